export { default as ApiExtension, ExtensionName } from './extension';
export type { ExtensionOptions } from './extension';
export { default as FilterExtension } from './filter';
export { default as CrsExtension } from './crs';
export { default as TransactionExtension } from './transaction';
export { TokenPaginationExtension, PaginationExtension } from './pagination';
