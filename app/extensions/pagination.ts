/* eslint-disable max-classes-per-file */
import ApiExtension, { ExtensionName, ExtensionOptions } from './extension';
import { bodyParameters, FieldDescriptor, queryParameters } from '../models/parameter-set';
import { paginationTokenField } from '../models/search';
import * as descriptions from '../models/descriptions';

export const tokenPaginationGetParameters = queryParameters('GETTokenPagination', [paginationTokenField]);
export const tokenPaginationPostParameters = bodyParameters('POSTTokenPagination', [paginationTokenField]);

const pageField: FieldDescriptor = { name: 'page', type: 'string', description: descriptions.PAGE };

export const paginationGetParameters = queryParameters('GETPagination', [pageField]);
export const paginationPostParameters = bodyParameters('POSTPagination', [pageField]);

/**
 * Pages through search results with an opaque token (`pt`) handed out by the backend
 */
export class TokenPaginationExtension extends ApiExtension {
  readonly name = ExtensionName.TOKEN_PAGINATION;

  /**
   * @param options - overrides of the defaults
   */
  constructor(options: ExtensionOptions = {}) {
    super([], { GET: tokenPaginationGetParameters, POST: tokenPaginationPostParameters }, options);
  }
}

/**
 * Pages through search results by page
 */
export class PaginationExtension extends ApiExtension {
  readonly name = ExtensionName.PAGINATION;

  /**
   * @param options - overrides of the defaults
   */
  constructor(options: ExtensionOptions = {}) {
    super([], { GET: paginationGetParameters, POST: paginationPostParameters }, options);
  }
}
