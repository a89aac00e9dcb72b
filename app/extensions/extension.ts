import type { HttpMethod, ParameterSet } from '../models/parameter-set';
import type { RequestModelSource } from '../models/request-model';
import type StacApi from '../api';

/**
 * Tags identifying each kind of API extension, used to look extensions up on a core client
 */
export enum ExtensionName {
  FILTER = 'FilterExtension',
  CRS = 'CrsExtension',
  TRANSACTION = 'TransactionExtension',
  TOKEN_PAGINATION = 'TokenPaginationExtension',
  PAGINATION = 'PaginationExtension',
}

export interface ExtensionOptions {
  // replaces the conformance classes the extension declares by default
  conformanceClasses?: string[];
  schemaHref?: string | null;
}

/**
 * An optional fragment of the STAC API. An extension declares the conformance classes it
 * implements, the request fields it adds to the search requests of each HTTP method and,
 * optionally, routes of its own.
 */
export default abstract class ApiExtension implements RequestModelSource {
  abstract readonly name: ExtensionName;

  readonly conformanceClasses: string[];

  readonly schemaHref: string | null;

  protected readonly requestModels: Partial<Record<HttpMethod, ParameterSet>>;

  /**
   * @param defaultConformanceClasses - the classes the extension implements
   * @param requestModels - the parameter set contributed for each HTTP method
   * @param options - overrides of the defaults
   */
  constructor(
    defaultConformanceClasses: string[],
    requestModels: Partial<Record<HttpMethod, ParameterSet>> = {},
    options: ExtensionOptions = {},
  ) {
    this.conformanceClasses = options.conformanceClasses ?? defaultConformanceClasses;
    this.schemaHref = options.schemaHref ?? null;
    this.requestModels = requestModels;
  }

  /**
   * Returns the parameter set the extension adds to search requests made with the given method
   *
   * @param httpMethod - GET or POST
   * @returns the parameter set, or null if the extension adds none
   */
  getRequestModel(httpMethod: HttpMethod): ParameterSet | null {
    return this.requestModels[httpMethod] ?? null;
  }

  /**
   * Adds the routes of the extension to the API. Extensions without routes do nothing.
   *
   * @param _api - the API being built
   */
  register(_api: StacApi): void {
    // no routes
  }
}
