import ApiExtension, { ExtensionName, ExtensionOptions } from './extension';
import type StacApi from '../api';
import { AsyncFiltersClient, FiltersClient } from '../clients/filter';
import { addQueryablesRoutes } from '../frontends/queryables';
import { bodyParameters, FieldDescriptor, queryParameters } from '../models/parameter-set';
import * as descriptions from '../models/descriptions';
import { CRS84, SUPPORTED_CRS } from '../util/conformance';

export const FILTER_CONFORMANCE_CLASSES = [
  'https://api.stacspec.org/v1.0.0-rc.2/item-search#filter',
  'http://www.opengis.net/spec/ogcapi-features-3/1.0/conf/filter',
  'http://www.opengis.net/spec/ogcapi-features-3/1.0/conf/features-filter',
  'http://www.opengis.net/spec/cql2/1.0/conf/basic-cql2',
  'http://www.opengis.net/spec/cql2/1.0/conf/cql2-json',
];

const filterCrsField: FieldDescriptor = {
  name: 'filterCrs',
  alias: 'filter-crs',
  type: 'string',
  description: descriptions.FILTER_CRS,
  default: CRS84,
  constraints: { enum: SUPPORTED_CRS },
};

const filterLangField: FieldDescriptor = {
  name: 'filterLang',
  alias: 'filter-lang',
  type: 'string',
  description: descriptions.FILTER_LANG,
  default: 'cql-json',
  constraints: { enum: ['cql-json'] },
};

export const filterGetParameters = queryParameters('FilterExtensionGetRequest', [
  { name: 'filter', type: 'string', description: descriptions.FILTER },
  filterCrsField,
  filterLangField,
]);

export const filterPostParameters = bodyParameters('FilterExtensionPostRequest', [
  { name: 'filter', type: 'json', description: descriptions.FILTER },
  filterCrsField,
  filterLangField,
]);

/**
 * Filters item searches with CQL expressions and describes the queryable properties at
 * `/queryables` and `/collections/{collectionId}/queryables`
 */
export default class FilterExtension extends ApiExtension {
  readonly name = ExtensionName.FILTER;

  readonly client: FiltersClient | AsyncFiltersClient;

  /**
   * @param client - the backend describing queryables; by default every collection has the
   *   default queryables schema
   * @param options - overrides of the defaults
   */
  constructor(client: FiltersClient | AsyncFiltersClient = {}, options: ExtensionOptions = {}) {
    super(FILTER_CONFORMANCE_CLASSES, { GET: filterGetParameters, POST: filterPostParameters }, options);
    this.client = client;
  }

  register(api: StacApi): void {
    addQueryablesRoutes(api, this.client);
  }
}
