import type { BBox, Geometry } from 'geojson';
import env from '../util/env';
import { CRS84, SUPPORTED_CRS } from '../util/conformance';
import type { DatetimeInterval } from '../util/parameter-parsing';
import {
  bodyParameters, FieldDescriptor, ParameterSet, queryParameters,
} from './parameter-set';
import * as descriptions from './descriptions';

//
// Parameter sets of the core STAC API requests. Extensions contribute further sets, which the
// request model composer merges with these.
//

export const collectionsField: FieldDescriptor = {
  name: 'collections', type: 'string[]', description: descriptions.COLLECTIONS,
};
export const idsField: FieldDescriptor = { name: 'ids', type: 'string[]', description: descriptions.IDS };
export const bboxField: FieldDescriptor = { name: 'bbox', type: 'bbox', description: descriptions.BBOX };
export const datetimeField: FieldDescriptor = {
  name: 'datetime', type: 'datetime', description: descriptions.DATETIME,
};
export const limitField: FieldDescriptor = {
  name: 'limit',
  type: 'integer',
  description: descriptions.LIMIT,
  default: env.defaultSearchLimit,
  constraints: { ge: 1, le: env.maxSearchLimit },
};
export const paginationTokenField: FieldDescriptor = {
  name: 'pt', type: 'string', description: descriptions.PAGINATION_TOKEN,
};
export const crsField: FieldDescriptor = {
  name: 'crs',
  type: 'string',
  description: descriptions.CRS,
  default: CRS84,
  constraints: { enum: SUPPORTED_CRS },
};
export const bboxCrsField: FieldDescriptor = {
  name: 'bboxCrs',
  alias: 'bbox-crs',
  type: 'string',
  description: descriptions.BBOX_CRS,
  default: CRS84,
  constraints: { enum: SUPPORTED_CRS },
};
export const collectionIdField: FieldDescriptor = {
  name: 'collectionId', type: 'string', in: 'path', required: true, description: descriptions.COLLECTION_ID,
};
export const itemIdField: FieldDescriptor = {
  name: 'itemId', type: 'string', in: 'path', required: true, description: descriptions.ITEM_ID,
};

export const baseSearchGetParameters: ParameterSet = queryParameters('BaseSearchGetRequest', [
  collectionsField,
  idsField,
  bboxField,
  datetimeField,
  limitField,
  { name: 'query', type: 'json', description: descriptions.QUERY },
  paginationTokenField,
  { name: 'fields', type: 'string[]', description: descriptions.FIELDS },
  { name: 'sortby', type: 'string[]', description: descriptions.SORTBY },
  { name: 'intersects', type: 'geometry', description: descriptions.INTERSECTS },
]);

export const baseSearchPostParameters: ParameterSet = bodyParameters('BaseSearchPostRequest', [
  collectionsField,
  idsField,
  bboxField,
  datetimeField,
  limitField,
  { name: 'query', type: 'json', description: descriptions.QUERY },
  paginationTokenField,
  { name: 'fields', type: 'json', description: descriptions.FIELDS },
  { name: 'sortby', type: 'json', description: descriptions.SORTBY },
  { name: 'intersects', type: 'geometry', description: descriptions.INTERSECTS },
]);

export const collectionUriParameters: ParameterSet = queryParameters('CollectionUri', [
  collectionIdField,
]);

export const itemUriParameters: ParameterSet = queryParameters('ItemUri', [
  collectionIdField,
  itemIdField,
  crsField,
]);

export const itemCollectionUriParameters: ParameterSet = queryParameters('ItemCollectionUri', [
  collectionIdField,
  limitField,
  bboxField,
  datetimeField,
  crsField,
  bboxCrsField,
]);

/**
 * Fields shared by parsed GET and POST search requests. Extension fields appear under their
 * own names.
 */
interface SearchRequestBase {
  collections?: string[];
  ids?: string[];
  bbox?: BBox;
  datetime?: DatetimeInterval;
  limit: number;
  query?: unknown;
  pt?: string;
  intersects?: Geometry;
  [field: string]: unknown;
}

export interface SearchGetRequest extends SearchRequestBase {
  fields?: string[];
  sortby?: string[];
}

export interface SearchPostRequest extends SearchRequestBase {
  fields?: unknown;
  sortby?: unknown;
}

export interface CollectionUriRequest {
  collectionId: string;
}

export interface ItemUriRequest {
  collectionId: string;
  itemId: string;
  crs: string;
}

export interface ItemCollectionRequest {
  collectionId: string;
  limit: number;
  bbox?: BBox;
  datetime?: DatetimeInterval;
  crs: string;
  bboxCrs: string;
  [field: string]: unknown;
}
