import type StacApi from '../api';
import { emptyRequestModel } from '../models/request-model';
import { Collection, Item, ItemCollection, MimeTypes } from '../models/stac';
import { AsyncTransactionsClient, TransactionsClient } from '../clients/transaction';
import { RequestValidationError } from '../util/errors';

/**
 * Returns true if the value is a JSON object
 *
 * @param value - the value to check
 */
function _isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns true if the value is a complete STAC item
 *
 * @param value - the value to check
 */
export function isItem(value: unknown): value is Item {
  return _isObject(value)
    && value.type === 'Feature'
    && typeof value.id === 'string'
    && 'geometry' in value
    && _isObject(value.properties);
}

/**
 * Returns true if the value is a feature collection of complete STAC items
 *
 * @param value - the value to check
 */
export function isItemCollection(value: unknown): value is ItemCollection {
  return _isObject(value)
    && value.type === 'FeatureCollection'
    && Array.isArray(value.features)
    && value.features.every(isItem);
}

/**
 * Returns true if the value is a complete STAC collection
 *
 * @param value - the value to check
 */
export function isCollection(value: unknown): value is Collection {
  return _isObject(value)
    && value.type === 'Collection'
    && typeof value.id === 'string'
    && _isObject(value.extent);
}

/**
 * Returns the item or feature collection in a create item request
 *
 * @param body - the request body
 * @throws RequestValidationError - if the body is neither
 */
function itemsFromBody(body: unknown): Item | ItemCollection {
  if (isItem(body) || isItemCollection(body)) return body;
  throw new RequestValidationError('The request body must be a STAC Item (a GeoJSON Feature with an id, a geometry and properties) or a FeatureCollection of them');
}

/**
 * Returns the item in an update item request
 *
 * @param body - the request body
 * @throws RequestValidationError - if the body is not a complete item
 */
function itemFromBody(body: unknown): Item {
  if (isItem(body)) return body;
  throw new RequestValidationError('The request body must be a complete STAC Item; partial updates are not supported');
}

/**
 * Returns the collection in a create or update collection request
 *
 * @param body - the request body
 * @throws RequestValidationError - if the body is not a complete collection
 */
function collectionFromBody(body: unknown): Collection {
  if (isCollection(body)) return body;
  throw new RequestValidationError('The request body must be a complete STAC Collection with an id and an extent');
}

/**
 * Adds the create, update and delete routes for items and collections
 *
 * @param api - the API to add the routes to
 * @param client - the backend performing the changes
 */
export function addTransactionRoutes(
  api: StacApi, client: TransactionsClient | AsyncTransactionsClient,
): void {
  api.addRoute({
    method: 'post',
    path: '/collections/:collectionId/items',
    operationId: 'createItem',
    summary: 'Create Item',
    contentType: MimeTypes.geojson,
    successStatus: 201,
    requestModel: api.collectionUriRequestModel,
    requestBody: 'A STAC Item or a FeatureCollection of STAC Items',
    handler: ({ collectionId }, req) => client.createItem(collectionId, itemsFromBody(req.body), req),
  });

  api.addRoute({
    method: 'put',
    path: '/collections/:collectionId/items/:itemId',
    operationId: 'updateItem',
    summary: 'Update Item',
    contentType: MimeTypes.geojson,
    requestModel: api.itemUriRequestModel,
    requestBody: 'The complete STAC Item replacing the existing one',
    handler: ({ collectionId, itemId }, req) => (
      client.updateItem(collectionId, itemId, itemFromBody(req.body), req)
    ),
  });

  api.addRoute({
    method: 'delete',
    path: '/collections/:collectionId/items/:itemId',
    operationId: 'deleteItem',
    summary: 'Delete Item',
    contentType: MimeTypes.geojson,
    requestModel: api.itemUriRequestModel,
    handler: ({ collectionId, itemId }, req) => client.deleteItem(collectionId, itemId, req),
  });

  api.addRoute({
    method: 'post',
    path: '/collections',
    operationId: 'createCollection',
    summary: 'Create Collection',
    successStatus: 201,
    requestModel: emptyRequestModel,
    requestBody: 'A STAC Collection',
    handler: (_request, req) => client.createCollection(collectionFromBody(req.body), req),
  });

  api.addRoute({
    method: 'put',
    path: '/collections/:collectionId',
    operationId: 'updateCollection',
    summary: 'Update Collection',
    requestModel: api.collectionUriRequestModel,
    requestBody: 'The complete STAC Collection replacing the existing one',
    handler: ({ collectionId }, req) => (
      client.updateCollection(collectionId, collectionFromBody(req.body), req)
    ),
  });

  api.addRoute({
    method: 'delete',
    path: '/collections/:collectionId',
    operationId: 'deleteCollection',
    summary: 'Delete Collection',
    requestModel: api.collectionUriRequestModel,
    handler: ({ collectionId }, req) => client.deleteCollection(collectionId, req),
  });
}
