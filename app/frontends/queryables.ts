import type StacApi from '../api';
import { emptyRequestModel } from '../models/request-model';
import { MimeTypes } from '../models/stac';
import { AsyncFiltersClient, FiltersClient, getQueryables } from '../clients/filter';

/**
 * Adds the routes describing the properties usable in filter expressions
 *
 * @param api - the API to add the routes to
 * @param client - the backend describing the queryables
 */
export function addQueryablesRoutes(api: StacApi, client: FiltersClient | AsyncFiltersClient): void {
  api.addRoute({
    method: 'get',
    path: '/queryables',
    operationId: 'getQueryables',
    summary: 'Queryables',
    contentType: MimeTypes.schemajson,
    requestModel: emptyRequestModel,
    handler: (_request, req) => getQueryables(client, undefined, req),
  });

  api.addRoute({
    method: 'get',
    path: '/collections/:collectionId/queryables',
    operationId: 'getCollectionQueryables',
    summary: 'Collection Queryables',
    contentType: MimeTypes.schemajson,
    requestModel: api.collectionUriRequestModel,
    handler: ({ collectionId }, req) => getQueryables(client, collectionId, req),
  });
}
