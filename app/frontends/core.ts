import type StacApi from '../api';
import { emptyRequestModel } from '../models/request-model';
import { MimeTypes } from '../models/stac';

/**
 * Adds the routes of the core STAC API: landing page, conformance, collections, items and
 * item search
 *
 * @param api - the API to add the routes to
 */
export function addCoreRoutes(api: StacApi): void {
  const { client } = api;

  api.addRoute({
    method: 'get',
    path: '/',
    operationId: 'getLandingPage',
    summary: 'Landing Page',
    requestModel: emptyRequestModel,
    handler: (_request, req) => client.landingPage(req),
  });

  api.addRoute({
    method: 'get',
    path: '/conformance',
    operationId: 'getConformanceClasses',
    summary: 'Conformance Classes',
    requestModel: emptyRequestModel,
    handler: () => client.conformance(),
  });

  api.addRoute({
    method: 'get',
    path: '/collections',
    operationId: 'getCollections',
    summary: 'Get Collections',
    requestModel: emptyRequestModel,
    handler: (_request, req) => client.allCollections(req),
  });

  api.addRoute({
    method: 'get',
    path: '/collections/:collectionId',
    operationId: 'getCollection',
    summary: 'Get Collection',
    requestModel: api.collectionUriRequestModel,
    handler: (request, req) => client.getCollection(request, req),
  });

  api.addRoute({
    method: 'get',
    path: '/collections/:collectionId/items',
    operationId: 'getItemCollection',
    summary: 'Get ItemCollection',
    contentType: MimeTypes.geojson,
    requestModel: api.itemCollectionRequestModel,
    handler: (request, req) => client.itemCollection(request, req),
  });

  api.addRoute({
    method: 'get',
    path: '/collections/:collectionId/items/:itemId',
    operationId: 'getItem',
    summary: 'Get Item',
    contentType: MimeTypes.geojson,
    requestModel: api.itemUriRequestModel,
    handler: (request, req) => client.getItem(request, req),
  });

  api.addRoute({
    method: 'get',
    path: '/search',
    operationId: 'getSearch',
    summary: 'Search',
    contentType: MimeTypes.geojson,
    requestModel: api.searchGetRequestModel,
    handler: (request, req) => client.getSearch(request, req),
  });

  api.addRoute({
    method: 'post',
    path: '/search',
    operationId: 'postSearch',
    summary: 'Search',
    contentType: MimeTypes.geojson,
    requestModel: api.searchPostRequestModel,
    handler: (request, req) => client.postSearch(request, req),
  });
}
