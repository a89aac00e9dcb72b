import express, { Response } from 'express';
import asyncHandler from 'express-async-handler';
import env from './util/env';
import ApiExtension from './extensions/extension';
import { CoreClient } from './clients/core';
import RequestModel, { ConflictPolicy, composeRequestModel } from './models/request-model';
import {
  baseSearchGetParameters, baseSearchPostParameters, CollectionUriRequest, collectionUriParameters,
  ItemCollectionRequest, itemCollectionUriParameters, ItemUriRequest, itemUriParameters,
  SearchGetRequest, SearchPostRequest,
} from './models/search';
import StacRequest from './models/stac-request';
import { MimeTypes } from './models/stac';
import router from './routers/router';
import { addCoreRoutes } from './frontends/core';
import { addOpenApiRoutes } from './frontends/openapi';

export type RouteMethod = 'get' | 'post' | 'put' | 'delete';

/**
 * A route of the STAC API, as registered by the core API or by an extension
 */
export interface StacRoute<T = unknown> {
  method: RouteMethod;
  // Express path, e.g. `/collections/:collectionId`
  path: string;
  operationId: string;
  summary: string;
  // content type of successful responses
  contentType?: string;
  // status of successful responses with a body
  successStatus?: number;
  requestModel: RequestModel<T>;
  // description of a JSON request body the handler reads itself
  requestBody?: string;
  /**
   * Answers the request. A null or undefined result is answered with 204 No Content.
   */
  handler(request: T, req: StacRequest, res: Response): unknown;
}

/**
 * What is known about a registered route, used to describe the API
 */
export type StacRouteDescription = Omit<StacRoute, 'handler'>;

export interface StacApiOptions {
  client: CoreClient;
  // defaults to the extensions of the client
  extensions?: ApiExtension[];
  title?: string;
  description?: string;
  version?: string;
  enableProxyHeaders?: boolean;
  corsOrigins?: string;
  maxBodySize?: string;
  openapiUrl?: string;
  docsUrl?: string;
  // how to treat a request field declared differently by two extensions
  onFieldConflict?: ConflictPolicy;
}

/**
 * A STAC API served by an Express router. The request models of the search and item
 * collection routes are composed once from the extensions when the API is built.
 *
 * @example
 * const api = new StacApi({ client: new MyCoreClient({ extensions }) });
 * app.use('/', api.router);
 */
export default class StacApi {
  readonly client: CoreClient;

  readonly extensions: ApiExtension[];

  readonly title: string;

  readonly description: string;

  readonly version: string;

  readonly openapiUrl: string;

  readonly docsUrl: string;

  readonly router: express.Router;

  readonly routes: StacRouteDescription[] = [];

  readonly searchGetRequestModel: RequestModel<SearchGetRequest>;

  readonly searchPostRequestModel: RequestModel<SearchPostRequest>;

  readonly itemCollectionRequestModel: RequestModel<ItemCollectionRequest>;

  readonly collectionUriRequestModel: RequestModel<CollectionUriRequest>;

  readonly itemUriRequestModel: RequestModel<ItemUriRequest>;

  /**
   * Builds the API: composes the request models and registers the core routes, the routes of
   * every extension and the OpenAPI description
   *
   * @param options - the client, extensions and settings; settings default to the environment
   * @throws ConfigurationError - if the extensions contribute conflicting request fields
   */
  constructor(options: StacApiOptions) {
    this.client = options.client;
    this.extensions = options.extensions ?? options.client.extensions;
    this.title = options.title ?? env.stacApiTitle;
    this.description = options.description ?? env.stacApiDescription;
    this.version = options.version ?? env.stacVersion;
    this.openapiUrl = options.openapiUrl ?? env.openapiUrl;
    this.docsUrl = options.docsUrl ?? env.docsUrl;

    const onConflict = options.onFieldConflict ?? 'error';
    this.searchGetRequestModel = composeRequestModel(
      'SearchGetRequest', baseSearchGetParameters, this.extensions, [], 'GET', onConflict,
    );
    this.searchPostRequestModel = composeRequestModel(
      'SearchPostRequest', baseSearchPostParameters, this.extensions, [], 'POST', onConflict,
    );
    this.itemCollectionRequestModel = composeRequestModel(
      'ItemCollectionGetRequest', itemCollectionUriParameters, this.extensions, [], 'GET', onConflict,
    );
    this.collectionUriRequestModel = composeRequestModel('CollectionUri', collectionUriParameters);
    this.itemUriRequestModel = composeRequestModel('ItemUri', itemUriParameters);

    this.router = router({
      enableProxyHeaders: options.enableProxyHeaders ?? env.enableProxyHeaders,
      corsOrigins: options.corsOrigins ?? env.corsOrigins,
      maxBodySize: options.maxBodySize ?? env.maxBodySize,
    });
    addCoreRoutes(this);
    for (const extension of this.extensions) {
      extension.register(this);
    }
    addOpenApiRoutes(this);
  }

  /**
   * Adds a route to the API. The request is parsed with the route's request model before the
   * handler is called.
   *
   * @param route - the route
   */
  addRoute<T>(route: StacRoute<T>): void {
    const { handler, ...description } = route;
    this.routes.push(description);
    this.router[route.method](route.path, asyncHandler(async (req: StacRequest, res: Response) => {
      const request = route.requestModel.parse({ query: req.query, params: req.params, body: req.body });
      const result = await handler(request, req, res);
      if (result === null || result === undefined) {
        res.status(204).end();
        return;
      }
      res.status(route.successStatus ?? 200)
        .type(route.contentType ?? MimeTypes.json)
        .json(result);
    }));
  }
}
