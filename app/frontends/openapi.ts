import _ from 'lodash';
import path from 'path';
import swaggerUi from 'swagger-ui-express';
import { NextFunction, Response } from 'express';
import type StacApi from '../api';
import type { StacRouteDescription } from '../api';
import { FieldDescriptor, RequestKind } from '../models/parameter-set';
import { MimeTypes } from '../models/stac';
import StacRequest from '../models/stac-request';
import { getBaseUrl } from '../util/url';
import { wireName } from '../util/parameter-parsing';

type JsonSchema = Record<string, unknown>;

/**
 * Returns the JSON schema of a request field
 *
 * @param field - the field
 * @param kind - whether the field is read from the query string or a JSON body
 * @returns the schema
 */
export function fieldSchema(field: FieldDescriptor, kind: RequestKind): JsonSchema {
  const inQuery = kind === RequestKind.QUERY;
  let schema: JsonSchema;
  switch (field.type) {
    case 'string[]':
      schema = { type: 'array', items: { type: 'string' } };
      break;
    case 'bbox':
      schema = { type: 'array', items: { type: 'number' }, minItems: 4, maxItems: 6 };
      break;
    case 'datetime':
      schema = { type: 'string' };
      break;
    case 'json':
      schema = inQuery ? { type: 'string', format: 'json' } : {};
      break;
    case 'geometry':
      schema = inQuery ? { type: 'string', format: 'json' } : { type: 'object' };
      break;
    default:
      schema = { type: field.type };
  }

  const {
    gt, ge, lt, le, multipleOf, minLength, maxLength, minItems, maxItems, pattern,
  } = field.constraints ?? {};
  Object.assign(schema, _.omitBy({
    title: field.title,
    description: field.description,
    minimum: ge ?? gt,
    exclusiveMinimum: gt !== undefined ? true : undefined,
    maximum: le ?? lt,
    exclusiveMaximum: lt !== undefined ? true : undefined,
    multipleOf,
    minLength,
    maxLength,
    minItems,
    maxItems,
    pattern,
    enum: field.constraints?.enum,
    default: field.default,
  }, _.isUndefined));
  return { ...schema, ...field.extra };
}

/**
 * Converts an Express route path to an OpenAPI path, e.g. `/collections/:collectionId` to
 * `/collections/{collectionId}`
 *
 * @param routePath - the Express path
 */
export function toOpenApiPath(routePath: string): string {
  return routePath.replace(/:(\w+)/g, '{$1}');
}

/**
 * Describes one operation
 *
 * @param route - the route
 */
function _operation(route: StacRouteDescription): JsonSchema {
  const { requestModel } = route;
  const operation: JsonSchema = {
    operationId: route.operationId,
    summary: route.summary,
  };
  if (requestModel.kind === RequestKind.QUERY) {
    operation.parameters = requestModel.fields.map((field) => ({
      name: wireName(field),
      in: field.in ?? 'query',
      required: field.in === 'path' || !!field.required,
      description: field.description,
      schema: fieldSchema(field, RequestKind.QUERY),
      ...(field.type === 'string[]' || field.type === 'bbox' ? { style: 'form', explode: false } : {}),
    }));
  } else {
    operation.requestBody = {
      required: true,
      content: {
        [MimeTypes.json]: {
          schema: {
            title: requestModel.name,
            type: 'object',
            properties: Object.fromEntries(requestModel.fields.map((field) => [
              wireName(field), fieldSchema(field, RequestKind.BODY),
            ])),
            required: requestModel.fields.filter((f) => f.required).map(wireName),
          },
        },
      },
    };
  }
  if (route.requestBody) {
    operation.requestBody = {
      required: true,
      description: route.requestBody,
      content: { [MimeTypes.json]: { schema: { type: 'object' } } },
    };
  }
  const status = `${route.successStatus ?? 200}`;
  operation.responses = {
    [status]: {
      description: 'Successful Response',
      content: { [route.contentType ?? MimeTypes.json]: { schema: { type: 'object' } } },
    },
    204: { description: 'No Content' },
    400: { description: 'Invalid request' },
    404: { description: 'Not found' },
  };
  return operation;
}

/**
 * Builds the OpenAPI 3.0 description of the routes of an API
 *
 * @param api - the API
 * @param baseUrl - the URL the API is served from
 * @returns the OpenAPI document
 */
export function buildOpenApiDocument(api: StacApi, baseUrl: string): JsonSchema {
  const paths: Record<string, Record<string, JsonSchema>> = {};
  for (const route of api.routes) {
    const openApiPath = toOpenApiPath(route.path);
    paths[openApiPath] = { ...paths[openApiPath], [route.method]: _operation(route) };
  }
  return {
    openapi: '3.0.3',
    info: { title: api.title, description: api.description, version: api.version },
    servers: [{ url: baseUrl.replace(/\/$/, '') }],
    paths,
  };
}

/**
 * Adds the OpenAPI description of the API and the Swagger UI documentation page
 *
 * @param api - the API
 */
export function addOpenApiRoutes(api: StacApi): void {
  api.router.get(api.openapiUrl, (req: StacRequest, res: Response) => {
    res.type(MimeTypes.openapi).json(buildOpenApiDocument(api, getBaseUrl(req)));
  });

  // The page loads its assets relative to itself, so it needs a trailing slash
  const redirectToSlash = (req: StacRequest, res: Response, next: NextFunction): void => {
    if (req.path === '/' && !req.originalUrl.split('?')[0].endsWith('/')) {
      res.redirect(301, getBaseUrl(req));
      return;
    }
    next();
  };
  const swaggerUrl = path.posix.relative(api.docsUrl, api.openapiUrl);
  api.router.use(
    api.docsUrl,
    redirectToSlash,
    swaggerUi.serve,
    swaggerUi.setup(null, { swaggerUrl, customSiteTitle: api.title }),
  );
}
