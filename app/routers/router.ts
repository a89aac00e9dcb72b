import express, { NextFunction, RequestHandler, Response } from 'express';
import cors from 'cors';
import log from '../util/log';
import { HttpError, RequestValidationError } from '../util/errors';
import addRequestId from '../middleware/request-id';
import proxyHeaders from '../middleware/proxy-headers';
import StacRequest from '../models/stac-request';

export interface RouterConfig {
  // True if forwarding headers from a reverse proxy are used when building links
  enableProxyHeaders: boolean;
  // `*` or a comma-separated list of allowed origins
  corsOrigins: string;
  // largest accepted request body, e.g. `1mb`
  maxBodySize: string;
}

/**
 * Given an Express.js middleware handler function, returns another
 * Express.js handler that wraps the input function with logging
 * information and ensures the logger accessed by the input function
 * describes the middleware that produced it.
 *
 * @param fn - The middleware handler to wrap with logging
 * @returns The handler wrapped with logging information
 */
function logged(fn: RequestHandler): RequestHandler {
  const scope = `middleware.${fn.name}`;
  return (req: StacRequest, res: Response, next: NextFunction): void => {
    const { logger } = req.context;
    const child = logger.child({ component: scope });
    req.context.logger = child;
    const startTime = new Date().getTime();
    try {
      child.debug('Invoking middleware');
      fn(req, res, next);
    } finally {
      const msTaken = new Date().getTime() - startTime;
      child.debug('Completed middleware', { durationMs: msTaken });
      if (req.context.logger === child) {
        // Other middlewares may have changed the logger when `next()` ran synchronously
        req.context.logger = logger;
      }
    }
  };
}

/**
 * Returns middleware parsing JSON request bodies, reporting bodies that cannot be parsed as
 * client errors
 *
 * @param limit - the largest accepted body
 */
function jsonBody(limit: string): RequestHandler {
  const parse = express.json({ limit, type: ['application/json', 'application/*+json'] });
  return function jsonBodyParser(req: StacRequest, res: Response, next: NextFunction): void {
    parse(req, res, (err?: unknown) => {
      if (!err) {
        next();
      } else if (err instanceof Error && 'status' in err && err.status === 413) {
        next(new HttpError(413, `The request body is larger than ${limit}`));
      } else {
        const message = err instanceof Error ? err.message : `${err}`;
        next(new RequestValidationError(`The request body is not valid JSON: ${message}`));
      }
    });
  };
}

/**
 * Returns the CORS origin setting for a configured origin list
 *
 * @param corsOrigins - `*` or a comma-separated list of origins
 */
function corsOrigin(corsOrigins: string): string | string[] {
  const origins = corsOrigins.split(',').map((o) => o.trim()).filter((o) => o);
  return origins.length === 1 ? origins[0] : origins;
}

/**
 * Creates and returns an express.Router instance with the middleware every STAC API route
 * needs. Routes are added to it by the API and its extensions.
 *
 * @param config - Config that controls whether certain middleware will be used
 * @returns The router
 */
export default function router(config: RouterConfig): express.Router {
  const result = express.Router();

  // The request context is normally set by the server; routers mounted elsewhere set it here
  result.use(addRequestId(log.child({ application: 'stac-api' })));
  if (config.enableProxyHeaders) {
    result.use(logged(proxyHeaders));
  }
  result.use(cors({ origin: corsOrigin(config.corsOrigins) }));
  result.use(jsonBody(config.maxBodySize));

  result.get('/_mgmt/ping', (_req, res) => {
    res.json({ message: 'PONG' });
  });
  return result;
}
