import express, { RequestHandler } from 'express';
import expressWinston from 'express-winston';
import { promisify } from 'util';
import { Server } from 'http';
import { Logger } from 'winston';
import StacApi from './api';
import errorHandler from './middleware/error-handler';
import logForRoutes from './middleware/log-for-routes';
import addRequestId from './middleware/request-id';
import StacRequest from './models/stac-request';
import { NotFoundError } from './util/errors';
import env from './util/env';
import logger from './util/log';
import { buildExampleApi } from '../example/memory-backend';

export interface ServerConfig {
  port?: number;
  hostBinding?: string;
}

/**
 * Returns middleware to log each request and its response
 *
 * @param appLogger - The application logger
 * @param ignorePaths - Don't log the request url and method if the req.path matches these patterns
 */
function addRequestLogger(appLogger: Logger, ignorePaths: RegExp[] = []): RequestHandler {
  return expressWinston.logger({
    winstonInstance: appLogger,
    headerBlacklist: ['authorization', 'cookie'],
    dynamicMeta(req: StacRequest) { return { requestId: req.context.id }; },
    ignoreRoute(req) { return ignorePaths.some((p) => p.test(req.path)); },
  });
}

/**
 * Builds the express application serving a STAC API, with request logging and JSON errors
 *
 * @param api - The STAC API to serve
 * @returns The express application
 */
export function buildApp(api: StacApi): express.Application {
  const appLogger = logger.child({ application: 'stac-api' });
  const app = express();
  app.disable('x-powered-by');
  // repeated query parameters arrive as arrays of strings, never as nested objects
  app.set('query parser', 'simple');

  app.use(addRequestId(appLogger));
  // health checks are too frequent to be worth logging
  const pingRegexp = /^\/_mgmt\/ping$/;
  app.use(addRequestLogger(appLogger, [pingRegexp]));
  // only searches are timed
  app.use(logForRoutes('timing.search-request.start', 'allow', [/\/search$/, /\/items$/]));

  app.use('/', api.router);
  app.use((req, _res, next) => next(new NotFoundError(`The requested page ${req.path} was not found`)));
  // Error handlers need to be mounted at the top level, not on a child router, or they get skipped.
  app.use(errorHandler);
  return app;
}

/**
 * Starts a server for the STAC API
 *
 * @param api - The STAC API to serve
 * @param config - The port and host network interface to bind against; defaults to the
 *   environment
 * @returns The running http.Server
 */
export function start(api: StacApi, config: ServerConfig = {}): Server {
  const port = config.port ?? env.port;
  const hostBinding = config.hostBinding ?? env.hostBinding;
  const app = buildApp(api);
  const server = app.listen(port, hostBinding, () => logger.info(`STAC API listening on ${hostBinding} on port ${port}`));
  return server;
}

/**
 * Stops a server created and returned by the start() method
 *
 * @param server - http.Server object as returned by start()
 * @returns A promise that completes when the server closes
 */
export async function stop(server: Server): Promise<void> {
  await promisify(server.close.bind(server))();
}

if (require.main === module) {
  // Log unhandled promise rejections and do not crash the node process
  process.on('unhandledRejection', (reason, promise) => {
    logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });
  start(buildExampleApi());
}
