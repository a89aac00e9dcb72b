import { Response, NextFunction } from 'express';
import {
  buildJsonErrorResponse, getCodeForError, getEndUserErrorMessage, getHttpStatusCode,
} from '../util/errors';
import StacRequest from '../models/stac-request';
import logger from '../util/log';

/**
 * Express.js middleware catching errors that escape route handling and sending them to users
 * as JSON
 *
 * @param err - The error that occurred
 * @param req - The client request
 * @param res - The client response
 * @param next - The next function in the middleware chain
 */
export default function errorHandler(
  err: Error, req: StacRequest, res: Response, next: NextFunction,
): void {
  if (res.headersSent) {
    // If the server has started writing the response, delegate to the
    // default error handler, which closes the connection and fails the
    // request
    next(err);
    return;
  }
  const statusCode = getHttpStatusCode(err);
  const requestLogger = req.context?.logger ?? logger;
  if (statusCode >= 500) {
    requestLogger.error(err);
  } else {
    requestLogger.warn(err.message);
  }
  res.status(statusCode).json(buildJsonErrorResponse(getCodeForError(err), getEndUserErrorMessage(err)));
}
