import { NextFunction, RequestHandler, Response } from 'express';
import { v4 as uuid } from 'uuid';
import { Logger } from 'winston';
import RequestContext from '../models/request-context';
import StacRequest from '../models/stac-request';

/**
 * Returns middleware to set a request context with a request id and a request specific
 * logger, if the request does not already have one set. Also adds requestUrl to the logger
 * info object.
 *
 * @param appLogger - The application logger the request logger derives from
 */
export default function addRequestId(appLogger: Logger): RequestHandler {
  return (req: StacRequest, _res: Response, next: NextFunction): void => {
    if (!req.context) {
      const requestId = uuid();
      const requestUrl = req.url;
      req.context = new RequestContext(requestId, appLogger.child({ requestId, requestUrl }));
    }
    next();
  };
}
