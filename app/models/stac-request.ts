import type { Request } from 'express';
import type RequestContext from './request-context';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      context: RequestContext;
    }
  }
}

/**
 * An Express request carrying the STAC API request context
 */
type StacRequest = Request;

export default StacRequest;
