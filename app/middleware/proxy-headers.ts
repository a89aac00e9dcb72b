import { NextFunction, Response } from 'express';
import StacRequest from '../models/stac-request';
import {
  portSuffix, replaceHeaderValueByName, resolveForwardedParts, toHeaderList, toRawHeaders,
} from '../util/forwarded';

/**
 * Express.js middleware reconstructing the URL a client used to reach the service when it
 * sits behind a reverse proxy. The `Host` header is rewritten to the forwarded host and port
 * and the resolved parts are stored on the request context for building links.
 *
 * @param req - The client request
 * @param _res - The client response
 * @param next - The next function in the middleware chain
 */
export default function proxyHeaders(req: StacRequest, _res: Response, next: NextFunction): void {
  const headers = toHeaderList(req.rawHeaders);
  const { localAddress, localPort } = req.socket;
  const server: [string, number] | null = localAddress && localPort
    ? [localAddress, localPort]
    : null;
  const forwarded = resolveForwardedParts({ scheme: req.protocol, server, headers });
  req.context.forwarded = forwarded;
  req.context.logger.debug('Resolved forwarded request location', { forwarded });

  if (forwarded.host) {
    const host = `${forwarded.host}${portSuffix(forwarded.scheme, forwarded.port)}`;
    req.rawHeaders = toRawHeaders(replaceHeaderValueByName(headers, 'host', host));
    req.headers.host = host;
  }
  next();
}
