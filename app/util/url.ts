import StacRequest from '../models/stac-request';
import HrefBuilder from './href-builder';
import { portSuffix } from './forwarded';

export type QueryOverrides = Record<string, string | string[] | undefined>;

/**
 * Returns the host (and port) the request was addressed to, falling back to the socket the
 * request arrived on when the client sent no `Host` header
 *
 * @param req - The incoming request
 */
function _getHost(req: StacRequest): string {
  const forwarded = req.context?.forwarded;
  if (forwarded?.host) {
    return `${forwarded.host}${portSuffix(forwarded.scheme, forwarded.port)}`;
  }
  return req.get('host') ?? `${req.socket.localAddress}:${req.socket.localPort}`;
}

/**
 * Normalizes a path prefix to start with a slash and not end with one, e.g. `rest/` to `/rest`
 *
 * @param prefix - the prefix, possibly null
 */
function _normalizePrefix(prefix: string | null | undefined): string {
  if (!prefix) return '';
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return trimmed ? `/${trimmed}` : '';
}

/**
 * Returns true if the URL is an absolute http or https URL with a host
 *
 * @param url - the URL to check
 */
function _isAbsoluteUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return /^https?:$/.test(parsed.protocol) && parsed.host !== '';
  } catch (e) {
    return false;
  }
}

/**
 * Returns the address of the socket the request arrived on
 *
 * @param req - The incoming request
 */
function _getSocketHost(req: StacRequest): string {
  const address = req.socket.localAddress ?? 'localhost';
  const host = address.includes(':') ? `[${address}]` : address;
  return `${host}:${req.socket.localPort}`;
}

/**
 * Returns the base URL of the STAC API serving the request, with a trailing slash. Behind a
 * reverse proxy this is the forwarded scheme, host, port and path prefix; in either case the
 * path the API router is mounted at is included. Forwarded values that do not make a valid URL
 * are dropped in favor of the request's own Host header, then of the socket it arrived on.
 *
 * @param req - The incoming request
 * @returns the base URL
 */
export function getBaseUrl(req: StacRequest): string {
  const scheme = req.context?.forwarded?.scheme ?? req.protocol;
  const prefix = _normalizePrefix(req.context?.forwarded?.pathPrefix);
  const baseUrl = `${scheme}://${_getHost(req)}${prefix}${req.baseUrl}/`;
  if (_isAbsoluteUrl(baseUrl)) return baseUrl;

  req.context?.logger.warn(`Ignoring request location ${baseUrl}, which is not a valid URL`);
  const hostHeader = req.get('host');
  const ownUrl = `${req.protocol}://${hostHeader}${req.baseUrl}/`;
  if (hostHeader && _isAbsoluteUrl(ownUrl)) return ownUrl;
  return `${req.protocol}://${_getSocketHost(req)}${req.baseUrl}/`;
}

/**
 * Returns an href builder for links in the response to the request
 *
 * @param req - The incoming request
 */
export function getHrefBuilder(req: StacRequest): HrefBuilder {
  return new HrefBuilder(getBaseUrl(req));
}

/**
 * Returns the full URL being accessed by the request, as seen by the client
 *
 * @param req - The incoming request whose URL should be gleaned
 * @param includeQuery - Include the query string in the returned URL (default: true)
 * @param queryOverrides - Key/value pairs to set / override in the query; undefined values
 *   remove the parameter
 * @returns The URL the incoming request is requesting
 */
export function getRequestUrl(
  req: StacRequest, includeQuery = true, queryOverrides: QueryOverrides = {},
): string {
  const url = new URL(getHrefBuilder(req).build(req.path));
  if (includeQuery) {
    const query: QueryOverrides = {};
    for (const [key, value] of Object.entries(req.query)) {
      if (typeof value === 'string') {
        query[key] = value;
      } else if (Array.isArray(value)) {
        query[key] = value.filter((v): v is string => typeof v === 'string');
      }
    }
    for (const [key, value] of Object.entries({ ...query, ...queryOverrides })) {
      for (const v of [value ?? []].flat()) {
        url.searchParams.append(key, v);
      }
    }
  }
  return url.href;
}
