import { parsePort } from './string';
import type { ForwardingContext } from '../models/request-context';

/**
 * An ordered list of [name, value] header pairs as they arrived on the wire
 */
export type HeaderList = Array<[string, string]>;

/**
 * The parts of an incoming request needed to work out where a client believes the service lives
 */
export interface RequestScope {
  scheme: string;
  // the host and port of the socket that accepted the connection, if known
  server: [string, number] | null;
  headers: HeaderList;
}

// Directives within a single proxy element of a `Forwarded` header (RFC 7239)
const PROTO_DIRECTIVE = /\bproto="?(?<proto>https?)\b/i;
const HOST_DIRECTIVE = /\bhost="?(?<host>[\w.-]+)(?::(?<port>\d{1,5}))?/i;

// a host name, or a bracketed IPv6 literal
const HOST_NAME = /^(?:[\w.-]+|\[[0-9a-f:.]+\])$/i;
const SCHEMES = ['http', 'https'];

/**
 * Converts the flat `rawHeaders` array of a Node.js request into header pairs
 *
 * @param rawHeaders - alternating header names and values
 * @returns the header list
 */
export function toHeaderList(rawHeaders: string[]): HeaderList {
  const headers: HeaderList = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    headers.push([rawHeaders[i], rawHeaders[i + 1]]);
  }
  return headers;
}

/**
 * Converts header pairs back to the flat `rawHeaders` layout
 *
 * @param headers - the header list
 * @returns alternating header names and values
 */
export function toRawHeaders(headers: HeaderList): string[] {
  return headers.flatMap(([name, value]) => [name, value]);
}

/**
 * Returns the value of the first header with the given name, compared case-insensitively
 *
 * @param headers - the header list to search
 * @param name - the header name
 * @param defaultValue - returned when no header matches
 * @returns the header value, or the default value when the header is absent
 */
export function getHeaderValueByName(
  headers: HeaderList, name: string, defaultValue: string | null = null,
): string | null {
  const target = name.toLowerCase();
  const match = headers.find(([headerName]) => headerName.toLowerCase() === target);
  return match ? match[1] : defaultValue;
}

/**
 * Returns a copy of the header list where the named header has the given value. The first
 * matching header is replaced where it stands and later duplicates of it are dropped; when no
 * header matches, the header is appended. All other headers keep their order.
 *
 * @param headers - the original header list, left untouched
 * @param name - the header name, compared case-insensitively
 * @param value - the new value
 * @returns the new header list
 */
export function replaceHeaderValueByName(
  headers: HeaderList, name: string, value: string,
): HeaderList {
  const target = name.toLowerCase();
  const result: HeaderList = [];
  let replaced = false;
  for (const [headerName, headerValue] of headers) {
    if (headerName.toLowerCase() !== target) {
      result.push([headerName, headerValue]);
    } else if (!replaced) {
      result.push([headerName, value]);
      replaced = true;
    }
  }
  if (!replaced) {
    result.push([name, value]);
  }
  return result;
}

/**
 * Splits a `Host` header style value into the host and the port text, if any
 *
 * @param value - e.g. `example.com:8080` or `[::1]:8080`
 */
function _splitHost(value: string): [string, string | undefined] {
  // bracketed IPv6 literals contain colons of their own
  const match = /^(\[[^\]]*\]|[^:]*)(?::(.*))?$/.exec(value.trim());
  return match ? [match[1], match[2]] : [value, undefined];
}

/**
 * Returns the first element of a header that proxies append to, e.g. `https` for
 * `https, http`
 *
 * @param value - the header value, possibly null
 */
function _firstElement(value: string | null): string | null {
  if (value === null) return null;
  const first = value.split(',')[0].trim();
  return first || null;
}

/**
 * Works out the scheme, host, port and path prefix a client used to reach the service, taking
 * reverse proxy headers into account.
 *
 * A `Forwarded` header takes precedence over the `X-Forwarded-Host`, `X-Forwarded-Proto` and
 * `X-Forwarded-Port` headers, which take precedence over the `Host` header and finally the
 * server socket. Ports that are not integers, schemes other than http and https and host names
 * that are not valid are ignored, leaving the value found so far.
 *
 * @param scope - the scheme, server socket and headers of the request
 * @returns the forwarding context for the request
 */
export function resolveForwardedParts(scope: RequestScope): ForwardingContext {
  let scheme = scope.scheme || 'http';
  let host: string | null;
  let port: number | null;

  const headerHost = getHeaderValueByName(scope.headers, 'host');
  if (headerHost === null) {
    [host, port] = scope.server ?? [null, null];
  } else {
    let portText: string | undefined;
    [host, portText] = _splitHost(headerHost);
    port = parsePort(portText);
  }

  const forwarded = getHeaderValueByName(scope.headers, 'forwarded');
  if (forwarded !== null) {
    for (const proxy of forwarded.split(',')) {
      const protoMatch = PROTO_DIRECTIVE.exec(proxy);
      const hostMatch = HOST_DIRECTIVE.exec(proxy);
      if (protoMatch?.groups && hostMatch?.groups) {
        scheme = protoMatch.groups.proto.toLowerCase();
        host = hostMatch.groups.host;
        port = parsePort(hostMatch.groups.port) ?? port;
      }
    }
  } else {
    // chained proxies append their own values; the first is the one the client used
    const forwardedHost = _firstElement(getHeaderValueByName(scope.headers, 'x-forwarded-host'));
    if (forwardedHost !== null) {
      // only the host is taken; the port comes from X-Forwarded-Port
      const [name] = _splitHost(forwardedHost);
      if (HOST_NAME.test(name)) host = name;
    }
    const proto = _firstElement(getHeaderValueByName(scope.headers, 'x-forwarded-proto'))?.toLowerCase();
    if (proto !== undefined && SCHEMES.includes(proto)) scheme = proto;
    port = parsePort(_firstElement(getHeaderValueByName(scope.headers, 'x-forwarded-port'))) ?? port;
  }

  const pathPrefix = getHeaderValueByName(scope.headers, 'x-forwarded-prefix');
  return { scheme, host, port, pathPrefix };
}

/**
 * Returns the `:port` suffix for a host, empty when the port is unknown or is the default
 * port for the scheme
 *
 * @param scheme - http or https
 * @param port - the port, possibly null
 */
export function portSuffix(scheme: string, port: number | null): string {
  if (port === null) return '';
  if ((scheme === 'http' && port === 80) || (scheme === 'https' && port === 443)) return '';
  return `:${port}`;
}
