import { ConfigurationError } from './errors';

/**
 * Turns relative link targets into absolute URLs under a base URL. A base URL may carry a path
 * prefix (e.g. one set by a reverse proxy), which every built link keeps.
 */
export default class HrefBuilder {
  readonly baseUrl: string;

  /**
   * @param baseUrl - absolute URL with a scheme and a host
   * @throws ConfigurationError if the URL is not absolute
   */
  constructor(baseUrl: string) {
    let parsed: URL;
    try {
      parsed = new URL(baseUrl);
    } catch (_) {
      throw new ConfigurationError(`Base URL "${baseUrl}" must include a scheme and host`);
    }
    if (!/^https?:$/.test(parsed.protocol) || !parsed.host) {
      throw new ConfigurationError(`Base URL "${baseUrl}" must include a scheme and host`);
    }
    parsed.search = '';
    parsed.hash = '';
    this.baseUrl = parsed.href.endsWith('/') ? parsed.href : `${parsed.href}/`;
  }

  /**
   * Builds an absolute URL. `./`, a leading `/` and the empty path are all relative to the
   * base URL.
   *
   * @param relativePath - path below the base URL, e.g. `collections/a/items`
   * @returns the absolute URL
   */
  build(relativePath = ''): string {
    const path = relativePath.replace(/^(\.\/|\/)+/, '');
    return new URL(path, this.baseUrl).href;
  }
}
