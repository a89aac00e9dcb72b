import type { Logger } from 'winston';

/**
 * The externally visible location of the service as reconstructed from proxy headers
 */
export interface ForwardingContext {
  scheme: string;
  host: string | null;
  port: number | null;
  pathPrefix: string | null;
}

/**
 * Contains additional information about a request
 */
export default class RequestContext {
  id: string;

  logger: Logger;

  startTime: Date;

  /**
   * Set by the proxy headers middleware when the service runs behind a reverse proxy
   */
  forwarded?: ForwardingContext;

  /**
   * Creates an instance of RequestContext.
   *
   * @param id - request identifier
   * @param logger - the logger for the request
   */
  constructor(id: string, logger: Logger) {
    this.id = id;
    this.logger = logger;
    this.startTime = new Date();
  }
}
