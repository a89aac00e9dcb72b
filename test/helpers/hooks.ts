import { before, after } from 'mocha';
import { Server } from 'http';
import request from 'supertest';

/**
 * Adds before / after hooks to execute an HTTP request against the STAC API and setting the
 * result to this.res
 *
 * @param requestFn - Builds the request given the server under test (this.frontend)
 */
export function hookRequest(requestFn: (app: Server) => request.Test): void {
  before(async function () {
    this.res = await requestFn(this.frontend);
  });
  after(function () {
    delete this.res;
  });
}

/**
 * Adds before / after hooks to GET a URL of the STAC API
 *
 * @param url - the path to request
 * @param query - Mapping of query param names to values
 * @param headers - Additional request headers
 */
export function hookUrl(url: string, query: object = {}, headers: Record<string, string> = {}): void {
  hookRequest((app) => request(app).get(url).query(query).set(headers));
}

/**
 * Adds before / after hooks to POST a JSON body to a URL of the STAC API
 *
 * @param url - the path to request
 * @param body - the request body
 */
export function hookPost(url: string, body: object): void {
  hookRequest((app) => request(app).post(url).send(body));
}
