import StacRequest from '../models/stac-request';
import { Queryables } from '../models/stac';

/**
 * Returns the queryables schema used when a backend describes none: a schema without
 * properties
 *
 * @returns the schema
 */
export function defaultQueryables(): Queryables {
  return {
    $schema: 'https://json-schema.org/draft/2019-09/schema',
    $id: 'https://example.org/queryables',
    type: 'object',
    title: 'Queryables for Example STAC API',
    description: 'Queryable names for the example STAC API Item Search filter.',
    properties: {},
  };
}

/**
 * The contract a synchronous backend implements to describe the properties usable in filter
 * expressions. Backends without their own description leave `getQueryables` out.
 */
export interface FiltersClient {
  /**
   * Called with `GET /queryables` or `GET /collections/{collectionId}/queryables`
   *
   * @param collectionId - the collection, absent for the queryables of all collections
   */
  getQueryables?(collectionId: string | undefined, req: StacRequest): Queryables;
}

/**
 * The contract a backend answering with promises implements to describe queryables
 */
export interface AsyncFiltersClient {
  getQueryables?(collectionId: string | undefined, req: StacRequest): Promise<Queryables>;
}

/**
 * Returns the queryables of a backend, or the default schema when it describes none
 *
 * @param client - the filters client
 * @param collectionId - the collection, if any
 * @param req - the client request
 */
export async function getQueryables(
  client: FiltersClient | AsyncFiltersClient, collectionId: string | undefined, req: StacRequest,
): Promise<Queryables> {
  if (client.getQueryables) {
    return client.getQueryables(collectionId, req);
  }
  return defaultQueryables();
}
