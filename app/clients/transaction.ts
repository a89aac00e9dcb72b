import StacRequest from '../models/stac-request';
import { Collection, Item, ItemCollection } from '../models/stac';

/**
 * The contract a synchronous backend implements to support the transaction extension.
 * Updates replace the whole resource; partial updates are not supported. A null result is
 * answered with no content.
 */
export interface TransactionsClient {
  /**
   * Called with `POST /collections/{collectionId}/items`
   *
   * @returns the created item, or null when a feature collection was given
   */
  createItem(collectionId: string, item: Item | ItemCollection, req: StacRequest): Item | null;

  /**
   * Called with `PUT /collections/{collectionId}/items/{itemId}`. The item must exist.
   */
  updateItem(collectionId: string, itemId: string, item: Item, req: StacRequest): Item | null;

  /**
   * Called with `DELETE /collections/{collectionId}/items/{itemId}`
   *
   * @returns the deleted item
   */
  deleteItem(collectionId: string, itemId: string, req: StacRequest): Item | null;

  /**
   * Called with `POST /collections`
   */
  createCollection(collection: Collection, req: StacRequest): Collection | null;

  /**
   * Called with `PUT /collections/{collectionId}`. The collection must exist.
   */
  updateCollection(collectionId: string, collection: Collection, req: StacRequest): Collection | null;

  /**
   * Called with `DELETE /collections/{collectionId}`
   *
   * @returns the deleted collection
   */
  deleteCollection(collectionId: string, req: StacRequest): Collection | null;
}

/**
 * The contract a backend answering with promises implements to support the transaction
 * extension
 */
export interface AsyncTransactionsClient {
  createItem(collectionId: string, item: Item | ItemCollection, req: StacRequest): Promise<Item | null>;

  updateItem(collectionId: string, itemId: string, item: Item, req: StacRequest): Promise<Item | null>;

  deleteItem(collectionId: string, itemId: string, req: StacRequest): Promise<Item | null>;

  createCollection(collection: Collection, req: StacRequest): Promise<Collection | null>;

  updateCollection(collectionId: string, collection: Collection, req: StacRequest): Promise<Collection | null>;

  deleteCollection(collectionId: string, req: StacRequest): Promise<Collection | null>;
}
