/* eslint-disable max-classes-per-file */
import _ from 'lodash';
import fs from 'fs';
import path from 'path';
import type { BBox } from 'geojson';
import StacApi, { StacApiOptions } from '../app/api';
import { AsyncBaseCoreClient, CoreClientOptions } from '../app/clients/core';
import { AsyncTransactionsClient } from '../app/clients/transaction';
import { AsyncFiltersClient, defaultQueryables } from '../app/clients/filter';
import {
  CrsExtension, FilterExtension, TokenPaginationExtension, TransactionExtension,
} from '../app/extensions';
import {
  Collection, Collections, Item, ItemCollection, Link, MimeTypes, Queryables,
} from '../app/models/stac';
import {
  CollectionUriRequest, ItemCollectionRequest, ItemUriRequest, SearchGetRequest, SearchPostRequest,
} from '../app/models/search';
import StacRequest from '../app/models/stac-request';
import HrefBuilder from '../app/util/href-builder';
import { ConflictError, NotFoundError, RequestValidationError } from '../app/util/errors';
import type { DatetimeInterval } from '../app/util/parameter-parsing';
import { getRequestUrl } from '../app/util/url';

export interface ExampleData {
  collections: Collection[];
  items: Item[];
}

/**
 * Reads the collections and items the example backend starts with
 */
export function loadExampleData(): ExampleData {
  const data: ExampleData = JSON.parse(fs.readFileSync(path.join(__dirname, 'data.json'), 'utf8'));
  return data;
}

interface ItemFilter {
  collections?: string[];
  ids?: string[];
  bbox?: BBox;
  datetime?: DatetimeInterval;
}

/**
 * Returns the 2D extent of a 2D or 3D bounding box as [west, south, east, north]
 *
 * @param bbox - the bounding box
 */
function _bbox2d(bbox: BBox): [number, number, number, number] {
  if (bbox.length === 6) {
    return [bbox[0], bbox[1], bbox[3], bbox[4]];
  }
  return [bbox[0], bbox[1], bbox[2], bbox[3]];
}

/**
 * Returns true if the item matches every criterion of the filter. Items without a bbox never
 * match a bbox criterion and items without a datetime never match a datetime criterion.
 *
 * @param item - the item
 * @param filter - the criteria
 */
export function itemMatches(item: Item, filter: ItemFilter): boolean {
  if (filter.collections?.length && !filter.collections.includes(item.collection ?? '')) {
    return false;
  }
  if (filter.ids?.length && !filter.ids.includes(item.id)) {
    return false;
  }
  if (filter.bbox) {
    if (!item.bbox) return false;
    const [west, south, east, north] = _bbox2d(filter.bbox);
    const [itemWest, itemSouth, itemEast, itemNorth] = _bbox2d(item.bbox);
    if (itemWest > east || itemEast < west || itemSouth > north || itemNorth < south) {
      return false;
    }
  }
  if (filter.datetime) {
    const value = item.properties?.datetime;
    if (typeof value !== 'string') return false;
    const time = new Date(value).getTime();
    const { start, end } = filter.datetime;
    if ((start && time < start.getTime()) || (end && time > end.getTime())) {
      return false;
    }
  }
  return true;
}

/**
 * Returns the offset encoded by a pagination token
 *
 * @param token - the `pt` parameter, if given
 * @throws RequestValidationError - if the token was not handed out by this backend
 */
function _offsetFromToken(token: unknown): number {
  if (token === undefined || token === null) return 0;
  if (typeof token === 'string' && /^\d+$/.test(token)) return parseInt(token, 10);
  throw new RequestValidationError(`Invalid pagination token ${JSON.stringify(token)}`);
}

/**
 * Keeps collections and items in memory. Serves as the transactions and queryables backend of
 * the example API.
 */
export class MemoryStore implements AsyncTransactionsClient, AsyncFiltersClient {
  private collections = new Map<string, Collection>();

  // items by collection, then by id, in insertion order
  private items = new Map<string, Map<string, Item>>();

  /**
   * @param data - the initial collections and items; copied, never modified
   */
  constructor(data: ExampleData = loadExampleData()) {
    for (const collection of _.cloneDeep(data.collections)) {
      this.collections.set(collection.id, collection);
      this.items.set(collection.id, new Map());
    }
    for (const item of _.cloneDeep(data.items)) {
      this._itemsOf(item.collection ?? '').set(item.id, item);
    }
  }

  /**
   * Returns the items of a collection
   *
   * @param collectionId - the collection
   * @throws NotFoundError - if the collection does not exist
   */
  private _itemsOf(collectionId: string): Map<string, Item> {
    const items = this.items.get(collectionId);
    if (!items) {
      throw new NotFoundError(`Collection ${collectionId} does not exist`);
    }
    return items;
  }

  listCollections(): Collection[] {
    return Array.from(this.collections.values());
  }

  /**
   * @throws NotFoundError - if the collection does not exist
   */
  findCollection(collectionId: string): Collection {
    const collection = this.collections.get(collectionId);
    if (!collection) {
      throw new NotFoundError(`Collection ${collectionId} does not exist`);
    }
    return collection;
  }

  /**
   * Returns every item of the given collections, or of all collections
   *
   * @param collectionIds - the collections; all when empty or absent
   */
  listItems(collectionIds?: string[]): Item[] {
    const ids = collectionIds?.length ? collectionIds : Array.from(this.items.keys());
    return ids.flatMap((id) => Array.from(this.items.get(id)?.values() ?? []));
  }

  /**
   * @throws NotFoundError - if the collection or the item does not exist
   */
  findItem(collectionId: string, itemId: string): Item {
    const item = this._itemsOf(collectionId).get(itemId);
    if (!item) {
      throw new NotFoundError(`Item ${itemId} does not exist in collection ${collectionId}`);
    }
    return item;
  }

  /**
   * Adds one item to a collection
   *
   * @throws ConflictError - if an item with the same id exists in the collection
   */
  private _addItem(collectionId: string, item: Item): Item {
    const items = this._itemsOf(collectionId);
    if (items.has(item.id)) {
      throw new ConflictError(`Item ${item.id} already exists in collection ${collectionId}`);
    }
    const stored = { ...item, collection: collectionId };
    items.set(item.id, stored);
    return stored;
  }

  async createItem(collectionId: string, item: Item | ItemCollection): Promise<Item | null> {
    if (item.type === 'FeatureCollection') {
      // check every id first so that a conflict adds nothing
      const items = this._itemsOf(collectionId);
      if (_.uniqBy(item.features, 'id').length !== item.features.length) {
        throw new RequestValidationError('Item ids must be unique within a feature collection');
      }
      const duplicate = item.features.find((feature) => items.has(feature.id));
      if (duplicate) {
        throw new ConflictError(`Item ${duplicate.id} already exists in collection ${collectionId}`);
      }
      for (const feature of item.features) {
        this._addItem(collectionId, feature);
      }
      return null;
    }
    return this._addItem(collectionId, item);
  }

  async updateItem(collectionId: string, itemId: string, item: Item): Promise<Item | null> {
    this.findItem(collectionId, itemId);
    if (item.id !== itemId) {
      throw new RequestValidationError(`The item id ${item.id} does not match the path item id ${itemId}`);
    }
    const stored = { ...item, collection: collectionId };
    this._itemsOf(collectionId).set(itemId, stored);
    return stored;
  }

  async deleteItem(collectionId: string, itemId: string): Promise<Item | null> {
    const item = this.findItem(collectionId, itemId);
    this._itemsOf(collectionId).delete(itemId);
    return item;
  }

  async createCollection(collection: Collection): Promise<Collection | null> {
    if (this.collections.has(collection.id)) {
      throw new ConflictError(`Collection ${collection.id} already exists`);
    }
    this.collections.set(collection.id, collection);
    this.items.set(collection.id, new Map());
    return collection;
  }

  async updateCollection(collectionId: string, collection: Collection): Promise<Collection | null> {
    this.findCollection(collectionId);
    if (collection.id !== collectionId) {
      throw new RequestValidationError(`The collection id ${collection.id} does not match the path collection id ${collectionId}`);
    }
    this.collections.set(collectionId, collection);
    return collection;
  }

  async deleteCollection(collectionId: string): Promise<Collection | null> {
    const collection = this.findCollection(collectionId);
    this.collections.delete(collectionId);
    this.items.delete(collectionId);
    return collection;
  }

  async getQueryables(collectionId: string | undefined, req: StacRequest): Promise<Queryables> {
    if (collectionId) {
      this.findCollection(collectionId);
    }
    return {
      ...defaultQueryables(),
      $id: getRequestUrl(req, false),
      properties: {
        id: { description: 'Item identifier', type: 'string' },
        collection: { description: 'Collection identifier', type: 'string' },
        datetime: { description: 'Acquisition time', type: 'string', format: 'date-time' },
        cloud_cover: { description: 'Cloud cover percentage', type: 'number', minimum: 0, maximum: 100 },
      },
    };
  }
}

/**
 * A core client searching the collections and items of a memory store. Searches filter by
 * collections, ids, bbox and datetime; other criteria are accepted and ignored.
 */
export class MemoryCoreClient extends AsyncBaseCoreClient {
  readonly store: MemoryStore;

  /**
   * @param store - the collections and items
   * @param options - the extensions and landing page settings
   */
  constructor(store: MemoryStore, options: CoreClientOptions = {}) {
    super(options);
    this.store = store;
  }

  /**
   * Returns a copy of the collection with links to itself, its items and the catalog
   */
  private _withCollectionLinks(collection: Collection, hrefBuilder: HrefBuilder): Collection {
    const base = `collections/${encodeURIComponent(collection.id)}`;
    return {
      ...collection,
      links: [
        { rel: 'self', type: MimeTypes.json, href: hrefBuilder.build(base) },
        { rel: 'parent', type: MimeTypes.json, href: hrefBuilder.build('./') },
        { rel: 'root', type: MimeTypes.json, href: hrefBuilder.build('./') },
        { rel: 'items', type: MimeTypes.geojson, href: hrefBuilder.build(`${base}/items`) },
      ],
    };
  }

  /**
   * Returns a copy of the item with links to itself, its collection and the catalog
   */
  private _withItemLinks(item: Item, hrefBuilder: HrefBuilder): Item {
    const collectionPath = `collections/${encodeURIComponent(item.collection ?? '')}`;
    return {
      ...item,
      links: [
        {
          rel: 'self',
          type: MimeTypes.geojson,
          href: hrefBuilder.build(`${collectionPath}/items/${encodeURIComponent(item.id)}`),
        },
        { rel: 'parent', type: MimeTypes.json, href: hrefBuilder.build(collectionPath) },
        { rel: 'collection', type: MimeTypes.json, href: hrefBuilder.build(collectionPath) },
        { rel: 'root', type: MimeTypes.json, href: hrefBuilder.build('./') },
      ],
    };
  }

  /**
   * Returns one page of the items matching the filter
   *
   * @param filter - the criteria
   * @param limit - the page size
   * @param token - the pagination token of the page
   * @param req - the client request
   * @param nextLink - builds the link to the next page from the offset of its first item
   */
  private _page(
    filter: ItemFilter,
    limit: number,
    token: unknown,
    req: StacRequest,
    nextLink: (offset: number) => Link,
  ): ItemCollection {
    const offset = _offsetFromToken(token);
    const hrefBuilder = this.hrefBuilder(req);
    const matched = this.store.listItems(filter.collections).filter((item) => itemMatches(item, filter));
    const features = matched.slice(offset, offset + limit).map((item) => this._withItemLinks(item, hrefBuilder));
    const links: Link[] = [{ rel: 'root', type: MimeTypes.json, href: hrefBuilder.build('./') }];
    if (offset + limit < matched.length) {
      links.push(nextLink(offset + limit));
    }
    return {
      type: 'FeatureCollection',
      features,
      links,
      numberMatched: matched.length,
      numberReturned: features.length,
      context: { returned: features.length, limit, matched: matched.length },
    };
  }

  async getSearch(search: SearchGetRequest, req: StacRequest): Promise<ItemCollection> {
    return this._page(search, search.limit, search.pt, req, (offset) => ({
      rel: 'next',
      type: MimeTypes.geojson,
      href: getRequestUrl(req, true, { pt: `${offset}` }),
      method: 'GET',
    }));
  }

  async postSearch(search: SearchPostRequest, req: StacRequest): Promise<ItemCollection> {
    const body: Record<string, unknown> = { ...req.body };
    return this._page(search, search.limit, search.pt, req, (offset) => ({
      rel: 'next',
      type: MimeTypes.geojson,
      href: this.hrefBuilder(req).build('search'),
      method: 'POST',
      body: { ...body, pt: `${offset}` },
    }));
  }

  async getItem(request: ItemUriRequest, req: StacRequest): Promise<Item> {
    const item = this.store.findItem(request.collectionId, request.itemId);
    return this._withItemLinks(item, this.hrefBuilder(req));
  }

  async allCollections(req: StacRequest): Promise<Collections> {
    const hrefBuilder = this.hrefBuilder(req);
    return {
      collections: this.store.listCollections()
        .map((collection) => this._withCollectionLinks(collection, hrefBuilder)),
      links: [
        { rel: 'root', type: MimeTypes.json, href: hrefBuilder.build('./') },
        { rel: 'self', type: MimeTypes.json, href: hrefBuilder.build('collections') },
      ],
    };
  }

  async getCollection(request: CollectionUriRequest, req: StacRequest): Promise<Collection> {
    const collection = this.store.findCollection(request.collectionId);
    return this._withCollectionLinks(collection, this.hrefBuilder(req));
  }

  async itemCollection(request: ItemCollectionRequest, req: StacRequest): Promise<ItemCollection> {
    this.store.findCollection(request.collectionId);
    const filter = { ...request, collections: [request.collectionId] };
    return this._page(filter, request.limit, request.pt, req, (offset) => ({
      rel: 'next',
      type: MimeTypes.geojson,
      href: getRequestUrl(req, true, { pt: `${offset}` }),
      method: 'GET',
    }));
  }
}

/**
 * Builds a STAC API over an in-memory store with the filter, CRS, transaction and token
 * pagination extensions
 *
 * @param data - the initial collections and items; defaults to example/data.json
 * @param options - API settings
 * @returns the API
 */
export function buildExampleApi(
  data: ExampleData = loadExampleData(), options: Omit<StacApiOptions, 'client'> = {},
): StacApi {
  const store = new MemoryStore(data);
  const extensions = [
    new FilterExtension(store),
    new CrsExtension(),
    new TransactionExtension(store),
    new TokenPaginationExtension(),
  ];
  const client = new MemoryCoreClient(store, { extensions });
  return new StacApi({ ...options, client });
}
