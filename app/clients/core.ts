/* eslint-disable max-classes-per-file */
import _ from 'lodash';
import env from '../util/env';
import { NotFoundError } from '../util/errors';
import { BASE_CONFORMANCE_CLASSES } from '../util/conformance';
import { getHrefBuilder } from '../util/url';
import HrefBuilder from '../util/href-builder';
import ApiExtension, { ExtensionName } from '../extensions/extension';
import RequestModel, { createPostRequestModel } from '../models/request-model';
import StacRequest from '../models/stac-request';
import {
  Collection, Collections, Conformance, Item, ItemCollection, LandingPage, MimeTypes,
} from '../models/stac';
import {
  CollectionUriRequest, ItemCollectionRequest, ItemUriRequest, SearchGetRequest, SearchPostRequest,
} from '../models/search';

export const QUERYABLES_REL = 'http://www.opengis.net/def/rel/ogc/1.0/queryables';

export interface CoreClientOptions {
  extensions?: ApiExtension[];
  baseConformanceClasses?: string[];
  landingPageId?: string;
  title?: string;
  description?: string;
  stacVersion?: string;
}

/**
 * State and behavior shared by the synchronous and asynchronous core client contracts: the
 * extension registry, conformance classes and landing page assembly
 */
export abstract class CoreClientBase {
  readonly extensions: ApiExtension[];

  readonly baseConformanceClasses: string[];

  readonly landingPageId: string;

  readonly title: string;

  readonly description: string;

  readonly stacVersion: string;

  // the composed POST search model, for backends that build search requests themselves
  readonly postRequestModel: RequestModel<SearchPostRequest>;

  /**
   * @param options - the extensions and landing page settings; settings default to the
   *   environment
   */
  constructor(options: CoreClientOptions = {}) {
    this.extensions = options.extensions ?? [];
    this.baseConformanceClasses = options.baseConformanceClasses ?? BASE_CONFORMANCE_CLASSES;
    this.landingPageId = options.landingPageId ?? env.stacApiLandingId;
    this.title = options.title ?? env.stacApiTitle;
    this.description = options.description ?? env.stacApiDescription;
    this.stacVersion = options.stacVersion ?? env.stacVersion;
    this.postRequestModel = createPostRequestModel(this.extensions);
  }

  /**
   * Returns the base conformance classes plus those of every extension, without duplicates
   */
  conformanceClasses(): string[] {
    return _.uniq([
      ...this.baseConformanceClasses,
      ...this.extensions.flatMap((ext) => ext.conformanceClasses),
    ]);
  }

  /**
   * Returns true if an extension with the given tag is registered
   *
   * @param name - the extension tag, e.g. `FilterExtension`
   */
  extensionIsEnabled(name: ExtensionName | string): boolean {
    return this.extensions.some((ext) => ext.name === name);
  }

  /**
   * Returns the first registered extension with the given tag
   *
   * @param name - the extension tag
   * @throws NotFoundError - if no such extension is registered
   */
  getExtension(name: ExtensionName | string): ApiExtension {
    const extension = this.extensions.find((ext) => ext.name === name);
    if (!extension) {
      throw new NotFoundError(`Extension ${name} not found`);
    }
    return extension;
  }

  /**
   * Returns the builder for links in the response to a request
   *
   * @param req - the client request
   */
  hrefBuilder(req: StacRequest): HrefBuilder {
    return getHrefBuilder(req);
  }

  /**
   * Builds the landing page
   *
   * @param hrefBuilder - builder for the links
   * @param collections - the collections to link to, in backend order
   * @returns the landing page
   */
  protected _landingPage(hrefBuilder: HrefBuilder, collections: Collection[]): LandingPage {
    const landingPage: LandingPage = {
      type: 'Catalog',
      id: this.landingPageId,
      title: this.title,
      description: this.description,
      stac_version: this.stacVersion,
      conformsTo: this.conformanceClasses(),
      links: [
        { rel: 'self', type: MimeTypes.json, href: hrefBuilder.build('./') },
        { rel: 'root', type: MimeTypes.json, href: hrefBuilder.build('./') },
        { rel: 'data', type: MimeTypes.json, href: hrefBuilder.build('collections') },
        {
          rel: 'conformance',
          type: MimeTypes.json,
          title: 'STAC/OGC conformance classes implemented by this server',
          href: hrefBuilder.build('conformance'),
        },
        {
          rel: 'search',
          type: MimeTypes.geojson,
          title: 'STAC search',
          href: hrefBuilder.build('search'),
          method: 'GET',
        },
        {
          rel: 'search',
          type: MimeTypes.geojson,
          title: 'STAC search',
          href: hrefBuilder.build('search'),
          method: 'POST',
        },
      ],
      stac_extensions: this.extensions
        .map((ext) => ext.schemaHref)
        .filter((href): href is string => !!href),
    };

    if (this.extensionIsEnabled(ExtensionName.FILTER)) {
      landingPage.links.push({
        rel: QUERYABLES_REL,
        type: MimeTypes.schemajson,
        title: 'Queryables',
        href: hrefBuilder.build('queryables'),
        method: 'GET',
      });
    }

    for (const collection of collections) {
      landingPage.links.push({
        rel: 'child',
        type: MimeTypes.json,
        title: collection.title || collection.id,
        href: hrefBuilder.build(`collections/${encodeURIComponent(collection.id)}`),
      });
    }

    landingPage.links.push({
      rel: 'service-desc',
      type: MimeTypes.openapi,
      title: 'OpenAPI service description',
      href: hrefBuilder.build('api'),
    });
    landingPage.links.push({
      rel: 'service-doc',
      type: MimeTypes.html,
      title: 'OpenAPI service documentation',
      href: hrefBuilder.build('api.html'),
    });
    return landingPage;
  }
}

/**
 * The contract a backend answering synchronously implements to serve the core STAC API
 */
export abstract class BaseCoreClient extends CoreClientBase {
  /**
   * Landing page, called with `GET /`
   *
   * @param req - the client request
   */
  landingPage(req: StacRequest): LandingPage {
    const { collections } = this.allCollections(req);
    return this._landingPage(this.hrefBuilder(req), collections);
  }

  /**
   * Conformance classes, called with `GET /conformance`
   */
  conformance(): Conformance {
    return { conformsTo: this.conformanceClasses() };
  }

  /**
   * Cross catalog search, called with `GET /search`
   */
  abstract getSearch(search: SearchGetRequest, req: StacRequest): ItemCollection;

  /**
   * Cross catalog search, called with `POST /search`
   */
  abstract postSearch(search: SearchPostRequest, req: StacRequest): ItemCollection;

  /**
   * Called with `GET /collections/{collectionId}/items/{itemId}`
   *
   * @throws NotFoundError - if the item does not exist
   */
  abstract getItem(request: ItemUriRequest, req: StacRequest): Item;

  /**
   * Called with `GET /collections`
   */
  abstract allCollections(req: StacRequest): Collections;

  /**
   * Called with `GET /collections/{collectionId}`
   *
   * @throws NotFoundError - if the collection does not exist
   */
  abstract getCollection(request: CollectionUriRequest, req: StacRequest): Collection;

  /**
   * Called with `GET /collections/{collectionId}/items`
   */
  abstract itemCollection(request: ItemCollectionRequest, req: StacRequest): ItemCollection;
}

/**
 * The contract a backend answering with promises implements to serve the core STAC API
 */
export abstract class AsyncBaseCoreClient extends CoreClientBase {
  /**
   * Landing page, called with `GET /`
   *
   * @param req - the client request
   */
  async landingPage(req: StacRequest): Promise<LandingPage> {
    const { collections } = await this.allCollections(req);
    return this._landingPage(this.hrefBuilder(req), collections);
  }

  /**
   * Conformance classes, called with `GET /conformance`
   */
  async conformance(): Promise<Conformance> {
    return { conformsTo: this.conformanceClasses() };
  }

  abstract getSearch(search: SearchGetRequest, req: StacRequest): Promise<ItemCollection>;

  abstract postSearch(search: SearchPostRequest, req: StacRequest): Promise<ItemCollection>;

  /**
   * @throws NotFoundError - if the item does not exist
   */
  abstract getItem(request: ItemUriRequest, req: StacRequest): Promise<Item>;

  abstract allCollections(req: StacRequest): Promise<Collections>;

  /**
   * @throws NotFoundError - if the collection does not exist
   */
  abstract getCollection(request: CollectionUriRequest, req: StacRequest): Promise<Collection>;

  abstract itemCollection(request: ItemCollectionRequest, req: StacRequest): Promise<ItemCollection>;
}

export type CoreClient = BaseCoreClient | AsyncBaseCoreClient;
