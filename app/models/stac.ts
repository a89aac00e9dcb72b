import type { BBox, Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';

export enum MimeTypes {
  json = 'application/json',
  geojson = 'application/geo+json',
  schemajson = 'application/schema+json',
  openapi = 'application/vnd.oai.openapi+json;version=3.0',
  html = 'text/html',
}

export interface Link {
  href: string;
  rel: string;
  type?: string;
  title?: string;
  method?: 'GET' | 'POST';
  body?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface LandingPage {
  type: 'Catalog';
  id: string;
  title: string;
  description: string;
  stac_version: string;
  stac_extensions: string[];
  conformsTo: string[];
  links: Link[];
  [key: string]: unknown;
}

export interface Conformance {
  conformsTo: string[];
}

export interface Extent {
  spatial: { bbox: BBox[] };
  temporal: { interval: Array<[string | null, string | null]> };
}

export interface Collection {
  type: 'Collection';
  id: string;
  stac_version?: string;
  stac_extensions?: string[];
  title?: string;
  description?: string;
  license?: string;
  extent: Extent;
  links?: Link[];
  [key: string]: unknown;
}

export interface Collections {
  collections: Collection[];
  links: Link[];
  [key: string]: unknown;
}

export interface Item extends Feature<Geometry | null, GeoJsonProperties> {
  id: string;
  stac_version?: string;
  stac_extensions?: string[];
  collection?: string;
  links?: Link[];
  assets?: Record<string, Record<string, unknown>>;
  bbox?: BBox;
}

export interface ItemCollection extends FeatureCollection<Geometry | null, GeoJsonProperties> {
  features: Item[];
  links?: Link[];
  numberMatched?: number;
  numberReturned?: number;
  context?: { returned: number; limit?: number; matched?: number };
}

/**
 * A JSON schema describing the properties that can be used in filter expressions
 */
export interface Queryables {
  $schema: string;
  $id: string;
  type: 'object';
  title: string;
  description?: string;
  properties: Record<string, Record<string, unknown>>;
  additionalProperties?: boolean;
}
