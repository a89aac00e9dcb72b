// Human-readable parameter descriptions, shown in the OpenAPI document

export const COLLECTIONS = 'Array of collection ids to search';
export const IDS = 'Array of item ids to return';
export const BBOX = 'Only return items intersecting this bounding box, given as 4 or 6 numbers: '
  + 'lower left then upper right corner, optionally with elevations';
export const DATETIME = 'Only return items with a date-time or date-time range intersecting this '
  + 'RFC 3339 date-time or interval, e.g. `2018-02-12T00:00:00Z/2018-03-18T12:31:12Z`, '
  + '`../2018-03-18T12:31:12Z` or `2018-02-12T00:00:00Z/..`';
export const LIMIT = 'The maximum number of results to return (page size)';
export const QUERY = 'Query expression on item properties';
export const PAGINATION_TOKEN = 'Opaque token used to fetch the next page of results';
export const PAGE = 'Page of results to return';
export const FIELDS = 'Properties to include or exclude from the returned items';
export const SORTBY = 'Properties to sort the results by';
export const INTERSECTS = 'Only return items intersecting this GeoJSON geometry';
export const COLLECTION_ID = 'Collection identifier';
export const ITEM_ID = 'Item identifier';
export const CRS = 'The coordinate reference system of returned geometries';
export const BBOX_CRS = 'The coordinate reference system of the `bbox` parameter';
export const FILTER = 'A CQL filter expression for filtering items';
export const FILTER_LANG = 'The language of the `filter` expression';
export const FILTER_CRS = 'The coordinate reference system of geometries in the `filter` expression';
