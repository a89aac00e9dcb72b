import { expect } from 'chai';
import { describe, it } from 'mocha';
import RequestModel, {
  composeRequestModel, createGetRequestModel, createPostRequestModel, mergeFields,
  RequestModelSource,
} from '../../app/models/request-model';
import {
  bodyParameters, HttpMethod, ParameterSet, queryParameters, RequestKind,
} from '../../app/models/parameter-set';
import { ConfigurationError, RequestValidationError } from '../../app/util/errors';
import { CRS84 } from '../../app/util/conformance';
import { itemCollectionUriParameters } from '../../app/models/search';
import { CrsExtension, FilterExtension, TokenPaginationExtension } from '../../app/extensions';

/**
 * Returns a request model source contributing the given parameter sets
 *
 * @param sets - the parameter set for each HTTP method
 */
function source(sets: Partial<Record<HttpMethod, ParameterSet>>): RequestModelSource {
  return { getRequestModel: (method) => sets[method] ?? null };
}

describe('Request model composition', function () {
  describe('composing the GET search model with extensions', function () {
    const model = createGetRequestModel([new FilterExtension(), new CrsExtension(), new TokenPaginationExtension()]);

    it('is a query model', function () {
      expect(model.kind).to.equal(RequestKind.QUERY);
    });

    it('contains the union of the fields in precedence order', function () {
      expect(model.fields.map((f) => f.name)).to.eql([
        'collections', 'ids', 'bbox', 'datetime', 'limit', 'query', 'pt', 'fields', 'sortby',
        'intersects', 'filter', 'filterCrs', 'filterLang', 'crs', 'bboxCrs',
      ]);
    });

    it('keeps a field declared identically by two sets once', function () {
      expect(model.fields.filter((f) => f.name === 'pt')).to.have.length(1);
    });

    it('cannot be modified', function () {
      expect(Object.isFrozen(model.fields)).to.equal(true);
    });
  });

  describe('composing the POST search model with extensions', function () {
    const model = createPostRequestModel([new FilterExtension()]);

    it('is a body model', function () {
      expect(model.kind).to.equal(RequestKind.BODY);
    });

    it('keeps the base parameter set as its parent', function () {
      expect(model.parent?.name).to.equal('BaseSearchPostRequest');
    });

    it('keeps the constraints of the base fields', function () {
      expect(model.field('limit')?.constraints).to.eql({ ge: 1, le: 100 });
    });

    it('keeps the defaults and aliases of extension fields', function () {
      expect(model.field('filterLang')).to.include({ alias: 'filter-lang', default: 'cql-json' });
    });
  });

  describe('composing the POST search model with constrained extension fields', function () {
    const constrained = source({
      POST: bodyParameters('ConstrainedExtension', [
        { name: 'cloudCover', alias: 'cloud-cover', type: 'number', constraints: { gt: 0, lt: 100 } },
        { name: 'platform', type: 'string', constraints: { minLength: 2, maxLength: 8 } },
      ]),
    });
    const model = composeRequestModel('ConstrainedPostRequest', bodyParameters('Base', []), [constrained], [], 'POST');

    it('keeps exclusive numeric bounds', function () {
      expect(model.field('cloudCover')?.constraints).to.eql({ gt: 0, lt: 100 });
    });

    it('keeps string length bounds', function () {
      expect(model.field('platform')?.constraints).to.eql({ minLength: 2, maxLength: 8 });
    });

    it('keeps the bounds when composed with the base search fields', function () {
      const searchModel = createPostRequestModel([constrained]);
      expect(searchModel.field('cloudCover')).to.include({ alias: 'cloud-cover' });
      expect(searchModel.field('cloudCover')?.constraints).to.eql({ gt: 0, lt: 100 });
      expect(searchModel.field('platform')?.constraints).to.eql({ minLength: 2, maxLength: 8 });
    });

    it('enforces the bounds when parsing', function () {
      expect(() => model.parse({ body: { 'cloud-cover': 100, platform: 'x' } })).to.throw(
        RequestValidationError,
        'Invalid ConstrainedPostRequest: "cloud-cover" must be less than 100; "platform" must be at least 2 characters long',
      );
    });

    it('accepts values within the bounds', function () {
      expect(model.parse({ body: { 'cloud-cover': 99.5, platform: 'sat-1' } }))
        .to.eql({ cloudCover: 99.5, platform: 'sat-1' });
    });
  });

  describe('composing the item collection model', function () {
    it('accepts the CRS parameters without the CRS extension', function () {
      const model = composeRequestModel('ItemCollectionGetRequest', itemCollectionUriParameters);
      expect(model.parse({ params: { collectionId: 'a' }, query: {} })).to.include({ crs: CRS84, bboxCrs: CRS84 });
    });

    it('keeps the CRS parameters once with the CRS extension', function () {
      const model = composeRequestModel('ItemCollectionGetRequest', itemCollectionUriParameters, [new CrsExtension()]);
      expect(model.fields.map((f) => f.name)).to.eql(['collectionId', 'limit', 'bbox', 'datetime', 'crs', 'bboxCrs']);
    });
  });

  it('rejects mixed query and body parameter sets', function () {
    const ext = source({ GET: bodyParameters('BodyExtension', [{ name: 'x', type: 'string' }]) });
    expect(() => createGetRequestModel([ext])).to.throw(
      ConfigurationError,
      'Mixed request model kinds for SearchGetRequest: BaseSearchGetRequest (query), BodyExtension (body). Check extension request models.',
    );
  });

  describe('when two sets declare a field differently', function () {
    const a = queryParameters('A', [{ name: 'x', type: 'string' }]);
    const b = queryParameters('B', [{ name: 'x', type: 'integer' }, { name: 'y', type: 'string' }]);

    it('fails by default', function () {
      expect(() => mergeFields('Model', [a, b])).to.throw(
        ConfigurationError, 'Field "x" of Model is declared differently by A and B',
      );
    });

    it('lets the later declaration win in place when overriding', function () {
      const fields = mergeFields('Model', [a, b], 'override');
      expect(fields).to.eql([{ name: 'x', type: 'integer' }, { name: 'y', type: 'string' }]);
    });

    it('passes the policy through composition', function () {
      const model = composeRequestModel('Model', a, [source({ GET: b })], [], 'GET', 'override');
      expect(model.field('x')?.type).to.equal('integer');
    });
  });

  it('adds mixins after the extensions', function () {
    const base = queryParameters('Base', [{ name: 'a', type: 'string' }]);
    const mixin = queryParameters('Mixin', [{ name: 'c', type: 'string' }]);
    const ext = source({ GET: queryParameters('Ext', [{ name: 'b', type: 'string' }]) });
    const model = composeRequestModel('Model', base, [ext], [mixin]);
    expect(model.fields.map((f) => f.name)).to.eql(['a', 'b', 'c']);
  });

  it('skips extensions contributing nothing for the method', function () {
    const base = queryParameters('Base', [{ name: 'a', type: 'string' }]);
    const ext = source({ POST: bodyParameters('Ext', [{ name: 'b', type: 'string' }]) });
    expect(composeRequestModel('Model', base, [ext]).fields).to.have.length(1);
  });
});

describe('Request model parsing', function () {
  const getModel = createGetRequestModel([new FilterExtension(), new CrsExtension()]);
  const postModel = createPostRequestModel([new FilterExtension(), new CrsExtension()]);

  describe('a GET search', function () {
    const request = getModel.parse({
      query: {
        collections: 'a,b',
        bbox: '1,2,3,4',
        limit: '5',
        'filter-lang': 'cql-json',
      },
    });

    it('splits multi-valued parameters', function () {
      expect(request.collections).to.eql(['a', 'b']);
    });

    it('converts bounding boxes', function () {
      expect(request.bbox).to.eql([1, 2, 3, 4]);
    });

    it('converts integers', function () {
      expect(request.limit).to.equal(5);
    });

    it('reads fields under their aliases', function () {
      expect(request.filterLang).to.equal('cql-json');
    });

    it('applies defaults', function () {
      expect(request.crs).to.equal(CRS84);
      expect(request.filterCrs).to.equal(CRS84);
    });

    it('leaves out fields without a value or default', function () {
      expect(request).not.to.have.property('ids');
    });
  });

  it('applies the default limit', function () {
    expect(getModel.parse({ query: {} }).limit).to.equal(10);
  });

  it('reports every invalid field at once', function () {
    expect(() => getModel.parse({ query: { limit: '0', bbox: '1,2', datetime: 'soon' } })).to.throw(
      RequestValidationError,
      'Invalid SearchGetRequest: "bbox" must have 4 or 6 numbers, got 2; "datetime" \'soon\' is not an RFC 3339 date-time or interval; "limit" must be greater than or equal to 1',
    );
  });

  it('rejects limits above the maximum', function () {
    expect(() => getModel.parse({ query: { limit: '101' } })).to.throw(
      RequestValidationError, 'Invalid SearchGetRequest: "limit" must be less than or equal to 100',
    );
  });

  it('rejects values outside the allowed values of an aliased field', function () {
    expect(() => getModel.parse({ query: { 'filter-lang': 'cql2-text' } })).to.throw(
      RequestValidationError, 'Invalid SearchGetRequest: "filter-lang" must be \'cql-json\'',
    );
  });

  describe('a POST search', function () {
    const request = postModel.parse({
      body: {
        collections: ['a'],
        limit: 3,
        filter: { op: '=', args: [{ property: 'id' }, 'x'] },
        sortby: [{ field: 'datetime', direction: 'desc' }],
      },
    });

    it('keeps JSON values', function () {
      expect(request.filter).to.eql({ op: '=', args: [{ property: 'id' }, 'x'] });
      expect(request.sortby).to.eql([{ field: 'datetime', direction: 'desc' }]);
    });

    it('keeps numbers', function () {
      expect(request.limit).to.equal(3);
    });
  });

  it('rejects POST fields of the wrong type', function () {
    expect(() => postModel.parse({ body: { collections: 'a', limit: '3' } })).to.throw(
      RequestValidationError,
      'Invalid SearchPostRequest: "collections" must be an array of strings; "limit" must be an integer',
    );
  });

  it('rejects a POST body that is not an object', function () {
    expect(() => postModel.parse({ body: [1, 2] })).to.throw(RequestValidationError, 'The request body must be a JSON object');
  });

  describe('with path parameters', function () {
    const model = new RequestModel<{ collectionId: string }>('CollectionUri', RequestKind.QUERY, [
      { name: 'collectionId', type: 'string', in: 'path', required: true },
    ]);

    it('reads them from the path', function () {
      expect(model.parse({ params: { collectionId: 'c1' }, query: { collectionId: 'c2' } }))
        .to.eql({ collectionId: 'c1' });
    });

    it('reports missing required fields', function () {
      expect(() => model.parse({ query: { collectionId: 'c2' } })).to.throw(
        RequestValidationError, 'Invalid CollectionUri: "collectionId" is required',
      );
    });
  });

  describe('with a field carried under both its name and its alias', function () {
    const fields = [{ name: 'filterLang', alias: 'filter-lang', type: 'string' as const }];
    const query = { filterLang: 'by-name', 'filter-lang': 'by-alias' };

    it('prefers the alias', function () {
      const model = new RequestModel('M', RequestKind.QUERY, fields);
      expect(model.parse({ query })).to.eql({ filterLang: 'by-alias' });
    });

    it('prefers the name with alias priority 0', function () {
      const model = new RequestModel('M', RequestKind.QUERY, [{ ...fields[0], aliasPriority: 0 }]);
      expect(model.parse({ query })).to.eql({ filterLang: 'by-name' });
    });
  });

  it('treats null body values as absent', function () {
    expect(postModel.parse({ body: { limit: null } }).limit).to.equal(10);
  });

  it('copies mutable defaults', function () {
    const model = new RequestModel<{ tags: string[] }>('M', RequestKind.BODY, [{ name: 'tags', type: 'string[]', default: [] }]);
    model.parse({ body: {} }).tags.push('x');
    expect(model.parse({ body: {} }).tags).to.eql([]);
  });
});
