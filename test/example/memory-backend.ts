import { expect } from 'chai';
import { describe, it } from 'mocha';
import { itemMatches, loadExampleData, MemoryStore } from '../../example/memory-backend';
import { Item } from '../../app/models/stac';
import { ConflictError, NotFoundError, RequestValidationError } from '../../app/util/errors';

const item: Item = {
  type: 'Feature',
  id: 'a',
  collection: 'c',
  geometry: null,
  bbox: [0, 0, 0, 2, 2, 10],
  properties: { datetime: '2020-01-01T00:00:00Z' },
};

describe('Memory backend', function () {
  describe('itemMatches', function () {
    it('matches everything without criteria', function () {
      expect(itemMatches(item, {})).to.equal(true);
    });

    it('compares the 2D extent of 3D bounding boxes', function () {
      expect(itemMatches(item, { bbox: [1, 1, 3, 3] })).to.equal(true);
      expect(itemMatches(item, { bbox: [3, 3, -100, 4, 4, 100] })).to.equal(false);
    });

    it('includes both ends of a datetime interval', function () {
      const instant = new Date('2020-01-01T00:00:00Z');
      expect(itemMatches(item, { datetime: { start: instant, end: instant } })).to.equal(true);
    });

    it('does not match items without a datetime in a datetime search', function () {
      const undated = { ...item, properties: {} };
      expect(itemMatches(undated, { datetime: { start: null, end: new Date() } })).to.equal(false);
    });

    it('matches by collection and id', function () {
      expect(itemMatches(item, { collections: ['c'], ids: ['a', 'b'] })).to.equal(true);
      expect(itemMatches(item, { collections: ['d'] })).to.equal(false);
    });
  });

  describe('MemoryStore', function () {
    it('starts with the example data', function () {
      const store = new MemoryStore();
      expect(store.listCollections().map((c) => c.id)).to.eql(['test-imagery', 'test-elevation']);
      expect(store.listItems(['test-elevation']).map((i) => i.id)).to.eql(['tile-1']);
    });

    it('does not modify the data it starts with', async function () {
      const data = loadExampleData();
      const store = new MemoryStore(data);
      await store.deleteItem('test-imagery', 'scene-1');
      expect(data.items.map((i) => i.id)).to.include('scene-1');
    });

    it('rejects collections that already exist', async function () {
      const store = new MemoryStore();
      const [collection] = store.listCollections();
      await expect(store.createCollection(collection))
        .to.be.rejectedWith(ConflictError, 'Collection test-imagery already exists');
    });

    it('adds nothing from a feature collection with a duplicate item', async function () {
      const store = new MemoryStore();
      const [existing] = store.listItems(['test-imagery']);
      await expect(store.createItem('test-imagery', {
        type: 'FeatureCollection',
        features: [{ ...existing, id: 'scene-new' }, existing],
      })).to.be.rejectedWith(ConflictError, 'Item scene-1 already exists in collection test-imagery');
      expect(store.listItems(['test-imagery'])).to.have.length(3);
    });

    it('adds nothing from a feature collection repeating an item id', async function () {
      const store = new MemoryStore();
      const [existing] = store.listItems(['test-imagery']);
      const repeated = { ...existing, id: 'scene-new' };
      await expect(store.createItem('test-imagery', {
        type: 'FeatureCollection',
        features: [repeated, repeated],
      })).to.be.rejectedWith(RequestValidationError, 'Item ids must be unique within a feature collection');
      expect(() => store.findItem('test-imagery', 'scene-new'))
        .to.throw(NotFoundError, 'Item scene-new does not exist in collection test-imagery');
    });

    it('rejects collection updates that change the id', async function () {
      const store = new MemoryStore();
      const [collection] = store.listCollections();
      await expect(store.updateCollection('test-elevation', collection)).to.be.rejectedWith(
        RequestValidationError, 'The collection id test-imagery does not match the path collection id test-elevation',
      );
    });

    it('deletes the items of a deleted collection', async function () {
      const store = new MemoryStore();
      await store.deleteCollection('test-elevation');
      expect(() => store.findItem('test-elevation', 'tile-1')).to.throw(NotFoundError, 'Collection test-elevation does not exist');
    });
  });
});
