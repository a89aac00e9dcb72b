import { expect } from 'chai';
import { describe, it } from 'mocha';
import { DummyCoreClient } from '../helpers/dummy-client';
import {
  CrsExtension, ExtensionName, FilterExtension, TokenPaginationExtension,
} from '../../app/extensions';
import { FILTER_CONFORMANCE_CLASSES } from '../../app/extensions/filter';
import { BASE_CONFORMANCE_CLASSES } from '../../app/util/conformance';
import { NotFoundError } from '../../app/util/errors';

describe('Core client', function () {
  describe('with the filter and token pagination extensions', function () {
    const filter = new FilterExtension();
    const client = new DummyCoreClient({ extensions: [filter, new TokenPaginationExtension()] });

    it('reports enabled extensions', function () {
      expect(client.extensionIsEnabled(ExtensionName.FILTER)).to.equal(true);
      expect(client.extensionIsEnabled('TokenPaginationExtension')).to.equal(true);
    });

    it('reports disabled extensions', function () {
      expect(client.extensionIsEnabled(ExtensionName.CRS)).to.equal(false);
    });

    it('returns registered extensions by name', function () {
      expect(client.getExtension(ExtensionName.FILTER)).to.equal(filter);
    });

    it('fails to return extensions that are not registered', function () {
      expect(() => client.getExtension(ExtensionName.CRS)).to.throw(NotFoundError, 'Extension CrsExtension not found');
    });

    it('lists the base and extension conformance classes', function () {
      expect(client.conformance().conformsTo).to.eql([...BASE_CONFORMANCE_CLASSES, ...FILTER_CONFORMANCE_CLASSES]);
    });

    it('composes the POST search model from its extensions', function () {
      expect(client.postRequestModel.field('filter')?.type).to.equal('json');
    });
  });

  describe('with extensions declaring the same conformance classes', function () {
    const client = new DummyCoreClient({
      extensions: [
        new FilterExtension(),
        new FilterExtension(),
        new CrsExtension({ conformanceClasses: [BASE_CONFORMANCE_CLASSES[0], 'https://example.com/conf/custom'] }),
      ],
    });

    it('lists each class once, in first declared order', function () {
      expect(client.conformanceClasses()).to.eql([
        ...BASE_CONFORMANCE_CLASSES,
        ...FILTER_CONFORMANCE_CLASSES,
        'https://example.com/conf/custom',
      ]);
    });

    it('returns the first extension with a repeated name', function () {
      expect(client.getExtension(ExtensionName.FILTER)).to.equal(client.extensions[0]);
    });
  });

  describe('with settings', function () {
    const client = new DummyCoreClient({
      baseConformanceClasses: ['https://example.com/conf/core'],
      landingPageId: 'test-catalog',
      title: 'Test Catalog',
      description: 'A catalog for tests',
      stacVersion: '1.0.0',
    });

    it('uses the given base conformance classes', function () {
      expect(client.conformanceClasses()).to.eql(['https://example.com/conf/core']);
    });

    it('uses the given landing page settings', function () {
      expect(client).to.include({ landingPageId: 'test-catalog', title: 'Test Catalog', description: 'A catalog for tests' });
    });
  });

  describe('without settings', function () {
    const client = new DummyCoreClient();

    it('takes the landing page settings from the environment', function () {
      expect(client).to.include({ landingPageId: 'stac-express', title: 'stac-express', stacVersion: '1.0.0' });
    });

    it('has no extensions', function () {
      expect(client.extensions).to.eql([]);
    });
  });
});
