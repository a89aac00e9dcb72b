import { expect } from 'chai';
import { describe, it } from 'mocha';
import hookServersStartStop from './helpers/servers';
import { hookUrl } from './helpers/hooks';
import { serverRoot } from './helpers/urls';
import { loadExampleData } from '../example/memory-backend';

describe('Links behind a reverse proxy', function () {
  describe('with proxy headers enabled', function () {
    hookServersStartStop();

    describe('when the proxy sends a Forwarded header', function () {
      hookUrl('/', {}, { Forwarded: 'for=192.0.2.60;proto=https;host=stac.example.com:443' });

      it('builds links from the forwarded scheme and host', function () {
        expect(this.res.body.links[0].href).to.equal('https://stac.example.com/');
        expect(this.res.body.links[2].href).to.equal('https://stac.example.com/collections');
      });
    });

    describe('when the Forwarded host has no port', function () {
      hookUrl('/', {}, { Forwarded: 'proto=https;host=stac.example.com' });

      it('keeps the port of the Host header', function () {
        const { port } = new URL(serverRoot(this.frontend));
        expect(this.res.body.links[0].href).to.equal(`https://stac.example.com:${port}/`);
      });
    });

    describe('when the proxy sends X-Forwarded headers with a path prefix', function () {
      hookUrl('/search', { limit: '1' }, {
        'X-Forwarded-Proto': 'http',
        'X-Forwarded-Host': 'proxy.example.com',
        'X-Forwarded-Port': '8080',
        'X-Forwarded-Prefix': '/rest/',
      });

      it('builds links below the prefix', function () {
        expect(this.res.body.features[0].links[0].href)
          .to.equal('http://proxy.example.com:8080/rest/collections/test-imagery/items/scene-1');
      });

      it('builds next links below the prefix', function () {
        expect(this.res.body.links[1].href).to.equal('http://proxy.example.com:8080/rest/search?limit=1&pt=1');
      });
    });

    describe('when the proxy sends the default port of the scheme', function () {
      hookUrl('/collections', {}, { 'X-Forwarded-Proto': 'https', 'X-Forwarded-Host': 'stac.example.com', 'X-Forwarded-Port': '443' });

      it('leaves the port out of links', function () {
        expect(this.res.body.links[1].href).to.equal('https://stac.example.com/collections');
      });
    });

    describe('when the proxy sends an X-Forwarded-Host with a port', function () {
      hookUrl('/', {}, { 'X-Forwarded-Host': 'proxy.example.com:8443' });

      it('answers successfully', function () {
        expect(this.res.statusCode).to.equal(200);
      });

      it('takes the host from the header and the port from the Host header', function () {
        const { port } = new URL(serverRoot(this.frontend));
        expect(this.res.body.links[0].href).to.equal(`http://proxy.example.com:${port}/`);
      });
    });

    describe('when chained proxies each append to X-Forwarded-Proto', function () {
      hookUrl('/collections', {}, { 'X-Forwarded-Proto': 'https, http' });

      it('answers successfully', function () {
        expect(this.res.statusCode).to.equal(200);
      });

      it('uses the scheme of the first proxy', function () {
        const { host } = new URL(serverRoot(this.frontend));
        expect(this.res.body.links[1].href).to.equal(`https://${host}/collections`);
      });
    });

    describe('when requesting the OpenAPI description through the proxy', function () {
      hookUrl('/api', {}, { Forwarded: 'proto=https;host=stac.example.com:443' });

      it('names the forwarded URL as the server', function () {
        expect(this.res.body.servers).to.eql([{ url: 'https://stac.example.com' }]);
      });
    });
  });

  describe('with proxy headers disabled', function () {
    hookServersStartStop(loadExampleData(), { enableProxyHeaders: false });

    describe('when the proxy sends a Forwarded header', function () {
      hookUrl('/', {}, { Forwarded: 'proto=https;host=stac.example.com:443' });

      it('builds links from the Host header', function () {
        expect(this.res.body.links[0].href).to.equal(`${serverRoot(this.frontend)}/`);
      });
    });
  });
});
