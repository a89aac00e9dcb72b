import { expect } from 'chai';
import { describe, it, before, after } from 'mocha';
import { promises as fs } from 'fs';
import * as path from 'path';
import { file, FileResult } from 'tmp-promise';
import appEnv, { StacApiEnv, makeConfigVar } from '../../app/util/env';
import { ConfigurationError } from '../../app/util/errors';

const envDefaultsPath = path.resolve(__dirname, '../../app/util/env-defaults');

describe('util/env', function () {
  describe('makeConfigVar', function () {
    it('parses integers', function () {
      expect(makeConfigVar('8080')).to.equal(8080);
    });

    it('parses floats', function () {
      expect(makeConfigVar('0.5')).to.equal(0.5);
    });

    it('parses booleans in any case', function () {
      expect(makeConfigVar('TRUE')).to.equal(true);
    });

    it('leaves other strings alone', function () {
      expect(makeConfigVar('1mb')).to.equal('1mb');
    });
  });

  describe('the environment shared by the application', function () {
    it('reads the variables set before it was first loaded', function () {
      expect(appEnv.maxSearchLimit).to.equal(100);
    });

    it('has its defaults copied beside the compiled module by the build', async function () {
      const pkg = JSON.parse(await fs.readFile(path.resolve(__dirname, '../../package.json'), 'utf8'));
      expect(pkg.scripts.build).to.equal('tsc && cp app/util/env-defaults dist/app/util/env-defaults');
    });
  });

  describe('when loading the environment', function () {
    let dotEnv: FileResult;

    before(async function () {
      dotEnv = await file({ postfix: '.env' });
      await fs.writeFile(dotEnv.path, 'DOCS_URL=/docs\nOPENAPI_URL=/openapi.json\n');
    });

    after(async function () {
      await dotEnv.cleanup();
    });

    it('reads the defaults', function () {
      const env = new StacApiEnv(envDefaultsPath, dotEnv.path);
      expect(env.stacVersion).to.equal('1.0.0');
    });

    it('lets the .env file override the defaults', function () {
      const env = new StacApiEnv(envDefaultsPath, dotEnv.path);
      expect(env.docsUrl).to.equal('/docs');
      expect(env.openapiUrl).to.equal('/openapi.json');
    });

    it('lets process environment variables override the defaults', function () {
      const env = new StacApiEnv(envDefaultsPath, dotEnv.path);
      expect(env.maxSearchLimit).to.equal(100);
    });

    it('converts variable names to camel case', function () {
      const env = new StacApiEnv(envDefaultsPath, dotEnv.path);
      expect(env.enableProxyHeaders).to.equal(true);
    });

    it('accepts the defaults as valid', function () {
      const env = new StacApiEnv(envDefaultsPath, dotEnv.path);
      expect(() => env.validate()).not.to.throw();
    });

    it('rejects invalid values, naming them', function () {
      const env = new StacApiEnv(envDefaultsPath, dotEnv.path);
      env.port = -1;
      env.maxBodySize = 'lots';
      expect(() => env.validate()).to.throw(ConfigurationError, 'Invalid environment: port and maxBodySize');
    });
  });
});
