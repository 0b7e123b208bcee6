import { describe, it, before, after } from 'node:test';
import { strict as assert } from 'assert';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Router } from '../src/routing/router.js';
import { contentTypeFor, resolveResource, staticResources } from '../src/static/resources.js';
import { NotFoundError, PathSafetyError } from '../src/web/errors.js';
import { TestServer, httpRequest, startTestServer } from './harness.js';

const ROOT = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures', 'static');

describe('resolveResource', () => {
  it('resolves below the root', () => {
    assert.equal(resolveResource(ROOT, 'dir/get_resource.txt'), path.join(ROOT, 'dir', 'get_resource.txt'));
  });

  it('rejects empty segments and absolute paths with 400', () => {
    assert.throws(() => resolveResource(ROOT, ''), PathSafetyError);
    assert.throws(() => resolveResource(ROOT, 'dir//get_resource.txt'), PathSafetyError);
    assert.throws(() => resolveResource(ROOT, '/etc/passwd'), PathSafetyError);
    assert.throws(() => resolveResource(ROOT, 'a\0b'), PathSafetyError);
  });

  it('reports paths resolving outside the root as missing', () => {
    assert.throws(() => resolveResource(ROOT, '../static-other/x'), NotFoundError);
    assert.throws(() => resolveResource(ROOT, 'dir/../../x'), NotFoundError);
    assert.throws(() => resolveResource(ROOT, '..'), NotFoundError);
  });

  it('decodes each segment once after splitting', () => {
    assert.equal(resolveResource(ROOT, 'some%20space.txt'), path.join(ROOT, 'some space.txt'));
    assert.throws(() => resolveResource(ROOT, 'dir%2Fget_resource.txt'), NotFoundError);
    assert.throws(() => resolveResource(ROOT, 'dir/%2e%2e/data.json'), NotFoundError);
    assert.throws(() => resolveResource(ROOT, 'dir/%E0%A4%A'), PathSafetyError);
  });
});

describe('contentTypeFor', () => {
  it('picks the type from the extension', () => {
    assert.equal(contentTypeFor('a.txt'), 'text/plain; charset=utf-8');
    assert.equal(contentTypeFor('a.json'), 'application/json; charset=utf-8');
    assert.equal(contentTypeFor('a.png'), 'image/png');
    assert.equal(contentTypeFor('a.unknown-ext'), 'application/octet-stream');
  });
});

describe('static resources over HTTP', () => {
  let srv: TestServer;

  before(async () => {
    srv = await startTestServer(staticResources(new Router(), { prefix: '/static/', root: ROOT }));
  });

  after(async () => {
    await srv.close();
  });

  it('serves a file with its type and length', async () => {
    const res = await httpRequest(srv.port, { path: '/static/dir/get_resource.txt' });
    assert.equal(res.status, 200);
    assert.equal(res.headers['content-type'], 'text/plain; charset=utf-8');
    assert.equal(res.headers['content-length'], '16');
    assert.equal(res.text, 'static resource\n');
  });

  it('answers HEAD without a body', async () => {
    const res = await httpRequest(srv.port, { method: 'HEAD', path: '/static/data.json' });
    assert.equal(res.status, 200);
    assert.equal(res.headers['content-type'], 'application/json; charset=utf-8');
    assert.equal(res.headers['content-length'], '12');
    assert.equal(res.body.length, 0);
  });

  it('decodes a percent-encoded name exactly once', async () => {
    assert.equal((await httpRequest(srv.port, { path: '/static/some%20space.txt' })).text, 'spaced\n');
    assert.equal((await httpRequest(srv.port, { path: '/static/some%2520space.txt' })).status, 404);
  });

  it('never serves outside the root', async () => {
    assert.equal((await httpRequest(srv.port, { path: '/static/../package.json' })).status, 404);
    assert.equal((await httpRequest(srv.port, { path: '/static/%2e%2e/%2e%2e/package.json' })).status, 404);
    assert.equal((await httpRequest(srv.port, { path: '/static//etc/passwd' })).status, 400);
    assert.equal((await httpRequest(srv.port, { path: '/static/' })).status, 400);
  });

  it('treats encoded slashes and dots as file name bytes', async () => {
    assert.equal((await httpRequest(srv.port, { path: '/static/dir%2Fget_resource.txt' })).status, 404);
    assert.equal((await httpRequest(srv.port, { path: '/static/dir/%2e%2e/data.json' })).status, 404);
    assert.equal((await httpRequest(srv.port, { path: '/static/dir/%2E%2E/%2E%2E/package.json' })).status, 404);
  });

  it('reports directories and missing files as 404', async () => {
    assert.equal((await httpRequest(srv.port, { path: '/static/dir' })).status, 404);
    assert.equal((await httpRequest(srv.port, { path: '/static/dir/missing.txt' })).status, 404);
  });
});
