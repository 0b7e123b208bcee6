import { describe, it, before, after } from 'node:test';
import { strict as assert } from 'assert';
import { Router } from '../src/routing/router.js';
import { ServerSentEvent, sse } from '../src/web/sse.js';
import { TestServer, httpRequest, startTestServer } from './harness.js';

async function* words(): AsyncGenerator<string> {
  yield 'ab';
  yield '';
  yield 'cd';
}

async function* records(): AsyncGenerator<{ n: number }> {
  yield { n: 1 };
  yield { n: 2 };
}

function routes(): Router {
  const events: ServerSentEvent[] = [
    { id: '1', data: { n: 1 } },
    { event: 'tick', data: 'plain\nline' },
    { comment: 'ping' }
  ];
  return new Router()
    .route({ method: 'GET', path: '/void', handler: () => undefined })
    .route({ method: 'GET', path: '/bytes', handler: () => Buffer.from([1, 2, 3]) })
    .route({ method: 'GET', path: '/object', handler: () => ({ a: 1 }) })
    .route({
      method: 'GET',
      path: '/map',
      produces: ['text/plain'],
      handler: () => new Map([['k', 'v'], ['n', '2']])
    })
    .route({ method: 'GET', path: '/xml', produces: ['application/xml'], handler: () => ({ a: 1 }) })
    .route({ method: 'GET', path: '/words', handler: () => words() })
    .route({ method: 'GET', path: '/records', handler: () => records() })
    .route({ method: 'GET', path: '/events', handler: () => sse(events) })
    .route({
      method: 'POST',
      path: '/created',
      handler: exchange => {
        exchange.response
          .status(201)
          .header('x-request-tag', 'tagged')
          .cookie('session', 'test-secret', { httpOnly: true, path: '/' })
          .cookie('theme', 'dark');
        return { created: true };
      }
    });
}

describe('HTTP responses', () => {
  let srv: TestServer;

  before(async () => {
    srv = await startTestServer(routes());
  });

  after(async () => {
    await srv.close();
  });

  const get = (path: string, headers?: Record<string, string>) => httpRequest(srv.port, { path, headers });

  it('writes an empty body for no result', async () => {
    const res = await get('/void');
    assert.equal(res.status, 200);
    assert.equal(res.headers['content-length'], '0');
    assert.equal(res.headers['content-type'], undefined);
  });

  it('writes bytes as they are', async () => {
    const res = await get('/bytes');
    assert.deepEqual(res.body, Buffer.from([1, 2, 3]));
    assert.equal(res.headers['content-length'], '3');
  });

  it('negotiates the codec of an object from Accept', async () => {
    const json = await get('/object');
    assert.equal(json.headers['content-type'], 'application/json');
    assert.equal(json.text, '{"a":1}');
    const text = await get('/object', { accept: 'text/plain' });
    assert.equal(text.headers['content-type'], 'text/plain');
    assert.equal(text.text, '{a=1}');
  });

  it('renders a map as text', async () => {
    assert.equal((await get('/map')).text, '{k=v, n=2}');
  });

  it('answers 500 when the produced type has no encoder', async () => {
    const res = await get('/xml');
    assert.equal(res.status, 500);
    assert.equal(res.text, 'No encoder for application/xml');
  });

  it('streams strings raw and chunked', async () => {
    const res = await get('/words');
    assert.equal(res.headers['transfer-encoding'], 'chunked');
    assert.equal(res.headers['content-type'], undefined);
    assert.equal(res.text, 'abcd');
  });

  it('streams objects as one encoded array', async () => {
    const res = await get('/records');
    assert.equal(res.headers['content-type'], 'application/json');
    assert.equal(res.text, '[{"n":1},{"n":2}]');
  });

  it('frames server-sent events', async () => {
    const res = await get('/events');
    assert.equal(res.headers['content-type'], 'text/event-stream;charset=utf-8');
    assert.equal(
      res.text,
      'id:1\ndata:{"n":1}\r\n\r\n' + 'event:tick\ndata:plain\r\ndata:line\r\n\r\n' + ':ping\n\r\n\r\n'
    );
  });

  it('keeps the status, headers and cookies a handler sets', async () => {
    const res = await httpRequest(srv.port, { method: 'POST', path: '/created' });
    assert.equal(res.status, 201);
    assert.equal(res.headers['x-request-tag'], 'tagged');
    assert.deepEqual(res.headers['set-cookie'], ['session=test-secret; Path=/; HttpOnly', 'theme=dark']);
    assert.equal(res.text, '{"created":true}');
  });
});
