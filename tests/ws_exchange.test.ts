import { describe, it, before, after } from 'node:test';
import { strict as assert } from 'assert';
import { setTimeout as delay } from 'timers/promises';
import { WebSocket, RawData } from 'ws';
import { pack, unpack } from 'msgpackr';
import { CloseCodes, CloseInfo, WebSocketState } from '../src/connectors/ws-exchange.js';
import { Router } from '../src/routing/router.js';
import { IllegalStateError } from '../src/web/errors.js';
import { TestServer, startTestServer, testConfig } from './harness.js';

interface Received {
  data: Buffer;
  binary: boolean;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** Records every message from construction on, so nothing sent right after the handshake is missed. */
class TestClient {
  readonly received: Received[] = [];
  readonly closed: Promise<{ code: number; reason: string }>;
  private waiters: Array<() => void> = [];
  private done = false;

  constructor(readonly ws: WebSocket) {
    ws.on('message', (data: RawData, isBinary: boolean) => {
      this.received.push({ data: toBuffer(data), binary: isBinary });
      this.wake();
    });
    this.closed = new Promise(resolve => {
      ws.once('close', (code: number, reason: Buffer) => {
        this.done = true;
        this.wake();
        resolve({ code, reason: reason.toString('utf8') });
      });
    });
  }

  private wake() {
    for (const w of this.waiters.splice(0)) w();
  }

  async take(n: number): Promise<Received[]> {
    while (this.received.length < n) {
      if (this.done) throw new Error(`Closed after ${this.received.length} of ${n} messages`);
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }
    return this.received.slice(0, n);
  }

  async texts(n: number): Promise<string[]> {
    return (await this.take(n)).map(m => m.data.toString('utf8'));
  }
}

function connect(port: number, path: string, protocols: string[] = []): Promise<TestClient> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}${path}`, protocols);
  const client = new TestClient(ws);
  return new Promise((resolve, reject) => {
    ws.once('open', () => resolve(client));
    ws.once('error', reject);
  });
}

/** Status of a refused handshake. */
function refused(port: number, path: string, protocols: string[] = []): Promise<number> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}${path}`, protocols);
  return new Promise((resolve, reject) => {
    ws.on('error', () => undefined);
    ws.once('open', () => reject(new Error('handshake unexpectedly accepted')));
    ws.once('unexpected-response', (req, res) => {
      resolve(res.statusCode || 0);
      req.destroy();
    });
  });
}

/** A value a server-side handler reports back to the test. */
class Observed<T> {
  private settle: (v: T | PromiseLike<T>) => void = () => undefined;
  readonly value = new Promise<T>(resolve => {
    this.settle = resolve;
  });

  set(v: T | PromiseLike<T>): void {
    this.settle(v);
  }
}

async function* mapAsync<T, R>(source: AsyncIterable<T>, fn: (v: T) => R): AsyncGenerator<R> {
  for await (const v of source) yield fn(v);
}

function routes(): Router {
  return new Router()
    .webSocket({
      path: '/echo',
      subprotocols: ['json'],
      handler: exchange => mapAsync(exchange.inbound.decodeTextMessages(), got => ({ got }))
    })
    .webSocket({
      path: '/binary',
      subprotocols: ['msgpack'],
      handler: exchange => mapAsync(exchange.inbound.decodeBinaryMessages(), got => ({ got }))
    })
    .webSocket({ path: '/seq', handler: () => ['a', 'b', 'c'] })
    .webSocket({
      path: '/inner',
      handler: () => [
        (async function* () {
          yield 'a';
          yield 'b';
        })(),
        'c'
      ]
    })
    .webSocket({
      path: '/fail',
      handler: () => {
        throw new Error('boom');
      }
    })
    .webSocket({
      path: '/rooms/{room}',
      handler: exchange => `${exchange.pathParameters.room}:${exchange.query.get('user') ?? ''}`
    })
    .webSocket({
      path: '/late',
      handler: async exchange => {
        await delay(100);
        return mapAsync(exchange.inbound.textMessages(), s => s.toUpperCase());
      }
    })
    .webSocket({ path: '/open', closeOnComplete: false, handler: () => 'hi' })
    .webSocket({
      path: '/generator',
      handler: () =>
        (function* () {
          yield 'a';
          yield 'b';
        })()
    })
    .webSocket({
      path: '/first-only',
      closeOnComplete: false,
      handler: exchange => {
        firstOnly.set((async () => {
          let first = '';
          for await (const text of exchange.inbound.textMessages()) {
            first = text;
            break;
          }
          return { first, closed: await exchange.closed };
        })());
      }
    })
    .webSocket({
      path: '/abrupt',
      closeOnComplete: false,
      handler: exchange => {
        abrupt.set((async () => {
          const seen: string[] = [];
          for await (const text of exchange.inbound.textMessages()) {
            seen.push(text);
            await exchange.outbound.send(`ack:${text}`);
          }
          return { seen, closed: await exchange.closed };
        })());
      }
    });
}

const firstOnly = new Observed<{ first: string; closed: CloseInfo }>();
const abrupt = new Observed<{ seen: string[]; closed: CloseInfo }>();
const closing = new Observed<{ state: WebSocketState; late: string; drained: string[]; closed: CloseInfo }>();

describe('WebSocket exchanges', () => {
  let srv: TestServer;

  before(async () => {
    srv = await startTestServer(routes());
  });

  after(async () => {
    await srv.close();
  });

  it('decodes and encodes text messages with the selected sub-protocol', async () => {
    const client = await connect(srv.port, '/echo', ['json']);
    assert.equal(client.ws.protocol, 'json');
    client.ws.send('{"a":1}');
    const [reply] = await client.take(1);
    assert.equal(reply.binary, false);
    assert.equal(reply.data.toString('utf8'), '{"got":{"a":1}}');
    client.ws.close(1000);
    assert.equal((await client.closed).code, 1000);
  });

  it('decodes and encodes binary messages with msgpack', async () => {
    const client = await connect(srv.port, '/binary', ['msgpack']);
    client.ws.send(pack({ a: 1 }));
    const [reply] = await client.take(1);
    assert.equal(reply.binary, true);
    assert.deepEqual(unpack(reply.data), { got: { a: 1 } });
    client.ws.close(1000);
    await client.closed;
  });

  it('accepts a client offering no sub-protocol', async () => {
    const client = await connect(srv.port, '/echo');
    assert.equal(client.ws.protocol, '');
    client.ws.send('[1]');
    assert.deepEqual(await client.texts(1), ['{"got":[1]}']);
    client.ws.close(1000);
    await client.closed;
  });

  it('refuses an unsupported sub-protocol and an unknown path', async () => {
    assert.equal(await refused(srv.port, '/echo', ['xml']), 400);
    assert.equal(await refused(srv.port, '/nowhere'), 404);
  });

  it('closes with 1007 on a malformed message', async () => {
    const client = await connect(srv.port, '/echo', ['json']);
    client.ws.send('{');
    const closed = await client.closed;
    assert.equal(closed.code, 1007);
    assert.ok(closed.reason.startsWith('Malformed json message: '));
  });

  it('sends a sequence in order and closes normally', async () => {
    const client = await connect(srv.port, '/seq');
    assert.deepEqual(await client.texts(3), ['a', 'b', 'c']);
    assert.equal((await client.closed).code, 1000);
  });

  it('concatenates an inner sequence into one message', async () => {
    const client = await connect(srv.port, '/inner');
    assert.deepEqual(await client.texts(2), ['ab', 'c']);
    await client.closed;
  });

  it('closes with 1011 when the handler throws', async () => {
    const client = await connect(srv.port, '/fail');
    const closed = await client.closed;
    assert.equal(closed.code, 1011);
    assert.equal(closed.reason, 'Internal error');
  });

  it('exposes path and query parameters', async () => {
    const client = await connect(srv.port, '/rooms/lobby?user=ann');
    assert.deepEqual(await client.texts(1), ['lobby:ann']);
    await client.closed;
  });

  it('keeps messages that arrive before the handler consumes them', async () => {
    const client = await connect(srv.port, '/late');
    client.ws.send('x');
    client.ws.send('y');
    assert.deepEqual(await client.texts(2), ['X', 'Y']);
    client.ws.close(1000);
    await client.closed;
  });

  it('leaves the connection open when the route says so', async () => {
    const client = await connect(srv.port, '/open');
    assert.deepEqual(await client.texts(1), ['hi']);
    await delay(100);
    assert.equal(client.ws.readyState, WebSocket.OPEN);
    client.ws.close(1000);
    await client.closed;
  });
});

describe('WebSocket exchange lifecycle', () => {
  let srv: TestServer;

  before(async () => {
    srv = await startTestServer(routes());
  });

  after(async () => {
    await srv.close();
  });

  it('sends every element of a synchronous iterable', async () => {
    const client = await connect(srv.port, '/generator');
    assert.deepEqual(await client.texts(2), ['a', 'b']);
    assert.equal((await client.closed).code, 1000);
  });

  it('keeps reading after the consumer stops early, so the peer close completes', async () => {
    const client = await connect(srv.port, '/first-only');
    client.ws.send('one');
    await delay(50);
    client.ws.send('two');
    client.ws.send('three');
    client.ws.close(1000);
    const result = await firstOnly.value;
    assert.equal(result.first, 'one');
    assert.equal(result.closed.code, 1000);
    assert.equal(result.closed.clean, true);
    assert.equal((await client.closed).code, 1000);
  });

  it('ends inbound without error on an abrupt disconnect', async () => {
    const client = await connect(srv.port, '/abrupt');
    client.ws.send('one');
    assert.deepEqual(await client.texts(1), ['ack:one']);
    client.ws.terminate();
    const result = await abrupt.value;
    assert.deepEqual(result.seen, ['one']);
    assert.deepEqual(result.closed, { code: 1006, reason: '', clean: false });
  });
});

describe('WebSocket closing handshake', () => {
  let srv: TestServer;

  before(async () => {
    const router = new Router().webSocket({
      path: '/closing',
      closeOnComplete: false,
      handler: exchange => {
        closing.set((async () => {
          await delay(100);
          exchange.close(CloseCodes.NORMAL, 'done');
          const state = exchange.state;
          const late = await exchange.outbound.send('late').then(
            () => 'sent',
            (e: unknown) => (e instanceof IllegalStateError ? e.message : 'unexpected failure')
          );
          const drained: string[] = [];
          for await (const text of exchange.inbound.textMessages()) drained.push(text);
          return { state, late, drained, closed: await exchange.closed };
        })());
      }
    });
    srv = await startTestServer(router, { ws: { ...testConfig().ws, inboundHighWater: 2 } });
  });

  after(async () => {
    await srv.close();
  });

  it('rejects sends once closing and drains inbound until the peer answers', async () => {
    const client = await connect(srv.port, '/closing');
    for (const m of ['m1', 'm2', 'm3', 'm4', 'm5']) client.ws.send(m);
    const closed = await client.closed;
    assert.equal(closed.code, 1000);
    assert.equal(closed.reason, 'done');
    const result = await closing.value;
    assert.equal(result.state, 'CLOSING');
    assert.equal(result.late, 'Cannot send on a CLOSING WebSocket');
    assert.deepEqual(result.drained, ['m1', 'm2', 'm3', 'm4', 'm5']);
    assert.equal(result.closed.code, 1000);
    assert.equal(result.closed.clean, true);
  });
});
