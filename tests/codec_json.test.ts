import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { JsonTextScanner, jsonCodec } from '../src/codec/json.js';
import { CodecError, collectBytes } from '../src/codec/types.js';
import { AsyncQueue } from '../src/util/async-queue.js';

async function* chunks(...parts: string[]): AsyncGenerator<Buffer> {
  for (const p of parts) yield Buffer.from(p, 'utf8');
}

describe('JsonTextScanner', () => {
  it('splits concatenated documents across pushes', () => {
    const s = new JsonTextScanner(false);
    assert.deepEqual(s.push('{"a":1}{"b"'), ['{"a":1}']);
    assert.deepEqual(s.push(':2} '), ['{"b":2}']);
    assert.deepEqual(s.end(), []);
  });

  it('unwraps the elements of a top-level array', () => {
    const s = new JsonTextScanner(true);
    assert.deepEqual(s.push('[1, "x", {"a":[2]}]'), ['1', '"x"', '{"a":[2]}']);
    assert.deepEqual(s.end(), []);
  });

  it('ignores brackets inside strings', () => {
    const s = new JsonTextScanner(true);
    assert.deepEqual(s.push('["a]", "b\\"}"]'), ['"a]"', '"b\\"}"']);
  });

  it('emits a trailing scalar at the end', () => {
    const s = new JsonTextScanner(false);
    assert.deepEqual(s.push('42'), []);
    assert.deepEqual(s.end(), ['42']);
  });

  it('rejects content after a top-level array', () => {
    const s = new JsonTextScanner(true);
    assert.throws(() => s.push('[1] 2'), /Unexpected '2' after top-level array/);
  });

  it('rejects truncated input', () => {
    const s = new JsonTextScanner(false);
    s.push('{"a":');
    assert.throws(() => s.end(), /Unexpected end of JSON input/);
  });
});

describe('jsonCodec', () => {
  it('encodes maps, sets and bigints', () => {
    const encoded = jsonCodec.encode({ m: new Map([['k', 1]]), s: new Set(['a', 'b']), n: 10n });
    assert.equal(Buffer.from(encoded).toString('utf8'), '{"m":{"k":1},"s":["a","b"],"n":"10"}');
    assert.equal(Buffer.from(jsonCodec.encode(undefined)).toString('utf8'), 'null');
  });

  it('keeps only the first document for a single value and drains the rest', async () => {
    let drained = false;
    async function* body(): AsyncGenerator<Buffer> {
      yield Buffer.from('{"a":1}{"b":');
      yield Buffer.from('2}');
      drained = true;
    }
    assert.deepEqual(await jsonCodec.decodeOne(body()), { a: 1 });
    assert.equal(drained, true);
  });

  it('decodes an empty body to undefined', async () => {
    assert.equal(await jsonCodec.decodeOne(chunks()), undefined);
    assert.equal(await jsonCodec.decodeOne(chunks('  \n')), undefined);
  });

  it('decodes a list from an array or from concatenated documents', async () => {
    assert.deepEqual(await jsonCodec.decodeList(chunks('[{"a":', '1},{"a":2}]')), [{ a: 1 }, { a: 2 }]);
    assert.deepEqual(await jsonCodec.decodeList(chunks('{"a":1}\n{"a":2}\n')), [{ a: 1 }, { a: 2 }]);
  });

  it('yields stream elements before the body is complete', async () => {
    const source = new AsyncQueue<Buffer>();
    const values = jsonCodec.decodeStream(source)[Symbol.asyncIterator]();
    source.push(Buffer.from('[1,'));
    assert.deepEqual(await values.next(), { value: 1, done: false });
    source.push(Buffer.from('2]'));
    source.end();
    assert.deepEqual(await values.next(), { value: 2, done: false });
    assert.equal((await values.next()).done, true);
  });

  it('reports malformed documents as codec errors', async () => {
    await assert.rejects(jsonCodec.decodeOne(chunks('{"a":}')), CodecError);
    await assert.rejects(jsonCodec.decodeList(chunks('[1,2')), /Unterminated top-level array/);
    assert.throws(() => jsonCodec.decode('{'), CodecError);
  });

  it('frames a stream of values as one array', async () => {
    async function* values(): AsyncGenerator<unknown> {
      yield 1;
      yield { a: 2 };
    }
    assert.equal((await collectBytes(jsonCodec.encodeStream(values()))).toString('utf8'), '[1,{"a":2}]');
    assert.equal((await collectBytes(jsonCodec.encodeStream(chunks()))).toString('utf8'), '[]');
  });

  it('round-trips a collection of objects in order', async () => {
    const items = [{ id: 1, tags: ['x'] }, { id: 2, tags: [] }, { id: 3, nested: { ok: true } }];
    assert.deepEqual(await jsonCodec.decodeList(chunks(Buffer.from(jsonCodec.encode(items)).toString('utf8'))), items);
  });
});
