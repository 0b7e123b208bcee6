import { describe, it } from 'node:test';
import { strict as assert } from 'assert';
import { pack } from 'msgpackr';
import { msgpackCodec } from '../src/codec/msgpack.js';
import { CodecError, collectBytes } from '../src/codec/types.js';

async function* split(buf: Buffer, ...at: number[]): AsyncGenerator<Buffer> {
  let start = 0;
  for (const end of at) {
    yield buf.subarray(start, end);
    start = end;
  }
  yield buf.subarray(start);
}

describe('msgpackCodec', () => {
  const first = { id: 1, name: 'hello' };
  const second = [1, 2, 3];
  const body = Buffer.concat([pack(first), pack(second)]);

  it('decodes one value', () => {
    assert.deepEqual(msgpackCodec.decode(pack(first)), first);
  });

  it('reassembles values split across chunks', async () => {
    assert.deepEqual(await msgpackCodec.decodeList(split(body, 3, 9)), [first, second]);
  });

  it('keeps the first value for a single binding', async () => {
    assert.deepEqual(await msgpackCodec.decodeOne(split(body, 5)), first);
  });

  it('rejects a truncated body', async () => {
    await assert.rejects(msgpackCodec.decodeList(split(body.subarray(0, body.length - 1))), /Unexpected end of msgpack input/);
  });

  it('reports an incomplete value as a codec error', () => {
    // fixarray of two holding a single element
    assert.throws(() => msgpackCodec.decode(Buffer.from([0x92, 0x01])), CodecError);
  });

  it('writes each streamed value back to back', async () => {
    async function* values(): AsyncGenerator<unknown> {
      yield first;
      yield second;
    }
    assert.deepEqual(await collectBytes(msgpackCodec.encodeStream(values())), body);
  });
});
