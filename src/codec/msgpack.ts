import { pack, unpack, unpackMultiple } from 'msgpackr';
import { Codec, ByteChunks, CodecError, decodeFirst } from './types.js';

function isIncomplete(e: unknown): e is Error & { incomplete: true } {
  return e instanceof Error && 'incomplete' in e && e.incomplete === true;
}

/**
 * Emits each packed value as soon as its last byte arrives; a value split
 * across chunks waits in `pending` for the rest.
 */
async function* unpackStream(chunks: ByteChunks): AsyncGenerator<unknown> {
  let pending: Buffer = Buffer.alloc(0);
  for await (const chunk of chunks) {
    pending = pending.length ? Buffer.concat([pending, chunk]) : Buffer.from(chunk);
    const values: unknown[] = [];
    let consumed = 0;
    try {
      unpackMultiple(pending, (value: unknown, _start?: number, end?: number) => {
        values.push(value);
        if (typeof end === 'number') consumed = end;
      });
      consumed = pending.length;
    } catch (e) {
      if (!isIncomplete(e)) throw new CodecError('msgpack', e instanceof Error ? e.message : 'Invalid msgpack', { cause: e });
    }
    pending = pending.subarray(consumed);
    yield* values;
  }
  if (pending.length > 0) throw new CodecError('msgpack', 'Unexpected end of msgpack input');
}

export const msgpackCodec: Codec = {
  name: 'msgpack',
  // Include standard + vendor media type; retain x- prefix for backward compatibility
  contentTypes: ['application/msgpack', 'application/vnd.msgpack', 'application/x-msgpack'],
  isBinary: true,
  encode(value: unknown): Uint8Array {
    return pack(value);
  },
  decode(buf: Uint8Array | string): unknown {
    const b = typeof buf === 'string' ? Buffer.from(buf, 'binary') : Buffer.from(buf);
    try {
      return unpack(b);
    } catch (e) {
      throw new CodecError('msgpack', e instanceof Error ? e.message : 'Invalid msgpack', { cause: e });
    }
  },
  decodeOne(chunks: ByteChunks): Promise<unknown> {
    return decodeFirst(chunks, unpackStream);
  },
  async decodeList(chunks: ByteChunks): Promise<unknown[]> {
    const values: unknown[] = [];
    for await (const v of unpackStream(chunks)) values.push(v);
    return values;
  },
  decodeStream(chunks: ByteChunks): AsyncIterable<unknown> {
    return unpackStream(chunks);
  },
  async *encodeStream(values: AsyncIterable<unknown>): AsyncIterable<Uint8Array> {
    for await (const v of values) yield pack(v);
  }
};
