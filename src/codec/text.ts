import { Codec, ByteChunks, collectBytes } from './types.js';

/**
 * Plain text rendering: collections become `a, b, c`, maps and plain
 * objects `{k=v, k=v}`.
 */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
  if (value instanceof Map) {
    return '{' + Array.from(value, ([k, v]) => `${toText(k)}=${toText(v)}`).join(', ') + '}';
  }
  if (Array.isArray(value) || value instanceof Set) {
    return Array.from(value, toText).join(', ');
  }
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') {
    return '{' + Object.entries(value).map(([k, v]) => `${k}=${toText(v)}`).join(', ') + '}';
  }
  return String(value);
}

export function splitText(text: string): string[] {
  if (text === '') return [];
  return text.split(',').map(s => s.trim());
}

async function* chunksAsText(chunks: ByteChunks): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  for await (const chunk of chunks) {
    const s = decoder.decode(chunk, { stream: true });
    if (s) yield s;
  }
  const tail = decoder.decode();
  if (tail) yield tail;
}

export const textCodec: Codec = {
  name: 'text',
  contentTypes: ['text/plain'],
  isBinary: false,
  encode(value: unknown): Uint8Array {
    return Buffer.from(toText(value), 'utf8');
  },
  decode(buf: Uint8Array | string): unknown {
    return typeof buf === 'string' ? buf : Buffer.from(buf).toString('utf8');
  },
  async decodeOne(chunks: ByteChunks): Promise<unknown> {
    // A text body is one document
    const buf = await collectBytes(chunks);
    return buf.length === 0 ? undefined : buf.toString('utf8');
  },
  async decodeList(chunks: ByteChunks): Promise<unknown[]> {
    return splitText((await collectBytes(chunks)).toString('utf8'));
  },
  decodeStream(chunks: ByteChunks): AsyncIterable<unknown> {
    return chunksAsText(chunks);
  },
  async *encodeStream(values: AsyncIterable<unknown>): AsyncIterable<Uint8Array> {
    for await (const v of values) {
      const buf = Buffer.from(toText(v), 'utf8');
      if (buf.length > 0) yield buf;
    }
  }
};
