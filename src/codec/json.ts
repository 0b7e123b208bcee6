import { Codec, ByteChunks, CodecError, decodeFirst } from './types.js';

function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return Array.from(value);
  if (typeof value === 'bigint') return value.toString();
  return value;
}

function stringify(value: unknown): string {
  // JSON.stringify(undefined) is undefined, not a string
  return JSON.stringify(value, replacer) ?? 'null';
}

function parse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new CodecError('json', e instanceof Error ? e.message : 'Invalid JSON', { cause: e });
  }
}

const WS = new Set([' ', '\t', '\n', '\r']);

/**
 * Incremental splitter for a stream of JSON text. In `documents` mode it
 * yields each top-level document of a concatenated stream. In `elements`
 * mode a leading top-level array is unwrapped and its elements are yielded
 * one by one; anything that is not an array behaves as `documents`.
 */
export class JsonTextScanner {
  private buf = '';
  private pos = 0;
  private start = -1;
  private depth = 0;
  private inString = false;
  private escaped = false;
  private scalar = false;
  private mode: 'unknown' | 'documents' | 'array' | 'closed';

  constructor(unwrapArray: boolean) {
    this.mode = unwrapArray ? 'unknown' : 'documents';
  }

  private get base(): number {
    return this.mode === 'array' ? 1 : 0;
  }

  push(text: string): string[] {
    this.buf += text;
    const out: string[] = [];
    for (; this.pos < this.buf.length; this.pos++) {
      const c = this.buf[this.pos];
      if (this.inString) {
        if (this.escaped) this.escaped = false;
        else if (c === '\\') this.escaped = true;
        else if (c === '"') {
          this.inString = false;
          if (this.depth === this.base) this.emit(out, this.pos + 1);
        }
        continue;
      }
      if (this.start < 0) {
        if (WS.has(c)) continue;
        if (this.mode === 'closed') throw new CodecError('json', `Unexpected '${c}' after top-level array`);
        if (this.mode === 'unknown') {
          if (c === '[') {
            this.mode = 'array';
            this.depth = 1;
            continue;
          }
          this.mode = 'documents';
        }
        if (this.mode === 'array') {
          if (c === ',') continue;
          if (c === ']') {
            this.depth = 0;
            this.mode = 'closed';
            continue;
          }
        }
        this.start = this.pos;
        this.scalar = c !== '{' && c !== '[' && c !== '"';
      }
      if (this.scalar) {
        if (WS.has(c) || c === ',' || c === ']' || c === '}' || c === '{' || c === '[' || c === '"') {
          this.emit(out, this.pos);
          this.pos--; // re-read the delimiter between values
        }
        continue;
      }
      if (c === '"') this.inString = true;
      else if (c === '{' || c === '[') this.depth++;
      else if (c === '}' || c === ']') {
        this.depth--;
        if (this.depth === this.base) this.emit(out, this.pos + 1);
        else if (this.depth < this.base) throw new CodecError('json', `Unexpected '${c}'`);
      }
    }
    this.compact();
    return out;
  }

  end(): string[] {
    const out: string[] = [];
    if (this.start >= 0 && this.scalar) this.emit(out, this.buf.length);
    if (this.start >= 0 || this.inString) throw new CodecError('json', 'Unexpected end of JSON input');
    if (this.mode === 'array') throw new CodecError('json', 'Unterminated top-level array');
    return out;
  }

  private emit(out: string[], endExclusive: number) {
    out.push(this.buf.slice(this.start, endExclusive));
    this.start = -1;
    this.scalar = false;
  }

  private compact() {
    const keep = this.start >= 0 ? this.start : this.pos;
    if (keep > 0) {
      this.buf = this.buf.slice(keep);
      this.pos -= keep;
      if (this.start >= 0) this.start = 0;
    }
  }
}

async function* scan(chunks: ByteChunks, unwrapArray: boolean): AsyncGenerator<unknown> {
  const scanner = new JsonTextScanner(unwrapArray);
  const decoder = new TextDecoder('utf-8');
  for await (const chunk of chunks) {
    for (const doc of scanner.push(decoder.decode(chunk, { stream: true }))) yield parse(doc);
  }
  for (const doc of scanner.push(decoder.decode())) yield parse(doc);
  for (const doc of scanner.end()) yield parse(doc);
}

export const jsonCodec: Codec = {
  name: 'json',
  contentTypes: ['application/json', 'text/json', 'application/*+json'],
  isBinary: false,
  encode(value: unknown): Uint8Array {
    return Buffer.from(stringify(value), 'utf8');
  },
  decode(buf: Uint8Array | string): unknown {
    const s = typeof buf === 'string' ? buf : Buffer.from(buf).toString('utf8');
    return parse(s);
  },
  decodeOne(chunks: ByteChunks): Promise<unknown> {
    return decodeFirst(chunks, c => scan(c, false));
  },
  async decodeList(chunks: ByteChunks): Promise<unknown[]> {
    const values: unknown[] = [];
    for await (const v of scan(chunks, true)) values.push(v);
    return values;
  },
  decodeStream(chunks: ByteChunks): AsyncIterable<unknown> {
    return scan(chunks, true);
  },
  async *encodeStream(values: AsyncIterable<unknown>): AsyncIterable<Uint8Array> {
    let first = true;
    yield Buffer.from('[');
    for await (const v of values) {
      yield Buffer.from((first ? '' : ',') + stringify(v), 'utf8');
      first = false;
    }
    yield Buffer.from(']');
  }
};
