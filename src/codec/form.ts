import { Codec, ByteChunks, CodecError, collectBytes, decodeFirst } from './types.js';

/** One `name=value` pair of an urlencoded form body. */
export interface Parameter {
  name: string;
  value: string;
}

export function isParameter(v: unknown): v is Parameter {
  return typeof v === 'object' && v !== null
    && 'name' in v && typeof v.name === 'string'
    && 'value' in v && typeof v.value === 'string';
}

function decodeComponent(s: string): string {
  try {
    return decodeURIComponent(s.replace(/\+/g, ' '));
  } catch (e) {
    throw new CodecError('form', `Malformed form encoding: ${s}`, { cause: e });
  }
}

export function parsePair(pair: string): Parameter {
  const eq = pair.indexOf('=');
  if (eq < 0) return { name: decodeComponent(pair), value: '' };
  return { name: decodeComponent(pair.slice(0, eq)), value: decodeComponent(pair.slice(eq + 1)) };
}

export function parseForm(text: string): Parameter[] {
  return text.split('&').filter(p => p.length > 0).map(parsePair);
}

/** Pairs are emitted as soon as their terminating `&` has arrived. */
async function* pairs(chunks: ByteChunks): AsyncGenerator<Parameter> {
  const decoder = new TextDecoder('utf-8');
  let pending = '';
  for await (const chunk of chunks) {
    pending += decoder.decode(chunk, { stream: true });
    const parts = pending.split('&');
    pending = parts.pop() ?? '';
    for (const p of parts) if (p) yield parsePair(p);
  }
  pending += decoder.decode();
  if (pending) yield parsePair(pending);
}

function toPairs(value: unknown): Array<[string, string]> {
  if (value instanceof Map) return Array.from(value, ([k, v]) => [String(k), String(v)]);
  if (Array.isArray(value)) {
    return value.filter(isParameter).map(p => [p.name, p.value]);
  }
  if (typeof value === 'object' && value !== null) {
    const out: Array<[string, string]> = [];
    for (const [k, v] of Object.entries(value)) {
      if (Array.isArray(v)) for (const item of v) out.push([k, String(item)]);
      else if (v !== undefined && v !== null) out.push([k, String(v)]);
    }
    return out;
  }
  throw new CodecError('form', 'Only maps, records and parameter lists can be form encoded');
}

export const formCodec: Codec = {
  name: 'form',
  contentTypes: ['application/x-www-form-urlencoded'],
  isBinary: false,
  encode(value: unknown): Uint8Array {
    return Buffer.from(new URLSearchParams(toPairs(value)).toString(), 'utf8');
  },
  decode(buf: Uint8Array | string): unknown {
    return parseForm(typeof buf === 'string' ? buf : Buffer.from(buf).toString('utf8'));
  },
  decodeOne(chunks: ByteChunks): Promise<unknown> {
    return decodeFirst(chunks, pairs);
  },
  async decodeList(chunks: ByteChunks): Promise<unknown[]> {
    return parseForm((await collectBytes(chunks)).toString('utf8'));
  },
  decodeStream(chunks: ByteChunks): AsyncIterable<unknown> {
    return pairs(chunks);
  },
  async *encodeStream(values: AsyncIterable<unknown>): AsyncIterable<Uint8Array> {
    let first = true;
    for await (const v of values) {
      const encoded = Buffer.from(formCodec.encode(isParameter(v) ? [v] : v)).toString('utf8');
      if (!encoded) continue;
      yield Buffer.from((first ? '' : '&') + encoded, 'utf8');
      first = false;
    }
  }
};

export { pairs as formPairs };
