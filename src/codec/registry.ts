import { Codec } from './types.js';
import { jsonCodec } from './json.js';
import { msgpackCodec } from './msgpack.js';
import { textCodec } from './text.js';
import { formCodec } from './form.js';
import { MediaType, parseMediaType, parseAccept, matchesRange } from './media-type.js';

export class CodecRegistry {
  private codecs = new Map<string, Codec>();
  private defaultCodecName: string;

  constructor(options: { defaultCodec: string }) {
    this.defaultCodecName = options.defaultCodec.toLowerCase();
  }

  register(codec: Codec) {
    this.codecs.set(codec.name, codec);
  }

  get(name?: string | null): Codec | undefined {
    if (!name) return undefined;
    return this.codecs.get(name.toLowerCase());
  }

  list(): Codec[] {
    return Array.from(this.codecs.values());
  }

  getDefault(): Codec {
    return this.codecs.get(this.defaultCodecName) || jsonCodec;
  }

  /** Codec for a request or part Content-Type. */
  forMediaType(contentType?: string | MediaType | null): Codec | undefined {
    const mt = typeof contentType === 'string' || !contentType ? parseMediaType(contentType) : contentType;
    if (!mt) return undefined;
    for (const c of this.codecs.values()) {
      if (c.contentTypes.some(t => t === mt.essence)) return c;
    }
    for (const c of this.codecs.values()) {
      if (c.contentTypes.some(t => {
        const range = parseMediaType(t);
        return range !== undefined && matchesRange(range, mt);
      })) return c;
    }
    // Support +json structured suffix
    if (mt.subtype.endsWith('+json')) return this.get('json') || jsonCodec;
    return undefined;
  }

  /** A WebSocket sub-protocol token names a codec or a media type. */
  forSubprotocol(token?: string | null): Codec | undefined {
    if (!token) return undefined;
    return this.get(token) || this.forMediaType(token);
  }

  /**
   * Response codec from an Accept header when the route declares no
   * produced type. Falls back to the default codec.
   */
  chooseForResponse(accept?: string | string[]): { codec: Codec; contentType: string } {
    for (const range of parseAccept(accept)) {
      if (range.q <= 0) continue;
      if (range.type === '*') break;
      for (const c of this.codecs.values()) {
        const hit = c.contentTypes.find(t => {
          const mt = parseMediaType(t);
          return mt !== undefined && !t.includes('*') && matchesRange(range, mt);
        });
        if (hit) return { codec: c, contentType: hit };
      }
      if (range.subtype.endsWith('+json')) return { codec: this.get('json') || jsonCodec, contentType: range.essence };
    }
    const def = this.getDefault();
    return { codec: def, contentType: def.contentTypes[0] };
  }
}

export function createDefaultRegistry(defaultCodec = 'json'): CodecRegistry {
  const registry = new CodecRegistry({ defaultCodec });
  registry.register(jsonCodec);
  registry.register(textCodec);
  registry.register(formCodec);
  registry.register(msgpackCodec);
  return registry;
}
