import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import { BodyElement, anyValue } from '../binding/converters.js';
import { CodecRegistry } from '../codec/registry.js';
import { Codec, CodecError, collectBytes } from '../codec/types.js';
import { Parameter, formPairs } from '../codec/form.js';
import { DecodedGuardrails, checkDecodedPayload } from '../codec/guards.js';
import { MediaType, parseMediaType } from '../codec/media-type.js';
import { MultipartLimits, Part, parseMultipart } from '../codec/multipart.js';
import { BadRequestError, CodecUnavailableError, IllegalStateError, ParameterBindingError, errorMessage } from './errors.js';

export interface BodyContext {
  registry: CodecRegistry;
  headers: IncomingHttpHeaders;
  /** Media types the route consumes, used when the request has no content-type */
  consumes: string[];
  guardrails: DecodedGuardrails;
  multipart: MultipartLimits;
}

export interface BodyOptions {
  /** Defaults to true: an empty body is a 400 */
  required?: boolean;
}

type BodyState = 'unread' | 'consumed' | 'discarded';

function malformed(e: unknown): unknown {
  if (e instanceof CodecError) return new BadRequestError(`Malformed request body: ${e.message}`, { cause: e });
  return e;
}

/**
 * The request body. It can be read once, by exactly one of the consumers
 * below; a second read, or a read after the body was discarded, throws
 * {@link IllegalStateError}.
 */
export class RequestBody {
  private state: BodyState = 'unread';
  readonly contentType?: MediaType;

  constructor(private readonly source: Readable, private readonly ctx: BodyContext) {
    const ct = ctx.headers['content-type'];
    this.contentType = parseMediaType(ct);
  }

  get consumed(): boolean {
    return this.state !== 'unread';
  }

  private take(): void {
    if (this.state === 'consumed') throw new IllegalStateError('Request body already consumed');
    if (this.state === 'discarded') throw new IllegalStateError('Request body was discarded');
    this.state = 'consumed';
  }

  private claim(): AsyncIterable<Buffer> {
    this.take();
    const source = this.source;
    // Leaving early must not destroy the socket the response is written to
    return { [Symbol.asyncIterator]: () => source.iterator({ destroyOnReturn: false }) };
  }

  /** Codec picked from the request content-type, or from the route's consumes when absent. */
  decoder(): Codec {
    const { registry, consumes } = this.ctx;
    if (this.contentType) {
      const codec = registry.forMediaType(this.contentType);
      if (!codec) throw new CodecUnavailableError(this.contentType.essence, 'decode');
      return codec;
    }
    if (consumes.length > 0) {
      const codec = registry.forMediaType(consumes[0]);
      if (!codec) throw new CodecUnavailableError(consumes[0], 'decode');
      return codec;
    }
    return registry.getDefault();
  }

  private guard<T>(value: T): T {
    const check = checkDecodedPayload(value, this.ctx.guardrails);
    if (!check.valid) {
      throw new BadRequestError(`Decoded payload rejected: ${check.reason} (limit ${check.limit}, actual ${check.actual})`);
    }
    return value;
  }

  private convert<T>(value: unknown, element: BodyElement<T>): T {
    try {
      return element(value);
    } catch (e) {
      throw new ParameterBindingError('body', `Invalid body (${errorMessage(e)})`, { cause: e });
    }
  }

  raw(): AsyncIterable<Buffer> {
    return this.claim();
  }

  async string(): Promise<string> {
    return (await collectBytes(this.claim())).toString('utf8');
  }

  /** Text chunks as they arrive, split on character boundaries. */
  async *textStream(): AsyncGenerator<string> {
    const decoder = new TextDecoder('utf-8');
    for await (const chunk of this.claim()) {
      const s = decoder.decode(chunk, { stream: true });
      if (s) yield s;
    }
    const tail = decoder.decode();
    if (tail) yield tail;
  }

  /**
   * First decoded value. Anything after it is drained and discarded, so a
   * multi-document body bound to one value keeps the first document only.
   */
  one<T = unknown>(element?: BodyElement<T>, options?: BodyOptions): Promise<T>;
  async one(element: BodyElement<unknown> = anyValue, options: BodyOptions = {}): Promise<unknown> {
    const value = await this.optional(element);
    if (value === undefined && (options.required ?? true)) {
      throw new ParameterBindingError('body', 'Missing required request body');
    }
    return value;
  }

  optional<T = unknown>(element?: BodyElement<T>): Promise<T | undefined>;
  async optional(element: BodyElement<unknown> = anyValue): Promise<unknown> {
    const codec = this.decoder();
    let value: unknown;
    try {
      value = await codec.decodeOne(this.claim());
    } catch (e) {
      throw malformed(e);
    }
    if (value === undefined) return undefined;
    return this.convert(this.guard(value), element);
  }

  list<T = unknown>(element?: BodyElement<T>, options?: BodyOptions): Promise<T[]>;
  async list(element: BodyElement<unknown> = anyValue, options: BodyOptions = {}): Promise<unknown[]> {
    const codec = this.decoder();
    let values: unknown[];
    try {
      values = await codec.decodeList(this.claim());
    } catch (e) {
      throw malformed(e);
    }
    if (values.length === 0 && (options.required ?? true)) {
      throw new ParameterBindingError('body', 'Missing required request body');
    }
    this.guard(values);
    return values.map(v => this.convert(v, element));
  }

  set<T = unknown>(element?: BodyElement<T>, options?: BodyOptions): Promise<Set<T>>;
  async set(element: BodyElement<unknown> = anyValue, options: BodyOptions = {}): Promise<Set<unknown>> {
    return new Set(await this.list(element, options));
  }

  /**
   * Values as the codec completes them. The codec is resolved now, so a
   * missing decoder fails before the handler runs; decoding itself happens
   * as the handler iterates.
   */
  stream<T = unknown>(element?: BodyElement<T>): AsyncIterable<T>;
  stream(element: BodyElement<unknown> = anyValue): AsyncIterable<unknown> {
    const codec = this.decoder();
    const chunks = this.claim();
    const guard = <V>(v: V) => this.guard(v);
    const convert = (v: unknown) => this.convert(v, element);
    return (async function* () {
      try {
        for await (const value of codec.decodeStream(chunks)) yield convert(guard(value));
      } catch (e) {
        throw malformed(e);
      }
    })();
  }

  /** Urlencoded pairs in arrival order, each one as soon as it is complete. */
  form(): AsyncIterable<Parameter> {
    const chunks = this.claim();
    return (async function* () {
      try {
        yield* formPairs(chunks);
      } catch (e) {
        throw malformed(e);
      }
    })();
  }

  multipart(): AsyncIterable<Part> {
    if (this.contentType?.essence !== 'multipart/form-data') {
      throw new BadRequestError('Expected a multipart/form-data body');
    }
    this.take();
    return parseMultipart(this.source, this.ctx.headers, this.ctx.registry, this.ctx.multipart);
  }

  /** Discards an unread body so the connection can be reused. */
  discard(): void {
    if (this.state === 'unread') this.state = 'discarded';
    this.release();
  }

  /** Lets whatever is left of the request stream flow to nowhere. */
  release(): void {
    if (!this.source.readableEnded && !this.source.destroyed) this.source.resume();
  }
}
