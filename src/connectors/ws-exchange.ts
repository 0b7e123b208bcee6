import { WebSocket, RawData } from 'ws';
import { BodyElement, anyValue } from '../binding/converters.js';
import { Codec } from '../codec/types.js';
import { DecodedGuardrails, checkDecodedPayload } from '../codec/guards.js';
import { AsyncQueue } from '../util/async-queue.js';
import { isAsyncIterable } from '../web/response-writer.js';
import { ParameterMap } from '../web/exchange.js';
import { IllegalStateError, errorMessage } from '../web/errors.js';
import type { MessageType } from '../routing/router.js';

export type WebSocketState = 'OPEN' | 'CLOSING' | 'CLOSED';

export interface CloseInfo {
  code: number;
  reason: string;
  /** False when the connection dropped without a close handshake */
  clean: boolean;
}

export const CloseCodes = {
  NORMAL: 1000,
  ABNORMAL: 1006,
  INVALID_PAYLOAD: 1007,
  TOO_BIG: 1009,
  INTERNAL_ERROR: 1011
} as const;

/** Inbound failure that ends the connection with a specific close code. */
export class WebSocketCloseError extends Error {
  constructor(readonly closeCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WebSocketCloseError';
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * One inbound message. `ws` reassembles fragmented frames, so a message
 * carries its complete payload; `frames()` still exposes it as a stream for
 * consumers written against partial delivery.
 */
export class WebSocketMessage {
  constructor(
    readonly kind: MessageType,
    private readonly payload: Buffer,
    private readonly codec: Codec,
    private readonly guardrails: DecodedGuardrails
  ) {}

  get binary(): boolean {
    return this.kind === 'binary';
  }

  get size(): number {
    return this.payload.length;
  }

  async *frames(): AsyncGenerator<Buffer> {
    yield this.payload;
  }

  async reduceToBytes(): Promise<Buffer> {
    return this.payload;
  }

  async reduceToString(): Promise<string> {
    return this.payload.toString('utf8');
  }

  decode<T = unknown>(element?: BodyElement<T>): Promise<T>;
  async decode(element: BodyElement<unknown> = anyValue): Promise<unknown> {
    let value: unknown;
    try {
      value = this.codec.decode(this.payload);
    } catch (e) {
      throw new WebSocketCloseError(CloseCodes.INVALID_PAYLOAD, `Malformed ${this.codec.name} message: ${errorMessage(e)}`, { cause: e });
    }
    const check = checkDecodedPayload(value, this.guardrails);
    if (!check.valid) {
      const code = check.reason === 'decoded_size_exceeded' ? CloseCodes.TOO_BIG : CloseCodes.INVALID_PAYLOAD;
      throw new WebSocketCloseError(code, `Decoded message rejected: ${check.reason} (limit ${check.limit}, actual ${check.actual})`);
    }
    try {
      return element(value);
    } catch (e) {
      throw new WebSocketCloseError(CloseCodes.INVALID_PAYLOAD, `Invalid message: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/**
 * Inbound side. Messages are queued from the moment the upgrade completes,
 * so nothing is lost before a consumer attaches. Only one of the views
 * below may be consumed.
 */
export class Inbound {
  private claimed = false;

  constructor(private readonly queue: AsyncQueue<WebSocketMessage>) {}

  private claim(): AsyncQueue<WebSocketMessage> {
    if (this.claimed) throw new IllegalStateError('Inbound messages already consumed');
    this.claimed = true;
    return this.queue;
  }

  messages(): AsyncIterable<WebSocketMessage> {
    return this.claim();
  }

  frames(): AsyncIterable<Buffer> {
    const queue = this.claim();
    return (async function* () {
      for await (const message of queue) yield* message.frames();
    })();
  }

  textMessages(): AsyncIterable<string> {
    const queue = this.claim();
    return (async function* () {
      for await (const message of queue) {
        if (!message.binary) yield await message.reduceToString();
      }
    })();
  }

  binaryMessages(): AsyncIterable<Buffer> {
    const queue = this.claim();
    return (async function* () {
      for await (const message of queue) {
        if (message.binary) yield await message.reduceToBytes();
      }
    })();
  }

  decodeTextMessages<T = unknown>(element?: BodyElement<T>): AsyncIterable<T>;
  decodeTextMessages(element: BodyElement<unknown> = anyValue): AsyncIterable<unknown> {
    return this.decoded('text', element);
  }

  decodeBinaryMessages<T = unknown>(element?: BodyElement<T>): AsyncIterable<T>;
  decodeBinaryMessages(element: BodyElement<unknown> = anyValue): AsyncIterable<unknown> {
    return this.decoded('binary', element);
  }

  private decoded(kind: MessageType, element: BodyElement<unknown>): AsyncIterable<unknown> {
    const queue = this.claim();
    return (async function* () {
      for await (const message of queue) {
        if (message.kind === kind) yield await message.decode(element);
      }
    })();
  }
}

type Payload = { data: Buffer; binary: boolean };

/** Iterables sent as a sequence of messages. Maps stay structured values. */
function isSyncIterable(v: unknown): v is Iterable<unknown> {
  if (typeof v !== 'object' || v === null || v instanceof Uint8Array || v instanceof Map) return false;
  return Symbol.iterator in v && typeof v[Symbol.iterator] === 'function';
}

/**
 * Outbound side. Accepts a single value, an iterable or async iterable of
 * values, or a sequence whose async-iterable elements are each concatenated
 * into one message.
 */
export class Outbound {
  private readonly pending = new Set<Promise<void>>();
  private failure: { error: unknown } | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly state: () => WebSocketState,
    private readonly codec: Codec | undefined,
    private readonly fallback: Codec,
    private readonly messageType?: MessageType
  ) {}

  private encode(value: unknown): Payload {
    if (typeof value === 'string') {
      return { data: Buffer.from(value, 'utf8'), binary: this.messageType === 'binary' };
    }
    if (value instanceof Uint8Array) {
      return { data: Buffer.from(value), binary: this.messageType !== 'text' };
    }
    const codec = this.codec ?? this.fallback;
    return { data: Buffer.from(codec.encode(value)), binary: codec.isBinary || this.messageType === 'binary' };
  }

  private async encodeInner(parts: AsyncIterable<unknown>): Promise<Payload | undefined> {
    const chunks: Buffer[] = [];
    let binary: boolean | undefined;
    for await (const part of parts) {
      const p = this.encode(part);
      if (binary === undefined) binary = p.binary;
      chunks.push(p.data);
    }
    if (binary === undefined) return undefined;
    return { data: Buffer.concat(chunks), binary };
  }

  private write(payload: Payload): Promise<void> {
    if (this.state() !== 'OPEN') {
      return Promise.reject(new IllegalStateError(`Cannot send on a ${this.state()} WebSocket`));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(payload.data, { binary: payload.binary }, err => (err ? reject(err) : resolve()));
    });
  }

  /** Sends one message; an async iterable value becomes one concatenated message. */
  async send(value: unknown): Promise<void> {
    if (isAsyncIterable(value)) {
      const payload = await this.encodeInner(value);
      if (payload) await this.write(payload);
      return;
    }
    await this.write(this.encode(value));
  }

  /**
   * Sends every message of `source` in order. Completion is tracked, so the
   * connection can close once everything handed over here is sent.
   */
  messages(source: unknown): Promise<void> {
    const run = this.sendAll(source);
    this.pending.add(run);
    run.then(
      () => {
        this.pending.delete(run);
      },
      (error: unknown) => {
        this.pending.delete(run);
        if (!this.failure) this.failure = { error };
      }
    );
    return run;
  }

  private async sendAll(source: unknown): Promise<void> {
    if (typeof source === 'string' || source instanceof Uint8Array || source === null || source === undefined) {
      if (source !== undefined && source !== null) await this.send(source);
      return;
    }
    if (isAsyncIterable(source)) {
      for await (const value of source) {
        if (this.state() !== 'OPEN') return;
        await this.send(value);
      }
      return;
    }
    if (isSyncIterable(source)) {
      for (const value of source) {
        if (this.state() !== 'OPEN') return;
        await this.send(value);
      }
      return;
    }
    await this.send(source);
  }

  /**
   * Resolves when every `messages()` call made so far has settled, and
   * rejects with the first failure among them.
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
    if (this.failure) throw this.failure.error;
  }
}

export interface WebSocketExchangeInit {
  id: string;
  ws: WebSocket;
  path: string;
  pathParameters: Record<string, string>;
  query: URLSearchParams;
  headers: ParameterMap;
  subprotocol: string | null;
  /** Codec selected by the sub-protocol, if any */
  codec: Codec | undefined;
  /** Codec used for structured messages when no sub-protocol selected one */
  fallbackCodec: Codec;
  messageType?: MessageType;
  guardrails: DecodedGuardrails;
  inboundHighWater: number;
}

/**
 * A WebSocket connection seen as two independent streams, inbound and
 * outbound, sharing only the close state.
 */
export class WebSocketExchange {
  readonly id: string;
  readonly path: string;
  readonly pathParameters: Readonly<Record<string, string>>;
  readonly query: ParameterMap;
  readonly headers: ParameterMap;
  readonly subprotocol: string | null;
  readonly codec: Codec | undefined;
  readonly inbound: Inbound;
  readonly outbound: Outbound;
  readonly closed: Promise<CloseInfo>;
  private current: WebSocketState = 'OPEN';
  private readonly ws: WebSocket;

  constructor(init: WebSocketExchangeInit) {
    this.id = init.id;
    this.ws = init.ws;
    this.path = init.path;
    this.pathParameters = init.pathParameters;
    this.query = new ParameterMap(init.query);
    this.headers = init.headers;
    this.subprotocol = init.subprotocol;
    this.codec = init.codec;

    const ws = init.ws;
    const decodeWith = init.codec ?? init.fallbackCodec;
    const queue = new AsyncQueue<WebSocketMessage>(init.inboundHighWater, () => ws.resume());
    this.inbound = new Inbound(queue);
    this.outbound = new Outbound(ws, () => this.current, init.codec, init.fallbackCodec, init.messageType);

    ws.on('message', (data: RawData, isBinary: boolean) => {
      const message = new WebSocketMessage(isBinary ? 'binary' : 'text', toBuffer(data), decodeWith, init.guardrails);
      // Slow consumer: stop reading from the socket until the queue drains.
      // Once closing, reading continues so the peer's close frame arrives.
      if (!queue.push(message) && this.current === 'OPEN') ws.pause();
    });

    this.closed = new Promise(resolve => {
      ws.once('close', (code: number, reason: Buffer) => {
        this.current = 'CLOSED';
        queue.end();
        resolve({ code, reason: reason.toString('utf8'), clean: code !== CloseCodes.ABNORMAL });
      });
    });
  }

  get state(): WebSocketState {
    return this.current;
  }

  /**
   * Starts the close handshake. Outbound sends are rejected from here on;
   * inbound keeps draining until the peer answers.
   */
  close(code: number = CloseCodes.NORMAL, reason = ''): void {
    if (this.current !== 'OPEN') return;
    this.current = 'CLOSING';
    this.ws.resume();
    this.ws.close(code, reason);
  }
}
