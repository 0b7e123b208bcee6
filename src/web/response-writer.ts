import type { ServerResponse } from 'http';
import { CodecRegistry } from '../codec/registry.js';
import { Codec } from '../codec/types.js';
import { ServerSentEvents, SSE_CONTENT_TYPE, encodeEvents } from './sse.js';
import { CodecUnavailableError, InternalServerError, MethodNotAllowedError, errorMessage, isHttpError } from './errors.js';

export interface WriteContext {
  registry: CodecRegistry;
  accept?: string | string[];
  /** Negotiated produced media type, when the route declares any */
  produced?: string;
}

type Raw = string | Uint8Array;

function isRaw(v: unknown): v is Raw {
  return typeof v === 'string' || v instanceof Uint8Array;
}

export function isAsyncIterable(v: unknown): v is AsyncIterable<unknown> {
  return typeof v === 'object' && v !== null && Symbol.asyncIterator in v;
}

function rawBytes(v: Raw): Buffer {
  return typeof v === 'string' ? Buffer.from(v, 'utf8') : Buffer.from(v.buffer, v.byteOffset, v.byteLength);
}

async function* rawChunks(values: AsyncIterable<unknown>): AsyncGenerator<Buffer> {
  for await (const v of values) {
    if (!isRaw(v)) throw new InternalServerError('Raw stream elements must be strings or bytes');
    const buf = rawBytes(v);
    if (buf.length > 0) yield buf;
  }
}

/** Puts an already-read first result back in front of the rest of an iterator. */
async function* prepend<T>(first: IteratorResult<T>, rest: AsyncIterator<T>): AsyncGenerator<T> {
  if (first.done) return;
  yield first.value;
  try {
    for (;;) {
      const r = await rest.next();
      if (r.done) return;
      yield r.value;
    }
  } finally {
    await rest.return?.();
  }
}

function writable(res: ServerResponse): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

/**
 * Writes chunks without a content-length, so the transport frames the body
 * as chunked. Stops pulling from the source once the client is gone, and
 * closes the source either way.
 */
async function pipeChunks(res: ServerResponse, chunks: AsyncIterable<Uint8Array>): Promise<number> {
  let bytes = 0;
  const it = chunks[Symbol.asyncIterator]();
  let finished = false;
  try {
    while (!res.destroyed) {
      const r = await it.next();
      if (r.done) {
        finished = true;
        break;
      }
      if (r.value.length === 0) continue;
      bytes += r.value.length;
      if (!res.write(r.value)) await writable(res);
    }
  } finally {
    if (!finished) await it.return?.();
  }
  if (!res.destroyed) res.end();
  return bytes;
}

function sendBuffer(res: ServerResponse, body: Buffer, contentType?: string): number {
  if (contentType) res.setHeader('content-type', contentType);
  res.setHeader('content-length', body.length);
  res.end(body);
  return body.length;
}

function producedCodec(ctx: WriteContext): Codec | undefined {
  if (!ctx.produced) return undefined;
  const codec = ctx.registry.forMediaType(ctx.produced);
  if (!codec) throw new CodecUnavailableError(ctx.produced, 'encode');
  return codec;
}

/**
 * Writes a handler result. Returns the number of body bytes written.
 *
 * - `undefined`/`null`: empty body, content-length 0
 * - string or bytes: sent as is, content-type only when the route produces one
 * - async iterables: chunked, raw when the elements are strings or bytes,
 *   otherwise framed by the produced or negotiated codec
 * - {@link ServerSentEvents}: `text/event-stream`
 * - anything else: encoded by the produced codec, or by the codec the
 *   Accept header selects when the route declares none
 */
export async function writeResult(res: ServerResponse, result: unknown, ctx: WriteContext): Promise<number> {
  if (result instanceof ServerSentEvents) {
    const dataType = result.dataType ?? 'application/json';
    const codec = ctx.registry.forMediaType(dataType);
    if (!codec) throw new CodecUnavailableError(dataType, 'encode');
    res.setHeader('content-type', SSE_CONTENT_TYPE);
    return pipeChunks(res, encodeEvents(result.events, codec));
  }

  if (result === undefined || result === null) {
    return sendBuffer(res, Buffer.alloc(0));
  }

  const codec = producedCodec(ctx);

  if (isAsyncIterable(result)) {
    if (codec && ctx.produced) {
      res.setHeader('content-type', ctx.produced);
      return pipeChunks(res, codec.encodeStream(result));
    }
    // The first element decides how the stream is written
    const it = result[Symbol.asyncIterator]();
    const first = await it.next();
    const rest = prepend(first, it);
    if (first.done || isRaw(first.value)) return pipeChunks(res, rawChunks(rest));
    const chosen = ctx.registry.chooseForResponse(ctx.accept);
    res.setHeader('content-type', chosen.contentType);
    return pipeChunks(res, chosen.codec.encodeStream(rest));
  }

  if (result instanceof Uint8Array) return sendBuffer(res, rawBytes(result), ctx.produced);
  if (codec && ctx.produced) return sendBuffer(res, Buffer.from(codec.encode(result)), ctx.produced);
  if (typeof result === 'string') return sendBuffer(res, rawBytes(result));

  const chosen = ctx.registry.chooseForResponse(ctx.accept);
  return sendBuffer(res, Buffer.from(chosen.codec.encode(result)), chosen.contentType);
}

/**
 * Writes a failure. An {@link HttpError} keeps its status and message;
 * anything else is an empty 500. Once headers are out the only signal left
 * is to abort the connection.
 */
export function writeError(res: ServerResponse, err: unknown): { status: number; message: string } {
  const message = errorMessage(err);
  if (res.headersSent) {
    res.destroy(err instanceof Error ? err : new Error(message));
    return { status: res.statusCode, message };
  }
  const status = prepareErrorResponse(res, err);
  if (isHttpError(err)) {
    sendBuffer(res, Buffer.from(err.message, 'utf8'), 'text/plain;charset=utf-8');
  } else {
    sendBuffer(res, Buffer.alloc(0));
  }
  return { status, message };
}

/**
 * Drops body headers a handler may have set and applies the error's status
 * (500 for anything that is not an {@link HttpError}), with `allow` for 405.
 */
export function prepareErrorResponse(res: ServerResponse, err: unknown): number {
  for (const name of ['content-type', 'content-length', 'transfer-encoding']) res.removeHeader(name);
  const status = isHttpError(err) ? err.status : 500;
  res.statusCode = status;
  if (err instanceof MethodNotAllowedError) res.setHeader('allow', err.allowedMethods.join(', '));
  return status;
}
