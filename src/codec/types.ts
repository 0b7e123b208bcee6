export type ByteChunks = AsyncIterable<Uint8Array>;

export interface Codec {
  name: string; // 'json' | 'msgpack' | 'text' | 'form'
  contentTypes: string[]; // e.g., ['application/json']
  isBinary: boolean;
  encode(value: unknown): Uint8Array;
  decode(buf: Uint8Array | string): unknown;
  /**
   * First logical value of the body. Whatever follows it is drained and
   * discarded. Resolves undefined for an empty body.
   */
  decodeOne(chunks: ByteChunks): Promise<unknown>;
  /** Every logical value of the body, in order. */
  decodeList(chunks: ByteChunks): Promise<unknown[]>;
  /** Values as soon as each one is complete. */
  decodeStream(chunks: ByteChunks): AsyncIterable<unknown>;
  /** Wire framing of a sequence of values. */
  encodeStream(values: AsyncIterable<unknown>): AsyncIterable<Uint8Array>;
}

export class CodecError extends Error {
  constructor(readonly codec: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodecError';
  }
}

/** Consumes and discards whatever is left of an iterator. */
export async function drain(it: AsyncIterator<unknown>): Promise<void> {
  for (;;) {
    const r = await it.next();
    if (r.done) return;
  }
}

/**
 * Runs `decode` over the body until it produces one value, then drains the
 * remaining bytes without decoding them.
 */
export async function decodeFirst(
  chunks: ByteChunks,
  decode: (chunks: ByteChunks) => AsyncIterable<unknown>
): Promise<unknown> {
  const source = chunks[Symbol.asyncIterator]();
  // No return(): leaving the decoder early must not close the underlying body
  const rest: ByteChunks = { [Symbol.asyncIterator]: () => ({ next: () => source.next() }) };
  const values = decode(rest)[Symbol.asyncIterator]();
  const first = await values.next();
  if (values.return) await values.return(undefined);
  await drain(source);
  return first.done ? undefined : first.value;
}

export async function collectBytes(chunks: ByteChunks): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) parts.push(Buffer.from(chunk));
  return Buffer.concat(parts);
}
