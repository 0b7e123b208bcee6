import busboy from 'busboy';
import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import { CodecRegistry } from './registry.js';
import { collectBytes } from './types.js';
import { AsyncQueue } from '../util/async-queue.js';
import { BadRequestError, CodecUnavailableError, IllegalStateError } from '../web/errors.js';

export interface MultipartLimits {
  maxParts: number;
  maxFields: number;
  maxPartSize: number;
}

/**
 * One part of a multipart/form-data body. Exactly one of `raw`, `string` or
 * `decode` may be called, and it must be called before the next part is
 * requested: parts are read in a single pass over the request stream.
 */
export interface Part {
  readonly name: string;
  readonly filename: string | null;
  readonly contentType: string | null;
  readonly headers: Record<string, string>;
  readonly consumed: boolean;
  raw(): AsyncIterable<Buffer>;
  string(): Promise<string>;
  decode(): Promise<unknown>;
}

type PartSource =
  | { kind: 'field'; value: string }
  | { kind: 'file'; stream: Readable; truncated: () => boolean };

async function* once(buf: Buffer): AsyncGenerator<Buffer> {
  yield buf;
}

/** busboy cuts an oversized file short; that surfaces here once the part is read. */
async function* fileChunks(name: string, src: Extract<PartSource, { kind: 'file' }>, maxSize: number): AsyncGenerator<Buffer> {
  for await (const chunk of src.stream) yield Buffer.from(chunk);
  if (src.truncated()) throw new BadRequestError(`Part ${name} exceeds ${maxSize} bytes`);
}

class MultipartPart implements Part {
  readonly headers: Record<string, string>;
  private state: 'pending' | 'consumed' | 'discarded' = 'pending';

  constructor(
    readonly name: string,
    readonly filename: string | null,
    readonly contentType: string | null,
    private readonly source: PartSource,
    private readonly registry: CodecRegistry,
    private readonly maxSize: number
  ) {
    const disposition = `form-data; name="${name}"` + (filename !== null ? `; filename="${filename}"` : '');
    this.headers = { 'content-disposition': disposition };
    if (contentType) this.headers['content-type'] = contentType;
  }

  get consumed(): boolean {
    return this.state !== 'pending';
  }

  private take(): PartSource {
    if (this.state === 'consumed') throw new IllegalStateError(`Part ${this.name} already consumed`);
    if (this.state === 'discarded') throw new IllegalStateError(`Part ${this.name} was discarded`);
    this.state = 'consumed';
    return this.source;
  }

  raw(): AsyncIterable<Buffer> {
    const src = this.take();
    if (src.kind === 'file') return fileChunks(this.name, src, this.maxSize);
    return once(Buffer.from(src.value, 'utf8'));
  }

  async string(): Promise<string> {
    const src = this.take();
    if (src.kind === 'field') return src.value;
    return (await collectBytes(fileChunks(this.name, src, this.maxSize))).toString('utf8');
  }

  async decode(): Promise<unknown> {
    const codec = this.registry.forMediaType(this.contentType);
    if (!codec) throw new CodecUnavailableError(this.contentType || '', 'decode');
    const src = this.take();
    if (src.kind === 'field') return codec.decode(src.value);
    return codec.decodeOne(fileChunks(this.name, src, this.maxSize));
  }

  /** Drains a part nobody consumed so the parser can move on. */
  discard() {
    if (this.state !== 'pending') return;
    this.state = 'discarded';
    if (this.source.kind === 'file') this.source.stream.resume();
  }
}

/**
 * Streams the parts of a multipart/form-data request body in arrival order.
 */
export function parseMultipart(
  source: Readable,
  headers: IncomingHttpHeaders,
  registry: CodecRegistry,
  limits: MultipartLimits
): AsyncIterable<Part> {
  let bb: busboy.Busboy;
  try {
    bb = busboy({
      headers,
      limits: {
        fileSize: limits.maxPartSize,
        files: limits.maxParts,
        fields: limits.maxFields,
        parts: limits.maxParts + limits.maxFields
      }
    });
  } catch (e) {
    throw new BadRequestError(e instanceof Error ? e.message : 'Malformed multipart request', { cause: e });
  }

  const queue = new AsyncQueue<MultipartPart>();
  let abandoned = false;
  const failLimit = (what: string) => () => {
    queue.fail(new BadRequestError(`Multipart ${what} limit exceeded`));
    source.unpipe(bb);
    source.resume();
  };

  bb.on('field', (name: string, value: string, info: busboy.FieldInfo) => {
    if (abandoned) return;
    queue.push(new MultipartPart(name, null, info.mimeType || null, { kind: 'field', value }, registry, limits.maxPartSize));
  });

  bb.on('file', (name: string, stream: Readable, info: busboy.FileInfo) => {
    if (abandoned) {
      stream.resume();
      return;
    }
    let truncated = false;
    stream.on('limit', () => {
      truncated = true;
    });
    stream.on('error', (err: Error) => {
      queue.fail(new BadRequestError(`Part ${name} failed: ${err.message}`, { cause: err }));
    });
    const filename = typeof info.filename === 'string' ? info.filename : null;
    const source: PartSource = { kind: 'file', stream, truncated: () => truncated };
    queue.push(new MultipartPart(name, filename, info.mimeType || null, source, registry, limits.maxPartSize));
  });

  bb.on('partsLimit', failLimit('parts'));
  bb.on('filesLimit', failLimit('files'));
  bb.on('fieldsLimit', failLimit('fields'));
  bb.on('error', (err: unknown) => {
    queue.fail(new BadRequestError(err instanceof Error ? err.message : 'Malformed multipart body', { cause: err }));
  });
  bb.on('finish', () => queue.end());

  source.pipe(bb);

  return (async function* () {
    let previous: MultipartPart | undefined;
    let completed = false;
    try {
      for (;;) {
        // Asking for the next part gives up on an unread previous one
        previous?.discard();
        const r = await queue.next();
        if (r.done) break;
        previous = r.value;
        yield r.value;
      }
      completed = true;
    } finally {
      previous?.discard();
      if (!completed) {
        // Consumer stopped early: let the parser run to the end of the body
        abandoned = true;
        for (const part of queue.takeBuffered()) part.discard();
      }
    }
  })();
}
