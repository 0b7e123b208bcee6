import { Codec } from '../codec/types.js';

export const SSE_CONTENT_TYPE = 'text/event-stream;charset=utf-8';

export interface ServerSentEvent<T = unknown> {
  id?: string;
  event?: string;
  comment?: string;
  data?: T;
}

type EventSource<T> = Iterable<ServerSentEvent<T>> | AsyncIterable<ServerSentEvent<T>>;

/** A handler result written as `text/event-stream`. */
export class ServerSentEvents<T = unknown> {
  constructor(
    readonly events: EventSource<T>,
    /** Media type of the codec applied to non-text `data`; JSON when unset */
    readonly dataType?: string
  ) {}
}

export function sse<T>(events: EventSource<T>, options: { dataType?: string } = {}): ServerSentEvents<T> {
  return new ServerSentEvents(events, options.dataType);
}

const LINE_BREAK = /\r\n|\r|\n/g;

/**
 * Frames one event. `data` is already encoded: only the framing is added
 * here, with every line break of the payload starting a new `data:` line.
 */
export function frameEvent(event: ServerSentEvent<unknown>, data?: string): string {
  let out = '';
  if (event.id !== undefined) out += `id:${event.id}\n`;
  if (event.event !== undefined) out += `event:${event.event}\n`;
  if (event.comment !== undefined) out += ':' + event.comment.replace(LINE_BREAK, '\r\n:') + '\n';
  if (data !== undefined) out += 'data:' + data.replace(LINE_BREAK, '\r\ndata:');
  return out + '\r\n\r\n';
}

function encodeData(data: unknown, codec: Codec): string | undefined {
  if (data === undefined) return undefined;
  if (typeof data === 'string') return data;
  if (data instanceof Uint8Array) return Buffer.from(data).toString('utf8');
  return Buffer.from(codec.encode(data)).toString('utf8');
}

export async function* encodeEvents<T>(events: EventSource<T>, codec: Codec): AsyncGenerator<Buffer> {
  for await (const event of events) {
    yield Buffer.from(frameEvent(event, encodeData(event.data, codec)), 'utf8');
  }
}
