import type { IncomingMessage, ServerResponse } from 'http';
import { serialize, type CookieSerializeOptions } from 'cookie';
import type { BindingSource } from '../binding/binder.js';
import { RequestBody, BodyContext } from './body.js';
import { PathSafetyError } from './errors.js';

/** Ordered multimap: values keep their arrival order within a name. */
export class ParameterMap {
  private readonly entries = new Map<string, string[]>();

  constructor(pairs: Iterable<readonly [string, string]> = [], private readonly caseInsensitive = false) {
    for (const [name, value] of pairs) this.add(name, value);
  }

  private key(name: string): string {
    return this.caseInsensitive ? name.toLowerCase() : name;
  }

  add(name: string, value: string): void {
    const k = this.key(name);
    const list = this.entries.get(k);
    if (list) list.push(value);
    else this.entries.set(k, [value]);
  }

  get(name: string): string | undefined {
    return this.entries.get(this.key(name))?.[0];
  }

  getAll(name: string): string[] {
    return [...(this.entries.get(this.key(name)) ?? [])];
  }

  has(name: string): boolean {
    return this.entries.has(this.key(name));
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }
}

/**
 * `name=value` pairs of every Cookie header line, in order. Repeated names
 * are kept; values are not split on commas here.
 */
export function parseCookies(lines: string[]): Array<[string, string]> {
  const out: Array<[string, string]> = [];
  for (const line of lines) {
    for (const piece of line.split(';')) {
      const eq = piece.indexOf('=');
      if (eq < 0) continue;
      const name = piece.slice(0, eq).trim();
      let value = piece.slice(eq + 1).trim();
      if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) value = value.slice(1, -1);
      if (!name) continue;
      try {
        out.push([name, decodeURIComponent(value)]);
      } catch {
        out.push([name, value]);
      }
    }
  }
  return out;
}

/**
 * Removes `.` and `..` segments of an encoded request path. Encoded dots
 * (`%2E`) are left alone: they are data, not navigation.
 */
export function normalizePath(rawPath: string): string {
  if (!rawPath.startsWith('/')) throw new PathSafetyError(`Request target must start with '/'`);
  const input = rawPath.slice(1).split('/');
  const output: string[] = [];
  input.forEach((segment, i) => {
    const last = i === input.length - 1;
    if (segment === '.' || segment === '..') {
      if (segment === '..') output.pop();
      // `/a/..` normalizes to `/`, keeping the trailing slash
      if (last) output.push('');
      return;
    }
    output.push(segment);
  });
  return '/' + output.join('/');
}

export class ExchangeResponse {
  constructor(private readonly res: ServerResponse) {}

  get statusCode(): number {
    return this.res.statusCode;
  }

  get headersSent(): boolean {
    return this.res.headersSent;
  }

  status(code: number): this {
    this.res.statusCode = code;
    return this;
  }

  header(name: string, value: string | number | string[]): this {
    this.res.setHeader(name, value);
    return this;
  }

  getHeader(name: string): string | undefined {
    const v = this.res.getHeader(name);
    if (v === undefined) return undefined;
    return Array.isArray(v) ? v.join(', ') : String(v);
  }

  cookie(name: string, value: string, options?: CookieSerializeOptions): this {
    const existing = this.res.getHeader('set-cookie');
    const list = Array.isArray(existing) ? existing : typeof existing === 'string' ? [existing] : [];
    this.res.setHeader('set-cookie', [...list, serialize(name, value, options)]);
    return this;
  }
}

/** What an error route sees: the request line and headers, and the response to adjust. */
export interface ErrorExchange {
  readonly method: string;
  readonly path: string;
  readonly headers: ParameterMap;
  readonly response: ExchangeResponse;
}

/** Every header line as a name/value pair, repeated headers kept apart. */
export function headerPairs(req: IncomingMessage): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const [name, values] of Object.entries(req.headersDistinct)) {
    for (const v of values ?? []) pairs.push([name, v]);
  }
  return pairs;
}

export interface ExchangeInit {
  req: IncomingMessage;
  res: ServerResponse;
  path: string;
  query: URLSearchParams;
  pathParameters: Record<string, string>;
  body: BodyContext;
}

/**
 * Per-request state: what the router matched, what the binder reads from,
 * and the response the handler may adjust before the result is written.
 */
export class Exchange implements BindingSource, ErrorExchange {
  readonly method: string;
  readonly path: string;
  readonly rawPath: string;
  readonly query: ParameterMap;
  readonly headers: ParameterMap;
  readonly cookies: ParameterMap;
  readonly pathParameters: Readonly<Record<string, string>>;
  readonly request: { readonly body: RequestBody; readonly remoteAddress: string };
  readonly response: ExchangeResponse;
  private formCache?: Promise<ParameterMap>;

  constructor(init: ExchangeInit) {
    const { req } = init;
    this.method = (req.method || 'GET').toUpperCase();
    this.path = init.path;
    this.rawPath = req.url || '/';
    this.query = new ParameterMap(init.query);
    this.headers = new ParameterMap(headerPairs(req), true);
    this.cookies = new ParameterMap(parseCookies(this.headers.getAll('cookie')));
    this.pathParameters = init.pathParameters;
    this.request = {
      body: new RequestBody(req, init.body),
      remoteAddress: req.socket.remoteAddress || ''
    };
    this.response = new ExchangeResponse(init.res);
  }

  get body(): RequestBody {
    return this.request.body;
  }

  pathParameter(name: string): string | undefined {
    return this.pathParameters[name];
  }

  queryValues(name: string): string[] {
    return this.query.getAll(name);
  }

  headerValues(name: string): string[] {
    return this.headers.getAll(name);
  }

  cookieValues(name: string): string[] {
    return this.cookies.getAll(name);
  }

  async formValues(name: string): Promise<string[]> {
    if (!this.formCache) {
      const body = this.request.body;
      this.formCache = (async () => {
        const map = new ParameterMap();
        for await (const p of body.form()) map.add(p.name, p.value);
        return map;
      })();
    }
    return (await this.formCache).getAll(name);
  }
}
