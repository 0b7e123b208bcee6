import { PathPattern, comparePatterns, compilePathPattern, matchPathPattern } from './path-pattern.js';
import type { ParameterBinder } from '../binding/binder.js';
import type { ErrorExchange, Exchange } from '../web/exchange.js';
import type { WebSocketExchange } from '../connectors/ws-exchange.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

interface RouteOptions {
  method: HttpMethod | HttpMethod[];
  path: string;
  /** Also match the path with (or without) a trailing slash */
  matchTrailingSlash?: boolean;
  /** Media types this route can produce; negotiated against Accept */
  produces?: string[];
  /** Media types accepted in the request body; anything else is a 415 */
  consumes?: string[];
}

/**
 * An HTTP route. `parameters` runs before the handler and returns the
 * handler's typed arguments, built from the binder.
 */
export type BoundRouteDefinition<A> = RouteOptions & {
  parameters: (binder: ParameterBinder) => A | Promise<A>;
  handler: (exchange: Exchange, args: A) => unknown;
};

export type PlainRouteDefinition = RouteOptions & {
  parameters?: undefined;
  handler: (exchange: Exchange) => unknown;
};

export type RouteDefinition<A> = BoundRouteDefinition<A> | PlainRouteDefinition;

export interface Route {
  readonly methods: readonly string[];
  readonly pattern: PathPattern;
  readonly produces: readonly string[];
  readonly consumes: readonly string[];
  /** Binds the arguments then runs the handler */
  invoke(exchange: Exchange, binder: ParameterBinder): Promise<unknown>;
}

export type MessageType = 'text' | 'binary';

export interface WebSocketRouteDefinition {
  path: string;
  /** Sub-protocol tokens this route accepts, each naming a codec or media type */
  subprotocols?: string[];
  /** Frame type forced on strings and bytes; by default strings go as text and bytes as binary */
  messageType?: MessageType;
  /** Close with 1000 when the outbound sequence completes. Defaults to the server setting */
  closeOnComplete?: boolean;
  handler: (exchange: WebSocketExchange) => unknown;
}

export interface WebSocketRoute {
  readonly pattern: PathPattern;
  readonly subprotocols: readonly string[];
  readonly messageType?: MessageType;
  readonly closeOnComplete?: boolean;
  readonly handler: (exchange: WebSocketExchange) => unknown;
}

/**
 * Runs around the matching routes. Call `next` to continue down the chain
 * (binding and the handler come last), or return a result to answer
 * without it.
 */
export type Interceptor = (exchange: Exchange, next: () => Promise<unknown>) => unknown;

export interface InterceptorDefinition {
  /** Path template the request must match; every path when absent */
  path?: string;
  /** Methods the request must use; every method when absent */
  method?: HttpMethod | HttpMethod[];
  handler: Interceptor;
}

interface RegisteredInterceptor {
  readonly pattern?: PathPattern;
  readonly methods?: readonly string[];
  readonly handler: Interceptor;
}

export type ErrorType<E extends Error> = abstract new (...args: never[]) => E;

interface ErrorRoute {
  readonly type: ErrorType<Error>;
  readonly handle: (error: unknown, exchange: ErrorExchange) => unknown;
}

/** Steps from the error to `type.prototype` along its prototype chain, or -1. */
function prototypeDistance(error: Error, type: ErrorType<Error>): number {
  let distance = 0;
  for (let proto: unknown = Object.getPrototypeOf(error); proto !== null; proto = Object.getPrototypeOf(proto)) {
    if (proto === type.prototype) return distance;
    distance++;
  }
  return -1;
}

/** Runs `last` behind the interceptors, the first registered outermost. */
export function runIntercepted(
  interceptors: readonly Interceptor[],
  exchange: Exchange,
  last: () => Promise<unknown>
): Promise<unknown> {
  const step = async (i: number): Promise<unknown> =>
    i < interceptors.length ? interceptors[i](exchange, () => step(i + 1)) : last();
  return step(0);
}

export type RouteMatch =
  | { kind: 'route'; route: Route; captures: Record<string, string> }
  | { kind: 'methodNotAllowed'; allowed: string[] }
  | { kind: 'none' };

function pathMatches(pattern: PathPattern, path: string): boolean {
  return pattern.literal !== undefined ? pattern.literal === path : pattern.regex.test(path);
}

function acceptsMethod(route: Route, method: string): boolean {
  return route.methods.includes(method) || (method === 'HEAD' && route.methods.includes('GET'));
}

export class Router {
  private readonly literal = new Map<string, Route[]>();
  private readonly patterns: Route[] = [];
  private readonly sockets: WebSocketRoute[] = [];
  private readonly interceptors: RegisteredInterceptor[] = [];
  private readonly errorRoutes: ErrorRoute[] = [];

  route<A>(definition: BoundRouteDefinition<A>): this;
  route(definition: PlainRouteDefinition): this;
  route<A>(definition: RouteDefinition<A>): this {
    const pattern = compilePathPattern(definition.path, { matchTrailingSlash: definition.matchTrailingSlash });
    let invoke: Route['invoke'];
    if (definition.parameters !== undefined) {
      const { parameters, handler } = definition;
      invoke = async (exchange, binder) => handler(exchange, await parameters(binder));
    } else {
      const { handler } = definition;
      invoke = async exchange => handler(exchange);
    }
    const route: Route = {
      methods: Array.isArray(definition.method) ? definition.method : [definition.method],
      pattern,
      produces: definition.produces ?? [],
      consumes: definition.consumes ?? [],
      invoke
    };
    if (pattern.literal !== undefined) {
      const list = this.literal.get(pattern.literal) ?? [];
      list.push(route);
      this.literal.set(pattern.literal, list);
    } else {
      this.patterns.push(route);
      // Array.prototype.sort is stable: equal patterns keep registration order
      this.patterns.sort((a, b) => comparePatterns(a.pattern, b.pattern));
    }
    return this;
  }

  webSocket(definition: WebSocketRouteDefinition): this {
    this.sockets.push({
      pattern: compilePathPattern(definition.path),
      subprotocols: definition.subprotocols ?? [],
      messageType: definition.messageType,
      closeOnComplete: definition.closeOnComplete,
      handler: definition.handler
    });
    this.sockets.sort((a, b) => comparePatterns(a.pattern, b.pattern));
    return this;
  }

  /**
   * Resolves a normalized, still-encoded path. Exact literal routes are
   * tried first, then patterns from most to least specific. A path that
   * matches only under other methods is reported with those methods.
   */
  match(method: string, path: string): RouteMatch {
    const allowed = new Set<string>();
    const candidates = [...(this.literal.get(path) ?? []), ...this.patterns];
    for (const route of candidates) {
      if (!pathMatches(route.pattern, path)) continue;
      if (acceptsMethod(route, method)) {
        const m = matchPathPattern(route.pattern, path);
        if (m.matched) return { kind: 'route', route, captures: m.captures };
      }
      for (const allowedMethod of route.methods) allowed.add(allowedMethod);
    }
    if (allowed.size > 0) return { kind: 'methodNotAllowed', allowed: Array.from(allowed) };
    return { kind: 'none' };
  }

  intercept(definition: InterceptorDefinition): this {
    const { path, method, handler } = definition;
    this.interceptors.push({
      pattern: path === undefined ? undefined : compilePathPattern(path),
      methods: method === undefined ? undefined : Array.isArray(method) ? method : [method],
      handler
    });
    return this;
  }

  /** Interceptors applying to a request, outermost first. */
  interceptorsFor(method: string, path: string): Interceptor[] {
    return this.interceptors
      .filter(i => i.methods === undefined || i.methods.includes(method) || (method === 'HEAD' && i.methods.includes('GET')))
      .filter(i => i.pattern === undefined || pathMatches(i.pattern, path))
      .map(i => i.handler);
  }

  /**
   * Renders errors of `type` (and its subclasses) instead of the plain-text
   * error body. The response status is preset from the error; the handler's
   * result is written like a route result.
   */
  error<E extends Error>(type: ErrorType<E>, handler: (error: E, exchange: ErrorExchange) => unknown): this {
    this.errorRoutes.push({
      type,
      handle: (error, exchange) => (error instanceof type ? handler(error, exchange) : undefined)
    });
    return this;
  }

  /** The error route declared for the closest class in the error's prototype chain. */
  matchError(error: unknown): ((exchange: ErrorExchange) => unknown) | undefined {
    if (!(error instanceof Error)) return undefined;
    let best: { route: ErrorRoute; distance: number } | undefined;
    for (const route of this.errorRoutes) {
      const distance = prototypeDistance(error, route.type);
      if (distance >= 0 && (best === undefined || distance < best.distance)) best = { route, distance };
    }
    if (!best) return undefined;
    const { route } = best;
    return exchange => route.handle(error, exchange);
  }

  matchWebSocket(path: string): { route: WebSocketRoute; captures: Record<string, string> } | undefined {
    for (const route of this.sockets) {
      const m = matchPathPattern(route.pattern, path);
      if (m.matched) return { route, captures: m.captures };
    }
    return undefined;
  }

  routes(): Route[] {
    return [...Array.from(this.literal.values()).flat(), ...this.patterns];
  }
}
