import * as http from 'http';
import type { WebSocketServer } from 'ws';
import { CodecRegistry, createDefaultRegistry } from '../codec/registry.js';
import { isConsumed, negotiateProduced, parseMediaType } from '../codec/media-type.js';
import { ParameterBinder } from '../binding/binder.js';
import { ServerConfig } from '../config/loader.js';
import { JsonlLog } from '../log/jsonl.js';
import { Router, runIntercepted } from '../routing/router.js';
import { Exchange, ExchangeResponse, ParameterMap, headerPairs, normalizePath } from '../web/exchange.js';
import {
  BadRequestError,
  MethodNotAllowedError,
  NotAcceptableError,
  RouteNotFoundError,
  UnsupportedMediaTypeError,
  errorMessage,
  isHttpError
} from '../web/errors.js';
import { prepareErrorResponse, writeError, writeResult } from '../web/response-writer.js';
import { attachWebSocket } from './ws.js';

interface HttpLogEntry {
  ts: string;
  event: string;
  ip?: string;
  method?: string;
  path?: string;
  status?: number;
  bytes?: number;
  durMs?: number;
  error?: string;
}

const webSocketServers = new WeakMap<http.Server, WebSocketServer>();

export interface HttpOptions {
  registry?: CodecRegistry;
  httpLog?: JsonlLog;
  wsLog?: JsonlLog;
}

/** Splits a request target into its path and query; absolute-form targets keep only the path. */
export function splitTarget(target: string): { rawPath: string; query: URLSearchParams } {
  let t = target.split('#')[0];
  if (!t.startsWith('/')) {
    let url: URL;
    try {
      url = new URL(t);
    } catch (e) {
      throw new BadRequestError(`Invalid request target: ${target}`, { cause: e });
    }
    t = url.pathname + url.search;
  }
  const q = t.indexOf('?');
  return {
    rawPath: q < 0 ? t : t.slice(0, q),
    query: new URLSearchParams(q < 0 ? '' : t.slice(q + 1))
  };
}

function hasBody(req: http.IncomingMessage): boolean {
  const length = req.headers['content-length'];
  if (length !== undefined) return Number(length) > 0;
  return req.headers['transfer-encoding'] !== undefined;
}

export function startHttp(router: Router, config: ServerConfig, options: HttpOptions = {}): http.Server {
  const registry = options.registry ?? createDefaultRegistry(config.defaultCodec);
  const httpLog = (options.httpLog ?? new JsonlLog('HTTP', config.logs.http)).open();
  const wsLog = (options.wsLog ?? new JsonlLog('WS', config.logs.ws)).open();

  const logJsonl = (entry: HttpLogEntry) => httpLog.write(entry);

  const handle = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const reqStartTime = process.hrtime.bigint();
    const reqIp = req.socket.remoteAddress || 'unknown';
    const method = (req.method || 'GET').toUpperCase();
    let path = req.url || '/';
    let bytes = 0;
    let error: string | undefined;
    let exchange: Exchange | undefined;

    try {
      const { rawPath, query } = splitTarget(req.url || '/');
      path = normalizePath(rawPath);

      const match = router.match(method, path);
      if (match.kind === 'none') throw new RouteNotFoundError(path);
      if (match.kind === 'methodNotAllowed') throw new MethodNotAllowedError(match.allowed);
      const { route, captures } = match;

      const contentType = req.headers['content-type'];
      if (route.consumes.length > 0 && hasBody(req) && !isConsumed(parseMediaType(contentType), [...route.consumes])) {
        throw new UnsupportedMediaTypeError(contentType || '');
      }

      let produced: string | undefined;
      if (route.produces.length > 0) {
        produced = negotiateProduced(req.headers.accept, [...route.produces]);
        if (!produced) throw new NotAcceptableError([...route.produces]);
      }

      const current = new Exchange({
        req,
        res,
        path,
        query,
        pathParameters: captures,
        body: {
          registry,
          headers: req.headers,
          consumes: [...route.consumes],
          guardrails: config.codec,
          multipart: config.multipart
        }
      });

      exchange = current;

      const result = await runIntercepted(router.interceptorsFor(method, path), current, () =>
        route.invoke(current, new ParameterBinder(current))
      );
      bytes = await writeResult(res, result, { registry, accept: req.headers.accept, produced });
    } catch (err) {
      error = errorMessage(err);
      if (!isHttpError(err)) console.error(`[HTTP] ${method} ${path} failed: ${error}`);
      const render = res.headersSent ? undefined : router.matchError(err);
      if (render) {
        try {
          prepareErrorResponse(res, err);
          const target = exchange ?? { method, path, headers: new ParameterMap(headerPairs(req), true), response: new ExchangeResponse(res) };
          bytes = await writeResult(res, await render(target), { registry, accept: req.headers.accept });
        } catch (renderErr) {
          console.error(`[HTTP] Error route for ${method} ${path} failed: ${errorMessage(renderErr)}`);
          writeError(res, renderErr);
        }
      } else {
        writeError(res, err);
      }
    } finally {
      // Whatever the handler left unread is drained so the connection can be reused
      if (exchange) exchange.body.discard();
      else req.resume();
    }

    const durNs = Number(process.hrtime.bigint() - reqStartTime);
    logJsonl({
      ts: new Date().toISOString(),
      event: 'http_request_complete',
      ip: reqIp,
      method,
      path,
      status: res.statusCode,
      bytes,
      durMs: Math.round(durNs / 1e6),
      error
    });
  };

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error(`[HTTP] Unhandled error: ${err instanceof Error ? err.message : String(err)}`);
      if (!res.headersSent) res.writeHead(500).end();
      else res.destroy();
    });
  });

  server.keepAliveTimeout = config.timeouts.keepAlive;
  server.headersTimeout = config.timeouts.headers;
  server.requestTimeout = config.timeouts.request;
  console.log(`[HTTP] Timeouts: keepAlive=${config.timeouts.keepAlive}ms, headers=${config.timeouts.headers}ms, request=${config.timeouts.request}ms`);

  // Handle timeout events (slowloris protection)
  server.on('timeout', (socket) => {
    console.warn(`[HTTP] Request timeout from ${socket.remoteAddress}`);
    logJsonl({
      ts: new Date().toISOString(),
      event: 'http_timeout',
      ip: socket.remoteAddress || 'unknown',
      error: 'RequestTimeout'
    });
    socket.destroy();
  });

  const wss = attachWebSocket(server, router, {
    registry,
    guardrails: config.codec,
    closeOnComplete: config.ws.closeOnComplete,
    inboundHighWater: config.ws.inboundHighWater,
    maxMessageSize: config.ws.maxMessageSize,
    log: wsLog
  });

  webSocketServers.set(server, wss);
  server.on('close', () => {
    httpLog.close();
    wsLog.close();
  });

  server.listen(config.port, config.bind);
  return server;
}

/** Stops accepting, drops open WebSocket and keep-alive connections, and resolves once closed. */
export function stopHttp(server: http.Server): Promise<void> {
  const closed = new Promise<void>((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
  const wss = webSocketServers.get(server);
  if (wss) {
    for (const client of wss.clients) client.terminate();
    wss.close();
  }
  server.closeAllConnections();
  return closed;
}
