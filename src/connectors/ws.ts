import { WebSocketServer, WebSocket } from 'ws';
import * as http from 'http';
import type { Duplex } from 'stream';
import { CodecRegistry } from '../codec/registry.js';
import { DecodedGuardrails } from '../codec/guards.js';
import { JsonlLog } from '../log/jsonl.js';
import { Router, WebSocketRoute } from '../routing/router.js';
import { ParameterMap, headerPairs, normalizePath } from '../web/exchange.js';
import { HttpError, IllegalStateError, errorMessage } from '../web/errors.js';
import { CloseCodes, WebSocketCloseError, WebSocketExchange } from './ws-exchange.js';

export interface WebSocketOptions {
  registry: CodecRegistry;
  guardrails: DecodedGuardrails;
  closeOnComplete: boolean;
  inboundHighWater: number;
  maxMessageSize: number;
  log: JsonlLog;
}

interface WsLogEntry {
  ts: string;
  event: 'ws_open' | 'ws_close' | 'ws_error' | 'ws_rejected';
  connId?: string;
  ip: string;
  path: string;
  subprotocol?: string | null;
  status?: number;
  closeCode?: number;
  clean?: boolean;
  durMs?: number;
  error?: string;
}

let connCounter = 0;

function generateConnId(): string {
  return `ws-${Date.now()}-${++connCounter}`;
}

function offeredProtocols(req: http.IncomingMessage): string[] {
  const header = req.headers['sec-websocket-protocol'];
  if (!header) return [];
  return header.split(',').map(p => p.trim()).filter(p => p.length > 0);
}

function reject(socket: Duplex, status: number) {
  const text = http.STATUS_CODES[status] || 'Error';
  socket.write(`HTTP/1.1 ${status} ${text}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

/** Close reasons are limited to 123 bytes by the protocol. */
function closeReason(message: string): string {
  let reason = message;
  while (Buffer.byteLength(reason, 'utf8') > 123) reason = reason.slice(0, -1);
  return reason;
}

/**
 * Picks the sub-protocol: the first token the client offers that the route
 * declares and the registry can resolve to a codec. `false` means the
 * client and route both offered tokens and none matched.
 */
export function selectSubprotocol(offered: string[], route: WebSocketRoute, registry: CodecRegistry): string | null | false {
  const hit = offered.find(t => route.subprotocols.includes(t) && registry.forSubprotocol(t) !== undefined);
  if (hit) return hit;
  if (offered.length > 0 && route.subprotocols.length > 0) return false;
  return null;
}

/**
 * Serves WebSocket routes on an existing HTTP server. Upgrades to paths
 * without a WebSocket route are refused with 404.
 */
export function attachWebSocket(server: http.Server, router: Router, options: WebSocketOptions): WebSocketServer {
  const { registry, log } = options;
  const selections = new WeakMap<http.IncomingMessage, string>();
  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: options.maxMessageSize,
    handleProtocols: (_protocols, req) => selections.get(req) ?? false
  });

  const logWsEvent = (entry: Omit<WsLogEntry, 'ts'>) => log.write({ ts: new Date().toISOString(), ...entry });

  server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const ip = req.socket.remoteAddress || 'unknown';
    let path = '/';
    let match: ReturnType<Router['matchWebSocket']>;
    let url: URL;
    try {
      url = new URL(req.url || '/', 'http://localhost');
      path = normalizePath(url.pathname);
      match = router.matchWebSocket(path);
    } catch (err) {
      const status = err instanceof HttpError ? err.status : 400;
      logWsEvent({ event: 'ws_rejected', ip, path, status, error: errorMessage(err) });
      reject(socket, status);
      return;
    }
    if (!match) {
      logWsEvent({ event: 'ws_rejected', ip, path, status: 404, error: 'not_found' });
      reject(socket, 404);
      return;
    }
    const { route, captures } = match;
    const selected = selectSubprotocol(offeredProtocols(req), route, registry);
    if (selected === false) {
      logWsEvent({ event: 'ws_rejected', ip, path, status: 400, error: 'unsupported_subprotocol' });
      reject(socket, 400);
      return;
    }
    if (selected) selections.set(req, selected);

    wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
      // Protocol errors (oversized or invalid frames) close the socket themselves
      ws.on('error', (err: Error) => {
        logWsEvent({ event: 'ws_error', ip, path, error: err.message });
      });
      const exchange = new WebSocketExchange({
        id: generateConnId(),
        ws,
        path,
        pathParameters: captures,
        query: url.searchParams,
        headers: new ParameterMap(headerPairs(req), true),
        subprotocol: selected,
        codec: selected ? registry.forSubprotocol(selected) : undefined,
        fallbackCodec: registry.getDefault(),
        messageType: route.messageType,
        guardrails: options.guardrails,
        inboundHighWater: options.inboundHighWater
      });
      serve(exchange, route, ip);
    });
  });

  const serve = (exchange: WebSocketExchange, route: WebSocketRoute, ip: string) => {
    const started = Date.now();
    const base = { connId: exchange.id, ip, path: exchange.path, subprotocol: exchange.subprotocol };
    logWsEvent({ event: 'ws_open', ...base });

    exchange.closed.then(info => {
      logWsEvent({ event: 'ws_close', ...base, closeCode: info.code, clean: info.clean, durMs: Date.now() - started });
    }, (err: unknown) => {
      console.error(`[WS] Close tracking failed for ${exchange.id}: ${errorMessage(err)}`);
    });

    const closeOnComplete = route.closeOnComplete ?? options.closeOnComplete;
    const run = async () => {
      const result = await route.handler(exchange);
      if (result !== undefined) await exchange.outbound.messages(result);
      await exchange.outbound.idle();
      if (closeOnComplete) exchange.close(CloseCodes.NORMAL);
    };

    run().catch((err: unknown) => {
      if (err instanceof WebSocketCloseError) {
        logWsEvent({ event: 'ws_error', ...base, closeCode: err.closeCode, error: err.message });
        console.error(`[WS] Closing ${exchange.id} with ${err.closeCode}: ${err.message}`);
        exchange.close(err.closeCode, closeReason(err.message));
        return;
      }
      if (err instanceof IllegalStateError && exchange.state !== 'OPEN') {
        // The peer went away while we were still sending
        logWsEvent({ event: 'ws_error', ...base, error: err.message });
        return;
      }
      logWsEvent({ event: 'ws_error', ...base, closeCode: CloseCodes.INTERNAL_ERROR, error: errorMessage(err) });
      console.error(`[WS] Handler error for ${exchange.id}: ${errorMessage(err)}`);
      exchange.close(CloseCodes.INTERNAL_ERROR, 'Internal error');
    });
  };

  return wss;
}
