import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { MultipartLimits } from '../codec/multipart.js';
import { DecodedGuardrails } from '../codec/guards.js';

export interface ServerConfig {
  bind: string;
  port: number;
  defaultCodec: string;
  static: { prefix: string; root: string | null };
  multipart: MultipartLimits;
  codec: DecodedGuardrails;
  ws: { closeOnComplete: boolean; inboundHighWater: number; maxMessageSize: number };
  timeouts: { keepAlive: number; headers: number; request: number };
  logs: { http: string | null; ws: string | null };
}

export class ConfigError extends Error {
  constructor(readonly field: string, message: string) {
    super(`Invalid config field ${field}: ${message}`);
    this.name = 'ConfigError';
  }
}

function int(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) throw new ConfigError(name, `expected an integer, got ${raw}`);
  return n;
}

function bool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

/** A log path; the empty string turns the file off. */
function logPath(env: NodeJS.ProcessEnv, name: string, fallback: string): string | null {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw === '' ? null : raw;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    bind: env.JUNCTION_BIND || '127.0.0.1',
    port: int(env, 'JUNCTION_HTTP_PORT', 9087),
    defaultCodec: env.JUNCTION_DEFAULT_CODEC || 'json',
    static: {
      prefix: env.JUNCTION_STATIC_PREFIX || '/static',
      root: env.JUNCTION_STATIC_ROOT || null
    },
    multipart: {
      maxParts: int(env, 'JUNCTION_MULTIPART_MAX_PARTS', 10),
      maxFields: int(env, 'JUNCTION_MULTIPART_MAX_FIELDS', 50),
      maxPartSize: int(env, 'JUNCTION_MULTIPART_MAX_PART_SIZE', 104857600)
    },
    codec: {
      maxDecodedSize: int(env, 'JUNCTION_CODEC_MAX_DECODED_SIZE', 10485760),
      maxDepth: int(env, 'JUNCTION_CODEC_MAX_DEPTH', 32)
    },
    ws: {
      closeOnComplete: bool(env, 'JUNCTION_WS_CLOSE_ON_COMPLETE', true),
      inboundHighWater: int(env, 'JUNCTION_WS_INBOUND_HIGH_WATER', 64),
      maxMessageSize: int(env, 'JUNCTION_WS_MAX_MESSAGE_SIZE', 1048576)
    },
    timeouts: {
      keepAlive: int(env, 'JUNCTION_KEEPALIVE_TIMEOUT_MS', 65000),
      headers: int(env, 'JUNCTION_HEADERS_TIMEOUT_MS', 60000),
      request: int(env, 'JUNCTION_REQUEST_TIMEOUT_MS', 300000)
    },
    logs: {
      http: logPath(env, 'JUNCTION_HTTP_LOG', path.join(process.cwd(), 'reports', 'http.log.jsonl')),
      ws: logPath(env, 'JUNCTION_WS_LOG', path.join(process.cwd(), 'reports', 'ws.log.jsonl'))
    }
  };
}

type Section = Record<string, unknown>;

function isSection(v: unknown): v is Section {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Reads a YAML config file over a base config. Every field is optional;
 * a field that is present must have the right type.
 */
export class ConfigLoader {
  load(file: string, base: ServerConfig): ServerConfig {
    const content = fs.readFileSync(file, 'utf8');
    let doc: unknown;
    try {
      doc = YAML.parse(content);
    } catch (err) {
      throw new ConfigError('(file)', `${file} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (doc === null || doc === undefined) return base;
    if (!isSection(doc)) throw new ConfigError('(root)', 'expected a mapping');
    return this.merge(doc, base);
  }

  private section(doc: Section, name: string): Section {
    const v = doc[name];
    if (v === undefined || v === null) return {};
    if (!isSection(v)) throw new ConfigError(name, 'expected a mapping');
    return v;
  }

  private string(s: Section, field: string, name: string, fallback: string): string {
    const v = s[name];
    if (v === undefined) return fallback;
    if (typeof v !== 'string') throw new ConfigError(field, 'expected a string');
    return v;
  }

  private nullableString(s: Section, field: string, name: string, fallback: string | null): string | null {
    const v = s[name];
    if (v === undefined) return fallback;
    if (v === null || v === '') return null;
    if (typeof v !== 'string') throw new ConfigError(field, 'expected a string');
    return v;
  }

  private integer(s: Section, field: string, name: string, fallback: number): number {
    const v = s[name];
    if (v === undefined) return fallback;
    if (typeof v !== 'number' || !Number.isInteger(v) || v < 0) {
      throw new ConfigError(field, 'expected a non-negative integer');
    }
    return v;
  }

  private boolean(s: Section, field: string, name: string, fallback: boolean): boolean {
    const v = s[name];
    if (v === undefined) return fallback;
    if (typeof v !== 'boolean') throw new ConfigError(field, 'expected a boolean');
    return v;
  }

  private merge(doc: Section, base: ServerConfig): ServerConfig {
    const st = this.section(doc, 'static');
    const mp = this.section(doc, 'multipart');
    const codec = this.section(doc, 'codec');
    const ws = this.section(doc, 'ws');
    const to = this.section(doc, 'timeouts');
    const logs = this.section(doc, 'logs');
    return {
      bind: this.string(doc, 'bind', 'bind', base.bind),
      port: this.integer(doc, 'port', 'port', base.port),
      defaultCodec: this.string(doc, 'defaultCodec', 'defaultCodec', base.defaultCodec),
      static: {
        prefix: this.string(st, 'static.prefix', 'prefix', base.static.prefix),
        root: this.nullableString(st, 'static.root', 'root', base.static.root)
      },
      multipart: {
        maxParts: this.integer(mp, 'multipart.maxParts', 'maxParts', base.multipart.maxParts),
        maxFields: this.integer(mp, 'multipart.maxFields', 'maxFields', base.multipart.maxFields),
        maxPartSize: this.integer(mp, 'multipart.maxPartSize', 'maxPartSize', base.multipart.maxPartSize)
      },
      codec: {
        maxDecodedSize: this.integer(codec, 'codec.maxDecodedSize', 'maxDecodedSize', base.codec.maxDecodedSize),
        maxDepth: this.integer(codec, 'codec.maxDepth', 'maxDepth', base.codec.maxDepth)
      },
      ws: {
        closeOnComplete: this.boolean(ws, 'ws.closeOnComplete', 'closeOnComplete', base.ws.closeOnComplete),
        inboundHighWater: this.integer(ws, 'ws.inboundHighWater', 'inboundHighWater', base.ws.inboundHighWater),
        maxMessageSize: this.integer(ws, 'ws.maxMessageSize', 'maxMessageSize', base.ws.maxMessageSize)
      },
      timeouts: {
        keepAlive: this.integer(to, 'timeouts.keepAlive', 'keepAlive', base.timeouts.keepAlive),
        headers: this.integer(to, 'timeouts.headers', 'headers', base.timeouts.headers),
        request: this.integer(to, 'timeouts.request', 'request', base.timeouts.request)
      },
      logs: {
        http: this.nullableString(logs, 'logs.http', 'http', base.logs.http),
        ws: this.nullableString(logs, 'logs.ws', 'ws', base.logs.ws)
      }
    };
  }
}

/** Environment defaults, overridden by the YAML file named in JUNCTION_CONFIG. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const base = configFromEnv(env);
  const file = env.JUNCTION_CONFIG;
  if (!file) return base;
  const config = new ConfigLoader().load(file, base);
  console.log(`[CONFIG] Loaded ${file}`);
  return config;
}
