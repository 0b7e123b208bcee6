import * as fs from 'fs';
import * as path from 'path';
import mime from 'mime-types';
import { Router } from '../routing/router.js';
import { NotFoundError, PathSafetyError } from '../web/errors.js';

export interface StaticOptions {
  /** URL prefix, e.g. `/static` */
  prefix: string;
  /** Directory served under the prefix */
  root: string;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (e) {
    throw new PathSafetyError('Malformed percent-encoding in resource path', { cause: e });
  }
}

/**
 * Resolves a still-encoded request path below `root`. The path is split on
 * literal `/` before each segment is decoded once, so `%2F` stays inside a
 * file name and `%2E%2E` names a file called `..` rather than the parent.
 * Empty segments and NUL bytes are a 400; a segment no file can carry, or a
 * path resolving outside the root, is a 404.
 */
export function resolveResource(root: string, encoded: string): string {
  const segments = encoded.split('/');
  if (segments.some(s => s === '')) {
    throw new PathSafetyError(`Invalid resource path: ${encoded}`);
  }
  const names = segments.map(decodeSegment);
  if (names.some(n => n.includes('\0'))) throw new PathSafetyError('Invalid resource path');
  if (names.some(n => n === '.' || n === '..' || n.includes('/') || n.includes(path.sep))) throw new NotFoundError();
  const base = path.resolve(root);
  const target = path.resolve(base, ...names);
  if (!target.startsWith(base + path.sep)) throw new NotFoundError();
  return target;
}

export function contentTypeFor(file: string): string {
  return mime.contentType(path.basename(file)) || 'application/octet-stream';
}

export function staticResources(router: Router, options: StaticOptions): Router {
  const prefix = options.prefix.replace(/\/+$/, '');
  return router.route({
    method: 'GET',
    path: `${prefix}/{path:.*}`,
    handler: async exchange => {
      // The router's capture is already decoded; resolution needs the encoded form
      const file = resolveResource(options.root, exchange.path.slice(prefix.length + 1));
      let stat: fs.Stats;
      try {
        stat = await fs.promises.stat(file);
      } catch (err) {
        if (isMissing(err)) throw new NotFoundError();
        throw err;
      }
      if (!stat.isFile()) throw new NotFoundError();
      exchange.response
        .header('content-type', contentTypeFor(file))
        .header('content-length', stat.size);
      return fs.createReadStream(file);
    }
  });
}
