export interface MediaType {
  type: string;
  subtype: string;
  /** `type/subtype`, lowercased, without parameters */
  essence: string;
  params: Record<string, string>;
}

export interface AcceptRange extends MediaType {
  q: number;
}

const TOKEN = /^[!#$%&'*+.^_`|~0-9a-z-]+$/;

export function parseMediaType(text?: string | null): MediaType | undefined {
  if (!text) return undefined;
  const [head, ...rest] = text.split(';');
  const slash = head.indexOf('/');
  if (slash < 0) return undefined;
  const type = head.slice(0, slash).trim().toLowerCase();
  const subtype = head.slice(slash + 1).trim().toLowerCase();
  if (!TOKEN.test(type) || !TOKEN.test(subtype)) return undefined;
  const params: Record<string, string> = {};
  for (const p of rest) {
    const eq = p.indexOf('=');
    if (eq < 0) continue;
    const key = p.slice(0, eq).trim().toLowerCase();
    let value = p.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1).replace(/\\(.)/g, '$1');
    }
    if (key) params[key] = value;
  }
  return { type, subtype, essence: `${type}/${subtype}`, params };
}

export function formatMediaType(mt: MediaType): string {
  const params = Object.entries(mt.params).map(([k, v]) => `;${k}=${v}`).join('');
  return mt.essence + params;
}

function specificity(r: MediaType): number {
  if (r.type === '*') return 0;
  if (r.subtype === '*') return 1;
  return 2;
}

/**
 * Parses an Accept header into ranges, best first. Equal q-values keep the
 * more specific range first, then header order.
 */
export function parseAccept(header?: string | string[] | null): AcceptRange[] {
  const joined = Array.isArray(header) ? header.join(',') : (header || '');
  const ranges: Array<AcceptRange & { index: number }> = [];
  joined.split(',').forEach((part, index) => {
    const mt = parseMediaType(part.trim());
    if (!mt) return;
    const q = mt.params.q !== undefined ? parseFloat(mt.params.q) : 1;
    const params = { ...mt.params };
    delete params.q;
    ranges.push({ ...mt, params, q: isNaN(q) ? 1 : q, index });
  });
  if (ranges.length === 0) {
    return [{ type: '*', subtype: '*', essence: '*/*', params: {}, q: 1 }];
  }
  ranges.sort((a, b) => (b.q - a.q) || (specificity(b) - specificity(a)) || (a.index - b.index));
  return ranges.map(({ index: _index, ...range }) => range);
}

/** Whether `mediaType` falls under `range`. Handles wildcards and the +json suffix. */
export function matchesRange(range: MediaType, mediaType: MediaType): boolean {
  if (range.type === '*') return true;
  if (range.type !== mediaType.type) return false;
  if (range.subtype === '*' || range.subtype === mediaType.subtype) return true;
  // Support +json structured suffix
  if (range.subtype === 'json' && mediaType.subtype.endsWith('+json')) return true;
  if (range.subtype.startsWith('*+')) return mediaType.subtype.endsWith(range.subtype.slice(1));
  return false;
}

/**
 * Picks the produced media type for a response: the first declared type the
 * client accepts, following the client's order of preference. Returns
 * undefined when nothing declared is acceptable.
 */
export function negotiateProduced(accept: string | string[] | undefined, produces: string[]): string | undefined {
  if (produces.length === 0) return undefined;
  const declared = produces
    .map(p => ({ raw: p, mt: parseMediaType(p) }))
    .filter((d): d is { raw: string; mt: MediaType } => d.mt !== undefined);
  for (const range of parseAccept(accept)) {
    if (range.q <= 0) continue;
    const hit = declared.find(d => matchesRange(range, d.mt) || matchesRange(d.mt, range));
    if (hit) return hit.raw;
  }
  return undefined;
}

/** Whether a request content type is one the route consumes. */
export function isConsumed(contentType: MediaType | undefined, consumes: string[]): boolean {
  if (consumes.length === 0) return true;
  if (!contentType) return false;
  return consumes.some(c => {
    const range = parseMediaType(c);
    return range !== undefined && matchesRange(range, contentType);
  });
}
