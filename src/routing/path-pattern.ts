/**
 * Route path templates.
 *
 *   /users/{id}               named capture, one segment (may be empty)
 *   /files/{name:[^/]*\.txt}  regex capture
 *   /qmark_?_                 `?` one character within a segment
 *   /wcard_*_                 `*` any run of characters within a segment
 *   /dirs/**                  any number of whole segments, including none
 *   /static/{path:.*}         a regex that can match `/` takes the remainder
 *
 * Templates compile to a regex matched against the still-encoded request
 * path. Captured values are percent-decoded exactly once, after matching.
 */
import { PathSafetyError } from '../web/errors.js';

export type SegmentKind = 'literal' | 'regex' | 'named' | 'qmark' | 'star' | 'directories' | 'catchAll';

const KIND_RANK: Record<SegmentKind, number> = {
  literal: 6,
  regex: 5,
  named: 4,
  qmark: 3,
  star: 2,
  directories: 1,
  catchAll: 0
};

interface SegmentScore {
  pureLiteral: boolean;
  literalChars: number;
  rank: number;
}

export interface PathPattern {
  template: string;
  /** Set when the template has no variable part at all */
  literal?: string;
  regex: RegExp;
  /** Capture group name to parameter name */
  groups: Array<{ group: string; name: string }>;
  parameterNames: string[];
  segments: SegmentScore[];
}

export class PathPatternError extends Error {
  constructor(template: string, reason: string) {
    super(`Invalid path template ${template}: ${reason}`);
    this.name = 'PathPatternError';
  }
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function canMatchSlash(re: string): boolean {
  try {
    return new RegExp(`^(?:${re})$`).test('a/b');
  } catch {
    return false;
  }
}

/** Reads `{...}` starting at `start`, honouring nested braces inside a regex. */
function readBraces(template: string, segment: string, start: number): number {
  let depth = 0;
  for (let i = start; i < segment.length; i++) {
    const c = segment[i];
    if (c === '\\') {
      i++;
      continue;
    }
    if (c === '{') depth++;
    else if (c === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  throw new PathPatternError(template, `unbalanced '{' in segment ${segment}`);
}

export function normalizeTemplate(template: string): string {
  let t = template.trim();
  if (!t.startsWith('/')) t = '/' + t;
  return t;
}

export function compilePathPattern(rawTemplate: string, options: { matchTrailingSlash?: boolean } = {}): PathPattern {
  const template = normalizeTemplate(rawTemplate);
  const groups: Array<{ group: string; name: string }> = [];
  const parameterNames: string[] = [];
  const scores: SegmentScore[] = [];
  let source = '';
  let variable = false;

  const segments = template.slice(1).split('/');
  segments.forEach((segment) => {
    if (segment === '**') {
      // Takes the slash before it so that `/a/**` also matches `/a`
      source += '(?:/[^/]*)*';
      scores.push({ pureLiteral: false, literalChars: 0, rank: KIND_RANK.directories });
      variable = true;
      return;
    }
    if (segment.includes('**')) {
      throw new PathPatternError(template, `'**' must be a whole segment`);
    }
    let part = '';
    let literalChars = 0;
    let rank = KIND_RANK.literal;
    for (let i = 0; i < segment.length; i++) {
      const c = segment[i];
      if (c === '{') {
        const end = readBraces(template, segment, i);
        const body = segment.slice(i + 1, end);
        const colon = body.indexOf(':');
        const name = (colon < 0 ? body : body.slice(0, colon)).trim();
        if (!name) throw new PathPatternError(template, 'empty parameter name');
        if (parameterNames.includes(name)) throw new PathPatternError(template, `duplicate parameter ${name}`);
        const group = `p${groups.length}`;
        groups.push({ group, name });
        parameterNames.push(name);
        if (colon < 0) {
          part += `(?<${group}>[^/]*)`;
          rank = Math.min(rank, KIND_RANK.named);
        } else {
          const re = body.slice(colon + 1);
          try {
            new RegExp(re);
          } catch (e) {
            throw new PathPatternError(template, `bad regex for ${name}: ${e instanceof Error ? e.message : String(e)}`);
          }
          part += `(?<${group}>${re})`;
          rank = Math.min(rank, canMatchSlash(re) ? KIND_RANK.catchAll : KIND_RANK.regex);
        }
        variable = true;
        i = end;
      } else if (c === '?') {
        part += '[^/]';
        rank = Math.min(rank, KIND_RANK.qmark);
        variable = true;
      } else if (c === '*') {
        part += '[^/]*';
        rank = Math.min(rank, KIND_RANK.star);
        variable = true;
      } else {
        part += escapeRegex(c);
        literalChars++;
      }
    }
    source += '/' + part;
    scores.push({ pureLiteral: rank === KIND_RANK.literal, literalChars, rank });
  });

  if (options.matchTrailingSlash) {
    source = source.endsWith('/') ? source + '?' : source + '/?';
    variable = true;
  }

  return {
    template,
    literal: variable ? undefined : template,
    regex: new RegExp(`^${source}$`),
    groups,
    parameterNames,
    segments: scores
  };
}

function compareScore(a: SegmentScore, b: SegmentScore): number {
  if (a.pureLiteral !== b.pureLiteral) return a.pureLiteral ? -1 : 1;
  if (a.literalChars !== b.literalChars) return b.literalChars - a.literalChars;
  return b.rank - a.rank;
}

/** Most specific first: negative when `a` should be tried before `b`. */
export function comparePatterns(a: PathPattern, b: PathPattern): number {
  const n = Math.min(a.segments.length, b.segments.length);
  for (let i = 0; i < n; i++) {
    const c = compareScore(a.segments[i], b.segments[i]);
    if (c !== 0) return c;
  }
  if (a.segments.length !== b.segments.length) return a.segments.length - b.segments.length;
  return 0;
}

export type PathMatch = { matched: true; captures: Record<string, string> } | { matched: false };

/**
 * Matches an encoded, dot-normalized path. Captures are decoded once; an
 * undecodable capture is reported as an error, not as a non-match.
 */
export function matchPathPattern(pattern: PathPattern, encodedPath: string): PathMatch {
  if (pattern.literal !== undefined) {
    return pattern.literal === encodedPath ? { matched: true, captures: {} } : { matched: false };
  }
  const m = pattern.regex.exec(encodedPath);
  if (!m) return { matched: false };
  const captures: Record<string, string> = {};
  for (const { group, name } of pattern.groups) {
    const raw = m.groups?.[group];
    try {
      captures[name] = raw === undefined ? '' : decodeURIComponent(raw);
    } catch (e) {
      throw new PathSafetyError(`Malformed percent-encoding in ${name}`, { cause: e });
    }
  }
  return { matched: true, captures };
}
