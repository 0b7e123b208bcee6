import { ElementType } from './converters.js';
import { ParameterBindingError } from '../web/errors.js';

export type ParameterSource = 'path' | 'query' | 'header' | 'cookie' | 'form';
export type Cardinality = 'one' | 'optional' | 'list' | 'set' | 'collection' | 'array';

export interface ParameterSpec {
  readonly name: string;
  readonly source: ParameterSource;
  readonly cardinality: Cardinality;
  readonly element: string;
  readonly required: boolean;
}

function splitValue(raw: string): string[] {
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Flattens the raw values of a source into the logical sequence a spec sees.
 * Header and cookie lines always split on commas, so one line `a,b` and two
 * lines `a` + `b` read the same. Other sources split only for collections:
 * a single query, path or form value keeps its commas.
 */
export function logicalValues(source: ParameterSource, cardinality: Cardinality, raws: string[]): string[] {
  const single = cardinality === 'one' || cardinality === 'optional';
  if (source === 'header' || source === 'cookie' || !single) return raws.flatMap(splitValue);
  return raws;
}

function parseElement<E>(spec: ParameterSpec, raw: string, element: ElementType<E>): E {
  try {
    return element.parse(raw);
  } catch (e) {
    throw new ParameterBindingError(spec.name, `Invalid ${element.name} ${spec.source} parameter`, { cause: e });
  }
}

function parseAll<E>(spec: ParameterSpec, values: string[], element: ElementType<E>): E[] {
  if (values.length === 0 && spec.required) {
    throw new ParameterBindingError(spec.name, `Missing required ${spec.source} parameter`);
  }
  return values.map(v => parseElement(spec, v, element));
}

/** One pure conversion per cardinality, from logical values to the bound value. */
export const resolve = {
  one<E, D = E>(spec: ParameterSpec, values: string[], element: ElementType<E>, fallback?: { value: D }): E | D {
    if (values.length === 0) {
      if (fallback) return fallback.value;
      throw new ParameterBindingError(spec.name, `Missing required ${spec.source} parameter`);
    }
    // First wins
    return parseElement(spec, values[0], element);
  },

  optional<E>(spec: ParameterSpec, values: string[], element: ElementType<E>): E | undefined {
    return values.length === 0 ? undefined : parseElement(spec, values[0], element);
  },

  list<E>(spec: ParameterSpec, values: string[], element: ElementType<E>): E[] {
    return parseAll(spec, values, element);
  },

  collection<E>(spec: ParameterSpec, values: string[], element: ElementType<E>): Iterable<E> {
    return parseAll(spec, values, element);
  },

  set<E>(spec: ParameterSpec, values: string[], element: ElementType<E>): Set<E> {
    return new Set(parseAll(spec, values, element));
  },

  array<E>(spec: ParameterSpec, values: string[], element: ElementType<E>): readonly E[] {
    return Object.freeze(parseAll(spec, values, element));
  }
};

export interface CollectionOptions {
  /** Defaults to true: zero values is a 400 */
  required?: boolean;
}

/** A declared default, used as is when the value is absent; it may itself be `undefined`. */
export interface OneOptions<D> {
  default: D;
}

export function fallbackOf(options: { default?: unknown }): { value: unknown } | undefined {
  return 'default' in options ? { value: options.default } : undefined;
}
