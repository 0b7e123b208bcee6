/** Parses one raw parameter string into an element value. Throws on bad input. */
export interface ElementType<E> {
  readonly name: string;
  parse(raw: string): E;
}

export const string: ElementType<string> = {
  name: 'string',
  parse: raw => raw
};

export const integer: ElementType<number> = {
  name: 'integer',
  parse(raw) {
    const s = raw.trim();
    if (!/^[+-]?\d+$/.test(s)) throw new Error(`not an integer: ${raw}`);
    const n = Number(s);
    if (!Number.isSafeInteger(n)) throw new Error(`integer out of range: ${raw}`);
    return n;
  }
};

export const number: ElementType<number> = {
  name: 'number',
  parse(raw) {
    const s = raw.trim();
    const n = Number(s);
    if (s === '' || Number.isNaN(n)) throw new Error(`not a number: ${raw}`);
    return n;
  }
};

export const boolean: ElementType<boolean> = {
  name: 'boolean',
  parse(raw) {
    switch (raw.trim().toLowerCase()) {
      case 'true':
        return true;
      case 'false':
        return false;
      default:
        throw new Error(`not a boolean: ${raw}`);
    }
  }
};

export function oneOf<T extends string>(...values: T[]): ElementType<T> {
  return {
    name: values.join('|'),
    parse(raw) {
      const hit = values.find(v => v === raw);
      if (hit === undefined) throw new Error(`expected one of ${values.join(', ')}`);
      return hit;
    }
  };
}

/** Converts one codec-decoded body value into the handler's element type. */
export type BodyElement<T> = (value: unknown) => T;

export const anyValue: BodyElement<unknown> = value => value;

export const stringValue: BodyElement<string> = value => {
  if (typeof value !== 'string') throw new TypeError(`expected a string, got ${typeof value}`);
  return value;
};

export const recordValue: BodyElement<Record<string, unknown>> = value => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeError('expected an object');
  }
  return Object.fromEntries(Object.entries(value));
};

export function valueOf<T>(guard: (value: unknown) => value is T, what = 'value'): BodyElement<T> {
  return value => {
    if (!guard(value)) throw new TypeError(`not a valid ${what}`);
    return value;
  };
}
