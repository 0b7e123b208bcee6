import { ElementType, string } from './converters.js';
import {
  Cardinality,
  CollectionOptions,
  OneOptions,
  ParameterSource,
  fallbackOf,
  ParameterSpec,
  logicalValues,
  resolve
} from './parameters.js';
import type { RequestBody } from '../web/body.js';

/** Raw values of a request, as the binder reads them. */
export interface BindingSource {
  pathParameter(name: string): string | undefined;
  queryValues(name: string): string[];
  headerValues(name: string): string[];
  cookieValues(name: string): string[];
  /** Reads the form body once; later calls share the result */
  formValues(name: string): Promise<string[]>;
  readonly body: RequestBody;
}

type SyncSource = Exclude<ParameterSource, 'form'>;

function spec(name: string, source: ParameterSource, cardinality: Cardinality, element: string, required: boolean): ParameterSpec {
  return { name, source, cardinality, element, required };
}

export class ParameterBuilder<E> {
  constructor(
    private readonly read: (name: string) => string[],
    private readonly record: (spec: ParameterSpec) => void,
    private readonly name: string,
    private readonly source: SyncSource,
    private readonly element: ElementType<E>
  ) {}

  as<T>(element: ElementType<T>): ParameterBuilder<T> {
    return new ParameterBuilder(this.read, this.record, this.name, this.source, element);
  }

  private values(cardinality: Cardinality, required: boolean): { spec: ParameterSpec; values: string[] } {
    const s = spec(this.name, this.source, cardinality, this.element.name, required);
    this.record(s);
    return { spec: s, values: logicalValues(this.source, cardinality, this.read(this.name)) };
  }

  one(): E;
  one<D>(options: OneOptions<D>): E | D;
  one(options: { default?: unknown } = {}): unknown {
    const fallback = fallbackOf(options);
    const { spec: s, values } = this.values('one', fallback === undefined);
    return resolve.one(s, values, this.element, fallback);
  }

  optional(): E | undefined {
    const { spec: s, values } = this.values('optional', false);
    return resolve.optional(s, values, this.element);
  }

  list(options: CollectionOptions = {}): E[] {
    const { spec: s, values } = this.values('list', options.required ?? true);
    return resolve.list(s, values, this.element);
  }

  collection(options: CollectionOptions = {}): Iterable<E> {
    const { spec: s, values } = this.values('collection', options.required ?? true);
    return resolve.collection(s, values, this.element);
  }

  set(options: CollectionOptions = {}): Set<E> {
    const { spec: s, values } = this.values('set', options.required ?? true);
    return resolve.set(s, values, this.element);
  }

  array(options: CollectionOptions = {}): readonly E[] {
    const { spec: s, values } = this.values('array', options.required ?? true);
    return resolve.array(s, values, this.element);
  }
}

/** Form parameters come from the request body, so every cardinality is async. */
export class FormParameterBuilder<E> {
  constructor(
    private readonly read: (name: string) => Promise<string[]>,
    private readonly record: (spec: ParameterSpec) => void,
    private readonly name: string,
    private readonly element: ElementType<E>
  ) {}

  as<T>(element: ElementType<T>): FormParameterBuilder<T> {
    return new FormParameterBuilder(this.read, this.record, this.name, element);
  }

  private async values(cardinality: Cardinality, required: boolean): Promise<{ spec: ParameterSpec; values: string[] }> {
    const s = spec(this.name, 'form', cardinality, this.element.name, required);
    this.record(s);
    return { spec: s, values: logicalValues('form', cardinality, await this.read(this.name)) };
  }

  one(): Promise<E>;
  one<D>(options: OneOptions<D>): Promise<E | D>;
  async one(options: { default?: unknown } = {}): Promise<unknown> {
    const fallback = fallbackOf(options);
    const { spec: s, values } = await this.values('one', fallback === undefined);
    return resolve.one(s, values, this.element, fallback);
  }

  async optional(): Promise<E | undefined> {
    const { spec: s, values } = await this.values('optional', false);
    return resolve.optional(s, values, this.element);
  }

  async list(options: CollectionOptions = {}): Promise<E[]> {
    const { spec: s, values } = await this.values('list', options.required ?? true);
    return resolve.list(s, values, this.element);
  }

  async collection(options: CollectionOptions = {}): Promise<Iterable<E>> {
    const { spec: s, values } = await this.values('collection', options.required ?? true);
    return resolve.collection(s, values, this.element);
  }

  async set(options: CollectionOptions = {}): Promise<Set<E>> {
    const { spec: s, values } = await this.values('set', options.required ?? true);
    return resolve.set(s, values, this.element);
  }

  async array(options: CollectionOptions = {}): Promise<readonly E[]> {
    const { spec: s, values } = await this.values('array', options.required ?? true);
    return resolve.array(s, values, this.element);
  }
}

/**
 * Handed to a route's `parameters` function before the handler runs. Each
 * builder call resolves a value immediately, so a binding failure surfaces
 * as a 400 before any handler code executes.
 */
export class ParameterBinder {
  private readonly recorded: ParameterSpec[] = [];

  constructor(private readonly source: BindingSource) {}

  /** Specs resolved so far, in resolution order. */
  get specs(): readonly ParameterSpec[] {
    return this.recorded;
  }

  private readonly record = (s: ParameterSpec) => {
    this.recorded.push(s);
  };

  path(name: string): ParameterBuilder<string> {
    const read = (n: string) => {
      const v = this.source.pathParameter(n);
      // An empty capture counts as absent
      return v === undefined || v === '' ? [] : [v];
    };
    return new ParameterBuilder(read, this.record, name, 'path', string);
  }

  query(name: string): ParameterBuilder<string> {
    return new ParameterBuilder(n => this.source.queryValues(n), this.record, name, 'query', string);
  }

  header(name: string): ParameterBuilder<string> {
    return new ParameterBuilder(n => this.source.headerValues(n), this.record, name, 'header', string);
  }

  cookie(name: string): ParameterBuilder<string> {
    return new ParameterBuilder(n => this.source.cookieValues(n), this.record, name, 'cookie', string);
  }

  form(name: string): FormParameterBuilder<string> {
    return new FormParameterBuilder(n => this.source.formValues(n), this.record, name, string);
  }

  get body(): RequestBody {
    return this.source.body;
  }
}
