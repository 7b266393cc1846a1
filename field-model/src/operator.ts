// Field operators and the invocation controller

import { BackendTable, type ExecutionStrategy, type ExternalExecutor } from './backend.js';
import { extractClosureVars } from './closure.js';
import { compileOperator } from './compiler.js';
import type { OffsetProvider } from './connectivity.js';
import { EMBEDDED_BACKEND } from './constants.js';
import { activeOffsetProvider, withOffsetProvider } from './context.js';
import { Dimension, dimNames } from './dimension.js';
import { type EnvValue, type Environment, type InvokeOptions, OperatorValue } from './environment.js';
import { BackendError, ClosureError, FieldShapeError, FieldTypeError, OffsetProviderError } from './errors.js';
import { evaluate } from './evaluator.js';
import { Field, type FieldValue, copyInto, isTuple } from './field.js';
import type { Expression, ParamSpec } from './types.js';

export interface FieldOperatorDefinition {
  name: string;
  /** Parameter names, optionally annotated with the dimensions of their field. */
  params: readonly (string | ParamSpec)[];
  body: Expression;
  /** Names the body may capture: dimensions, offsets, operators, constants. */
  env?: Environment;
  /** External executors by backend id, in addition to `embedded`. */
  backends?: Readonly<Record<string, ExternalExecutor>>;
}

export type CompiledBody = (args: readonly FieldValue[], provider: OffsetProvider) => FieldValue;

let operatorCount = 0;

function normalizeParams(name: string, params: FieldOperatorDefinition['params']): ParamSpec[] {
  const normalized = params.map((p) => (typeof p === 'string' ? { name: p } : { ...p }));
  const seen = new Set<string>();
  for (const param of normalized) {
    if (seen.has(param.name)) throw new ClosureError(`${name}: duplicate parameter ${param.name}`);
    seen.add(param.name);
  }
  return normalized;
}

function checkOutTarget(out: FieldValue, owner: string): void {
  if (isTuple(out)) {
    out.forEach((item) => checkOutTarget(item, owner));
    return;
  }
  if (!(out instanceof Field)) {
    throw new FieldTypeError(`${owner}: out must be a Field or a tuple of Fields, got ${typeof out}`);
  }
}

/**
 * An operator: a compiled body plus the metadata needed to run it, frozen
 * once built.
 *
 * The first call made while no offset-provider context is active is the
 * outermost call. It requires `out`, opens the context from
 * `offsetProvider`, runs the body and copies the result into `out`. Calls made
 * from inside a running body are nested: they reuse the open context and
 * return their value.
 */
export class FieldOperator extends OperatorValue {
  readonly id: string;
  readonly name: string;
  readonly params: readonly ParamSpec[];
  readonly body: Expression;
  readonly closureVars: ReadonlyMap<string, EnvValue>;
  readonly backends: BackendTable;
  readonly fn: CompiledBody;

  constructor(definition: FieldOperatorDefinition) {
    super();
    const { name, body } = definition;
    const params = normalizeParams(name, definition.params);
    const closureVars = extractClosureVars(body, params, definition.env ?? {}, name);

    for (const param of params) {
      for (const dim of param.dims ?? []) {
        if (!(closureVars.get(dim) instanceof Dimension)) {
          throw new ClosureError(`${name}: parameter ${param.name} is annotated with ${dim}, which is not a dimension`);
        }
      }
    }

    this.id = `${name}#${operatorCount++}`;
    this.name = name;
    this.params = Object.freeze(params);
    this.body = body;
    this.closureVars = closureVars;
    this.backends = new BackendTable(definition.backends);
    this.fn = (args, provider) =>
      evaluate(body, {
        locals: new Map(params.map((p, i) => [p.name, args[i]])),
        closure: closureVars,
        provider,
        owner: name,
      });
    Object.freeze(this);
  }

  invoke(args: readonly FieldValue[], options: InvokeOptions = {}): FieldValue {
    const current = activeOffsetProvider();
    const strategy = this.backends.resolve(options.backend ?? EMBEDDED_BACKEND);

    if (current === undefined) {
      const { out } = options;
      if (out === undefined) {
        throw new OffsetProviderError(`${this.name}: an out target is required at the outermost call`);
      }
      checkOutTarget(out, this.name);
      const bound = this.bind(args, options.kwargs);
      return withOffsetProvider(options.offsetProvider ?? {}, (provider) => {
        this.run(strategy, bound, out, provider);
        return out;
      });
    }

    if (options.out !== undefined) {
      throw new OffsetProviderError(`${this.name}: out is only accepted at the outermost call`);
    }
    if (options.offsetProvider !== undefined) {
      throw new OffsetProviderError(`${this.name}: offsetProvider is only accepted at the outermost call`);
    }
    return this.run(strategy, this.bind(args, options.kwargs), undefined, current);
  }

  private run(
    strategy: ExecutionStrategy,
    args: readonly FieldValue[],
    out: FieldValue | undefined,
    provider: OffsetProvider
  ): FieldValue {
    if (strategy.kind === 'embedded') {
      const value = this.fn(args, provider);
      if (out !== undefined) copyInto(out, value);
      return value;
    }

    const result = strategy.executor.execute({
      operator: this,
      ir: compileOperator(this),
      args,
      out,
      offsetProvider: provider,
      outermost: out !== undefined,
    });
    if (out !== undefined) return out;
    if (result === undefined) {
      throw new BackendError(`Backend ${strategy.id} returned no value for nested call to ${this.name}`);
    }
    return result;
  }

  // Arguments in parameter order: positional first, then keywords.
  private bind(args: readonly FieldValue[], kwargs: Readonly<Record<string, FieldValue>> = {}): FieldValue[] {
    if (args.length > this.params.length) {
      throw new ClosureError(`${this.name} takes ${this.params.length} argument(s), got ${args.length}`);
    }
    const names = this.params.map((p) => p.name);
    for (const key of Object.keys(kwargs)) {
      const position = names.indexOf(key);
      if (position === -1) throw new ClosureError(`${this.name} has no parameter ${key}`);
      if (position < args.length) throw new ClosureError(`${this.name}: ${key} given positionally and by name`);
    }

    return this.params.map((param, i) => {
      const value = i < args.length ? args[i] : kwargs[param.name];
      if (value === undefined) throw new ClosureError(`${this.name}: missing argument ${param.name}`);
      this.checkAnnotation(param, value);
      return value;
    });
  }

  private checkAnnotation(param: ParamSpec, value: FieldValue): void {
    if (!param.dims || !(value instanceof Field)) return;
    const expected = param.dims.map((d) => this.closureVars.get(d));
    const matches =
      expected.length === value.rank &&
      expected.every((d, i) => d instanceof Dimension && d.equals(value.dims[i]));
    if (!matches) {
      throw new FieldShapeError(
        `${this.name}: ${param.name} must be a field over (${param.dims.join(', ')}), got (${dimNames(value.dims).join(', ')})`
      );
    }
  }
}

export function fieldOperator(definition: FieldOperatorDefinition): FieldOperator {
  return new FieldOperator(definition);
}
