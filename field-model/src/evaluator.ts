// Embedded evaluation of operator bodies

import { MATH_PRIMITIVES, applyBinary, applyMath, applyUnary, broadcast, maxOver, minOver, neighborSum, where } from './builtins.js';
import { FieldOffset, type OffsetProvider, type OffsetSelection, shift } from './connectivity.js';
import { Dimension } from './dimension.js';
import { type EnvValue, OperatorValue } from './environment.js';
import { ClosureError, FieldIndexError, FieldTypeError } from './errors.js';
import { Field, type FieldValue, isTuple } from './field.js';
import type { Expression, ReductionOp } from './types.js';

export interface EvalFrame {
  readonly locals: ReadonlyMap<string, FieldValue>;
  readonly closure: ReadonlyMap<string, EnvValue>;
  /** Connectivities of the running outermost call, passed down explicitly. */
  readonly provider: OffsetProvider;
  /** Operator name, for error messages. */
  readonly owner: string;
}

function describe(value: EnvValue): string {
  if (value instanceof Dimension) return `dimension ${value.name}`;
  if (value instanceof FieldOffset) return `offset ${value.name}`;
  if (value instanceof OperatorValue) return `operator ${value.name}`;
  if (value instanceof Field) return 'field';
  return isTuple(value) ? 'tuple' : typeof value;
}

// ─── Name resolution ──────────────────────────────────────────────────────────

export class Scope {
  constructor(private readonly frame: EvalFrame) {}

  lookup(name: string): EnvValue {
    const local = this.frame.locals.get(name);
    if (local !== undefined) return local;
    const captured = this.frame.closure.get(name);
    if (captured !== undefined) return captured;
    throw new ClosureError(`${this.frame.owner}: ${name} is not defined`);
  }

  value(name: string): FieldValue {
    const v = this.lookup(name);
    if (v instanceof Dimension || v instanceof FieldOffset || v instanceof OperatorValue) {
      throw new ClosureError(`${this.frame.owner}: ${name} is a ${describe(v)}, not a field value`);
    }
    return v;
  }

  dimension(name: string): Dimension {
    const v = this.lookup(name);
    if (!(v instanceof Dimension)) {
      throw new ClosureError(`${this.frame.owner}: ${name} is a ${describe(v)}, expected a dimension`);
    }
    return v;
  }

  offset(name: string): FieldOffset {
    const v = this.lookup(name);
    if (!(v instanceof FieldOffset)) {
      throw new ClosureError(`${this.frame.owner}: ${name} is a ${describe(v)}, expected a field offset`);
    }
    return v;
  }

  operator(name: string): OperatorValue {
    const v = this.lookup(name);
    if (!(v instanceof OperatorValue)) {
      throw new ClosureError(`${this.frame.owner}: ${name} is a ${describe(v)}, expected an operator`);
    }
    return v;
  }

  with(name: string, value: FieldValue): Scope {
    const locals = new Map(this.frame.locals);
    locals.set(name, value);
    return new Scope({ ...this.frame, locals });
  }

  get provider(): OffsetProvider {
    return this.frame.provider;
  }
}

// ─── Operations shared with staged execution ──────────────────────────────────

/** Shift a field, every field of a tuple, or pass a scalar through. */
export function applyShift(value: FieldValue, request: FieldOffset | OffsetSelection, provider: OffsetProvider): FieldValue {
  if (isTuple(value)) return value.map((item) => applyShift(item, request, provider));
  if (value instanceof Field) return shift(value, request, provider);
  return value;
}

export function applyReduction(op: ReductionOp, value: FieldValue, axis: Dimension): Field {
  if (!(value instanceof Field)) {
    throw new FieldTypeError(`${op} expects a field, got ${isTuple(value) ? 'a tuple' : typeof value}`);
  }
  switch (op) {
    case 'neighbor_sum':
      return neighborSum(value, axis);
    case 'max_over':
      return maxOver(value, axis);
    case 'min_over':
      return minOver(value, axis);
  }
}

export function tupleItem(value: FieldValue, index: number): FieldValue {
  if (!isTuple(value)) {
    throw new FieldTypeError(`Cannot take element ${index} of a ${value instanceof Field ? 'field' : typeof value}`);
  }
  if (!Number.isInteger(index) || index < 0 || index >= value.length) {
    throw new FieldIndexError(`Tuple index ${index} is out of range 0..${value.length - 1}`);
  }
  return value[index];
}

export function callByName(scope: Scope, fn: string, args: readonly FieldValue[]): FieldValue {
  if (MATH_PRIMITIVES.has(fn)) return applyMath(fn, args);
  return scope.operator(fn).invoke(args);
}

// ─── Evaluation ───────────────────────────────────────────────────────────────

function evaluateIn(expr: Expression, scope: Scope): FieldValue {
  switch (expr.op) {
    case 'ref':
      return scope.value(expr.id);
    case 'const':
      return expr.value;
    case 'add':
    case 'sub':
    case 'mul':
    case 'div':
    case 'pow':
    case 'lt':
    case 'le':
    case 'gt':
    case 'ge':
    case 'eq':
    case 'ne':
    case 'and':
    case 'or':
      return applyBinary(expr.op, evaluateIn(expr.left, scope), evaluateIn(expr.right, scope));
    case 'neg':
    case 'not':
      return applyUnary(expr.op, evaluateIn(expr.value, scope));
    case 'call':
      return callByName(
        scope,
        expr.fn,
        expr.args.map((arg) => evaluateIn(arg, scope))
      );
    case 'shift': {
      const offset = scope.offset(expr.offset);
      const request = expr.slot === undefined ? offset : offset.at(expr.slot);
      return applyShift(evaluateIn(expr.value, scope), request, scope.provider);
    }
    case 'neighbor_sum':
    case 'max_over':
    case 'min_over':
      return applyReduction(expr.op, evaluateIn(expr.value, scope), scope.dimension(expr.axis));
    case 'where':
      return where(evaluateIn(expr.cond, scope), evaluateIn(expr.trueVal, scope), evaluateIn(expr.falseVal, scope));
    case 'broadcast':
      return broadcast(
        evaluateIn(expr.value, scope),
        expr.dims.map((d) => scope.dimension(d))
      );
    case 'tuple':
      return expr.values.map((v) => evaluateIn(v, scope));
    case 'get':
      return tupleItem(evaluateIn(expr.value, scope), expr.index);
    case 'let':
      return evaluateIn(expr.body, scope.with(expr.name, evaluateIn(expr.value, scope)));
    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function evaluate(expr: Expression, frame: EvalFrame): FieldValue {
  return evaluateIn(expr, new Scope(frame));
}
