// Compiler: operator bodies -> flat JSON IR for external backends

import { FieldOffset } from './connectivity.js';
import { Dimension, dimNames } from './dimension.js';
import { type EnvValue, OperatorValue } from './environment.js';
import { Field, isTuple } from './field.js';
import type { FieldOperator } from './operator.js';
import type { CaptureDescriptor, Expression, Operation, OperatorIR } from './types.js';

interface CompilerContext {
  tempVarCounter: number;
  operations: Operation[];
  varMap: Map<string, string>; // Operation key -> variable name
}

// Generate unique temporary variable name
function getTempVar(ctx: CompilerContext): string {
  return `temp_${ctx.tempVarCounter++}`;
}

// Emit an operation unless an identical one (same op, operands and
// attributes) already exists; operands are variables, so identical keys
// always denote identical values.
function emit(ctx: CompilerContext, operation: Omit<Operation, 'target'>): string {
  const key = JSON.stringify(operation);
  const existing = ctx.varMap.get(key);
  if (existing) {
    return existing;
  }
  const target = getTempVar(ctx);
  ctx.operations.push({ target, ...operation });
  ctx.varMap.set(key, target);
  return target;
}

// Compile expression tree to flat operations. `scope` maps parameters and
// let-bound names to the variables holding them.
function compileExpression(expr: Expression, ctx: CompilerContext, scope: ReadonlyMap<string, string>): string {
  const compile = (e: Expression): string => compileExpression(e, ctx, scope);

  switch (expr.op) {
    case 'ref': {
      const bound = scope.get(expr.id);
      if (bound) return bound;
      return emit(ctx, { op: 'capture', args: [], name: expr.id });
    }

    case 'const':
      return emit(ctx, { op: 'const', args: [], value: expr.value });

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
    case 'or': {
      const left = compile(expr.left);
      const right = compile(expr.right);
      return emit(ctx, { op: expr.op, args: [left, right] });
    }

    case 'neg':
    case 'not':
      return emit(ctx, { op: expr.op, args: [compile(expr.value)] });

    case 'call': {
      const args = expr.args.map(compile);
      return emit(ctx, { op: 'call', args, name: expr.fn });
    }

    case 'shift': {
      const val = compile(expr.value);
      return emit(
        ctx,
        expr.slot === undefined
          ? { op: 'shift', args: [val], offset: expr.offset }
          : { op: 'shift', args: [val], offset: expr.offset, slot: expr.slot }
      );
    }

    case 'neighbor_sum':
    case 'max_over':
    case 'min_over':
      return emit(ctx, { op: expr.op, args: [compile(expr.value)], axis: expr.axis });

    case 'where': {
      const cond = compile(expr.cond);
      const trueVal = compile(expr.trueVal);
      const falseVal = compile(expr.falseVal);
      return emit(ctx, { op: 'where', args: [cond, trueVal, falseVal] });
    }

    case 'broadcast':
      return emit(ctx, { op: 'broadcast', args: [compile(expr.value)], dims: expr.dims });

    case 'tuple':
      return emit(ctx, { op: 'tuple', args: expr.values.map(compile) });

    case 'get':
      return emit(ctx, { op: 'get', args: [compile(expr.value)], index: expr.index });

    case 'let': {
      const value = compile(expr.value);
      const inner = new Map(scope);
      inner.set(expr.name, value);
      return compileExpression(expr.body, ctx, inner);
    }

    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

const compiled = new WeakMap<FieldOperator, OperatorIR>();

/**
 * Lower an operator body to IR. Parameters are loaded first, in order; the
 * result is cached per operator.
 */
export function compileOperator(operator: FieldOperator): OperatorIR {
  const cached = compiled.get(operator);
  if (cached) return cached;

  const ctx: CompilerContext = {
    tempVarCounter: 0,
    operations: [],
    varMap: new Map(),
  };
  const scope = new Map<string, string>();
  for (const param of operator.params) {
    scope.set(param.name, emit(ctx, { op: 'param', args: [], name: param.name }));
  }
  const result = compileExpression(operator.body, ctx, scope);

  const ir: OperatorIR = {
    name: operator.name,
    params: operator.params.map((p) => ({ ...p })),
    captured: Array.from(operator.closureVars.keys()),
    operations: ctx.operations,
    result,
  };
  compiled.set(operator, ir);
  return ir;
}

/** JSON-safe description of a captured value, for staging it elsewhere. */
export function describeCapture(value: EnvValue): CaptureDescriptor {
  if (value instanceof Dimension) {
    return { kind: 'dimension', name: value.name, dimKind: value.kind };
  }
  if (value instanceof FieldOffset) {
    return { kind: 'offset', name: value.name, source: value.source.name, target: dimNames(value.target) };
  }
  if (value instanceof OperatorValue) {
    return { kind: 'operator', name: value.name, id: value.id };
  }
  if (value instanceof Field) {
    return { kind: 'field', dims: dimNames(value.dims), dtype: value.dtype, sizes: [...value.sizes] };
  }
  if (isTuple(value)) {
    return { kind: 'tuple', items: value.map(describeCapture) };
  }
  return { kind: 'scalar', value };
}

export function describeCaptures(operator: FieldOperator): Record<string, CaptureDescriptor> {
  const out: Record<string, CaptureDescriptor> = {};
  for (const [name, value] of operator.closureVars) {
    out[name] = describeCapture(value);
  }
  return out;
}
