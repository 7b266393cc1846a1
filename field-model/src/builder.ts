// DSL Core: Type-safe expression builder for field operator bodies

import type { BinaryOp, Expression, ReductionOp, Scalar } from './types.js';

type Operand = Expression | Scalar;

// Bare numbers and booleans become constants
function lift(value: Operand): Expression {
  return typeof value === 'number' || typeof value === 'boolean' ? { op: 'const', value } : value;
}

const binary =
  (op: BinaryOp) =>
  (left: Operand, right: Operand): Expression => ({ op, left: lift(left), right: lift(right) });

const reduction =
  (op: ReductionOp) =>
  (value: Expression, axis: string): Expression => ({ op, value, axis });

// Type-safe operation builders
export const ops = {
  ref: (id: string): Expression => ({ op: 'ref', id }),
  const: (value: Scalar): Expression => ({ op: 'const', value }),

  add: binary('add'),
  sub: binary('sub'),
  mul: binary('mul'),
  div: binary('div'),
  pow: binary('pow'),
  neg: (value: Operand): Expression => ({ op: 'neg', value: lift(value) }),

  // Comparison
  lt: binary('lt'),
  le: binary('le'),
  gt: binary('gt'),
  ge: binary('ge'),
  eq: binary('eq'),
  ne: binary('ne'),

  // Logic
  and: binary('and'),
  or: binary('or'),
  not: (value: Operand): Expression => ({ op: 'not', value: lift(value) }),

  // Math primitives (sin, sqrt, maximum, ...) or nested operators, by name
  call: (fn: string, ...args: Operand[]): Expression => ({ op: 'call', fn, args: args.map(lift) }),

  // Connectivity operations
  shift: (value: Expression, offset: string, slot?: number): Expression =>
    slot === undefined ? { op: 'shift', value, offset } : { op: 'shift', value, offset, slot },
  neighborSum: reduction('neighbor_sum'),
  maxOver: reduction('max_over'),
  minOver: reduction('min_over'),

  // Conditional
  where: (cond: Expression, trueVal: Operand, falseVal: Operand): Expression => ({
    op: 'where',
    cond,
    trueVal: lift(trueVal),
    falseVal: lift(falseVal),
  }),
  broadcast: (value: Operand, dims: string[]): Expression => ({ op: 'broadcast', value: lift(value), dims }),

  // Tuples and local bindings
  tuple: (...values: Operand[]): Expression => ({ op: 'tuple', values: values.map(lift) }),
  get: (value: Expression, index: number): Expression => ({ op: 'get', value, index }),
  let: (name: string, value: Expression, body: Expression): Expression => ({ op: 'let', name, value, body }),
} as const;
