// Builtin field operations: element-wise arithmetic, reductions over
// neighbour axes, masked selection and broadcasting

import { Dimension, dimNames, dimensionIndex, unionDims } from './dimension.js';
import { ClosureError, FieldShapeError, FieldTypeError, TupleShapeError } from './errors.js';
import {
  type AxisRange,
  Field,
  type FieldValue,
  dtypeOf,
  fitsInt32,
  generate,
  isField,
  isScalar,
  isTuple,
  promoteDType,
  scalarField,
} from './field.js';
import type { ArithmeticOp, BinaryOp, ComparisonOp, DType, LogicalOp, Scalar, UnaryOp } from './types.js';

export type Operand = Field | Scalar;

export function operandDType(value: Operand): DType {
  return isField(value) ? value.dtype : dtypeOf(value);
}

function toOperand(value: FieldValue, what: string): Operand {
  if (isTuple(value)) {
    throw new FieldTypeError(`${what} expects a Field or a scalar, got a tuple of ${value.length}`);
  }
  return value;
}

/**
 * Combine operands element by element.
 *
 * The result is defined over the ordered union of the operands' dimensions.
 * Along a dimension shared by several operands it covers the intersection of
 * their external index ranges. Rank-0 fields and scalars are broadcast.
 * Returns a scalar only when every operand is a scalar.
 */
export function zipWith(
  operands: readonly Operand[],
  dtype: DType,
  compute: (values: readonly Scalar[]) => Scalar
): Operand {
  if (operands.every(isScalar)) {
    return compute(operands);
  }

  let dims: Dimension[] = [];
  let broadcastDims: Dimension[] = [];
  for (const op of operands) {
    if (!isField(op)) continue;
    dims = unionDims(dims, op.dims);
    broadcastDims = unionDims(broadcastDims, op.broadcastDims);
  }
  broadcastDims = unionDims(dims, broadcastDims);

  const ranges: AxisRange[] = dims.map((dim) => {
    let start = -Infinity;
    let stop = Infinity;
    for (const op of operands) {
      if (!isField(op)) continue;
      const axis = op.axisOf(dim);
      if (axis === -1) continue;
      const r = op.range(axis);
      start = Math.max(start, r.start);
      stop = Math.min(stop, r.stop);
    }
    if (start > stop) {
      throw new FieldShapeError(`Operands do not overlap along dimension ${dim.name}`);
    }
    return { start, stop };
  });

  // For each operand, which result axis feeds each of its own axes
  const projections = operands.map((op) => (isField(op) ? op.dims.map((d) => dimensionIndex(dims, d)) : []));
  const values = new Array<Scalar>(operands.length);

  return generate({ dims, ranges, dtype, broadcastDims }, (indices) => {
    operands.forEach((op, i) => {
      values[i] = isField(op) ? op.get(projections[i].map((axis) => indices[axis])) : op;
    });
    return compute(values);
  });
}

// ─── Arithmetic, comparison, logic ────────────────────────────────────────────

const ARITHMETIC: Readonly<Record<ArithmeticOp, (a: number, b: number) => number>> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  pow: (a, b) => a ** b,
};

const COMPARISON: Readonly<Record<ComparisonOp, (a: number, b: number) => boolean>> = {
  lt: (a, b) => a < b,
  le: (a, b) => a <= b,
  gt: (a, b) => a > b,
  ge: (a, b) => a >= b,
  eq: (a, b) => a === b,
  ne: (a, b) => a !== b,
};

const LOGICAL: Readonly<Record<LogicalOp, (a: boolean, b: boolean) => boolean>> = {
  and: (a, b) => a && b,
  or: (a, b) => a || b,
};

function isArithmetic(op: BinaryOp): op is ArithmeticOp {
  return op in ARITHMETIC;
}

function isComparison(op: BinaryOp): op is ComparisonOp {
  return op in COMPARISON;
}

function arithmeticDType(op: ArithmeticOp, left: Operand, right: Operand): DType {
  if (op === 'div' || op === 'pow') return 'float64';
  return promoteDType(promoteDType(operandDType(left), operandDType(right)), 'int32');
}

/** int32 copy of an integral float64 field, or the field itself if any element does not fit. */
function narrowInt32(wide: Field): Field {
  for (let i = 0; i < wide.data.length; i++) {
    if (!fitsInt32(wide.data[i])) return wide;
  }
  return wide.astype('int32');
}

/**
 * Integer results are computed in float64 and kept int32 only when every
 * element fits.
 */
function integral(dtype: DType, compute: (dtype: DType) => Operand): Operand {
  if (dtype !== 'int32') return compute(dtype);
  const wide = compute('float64');
  return isField(wide) ? narrowInt32(wide) : wide;
}

export function applyBinary(op: BinaryOp, left: FieldValue, right: FieldValue): Operand {
  const l = toOperand(left, op);
  const r = toOperand(right, op);
  if (isArithmetic(op)) {
    const fn = ARITHMETIC[op];
    return integral(arithmeticDType(op, l, r), (dtype) => zipWith([l, r], dtype, ([a, b]) => fn(Number(a), Number(b))));
  }
  if (isComparison(op)) {
    const fn = COMPARISON[op];
    return zipWith([l, r], 'bool', ([a, b]) => fn(Number(a), Number(b)));
  }
  const fn = LOGICAL[op];
  return zipWith([l, r], 'bool', ([a, b]) => fn(Boolean(a), Boolean(b)));
}

export function applyUnary(op: UnaryOp, value: FieldValue): Operand {
  const v = toOperand(value, op);
  if (op === 'not') {
    return zipWith([v], 'bool', ([a]) => !a);
  }
  return integral(promoteDType(operandDType(v), 'int32'), (dtype) => zipWith([v], dtype, ([a]) => -Number(a)));
}

// ─── Math primitives ──────────────────────────────────────────────────────────

const UNARY_MATH: Readonly<Record<string, (x: number) => number>> = {
  abs: Math.abs,
  sqrt: Math.sqrt,
  exp: Math.exp,
  log: Math.log,
  sin: Math.sin,
  cos: Math.cos,
  tan: Math.tan,
  tanh: Math.tanh,
  floor: Math.floor,
  ceil: Math.ceil,
};

const BINARY_MATH: Readonly<Record<string, (x: number, y: number) => number>> = {
  minimum: Math.min,
  maximum: Math.max,
  power: Math.pow,
};

/** Names that are always primitives and never captured from an environment. */
export const MATH_PRIMITIVES: ReadonlySet<string> = new Set([...Object.keys(UNARY_MATH), ...Object.keys(BINARY_MATH)]);

export function applyMath(name: string, args: readonly FieldValue[]): Operand {
  if (!MATH_PRIMITIVES.has(name)) {
    throw new ClosureError(`${name} is not a math primitive`);
  }
  const operands = args.map((a) => toOperand(a, name));
  if (name in UNARY_MATH) {
    const fn = UNARY_MATH[name];
    if (operands.length !== 1) throw new ClosureError(`${name} takes 1 argument, got ${operands.length}`);
    return zipWith(operands, 'float64', ([x]) => fn(Number(x)));
  }
  const fn = BINARY_MATH[name];
  if (operands.length !== 2) throw new ClosureError(`${name} takes 2 arguments, got ${operands.length}`);
  return zipWith(operands, 'float64', ([x, y]) => fn(Number(x), Number(y)));
}

// ─── Reductions ───────────────────────────────────────────────────────────────

function reduceAxis(
  field: Field,
  axis: Dimension,
  what: string,
  dtype: DType,
  init: number,
  combine: (acc: number, value: number) => number
): Field {
  const k = field.axisOf(axis);
  if (k === -1) {
    throw new FieldShapeError(`${what}: field over (${dimNames(field.dims).join(', ')}) has no dimension ${axis.name}`);
  }
  const { ranges } = field.shape();
  const { start, stop } = ranges[k];
  const source = new Array<number>(field.rank);

  return generate(
    {
      dims: field.dims.filter((_, i) => i !== k),
      ranges: ranges.filter((_, i) => i !== k),
      dtype,
      broadcastDims: field.broadcastDims.filter((d) => !d.equals(axis)),
    },
    (indices) => {
      for (let i = 0; i < k; i++) source[i] = indices[i];
      for (let i = k; i < indices.length; i++) source[i + 1] = indices[i];
      let acc = init;
      for (let j = start; j <= stop; j++) {
        source[k] = j;
        acc = combine(acc, Number(field.get(source)));
      }
      return acc;
    }
  );
}

/** Sum over the neighbour axis `axis`. Bool fields count their true entries. */
export function neighborSum(field: Field, axis: Dimension): Field {
  const sum = reduceAxis(field, axis, 'neighbor_sum', 'float64', 0, (acc, v) => acc + v);
  return field.dtype === 'float64' ? sum : narrowInt32(sum);
}

function requireNonEmpty(field: Field, axis: Dimension, what: string): void {
  const k = field.axisOf(axis);
  if (k !== -1 && field.sizes[k] === 0) {
    throw new FieldShapeError(`${what}: dimension ${axis.name} is empty`);
  }
}

export function maxOver(field: Field, axis: Dimension): Field {
  requireNonEmpty(field, axis, 'max_over');
  return reduceAxis(field, axis, 'max_over', field.dtype, -Infinity, Math.max);
}

export function minOver(field: Field, axis: Dimension): Field {
  requireNonEmpty(field, axis, 'min_over');
  return reduceAxis(field, axis, 'min_over', field.dtype, Infinity, Math.min);
}

// ─── Selection ────────────────────────────────────────────────────────────────

function assertCongruent(a: FieldValue, b: FieldValue, path: string): void {
  if (!isTuple(a) && !isTuple(b)) return;
  if (!isTuple(a) || !isTuple(b)) {
    throw new TupleShapeError(`where: branches differ at ${path || 'top level'}: tuple vs single value`);
  }
  if (a.length !== b.length) {
    throw new TupleShapeError(`where: branches differ at ${path || 'top level'}: ${a.length} vs ${b.length} elements`);
  }
  a.forEach((item, i) => assertCongruent(item, b[i], `${path}[${i}]`));
}

function select(mask: Operand, a: FieldValue, b: FieldValue): FieldValue {
  if (isTuple(a) && isTuple(b)) {
    return a.map((item, i) => select(mask, item, b[i]));
  }
  const x = toOperand(a, 'where');
  const y = toOperand(b, 'where');
  return zipWith([mask, x, y], promoteDType(operandDType(x), operandDType(y)), ([m, u, v]) => (m ? u : v));
}

/**
 * Element-wise `mask ? a : b`. Tuple branches are walked position by
 * position and must have the same structure.
 */
export function where(mask: FieldValue, a: FieldValue, b: FieldValue): FieldValue {
  const m = toOperand(mask, 'where mask');
  if (operandDType(m) !== 'bool') {
    throw new FieldTypeError(`where: mask must be boolean-valued, got ${operandDType(m)}`);
  }
  assertCongruent(a, b, '');
  return select(m, a, b);
}

/**
 * Tag a value with the dimensions it should be promoted to. A field keeps its
 * data; a scalar becomes a rank-0 field.
 */
export function broadcast(value: FieldValue, dims: readonly Dimension[]): Field {
  const v = toOperand(value, 'broadcast');
  return v instanceof Field ? v.broadcastTo(dims) : scalarField(v, dims);
}
