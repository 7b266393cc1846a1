import { describe, expect, it } from 'vitest';
import {
  applyBinary,
  applyMath,
  applyUnary,
  broadcast,
  maxOver,
  minOver,
  neighborSum,
  where,
} from '../src/builtins.js';
import { Dimension, dimNames } from '../src/dimension.js';
import { ClosureError, FieldShapeError, FieldTypeError, TupleShapeError } from '../src/errors.js';
import { Field, type FieldValue, field, isTuple, zeros } from '../src/field.js';

const Cell = new Dimension('Cell');
const Edge = new Dimension('Edge');
const K = new Dimension('K', 'vertical');
const E2CDim = new Dimension('E2CDim', 'local');

function asField(value: FieldValue): Field {
  if (!(value instanceof Field)) throw new Error('expected a field');
  return value;
}

describe('element-wise operations', () => {
  it('adds a scalar to every element', () => {
    const sum = asField(applyBinary('add', field(Cell, [1, 2, 3]), 10));
    expect(sum.dtype).toBe('float64');
    expect(sum.toArray()).toEqual([11, 12, 13]);
  });

  it('keeps integer arithmetic integral and makes division floating', () => {
    const ints = field(Cell, [4, 6], { dtype: 'int32' });
    expect(asField(applyBinary('mul', ints, 2)).dtype).toBe('int32');
    const half = asField(applyBinary('div', ints, 4));
    expect(half.dtype).toBe('float64');
    expect(half.toArray()).toEqual([1, 1.5]);
  });

  it('widens integer results that do not fit in int32', () => {
    const counts = field(Cell, [2, 1], { dtype: 'int32' });
    const product = asField(applyBinary('mul', counts, 2_000_000_000));
    expect(product.dtype).toBe('float64');
    expect(product.toArray()).toEqual([4e9, 2e9]);
    const negated = asField(applyUnary('neg', field(Cell, [-2147483648], { dtype: 'int32' })));
    expect(negated.dtype).toBe('float64');
    expect(negated.toArray()).toEqual([2147483648]);
  });

  it('returns a scalar for scalar operands', () => {
    expect(applyBinary('pow', 2, 3)).toBe(8);
    expect(applyUnary('neg', 4)).toBe(-4);
  });

  it('combines over the union of dimensions', () => {
    const outer = asField(applyBinary('mul', field(Cell, [1, 2]), field(K, [10, 20, 30])));
    expect(dimNames(outer.dims)).toEqual(['Cell', 'K']);
    expect(outer.toArray()).toEqual([
      [10, 20, 30],
      [20, 40, 60],
    ]);
  });

  it('restricts shared dimensions to the overlapping range', () => {
    const a = field(K, [1, 2, 3]);
    const b = field(K, [10, 20, 30], { origin: { K: 1 } });
    const sum = asField(applyBinary('add', a, b));
    expect(sum.range(0)).toEqual({ start: 2, stop: 3 });
    expect(sum.toArray()).toEqual([12, 23]);
  });

  it('fails when shared dimensions do not overlap', () => {
    const a = field(K, [1, 2]);
    const b = field(K, [1, 2], { origin: { K: 5 } });
    expect(() => applyBinary('add', a, b)).toThrow(new FieldShapeError('Operands do not overlap along dimension K'));
  });

  it('compares into bool fields', () => {
    const mask = asField(applyBinary('ge', field(Cell, [1, 2, 3]), 2));
    expect(mask.dtype).toBe('bool');
    expect(mask.toArray()).toEqual([false, true, true]);
    expect(asField(applyUnary('not', mask)).toArray()).toEqual([true, false, false]);
  });

  it('combines masks logically', () => {
    const a = field(Cell, [true, true, false]);
    const b = field(Cell, [true, false, false]);
    expect(asField(applyBinary('and', a, b)).toArray()).toEqual([true, false, false]);
    expect(asField(applyBinary('or', a, b)).toArray()).toEqual([true, true, false]);
  });

  it('rejects tuples', () => {
    expect(() => applyBinary('add', [1, 2], 1)).toThrow(FieldTypeError);
  });
});

describe('math primitives', () => {
  it('applies unary and binary primitives', () => {
    expect(asField(applyMath('sqrt', [field(Cell, [4, 9])])).toArray()).toEqual([2, 3]);
    expect(asField(applyMath('maximum', [field(Cell, [-1, 2]), 0])).toArray()).toEqual([0, 2]);
  });

  it('checks arity and names', () => {
    expect(() => applyMath('sqrt', [1, 2])).toThrow(ClosureError);
    expect(() => applyMath('minimum', [1])).toThrow(ClosureError);
    expect(() => applyMath('constructor', [1])).toThrow(ClosureError);
  });
});

describe('reductions', () => {
  const neighbors = field([Edge, E2CDim], [
    [1, 4],
    [3, 2],
    [5, 0],
  ]);

  it('sums over the neighbour axis', () => {
    const sum = neighborSum(neighbors, E2CDim);
    expect(dimNames(sum.dims)).toEqual(['Edge']);
    expect(sum.toArray()).toEqual([5, 5, 5]);
  });

  it('takes maxima and minima', () => {
    expect(maxOver(neighbors, E2CDim).toArray()).toEqual([4, 3, 5]);
    expect(minOver(neighbors, E2CDim).toArray()).toEqual([1, 2, 0]);
  });

  it('counts true entries of a bool field', () => {
    const flags = field([Edge, E2CDim], [
      [true, true],
      [false, true],
    ]);
    const count = neighborSum(flags, E2CDim);
    expect(count.dtype).toBe('int32');
    expect(count.toArray()).toEqual([2, 1]);
  });

  it('fails on an empty axis for maxima and minima', () => {
    const empty = zeros([Edge, E2CDim], [2, 0]);
    expect(() => maxOver(empty, E2CDim)).toThrow(new FieldShapeError('max_over: dimension E2CDim is empty'));
    expect(() => minOver(empty, E2CDim)).toThrow(FieldShapeError);
    expect(neighborSum(empty, E2CDim).toArray()).toEqual([0, 0]);
  });

  it('fails for a field without the axis', () => {
    expect(() => neighborSum(field(Edge, [1]), E2CDim)).toThrow(FieldShapeError);
  });
});

describe('where', () => {
  const mask = field(Cell, [true, false, true]);

  it('selects element-wise', () => {
    expect(asField(where(mask, field(Cell, [1, 2, 3]), 0)).toArray()).toEqual([1, 0, 3]);
  });

  it('selects within tuples position by position', () => {
    const result = where(mask, [1, field(Cell, [1, 2, 3])], [2, field(Cell, [4, 5, 6])]);
    if (!isTuple(result)) throw new Error('expected a tuple');
    expect(result.map((item) => asField(item).toArray())).toEqual([
      [1, 2, 1],
      [1, 5, 3],
    ]);
  });

  it('requires congruent tuple branches', () => {
    expect(() => where(mask, [1, 2], [1])).toThrow(TupleShapeError);
    expect(() => where(mask, [1, [2, 3]], [1, 2])).toThrow(TupleShapeError);
  });

  it('requires a boolean mask', () => {
    expect(() => where(field(Cell, [1, 0, 1]), 1, 2)).toThrow(FieldTypeError);
  });
});

describe('broadcast', () => {
  it('keeps large integer scalars exact', () => {
    const b = broadcast(3e9, [Cell]);
    expect(b.dtype).toBe('float64');
    expect(b.get([])).toBe(3e9);
  });

  it('turns a scalar into a rank-0 field', () => {
    const b = broadcast(3, [Cell, K]);
    expect(b.rank).toBe(0);
    expect(dimNames(b.broadcastDims)).toEqual(['Cell', 'K']);
  });

  it('tags a field with extra dimensions', () => {
    const b = broadcast(field(K, [1, 2]), [Cell, K]);
    expect(dimNames(b.dims)).toEqual(['K']);
    expect(dimNames(b.broadcastDims)).toEqual(['Cell', 'K']);
  });
});
