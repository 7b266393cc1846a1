import { describe, expect, it } from 'vitest';
import { Dimension } from '../src/dimension.js';
import { FieldIndexError, FieldShapeError, FieldTypeError } from '../src/errors.js';
import { Field, asField, copyInto, field, full, generate, scalarField, zeros } from '../src/field.js';

const Cell = new Dimension('Cell');
const K = new Dimension('K', 'vertical');

describe('Field construction', () => {
  it('builds from nested values with 1-based external indices', () => {
    const f = field([Cell, K], [
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(f.dtype).toBe('float64');
    expect(f.sizes).toEqual([2, 3]);
    expect(f.get([1, 1])).toBe(1);
    expect(f.get([2, 3])).toBe(6);
  });

  it('infers bool from boolean values and honours an explicit dtype', () => {
    expect(field(Cell, [true, false]).dtype).toBe('bool');
    const ints = field(Cell, [1, 2], { dtype: 'int32' });
    expect(ints.data).toBeInstanceOf(Int32Array);
  });

  it('rejects duplicate dimensions', () => {
    expect(() => zeros([Cell, Cell], [2, 2])).toThrow(FieldShapeError);
  });

  it('rejects broadcast dimensions that do not include its own', () => {
    expect(() => zeros([Cell, K], [2, 2], { broadcastDims: [Cell] })).toThrow(FieldShapeError);
  });

  it('rejects data whose length does not match the shape', () => {
    expect(
      () => new Field({ dims: [Cell], data: new Float64Array(3), dtype: 'float64', sizes: [4] })
    ).toThrow(FieldShapeError);
  });

  it('rejects storage of the wrong element type', () => {
    expect(() => new Field({ dims: [Cell], data: new Int32Array(2), dtype: 'float64', sizes: [2] })).toThrow(
      FieldTypeError
    );
  });

  it('rejects ragged values', () => {
    expect(() => field([Cell, K], [[1, 2], [3]])).toThrow(FieldShapeError);
  });
});

describe('origins', () => {
  it('shifts the valid index range of an axis', () => {
    const f = field(K, [10, 20, 30], { origin: { K: 1 } });
    expect(f.range(0)).toEqual({ start: 2, stop: 4 });
    expect(f.get([2])).toBe(10);
    expect(f.get([4])).toBe(30);
  });

  it('fails outside the valid range', () => {
    const f = field(K, [10, 20, 30], { origin: { K: 1 } });
    expect(() => f.get([1])).toThrow(new FieldIndexError('Index 1 is out of range 2..4 for dimension K'));
    expect(() => f.get([5])).toThrow(FieldIndexError);
    expect(() => f.set([0], 1)).toThrow(FieldIndexError);
  });

  it('rejects an origin for a dimension the field does not have', () => {
    expect(() => field(K, [1], { origin: { Cell: 1 } })).toThrow(FieldShapeError);
  });

  it('replaces the origin of one axis without copying', () => {
    const f = field([Cell, K], [[1, 2]]);
    const moved = f.withOrigin(K, 3);
    expect(moved.data).toBe(f.data);
    expect(moved.range(1)).toEqual({ start: 4, stop: 5 });
    expect(moved.get([1, 5])).toBe(2);
  });
});

describe('element access', () => {
  it('round-trips set and get', () => {
    const f = zeros([Cell, K], [2, 2]);
    f.set([2, 1], 7.5);
    expect(f.get([2, 1])).toBe(7.5);
    expect(f.toArray()).toEqual([
      [0, 0],
      [7.5, 0],
    ]);
  });

  it('stores booleans as booleans', () => {
    const f = zeros(Cell, [2], { dtype: 'bool' });
    f.set([2], true);
    expect(f.toArray()).toEqual([false, true]);
  });

  it('checks the number of indices', () => {
    expect(() => zeros([Cell, K], [2, 2]).get([1])).toThrow(FieldShapeError);
  });
});

describe('slicing', () => {
  const f = field([Cell, K], [
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ]);

  it('drops an axis selected by a single index', () => {
    const row = f.slice([2, { start: 1, stop: 3 }]);
    expect(row.dims).toEqual([K]);
    expect(row.toArray()).toEqual([4, 5, 6]);
  });

  it('keeps external indices of a range', () => {
    const column = f.slice([{ start: 2, stop: 3 }, 3]);
    expect(column.range(0)).toEqual({ start: 2, stop: 3 });
    expect(column.get([2])).toBe(6);
    expect(column.get([3])).toBe(9);
  });

  it('shares storage with the sliced field', () => {
    const copy = f.copy();
    const view = copy.slice([{ start: 2, stop: 2 }, { start: 2, stop: 3 }]);
    view.set([2, 3], 60);
    expect(copy.get([2, 3])).toBe(60);
  });

  it('fails on selectors outside the range', () => {
    expect(() => f.slice([4, 1])).toThrow(FieldIndexError);
    expect(() => f.slice([{ start: 3, stop: 2 }, 1])).toThrow(FieldIndexError);
  });
});

describe('conversion', () => {
  it('truncates when converting to int32', () => {
    expect(field(Cell, [1.5, 2.7]).astype('int32').toArray()).toEqual([1, 2]);
  });

  it('describes itself', () => {
    const f = field([Cell, K], [[1, 2, 3]], { origin: { K: 1 } });
    expect(f.toString()).toBe('float64 Field with dimensions (Cell, K) with indices 1:1×2:4');
  });

  it('generates values from external indices', () => {
    const f = generate({ dims: [K], ranges: [{ start: 3, stop: 5 }], dtype: 'int32' }, ([k]) => k * 10);
    expect(f.origin).toEqual([2]);
    expect(f.toArray()).toEqual([30, 40, 50]);
  });

  it('stores integers outside the int32 range as float64', () => {
    const big = scalarField(3e9);
    expect(big.dtype).toBe('float64');
    expect(big.get([])).toBe(3e9);
    expect(scalarField(-2147483648).dtype).toBe('int32');
    expect(scalarField(2147483648).dtype).toBe('float64');
  });

  it('wraps scalars as rank-0 fields', () => {
    const s = scalarField(4, [Cell]);
    expect(s.rank).toBe(0);
    expect(s.get([])).toBe(4);
    expect(s.broadcastDims).toEqual([Cell]);
  });

  it('promotes scalars and passes fields through', () => {
    const f = field(Cell, [1]);
    expect(asField(f)).toBe(f);
    expect(asField(true).dtype).toBe('bool');
  });

  it('tags broadcast dimensions without touching data', () => {
    const f = field(K, [1, 2]);
    const b = f.broadcastTo([Cell, K]);
    expect(b.data).toBe(f.data);
    expect(b.broadcastDims).toEqual([Cell, K]);
    expect(() => f.broadcastTo([Cell])).toThrow(FieldShapeError);
  });
});

describe('copyInto', () => {
  it('copies positionally between fields of equal shape', () => {
    const out = zeros(K, [3]);
    copyInto(out, field(K, [1, 2, 3], { origin: { K: 1 } }));
    expect(out.toArray()).toEqual([1, 2, 3]);
  });

  it('fills the target from a scalar or rank-0 field', () => {
    const out = zeros(Cell, [2]);
    copyInto(out, 3);
    expect(out.toArray()).toEqual([3, 3]);
    copyInto(out, scalarField(5));
    expect(out.toArray()).toEqual([5, 5]);
  });

  it('copies tuples component-wise', () => {
    const a = zeros(Cell, [2]);
    const b = full(Cell, [2], false);
    copyInto([a, b], [field(Cell, [1, 2]), field(Cell, [true, false])]);
    expect(a.toArray()).toEqual([1, 2]);
    expect(b.toArray()).toEqual([true, false]);
  });

  it('rejects mismatched shapes before writing anything', () => {
    const a = zeros(Cell, [2]);
    const b = zeros(Cell, [3]);
    expect(() => copyInto([a, b], [field(Cell, [1, 2]), field(Cell, [1, 2])])).toThrow(FieldShapeError);
    expect(a.toArray()).toEqual([0, 0]);
  });

  it('reads every source before writing when sources and targets share storage', () => {
    const a = field(Cell, [1, 2]);
    const b = field(Cell, [3, 4]);
    copyInto([a, b], [b, a]);
    expect(a.toArray()).toEqual([3, 4]);
    expect(b.toArray()).toEqual([1, 2]);
  });

  it('rejects tuple mismatches', () => {
    expect(() => copyInto([zeros(Cell, [2])], field(Cell, [1, 2]))).toThrow(FieldShapeError);
    expect(() => copyInto(zeros(Cell, [2]), [field(Cell, [1, 2])])).toThrow(FieldShapeError);
  });

  it('rejects a target that is not a field', () => {
    expect(() => copyInto(3, field(Cell, [1]))).toThrow(FieldTypeError);
  });
});
