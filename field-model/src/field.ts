// Field: a dense, dimension-tagged array with per-axis origin offsets

import { DEFAULT_ORIGIN, FIRST_INDEX, INT32_MAX, INT32_MIN } from './constants.js';
import { Dimension, dimNames, dimensionIndex, isSubset } from './dimension.js';
import { FieldIndexError, FieldShapeError, FieldTypeError } from './errors.js';
import type { DType, Scalar } from './types.js';

export type FieldData = Float64Array | Int32Array | Uint8Array;

/** Anything an operator can take or produce: a Field, a scalar or a tuple of them. */
export type FieldValue = Field | Scalar | readonly FieldValue[];

export type NestedValues = Scalar | readonly NestedValues[];

/** Inclusive range of external indices along one axis. */
export interface AxisRange {
  readonly start: number;
  readonly stop: number;
}

export type AxisSelector = number | AxisRange;

export interface FieldShape {
  readonly dims: readonly Dimension[];
  readonly ranges: readonly AxisRange[];
  readonly broadcastDims: readonly Dimension[];
}

export interface FieldOptions {
  dtype?: DType;
  broadcastDims?: readonly Dimension[];
  /** Origin per dimension name; unnamed axes start at 0. */
  origin?: Readonly<Record<string, number>>;
}

export interface FieldInit {
  dims: readonly Dimension[];
  data: FieldData;
  dtype: DType;
  sizes: readonly number[];
  /** Defaults to a contiguous row-major layout. */
  strides?: readonly number[];
  offset?: number;
  origin?: readonly number[];
  broadcastDims?: readonly Dimension[];
}

export function allocate(dtype: DType, length: number): FieldData {
  switch (dtype) {
    case 'float64':
      return new Float64Array(length);
    case 'int32':
      return new Int32Array(length);
    case 'bool':
      return new Uint8Array(length);
  }
}

function matchesDType(data: FieldData, dtype: DType): boolean {
  switch (dtype) {
    case 'float64':
      return data instanceof Float64Array;
    case 'int32':
      return data instanceof Int32Array;
    case 'bool':
      return data instanceof Uint8Array;
  }
}

function rowMajorStrides(sizes: readonly number[]): number[] {
  const strides = new Array<number>(sizes.length);
  let stride = 1;
  for (let i = sizes.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= sizes[i];
  }
  return strides;
}

function product(sizes: readonly number[]): number {
  return sizes.reduce((acc, n) => acc * n, 1);
}

/**
 * Visit every local (0-based) index of an array with the given extents in
 * row-major order. A rank-0 shape is visited once with an empty index.
 */
export function forEachIndex(sizes: readonly number[], visit: (local: readonly number[]) => void): void {
  if (sizes.some((n) => n === 0)) return;
  const local = new Array<number>(sizes.length).fill(0);
  for (;;) {
    visit(local);
    let axis = sizes.length - 1;
    while (axis >= 0) {
      local[axis]++;
      if (local[axis] < sizes[axis]) break;
      local[axis] = 0;
      axis--;
    }
    if (axis < 0) return;
  }
}

export function fitsInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

export function dtypeOf(value: Scalar): DType {
  if (typeof value === 'boolean') return 'bool';
  return fitsInt32(value) ? 'int32' : 'float64';
}

const DTYPE_RANK: Readonly<Record<DType, number>> = { bool: 0, int32: 1, float64: 2 };

export function promoteDType(a: DType, b: DType): DType {
  return DTYPE_RANK[a] >= DTYPE_RANK[b] ? a : b;
}

export function isField(value: FieldValue): value is Field {
  return value instanceof Field;
}

export function isTuple(value: FieldValue): value is readonly FieldValue[] {
  return Array.isArray(value);
}

export function isScalar(value: FieldValue): value is Scalar {
  return typeof value === 'number' || typeof value === 'boolean';
}

export class Field {
  readonly dims: readonly Dimension[];
  readonly data: FieldData;
  readonly dtype: DType;
  readonly sizes: readonly number[];
  readonly strides: readonly number[];
  readonly offset: number;
  readonly origin: readonly number[];
  readonly broadcastDims: readonly Dimension[];

  constructor(init: FieldInit) {
    const rank = init.dims.length;
    const origin = init.origin ?? new Array<number>(rank).fill(DEFAULT_ORIGIN);

    if (init.sizes.length !== rank) {
      throw new FieldShapeError(
        `Field has ${rank} dimension(s) (${dimNames(init.dims).join(', ')}) but data of rank ${init.sizes.length}`
      );
    }
    if (origin.length !== rank) {
      throw new FieldShapeError(`Field of rank ${rank} needs ${rank} origin value(s), got ${origin.length}`);
    }
    const names = new Set(dimNames(init.dims));
    if (names.size !== rank) {
      throw new FieldShapeError(`Duplicate dimensions in (${dimNames(init.dims).join(', ')})`);
    }
    const broadcastDims = init.broadcastDims ?? init.dims;
    if (!isSubset(init.dims, broadcastDims)) {
      throw new FieldShapeError(
        `Broadcast dimensions (${dimNames(broadcastDims).join(', ')}) must include (${dimNames(init.dims).join(', ')})`
      );
    }
    if (!matchesDType(init.data, init.dtype)) {
      throw new FieldTypeError(`Storage does not hold ${init.dtype} elements`);
    }
    if (init.strides === undefined && init.data.length !== product(init.sizes)) {
      throw new FieldShapeError(
        `Data holds ${init.data.length} element(s), shape (${init.sizes.join(', ')}) needs ${product(init.sizes)}`
      );
    }

    this.dims = Object.freeze([...init.dims]);
    this.data = init.data;
    this.dtype = init.dtype;
    this.sizes = Object.freeze([...init.sizes]);
    this.strides = Object.freeze([...(init.strides ?? rowMajorStrides(init.sizes))]);
    this.offset = init.offset ?? 0;
    this.origin = Object.freeze([...origin]);
    this.broadcastDims = Object.freeze([...broadcastDims]);
  }

  get rank(): number {
    return this.dims.length;
  }

  /** Number of elements. */
  get size(): number {
    return product(this.sizes);
  }

  range(axis: number): AxisRange {
    const start = this.origin[axis] + FIRST_INDEX;
    return { start, stop: start + this.sizes[axis] - 1 };
  }

  shape(): FieldShape {
    return {
      dims: this.dims,
      ranges: this.dims.map((_, axis) => this.range(axis)),
      broadcastDims: this.broadcastDims,
    };
  }

  axisOf(dim: Dimension): number {
    return dimensionIndex(this.dims, dim);
  }

  get(indices: readonly number[]): Scalar {
    return this.read(this.storageOffset(indices));
  }

  set(indices: readonly number[], value: Scalar): void {
    this.write(this.storageOffset(indices), value);
  }

  // Element at a local (0-based, origin-free) index; used for positional copies
  getLocal(local: readonly number[]): Scalar {
    let pos = this.offset;
    for (let i = 0; i < local.length; i++) pos += local[i] * this.strides[i];
    return this.read(pos);
  }

  /**
   * Restrict the field. A numeric selector picks one external index and
   * drops the axis; a range keeps the axis with its external indices
   * unchanged. The result shares storage with this field.
   */
  slice(selectors: readonly AxisSelector[]): Field {
    if (selectors.length !== this.rank) {
      throw new FieldShapeError(`Expected ${this.rank} selector(s), got ${selectors.length}`);
    }
    const dims: Dimension[] = [];
    const sizes: number[] = [];
    const strides: number[] = [];
    const origin: number[] = [];
    let offset = this.offset;

    selectors.forEach((selector, axis) => {
      if (typeof selector === 'number') {
        offset += this.localIndex(axis, selector) * this.strides[axis];
        return;
      }
      if (selector.stop < selector.start) {
        throw new FieldIndexError(
          `Empty range ${selector.start}..${selector.stop} for dimension ${this.dims[axis].name}`
        );
      }
      const first = this.localIndex(axis, selector.start);
      this.localIndex(axis, selector.stop);
      offset += first * this.strides[axis];
      dims.push(this.dims[axis]);
      sizes.push(selector.stop - selector.start + 1);
      strides.push(this.strides[axis]);
      origin.push(selector.start - FIRST_INDEX);
    });

    return new Field({
      dims,
      data: this.data,
      dtype: this.dtype,
      sizes,
      strides,
      offset,
      origin,
      broadcastDims: this.broadcastDims,
    });
  }

  broadcastTo(broadcastDims: readonly Dimension[]): Field {
    if (!isSubset(this.dims, broadcastDims)) {
      throw new FieldShapeError(
        `Cannot broadcast (${dimNames(this.dims).join(', ')}) to (${dimNames(broadcastDims).join(', ')})`
      );
    }
    return this.relayout({ broadcastDims });
  }

  /** Same storage, with the origin of `dim` replaced. */
  withOrigin(dim: Dimension, value: number): Field {
    const axis = this.axisOf(dim);
    if (axis === -1) {
      throw new FieldShapeError(`Field over (${dimNames(this.dims).join(', ')}) has no dimension ${dim.name}`);
    }
    const origin = [...this.origin];
    origin[axis] = value;
    return this.relayout({ origin });
  }

  astype(dtype: DType): Field {
    const data = allocate(dtype, this.size);
    const out = new Field({
      dims: this.dims,
      data,
      dtype,
      sizes: this.sizes,
      origin: this.origin,
      broadcastDims: this.broadcastDims,
    });
    let pos = 0;
    forEachIndex(this.sizes, (local) => {
      out.write(pos++, this.getLocal(local));
    });
    return out;
  }

  /** Contiguous copy that owns its storage. */
  copy(): Field {
    return this.astype(this.dtype);
  }

  toArray(): NestedValues {
    const build = (axis: number, local: number[]): NestedValues => {
      if (axis === this.rank) return this.getLocal(local);
      const items: NestedValues[] = [];
      for (let i = 0; i < this.sizes[axis]; i++) {
        items.push(build(axis + 1, [...local, i]));
      }
      return items;
    };
    return build(0, []);
  }

  toString(): string {
    const ranges = this.shape()
      .ranges.map((r) => `${r.start}:${r.stop}`)
      .join('×');
    return `${this.dtype} Field with dimensions (${dimNames(this.broadcastDims).join(', ')}) with indices ${ranges}`;
  }

  /** Overwrite every element, visiting local indices in row-major order. */
  fill(values: (local: readonly number[]) => Scalar): void {
    forEachIndex(this.sizes, (local) => {
      let pos = this.offset;
      for (let i = 0; i < local.length; i++) pos += local[i] * this.strides[i];
      this.write(pos, values(local));
    });
  }

  // The one place where external indices become storage positions.
  private storageOffset(indices: readonly number[]): number {
    if (indices.length !== this.rank) {
      throw new FieldShapeError(`Field of rank ${this.rank} indexed with ${indices.length} index(es)`);
    }
    let pos = this.offset;
    for (let axis = 0; axis < indices.length; axis++) {
      pos += this.localIndex(axis, indices[axis]) * this.strides[axis];
    }
    return pos;
  }

  private localIndex(axis: number, index: number): number {
    const local = index - this.origin[axis] - FIRST_INDEX;
    if (!Number.isInteger(index) || local < 0 || local >= this.sizes[axis]) {
      const { start, stop } = this.range(axis);
      throw new FieldIndexError(
        `Index ${index} is out of range ${start}..${stop} for dimension ${this.dims[axis].name}`
      );
    }
    return local;
  }

  private read(pos: number): Scalar {
    const raw = this.data[pos];
    return this.dtype === 'bool' ? raw !== 0 : raw;
  }

  private write(pos: number, value: Scalar): void {
    if (this.dtype === 'bool') {
      this.data[pos] = value ? 1 : 0;
    } else {
      this.data[pos] = Number(value);
    }
  }

  private relayout(changes: { origin?: readonly number[]; broadcastDims?: readonly Dimension[] }): Field {
    return new Field({
      dims: this.dims,
      data: this.data,
      dtype: this.dtype,
      sizes: this.sizes,
      strides: this.strides,
      offset: this.offset,
      origin: changes.origin ?? this.origin,
      broadcastDims: changes.broadcastDims ?? this.broadcastDims,
    });
  }
}

// ─── Factories ────────────────────────────────────────────────────────────────

function resolveOrigin(dims: readonly Dimension[], origin: FieldOptions['origin']): number[] {
  const out = new Array<number>(dims.length).fill(DEFAULT_ORIGIN);
  if (!origin) return out;
  for (const [name, value] of Object.entries(origin)) {
    const axis = dims.findIndex((d) => d.name === name);
    if (axis === -1) {
      throw new FieldShapeError(`Origin given for ${name}, which is not one of (${dimNames(dims).join(', ')})`);
    }
    out[axis] = value;
  }
  return out;
}

function toDims(dims: Dimension | readonly Dimension[]): readonly Dimension[] {
  return dims instanceof Dimension ? [dims] : dims;
}

function flatten(values: NestedValues, rank: number): { sizes: number[]; flat: Scalar[] } {
  const sizes = new Array<number>(rank).fill(-1);
  const flat: Scalar[] = [];

  const walk = (value: NestedValues, depth: number): void => {
    if (depth === rank) {
      if (typeof value !== 'number' && typeof value !== 'boolean') {
        throw new FieldShapeError(`Values are nested deeper than rank ${rank}`);
      }
      flat.push(value);
      return;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      throw new FieldShapeError(`Values are nested ${depth} level(s) deep, rank ${rank} expected`);
    }
    if (sizes[depth] === -1) {
      sizes[depth] = value.length;
    } else if (sizes[depth] !== value.length) {
      throw new FieldShapeError(`Ragged values at depth ${depth}: ${value.length} vs ${sizes[depth]}`);
    }
    for (const item of value) walk(item, depth + 1);
  };

  walk(values, 0);
  return { sizes: sizes.map((n) => Math.max(n, 0)), flat };
}

/**
 * Build a field from nested row-major values, one nesting level per
 * dimension.
 *
 *   field([Cell, K], [[1, 2], [3, 4], [5, 6]], { origin: { K: 1 } })
 */
export function field(dims: Dimension | readonly Dimension[], values: NestedValues, options: FieldOptions = {}): Field {
  const fieldDims = toDims(dims);
  const { sizes, flat } = flatten(values, fieldDims.length);
  const dtype = options.dtype ?? (flat.some((v) => typeof v === 'boolean') ? 'bool' : 'float64');
  const out = new Field({
    dims: fieldDims,
    data: allocate(dtype, flat.length),
    dtype,
    sizes,
    origin: resolveOrigin(fieldDims, options.origin),
    broadcastDims: options.broadcastDims,
  });
  let i = 0;
  out.fill(() => flat[i++]);
  return out;
}

export function full(
  dims: Dimension | readonly Dimension[],
  sizes: readonly number[],
  value: Scalar,
  options: FieldOptions = {}
): Field {
  const fieldDims = toDims(dims);
  const dtype = options.dtype ?? (typeof value === 'boolean' ? 'bool' : 'float64');
  const out = new Field({
    dims: fieldDims,
    data: allocate(dtype, product(sizes)),
    dtype,
    sizes,
    origin: resolveOrigin(fieldDims, options.origin),
    broadcastDims: options.broadcastDims,
  });
  if (value !== 0 && value !== false) out.fill(() => value);
  return out;
}

export function zeros(dims: Dimension | readonly Dimension[], sizes: readonly number[], options: FieldOptions = {}): Field {
  return full(dims, sizes, 0, options);
}

/** Rank-0 field holding one value, optionally tagged for broadcasting. */
export function scalarField(value: Scalar, broadcastDims: readonly Dimension[] = []): Field {
  const dtype = dtypeOf(value);
  const out = new Field({ dims: [], data: allocate(dtype, 1), dtype, sizes: [], broadcastDims });
  out.set([], value);
  return out;
}

export function asField(value: Field | Scalar): Field {
  return value instanceof Field ? value : scalarField(value);
}

/**
 * Build a contiguous field over the given external ranges, computing each
 * element from its external index.
 */
export function generate(
  layout: { dims: readonly Dimension[]; ranges: readonly AxisRange[]; dtype: DType; broadcastDims?: readonly Dimension[] },
  compute: (indices: readonly number[]) => Scalar
): Field {
  const sizes = layout.ranges.map((r) => Math.max(r.stop - r.start + 1, 0));
  const out = new Field({
    dims: layout.dims,
    data: allocate(layout.dtype, product(sizes)),
    dtype: layout.dtype,
    sizes,
    origin: layout.ranges.map((r) => r.start - FIRST_INDEX),
    broadcastDims: layout.broadcastDims,
  });
  const indices = new Array<number>(sizes.length);
  out.fill((local) => {
    for (let i = 0; i < local.length; i++) indices[i] = local[i] + layout.ranges[i].start;
    return compute(indices);
  });
  return out;
}

// ─── Copy into output ─────────────────────────────────────────────────────────

type CopyPlan = Array<{ target: Field; source: Field | Scalar }>;

function planCopy(target: FieldValue, source: FieldValue, path: string, plan: CopyPlan): void {
  if (isTuple(target)) {
    if (!isTuple(source) || source.length !== target.length) {
      const got = isTuple(source) ? `a tuple of ${source.length}` : 'a single value';
      throw new FieldShapeError(`Output${path} is a tuple of ${target.length}, result is ${got}`);
    }
    target.forEach((t, i) => planCopy(t, source[i], `${path}[${i}]`, plan));
    return;
  }
  if (!isField(target)) {
    throw new FieldTypeError(`Output${path} must be a Field or a tuple of Fields`);
  }
  if (isTuple(source)) {
    throw new FieldShapeError(`Output${path} is a Field, result is a tuple of ${source.length}`);
  }
  if (isScalar(source) || source.rank === 0) {
    plan.push({ target, source });
    return;
  }
  const sameDims =
    source.rank === target.rank && source.dims.every((d, i) => d.equals(target.dims[i]));
  const sameSizes = source.sizes.every((n, i) => n === target.sizes[i]);
  if (!sameDims || !sameSizes) {
    throw new FieldShapeError(
      `Output${path} has shape (${describeShape(target)}), result has (${describeShape(source)})`
    );
  }
  plan.push({ target, source });
}

function describeShape(f: Field): string {
  return f.dims.map((d, i) => `${d.name}: ${f.sizes[i]}`).join(', ');
}

/**
 * Copy `source` element-wise into `target`. Scalars and rank-0 fields fill
 * the target. Every component is checked before anything is written.
 */
export function copyInto(target: FieldValue, source: FieldValue): void {
  const plan: CopyPlan = [];
  planCopy(target, source, '', plan);
  // A source sharing storage with any target is read before the first write.
  const detached = plan.map(({ target: t, source: s }) => ({
    target: t,
    source: isField(s) && plan.some((p) => p.target.data.buffer === s.data.buffer) ? s.copy() : s,
  }));
  for (const { target: t, source: s } of detached) {
    if (isScalar(s)) {
      t.fill(() => s);
    } else if (s.rank === 0) {
      const value = s.get([]);
      t.fill(() => value);
    } else {
      t.fill((local) => s.getLocal(local));
    }
  }
}
