// Connectivities, field offsets and the neighbour transform

import { DEFAULT_AXIS_SHIFT, NEIGHBOR_SENTINEL } from './constants.js';
import { Dimension, dimNames } from './dimension.js';
import { ConnectivityError, FieldIndexError, FieldShapeError, OffsetProviderError } from './errors.js';
import { type AxisRange, type Field, generate } from './field.js';
import type { Scalar } from './types.js';

export type ConnectivityTable = readonly (readonly number[])[];

/**
 * Neighbour table from a mesh element to elements of another dimension.
 *
 * One row per element of `target` (the dimension the gathered field lives
 * on), one column per neighbour slot. Entries are 1-based indices along
 * `source`, or NEIGHBOR_SENTINEL where the element has fewer neighbours.
 *
 *   // edge -> its two adjacent cells
 *   new Connectivity([[1, 0], [1, 2]], Cell, Edge, 2)
 */
export class Connectivity {
  readonly table: Int32Array;
  readonly rows: number;
  readonly source: Dimension;
  readonly target: Dimension;
  readonly maxNeighbors: number;

  constructor(table: ConnectivityTable, source: Dimension, target: Dimension, maxNeighbors: number) {
    if (!Number.isInteger(maxNeighbors) || maxNeighbors < 1) {
      throw new ConnectivityError(`maxNeighbors must be a positive integer, got ${maxNeighbors}`);
    }
    const data = new Int32Array(table.length * maxNeighbors);
    table.forEach((row, r) => {
      if (row.length !== maxNeighbors) {
        throw new ConnectivityError(`Connectivity row ${r + 1} has ${row.length} entries, expected ${maxNeighbors}`);
      }
      row.forEach((entry, c) => {
        if (!Number.isInteger(entry)) {
          throw new ConnectivityError(`Connectivity entry at row ${r + 1}, slot ${c + 1} is not an integer: ${entry}`);
        }
        data[r * maxNeighbors + c] = entry;
      });
    });

    this.table = data;
    this.rows = table.length;
    this.source = source;
    this.target = target;
    this.maxNeighbors = maxNeighbors;
  }

  /** Table entry for a 1-based row and slot. */
  neighbor(row: number, slot: number): number {
    return this.table[(row - 1) * this.maxNeighbors + (slot - 1)];
  }
}

export interface OffsetSelection {
  readonly offset: FieldOffset;
  readonly slot: number;
}

/**
 * Named request to shift or gather a field. The name is looked up in the
 * offset provider of the running operator call.
 *
 *   const E2C = new FieldOffset('E2C', { source: Cell, target: [Edge, E2CDim] });
 *   const Koff = new FieldOffset('Koff', { source: K, target: K });
 */
export class FieldOffset {
  readonly name: string;
  readonly source: Dimension;
  readonly target: readonly Dimension[];

  constructor(name: string, dims: { source: Dimension; target: Dimension | readonly Dimension[] }) {
    const target = dims.target instanceof Dimension ? [dims.target] : [...dims.target];
    if (target.length === 0) {
      throw new ConnectivityError(`Offset ${name} needs at least one target dimension`);
    }
    if (target.slice(1).some((d) => d.kind !== 'local')) {
      throw new ConnectivityError(
        `All but the first target dimension of offset ${name} must be local, got (${dimNames(target).join(', ')})`
      );
    }
    this.name = name;
    this.source = dims.source;
    this.target = Object.freeze(target);
    Object.freeze(this);
  }

  /** Select one 1-based neighbour slot (or axis shift distance). */
  at(slot: number): OffsetSelection {
    return { offset: this, slot };
  }
}

export type OffsetProviderEntry = Connectivity | Dimension;

export type OffsetProvider = Readonly<Record<string, OffsetProviderEntry>>;

export function checkProviderEntry(name: string, entry: unknown): OffsetProviderEntry {
  if (entry instanceof Connectivity || entry instanceof Dimension) return entry;
  const kind = entry === null ? 'null' : typeof entry;
  throw new OffsetProviderError(`Offset provider entry ${name} of type ${kind} is neither a Connectivity nor a Dimension`);
}

export function resolveOffset(provider: OffsetProvider, name: string): OffsetProviderEntry {
  if (!Object.prototype.hasOwnProperty.call(provider, name)) {
    throw new OffsetProviderError(`No connectivity or dimension registered for offset ${name}`);
  }
  return checkProviderEntry(name, provider[name]);
}

/**
 * Apply an offset to a field.
 *
 * A Dimension entry moves the field along a regular axis by adding the slot
 * (default 1) to that axis's origin. A Connectivity entry gathers neighbour
 * values into a new field whose source axis is replaced by the offset's
 * target dimension, followed by the neighbour dimension when no slot is
 * selected. Sentinel entries produce 0 (false for bool fields).
 */
export function shift(field: Field, request: FieldOffset | OffsetSelection, provider: OffsetProvider): Field {
  const offset = request instanceof FieldOffset ? request : request.offset;
  const slot = request instanceof FieldOffset ? undefined : request.slot;
  const entry = resolveOffset(provider, offset.name);

  if (entry instanceof Dimension) {
    const axis = field.axisOf(entry);
    if (axis === -1) return field;
    return field.withOrigin(entry, field.origin[axis] + (slot ?? DEFAULT_AXIS_SHIFT));
  }
  return gather(field, offset, slot, entry);
}

function gather(field: Field, offset: FieldOffset, slot: number | undefined, conn: Connectivity): Field {
  if (!conn.source.equals(offset.source) || !conn.target.equals(offset.target[0])) {
    throw new ConnectivityError(
      `Offset ${offset.name} maps ${offset.source.name} -> ${offset.target[0].name}, ` +
        `but its connectivity maps ${conn.source.name} -> ${conn.target.name}`
    );
  }
  const axis = field.axisOf(offset.source);
  if (axis === -1) {
    throw new FieldShapeError(
      `Offset ${offset.name} needs a field over ${offset.source.name}, got (${dimNames(field.dims).join(', ')})`
    );
  }

  let slots: number[];
  let newDims: Dimension[];
  if (slot !== undefined) {
    if (!Number.isInteger(slot) || slot < 1 || slot > conn.maxNeighbors) {
      throw new FieldIndexError(`Slot ${slot} of offset ${offset.name} is out of range 1..${conn.maxNeighbors}`);
    }
    slots = [slot];
    newDims = [offset.target[0]];
  } else if (offset.target.length > 1) {
    slots = Array.from({ length: conn.maxNeighbors }, (_, i) => i + 1);
    newDims = [offset.target[0], offset.target[1]];
  } else if (conn.maxNeighbors === 1) {
    slots = [1];
    newDims = [offset.target[0]];
  } else {
    throw new FieldShapeError(
      `Offset ${offset.name} has no neighbour dimension for ${conn.maxNeighbors} slots; select one with ${offset.name}.at(n)`
    );
  }

  // Every used entry is checked before the result is allocated.
  const valid = field.range(axis);
  for (let row = 1; row <= conn.rows; row++) {
    for (const s of slots) {
      const index = conn.neighbor(row, s);
      if (index === NEIGHBOR_SENTINEL) continue;
      if (index < 0) {
        throw new ConnectivityError(`Illegal index ${index} in connectivity ${offset.name} at row ${row}, slot ${s}`);
      }
      if (index < valid.start || index > valid.stop) {
        throw new FieldIndexError(
          `Index ${index} of connectivity ${offset.name} (row ${row}, slot ${s}) is out of range ` +
            `${valid.start}..${valid.stop} for dimension ${offset.source.name}`
        );
      }
    }
  }

  const dims = [...field.dims.slice(0, axis), ...newDims, ...field.dims.slice(axis + 1)];
  const newRanges: AxisRange[] = [{ start: 1, stop: conn.rows }];
  if (newDims.length === 2) newRanges.push({ start: 1, stop: slots.length });
  const { ranges: fieldRanges } = field.shape();
  const ranges = [...fieldRanges.slice(0, axis), ...newRanges, ...fieldRanges.slice(axis + 1)];
  const identity: Scalar = field.dtype === 'bool' ? false : 0;
  const source = new Array<number>(field.rank);

  return generate({ dims, ranges, dtype: field.dtype }, (indices) => {
    const row = indices[axis];
    const s = newDims.length === 2 ? slots[indices[axis + 1] - 1] : slots[0];
    const index = conn.neighbor(row, s);
    if (index === NEIGHBOR_SENTINEL) return identity;
    for (let i = 0; i < axis; i++) source[i] = indices[i];
    source[axis] = index;
    for (let i = axis + 1; i < field.rank; i++) source[i] = indices[i + newDims.length - 1];
    return field.get(source);
  });
}
