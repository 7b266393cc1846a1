import type { DimensionKind } from './types.js';

/**
 * A named logical axis. Dimensions are compared by value: two instances with
 * the same name and kind are the same axis.
 *
 * Local dimensions denote a neighbour slot (e.g. the two cells of an edge)
 * rather than a mesh axis.
 */
export class Dimension {
  readonly name: string;
  readonly kind: DimensionKind;

  constructor(name: string, kind: DimensionKind = 'horizontal') {
    this.name = name;
    this.kind = kind;
    Object.freeze(this);
  }

  equals(other: Dimension): boolean {
    return this.name === other.name && this.kind === other.kind;
  }

  toString(): string {
    return this.name;
  }
}

// Position of the first dimension equal to `dim`, or -1
export function dimensionIndex(dims: readonly Dimension[], dim: Dimension): number {
  return dims.findIndex((d) => d.equals(dim));
}

export function isSubset(dims: readonly Dimension[], of: readonly Dimension[]): boolean {
  return dims.every((d) => dimensionIndex(of, d) !== -1);
}

// Ordered union: every dimension of `a`, then those of `b` not already present
export function unionDims(a: readonly Dimension[], b: readonly Dimension[]): Dimension[] {
  const out = [...a];
  for (const d of b) {
    if (dimensionIndex(out, d) === -1) out.push(d);
  }
  return out;
}

export function dimNames(dims: readonly Dimension[]): string[] {
  return dims.map((d) => d.name);
}
