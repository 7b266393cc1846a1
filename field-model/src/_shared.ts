// Shared dimensions and helpers for operator definitions

import type { ExternalExecutor } from './backend.js';
import { Connectivity, FieldOffset, type OffsetProvider } from './connectivity.js';
import { Dimension } from './dimension.js';
import type { Environment, EnvValue, OperatorValue } from './environment.js';
import { STAGED_BACKEND, createStagedExecutor } from './staged.js';

type Named = Dimension | FieldOffset | OperatorValue;

/**
 * Standard dimensions of an edge/cell mesh with vertical levels
 */
export const MESH_DIMS = {
  Cell: new Dimension('Cell'),
  Edge: new Dimension('Edge'),
  K: new Dimension('K', 'vertical'),
  E2CDim: new Dimension('E2CDim', 'local'),
  C2EDim: new Dimension('C2EDim', 'local'),
} as const;

export const MESH_OFFSETS = {
  E2C: new FieldOffset('E2C', { source: MESH_DIMS.Cell, target: [MESH_DIMS.Edge, MESH_DIMS.E2CDim] }),
  C2E: new FieldOffset('C2E', { source: MESH_DIMS.Edge, target: [MESH_DIMS.Cell, MESH_DIMS.C2EDim] }),
  Koff: new FieldOffset('Koff', { source: MESH_DIMS.K, target: MESH_DIMS.K }),
} as const;

// Backends every example operator can run on besides `embedded`
export const DEFINITION_BACKENDS: Readonly<Record<string, ExternalExecutor>> = {
  [STAGED_BACKEND]: createStagedExecutor(),
};

/**
 * Build an operator environment from named values, keyed by their names.
 * Extra entries (constants, aliases) are merged last.
 */
export function environmentOf(values: readonly Named[], extra: Environment = {}): Environment {
  const env: Record<string, EnvValue> = {};
  for (const value of values) {
    env[value.name] = value;
  }
  return { ...env, ...extra };
}

/**
 * Offset provider for a mesh given as edge->cell and cell->edge tables
 * (1-based, 0 for a missing neighbour).
 */
export function meshOffsetProvider(tables: {
  e2c: readonly (readonly number[])[];
  c2e: readonly (readonly number[])[];
}): OffsetProvider {
  const { Cell, Edge, K } = MESH_DIMS;
  return {
    E2C: new Connectivity(tables.e2c, Cell, Edge, tables.e2c[0]?.length ?? 1),
    C2E: new Connectivity(tables.c2e, Edge, Cell, tables.c2e[0]?.length ?? 1),
    Koff: K,
  };
}
