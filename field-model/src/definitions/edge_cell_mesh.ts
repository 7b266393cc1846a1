// Example: Operators on a small edge/cell mesh (gathers, reductions, nesting)

import { DEFINITION_BACKENDS, MESH_DIMS, MESH_OFFSETS, environmentOf } from '../_shared.js';
import { ops } from '../builder.js';
import { fieldOperator } from '../operator.js';

const { Cell, Edge, E2CDim, C2EDim } = MESH_DIMS;
const { E2C, C2E } = MESH_OFFSETS;

// 6 cells, 12 edges. Boundary edges (1..6) have a single adjacent cell.
export const MESH = {
  e2c: [
    [1, 0],
    [3, 0],
    [3, 0],
    [4, 0],
    [5, 0],
    [6, 0],
    [1, 6],
    [1, 2],
    [2, 3],
    [2, 4],
    [4, 5],
    [5, 6],
  ],
  c2e: [
    [1, 7, 8],
    [8, 9, 10],
    [2, 3, 9],
    [4, 10, 11],
    [5, 11, 12],
    [6, 7, 12],
  ],
} as const;

const v = ops.ref('v');

// Difference between the two cells of an edge; 0 stands in for a missing cell
export const edgeDifference = fieldOperator({
  name: 'edge_difference',
  params: [{ name: 'v', dims: ['Cell'] }],
  body: ops.sub(ops.shift(v, 'E2C', 1), ops.shift(v, 'E2C', 2)),
  env: environmentOf([Cell, E2C]),
  backends: DEFINITION_BACKENDS,
});

export const edgeAverage = fieldOperator({
  name: 'edge_average',
  params: [{ name: 'v', dims: ['Cell'] }],
  body: ops.mul(ops.neighborSum(ops.shift(v, 'E2C'), 'E2CDim'), ops.ref('half')),
  env: environmentOf([Cell, E2C, E2CDim], { half: 0.5 }),
  backends: DEFINITION_BACKENDS,
});

export const cellCirculation = fieldOperator({
  name: 'cell_circulation',
  params: [{ name: 'e', dims: ['Edge'] }],
  body: ops.neighborSum(ops.shift(ops.ref('e'), 'C2E'), 'C2EDim'),
  env: environmentOf([Edge, C2E, C2EDim]),
  backends: DEFINITION_BACKENDS,
});

// Nested calls: both callees run inside this operator's context
export const cellLaplacian = fieldOperator({
  name: 'cell_laplacian',
  params: [{ name: 'v', dims: ['Cell'] }],
  body: ops.call('cell_circulation', ops.call('edge_difference', v)),
  env: environmentOf([Cell, edgeDifference, cellCirculation]),
  backends: DEFINITION_BACKENDS,
});

export const clampedDifference = fieldOperator({
  name: 'clamped_difference',
  params: ['v', 'limit'],
  body: (() => {
    const d = ops.ref('d');
    const limit = ops.ref('limit');
    return ops.let(
      'd',
      ops.call('edge_difference', v),
      ops.where(ops.gt(d, limit), limit, ops.where(ops.lt(d, ops.neg(limit)), ops.neg(limit), d))
    );
  })(),
  env: environmentOf([edgeDifference]),
  backends: DEFINITION_BACKENDS,
});

export const edgeExtrema = fieldOperator({
  name: 'edge_extrema',
  params: ['v'],
  body: (() => {
    const neighbors = ops.shift(v, 'E2C');
    return ops.tuple(ops.maxOver(neighbors, 'E2CDim'), ops.minOver(neighbors, 'E2CDim'));
  })(),
  env: environmentOf([E2C, E2CDim]),
  backends: DEFINITION_BACKENDS,
});
