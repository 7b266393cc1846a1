// Example: Vertical stencils along K, shifted with a Dimension offset

import { DEFINITION_BACKENDS, MESH_DIMS, MESH_OFFSETS, environmentOf } from '../_shared.js';
import { ops } from '../builder.js';
import { fieldOperator } from '../operator.js';

const { Cell, K } = MESH_DIMS;
const { Koff } = MESH_OFFSETS;

const a = ops.ref('a');

// a[k] - a[k-1], defined from the second level on
export const verticalDifference = fieldOperator({
  name: 'vertical_difference',
  params: [{ name: 'a', dims: ['Cell', 'K'] }],
  body: ops.sub(a, ops.shift(a, 'Koff')),
  env: environmentOf([Cell, K, Koff]),
  backends: DEFINITION_BACKENDS,
});

// Positive part of the level above minus the level below
export const upwindFlux = fieldOperator({
  name: 'upwind_flux',
  params: ['a', 'w'],
  body: ops.mul(ops.call('maximum', ops.ref('w'), 0), ops.call('vertical_difference', a)),
  env: environmentOf([verticalDifference]),
  backends: DEFINITION_BACKENDS,
});

export const levelMask = fieldOperator({
  name: 'level_mask',
  params: ['a', 'threshold'],
  body: ops.and(ops.ge(a, ops.ref('threshold')), ops.not(ops.eq(a, ops.ref('threshold')))),
  backends: DEFINITION_BACKENDS,
});
