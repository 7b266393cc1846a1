export * from './types.js';
export * from './errors.js';
export * from './constants.js';
export * from './dimension.js';
export * from './field.js';
export * from './connectivity.js';
export * from './builtins.js';
export { ops } from './builder.js';
export * from './environment.js';
export { extractClosureVars, freeNames } from './closure.js';
export { evaluate } from './evaluator.js';
export { activeOffsetProvider, hasActiveContext, withOffsetProvider } from './context.js';
export * from './backend.js';
export * from './operator.js';
export { compileOperator, describeCapture, describeCaptures } from './compiler.js';
export { STAGED_BACKEND, createStagedExecutor } from './staged.js';
export { DEFINITION_BACKENDS, MESH_DIMS, MESH_OFFSETS, environmentOf, meshOffsetProvider } from './_shared.js';
