// Execution strategies for operator bodies

import type { OffsetProvider } from './connectivity.js';
import { EMBEDDED_BACKEND } from './constants.js';
import { BackendError } from './errors.js';
import type { FieldValue } from './field.js';
import type { FieldOperator } from './operator.js';
import type { OperatorIR } from './types.js';

export interface ExecutionRequest {
  readonly operator: FieldOperator;
  /** Lowered body, compiled once per operator. */
  readonly ir: OperatorIR;
  /** Arguments in parameter order. */
  readonly args: readonly FieldValue[];
  /** Present exactly when `outermost` is true. */
  readonly out: FieldValue | undefined;
  readonly offsetProvider: OffsetProvider;
  readonly outermost: boolean;
}

/**
 * An out-of-process or code-generating executor. At the outermost call it
 * must populate `request.out`; when nested it returns the computed value.
 * Results must match the embedded backend exactly.
 */
export interface ExternalExecutor {
  execute(request: ExecutionRequest): FieldValue | undefined;
}

export type ExecutionStrategy =
  | { readonly kind: 'embedded' }
  | { readonly kind: 'external'; readonly id: string; readonly executor: ExternalExecutor };

const EMBEDDED: ExecutionStrategy = { kind: 'embedded' };

/**
 * Closed mapping from backend id to strategy, fixed when an operator is
 * defined. `embedded` is always present and cannot be replaced.
 */
export class BackendTable {
  private readonly strategies: ReadonlyMap<string, ExecutionStrategy>;

  constructor(external: Readonly<Record<string, ExternalExecutor>> = {}) {
    const strategies = new Map<string, ExecutionStrategy>([[EMBEDDED_BACKEND, EMBEDDED]]);
    for (const [id, executor] of Object.entries(external)) {
      if (id === EMBEDDED_BACKEND) {
        throw new BackendError(`Backend id ${EMBEDDED_BACKEND} is reserved`);
      }
      if (id.trim() === '') {
        throw new BackendError('Backend id must not be empty');
      }
      strategies.set(id, { kind: 'external', id, executor });
    }
    this.strategies = strategies;
  }

  resolve(id: string): ExecutionStrategy {
    const strategy = this.strategies.get(id);
    if (!strategy) {
      throw new BackendError(`Unknown backend ${id}; available: ${this.ids().join(', ')}`);
    }
    return strategy;
  }

  ids(): string[] {
    return Array.from(this.strategies.keys());
  }
}
