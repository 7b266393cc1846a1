// Values an operator body can capture by name

import type { FieldOffset, OffsetProvider } from './connectivity.js';
import type { Dimension } from './dimension.js';
import type { FieldValue } from './field.js';

export interface InvokeOptions {
  /** Output target; required at the outermost call, forbidden when nested. */
  out?: FieldValue;
  /** Connectivities for this call; only accepted at the outermost call. */
  offsetProvider?: OffsetProvider;
  backend?: string;
  /** Arguments by parameter name, after the positional ones. */
  kwargs?: Readonly<Record<string, FieldValue>>;
}

/**
 * Anything callable from an operator body. FieldOperator is the one
 * implementation; the evaluator only depends on this shape.
 */
export abstract class OperatorValue {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract invoke(args: readonly FieldValue[], options?: InvokeOptions): FieldValue;
}

export type EnvValue = FieldValue | Dimension | FieldOffset | OperatorValue;

export type Environment = Readonly<Record<string, EnvValue>>;
