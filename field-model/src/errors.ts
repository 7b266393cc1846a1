// Error classes thrown by the field model. Every failure is synchronous and
// propagates to the caller of the current operation.

/** Rank, dimension or extent mismatch between fields, outputs or selectors. */
export class FieldShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldShapeError';
  }
}

/** An external index, gather index or neighbour slot outside its valid range. */
export class FieldIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldIndexError';
  }
}

/** A value of the wrong element type or kind, e.g. a non-boolean mask. */
export class FieldTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldTypeError';
  }
}

export class ConnectivityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectivityError';
  }
}

/**
 * Misuse of the offset-provider context: opening a second context, passing
 * `out` or `offsetProvider` to a nested call, omitting `out` at the outermost
 * call, or an unusable provider entry.
 */
export class OffsetProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OffsetProviderError';
  }
}

export class TupleShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TupleShapeError';
  }
}

/** Unbound names, names bound to the wrong kind of value, bad arguments. */
export class ClosureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClosureError';
  }
}

export class BackendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackendError';
  }
}
