// Type definitions for the field operator DSL

export type DimensionKind = 'horizontal' | 'vertical' | 'local';

// Element types a Field can store
export type DType = 'float64' | 'int32' | 'bool';

export type Scalar = number | boolean;

// Operator families, grouped the way the evaluator dispatches them
export type ArithmeticOp = 'add' | 'sub' | 'mul' | 'div' | 'pow';
export type ComparisonOp = 'lt' | 'le' | 'gt' | 'ge' | 'eq' | 'ne';
export type LogicalOp = 'and' | 'or';
export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;
export type UnaryOp = 'neg' | 'not';
export type ReductionOp = 'neighbor_sum' | 'max_over' | 'min_over';

// Expression AST types.
// Every string-valued name (ref ids, callees, offsets, axes, dims) is resolved
// against parameters, let bindings or the operator's captured environment.
export type Expression =
  | { op: 'ref'; id: string }
  | { op: 'const'; value: Scalar }
  | { op: BinaryOp; left: Expression; right: Expression }
  | { op: UnaryOp; value: Expression }
  | { op: 'call'; fn: string; args: Expression[] }
  | { op: 'shift'; value: Expression; offset: string; slot?: number }
  | { op: ReductionOp; value: Expression; axis: string }
  | { op: 'where'; cond: Expression; trueVal: Expression; falseVal: Expression }
  | { op: 'broadcast'; value: Expression; dims: string[] }
  | { op: 'tuple'; values: Expression[] }
  | { op: 'get'; value: Expression; index: number }
  | { op: 'let'; name: string; value: Expression; body: Expression };

// Operator parameter, optionally annotated with the names of the dimensions
// its Field argument must carry.
export interface ParamSpec {
  name: string;
  dims?: string[];
}

// IR (Intermediate Representation) types for JSON output
export type OperationCode =
  | 'param'
  | 'capture'
  | 'const'
  | BinaryOp
  | UnaryOp
  | 'call'
  | 'shift'
  | ReductionOp
  | 'where'
  | 'broadcast'
  | 'tuple'
  | 'get';

export interface Operation {
  target: string; // Temporary variable name
  op: OperationCode;
  args: string[]; // Variable names of operands
  value?: Scalar; // For const op
  name?: string; // Parameter, captured name, math primitive or callee
  // Connectivity ops
  offset?: string;
  slot?: number;
  axis?: string;
  dims?: string[];
  // Tuple access
  index?: number;
}

export interface OperatorIR {
  name: string;
  params: ParamSpec[];
  captured: string[];
  operations: Operation[];
  result: string;
}

// JSON-safe description of a captured value, used when staging an operator
export type CaptureDescriptor =
  | { kind: 'dimension'; name: string; dimKind: DimensionKind }
  | { kind: 'offset'; name: string; source: string; target: string[] }
  | { kind: 'operator'; name: string; id: string }
  | { kind: 'scalar'; value: Scalar }
  | { kind: 'field'; dims: string[]; dtype: DType; sizes: number[] }
  | { kind: 'tuple'; items: CaptureDescriptor[] };
