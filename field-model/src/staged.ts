// Reference external executor: runs the lowered IR of an operator instead of
// walking its expression tree. Used to check that the IR keeps embedded
// semantics, and as a template for real code-generating backends.

import type { ExecutionRequest, ExternalExecutor } from './backend.js';
import { MATH_PRIMITIVES, applyBinary, applyMath, applyUnary, broadcast, where } from './builtins.js';
import { compileOperator } from './compiler.js';
import type { OffsetProvider } from './connectivity.js';
import { FieldOffset } from './connectivity.js';
import { Dimension } from './dimension.js';
import { type EnvValue, OperatorValue } from './environment.js';
import { BackendError, ClosureError } from './errors.js';
import { applyReduction, applyShift, tupleItem } from './evaluator.js';
import { type FieldValue, copyInto } from './field.js';
import { FieldOperator } from './operator.js';
import type { Operation, OperatorIR } from './types.js';

export const STAGED_BACKEND = 'staged';

interface Program {
  ir: OperatorIR;
  closure: ReadonlyMap<string, EnvValue>;
  args: readonly FieldValue[];
  provider: OffsetProvider;
}

function captured(program: Program, name: string | undefined): EnvValue {
  const value = name === undefined ? undefined : program.closure.get(name);
  if (value === undefined) {
    throw new BackendError(`${program.ir.name}: captured name ${name} was not staged`);
  }
  return value;
}

function capturedField(program: Program, name: string | undefined): FieldValue {
  const value = captured(program, name);
  if (value instanceof Dimension || value instanceof FieldOffset || value instanceof OperatorValue) {
    throw new BackendError(`${program.ir.name}: ${name} is not a field value`);
  }
  return value;
}

function capturedDimension(program: Program, name: string | undefined): Dimension {
  const value = captured(program, name);
  if (!(value instanceof Dimension)) throw new BackendError(`${program.ir.name}: ${name} is not a dimension`);
  return value;
}

function step(program: Program, op: Operation, read: (name: string) => FieldValue): FieldValue {
  const args = op.args.map(read);
  switch (op.op) {
    case 'param': {
      const position = program.ir.params.findIndex((p) => p.name === op.name);
      if (position === -1) throw new BackendError(`${program.ir.name}: unknown parameter ${op.name}`);
      return program.args[position];
    }
    case 'capture':
      return capturedField(program, op.name);
    case 'const':
      if (op.value === undefined) throw new BackendError(`${op.target}: const without value`);
      return op.value;
    case 'add':
    case 'sub':
    case 'mul':
    case 'div':
    case 'pow':
    case 'lt':
    case 'le':
    case 'gt':
    case 'ge':
    case 'eq':
    case 'ne':
    case 'and':
    case 'or':
      return applyBinary(op.op, args[0], args[1]);
    case 'neg':
    case 'not':
      return applyUnary(op.op, args[0]);
    case 'call': {
      const name = op.name ?? '';
      if (MATH_PRIMITIVES.has(name)) return applyMath(name, args);
      const callee = captured(program, name);
      if (!(callee instanceof FieldOperator)) {
        throw new BackendError(`${program.ir.name}: ${name} is not an operator`);
      }
      if (args.length !== callee.params.length) {
        throw new ClosureError(`${callee.name} takes ${callee.params.length} argument(s), got ${args.length}`);
      }
      // Nested operators run inline against the same connectivities.
      return run({ ir: compileOperator(callee), closure: callee.closureVars, args, provider: program.provider });
    }
    case 'shift': {
      const offset = captured(program, op.offset);
      if (!(offset instanceof FieldOffset)) throw new BackendError(`${program.ir.name}: ${op.offset} is not an offset`);
      return applyShift(args[0], op.slot === undefined ? offset : offset.at(op.slot), program.provider);
    }
    case 'neighbor_sum':
    case 'max_over':
    case 'min_over':
      return applyReduction(op.op, args[0], capturedDimension(program, op.axis));
    case 'where':
      return where(args[0], args[1], args[2]);
    case 'broadcast':
      return broadcast(
        args[0],
        (op.dims ?? []).map((d) => capturedDimension(program, d))
      );
    case 'tuple':
      return args;
    case 'get':
      return tupleItem(args[0], op.index ?? -1);
  }
}

function run(program: Program): FieldValue {
  const vars = new Map<string, FieldValue>();
  const read = (name: string): FieldValue => {
    const value = vars.get(name);
    if (value === undefined) throw new BackendError(`${program.ir.name}: ${name} is used before it is defined`);
    return value;
  };
  for (const op of program.ir.operations) {
    vars.set(op.target, step(program, op, read));
  }
  return read(program.ir.result);
}

export function createStagedExecutor(): ExternalExecutor {
  return {
    execute(request: ExecutionRequest): FieldValue | undefined {
      const value = run({
        ir: request.ir,
        closure: request.operator.closureVars,
        args: request.args,
        provider: request.offsetProvider,
      });
      if (!request.outermost) return value;
      if (request.out === undefined) {
        throw new BackendError(`${request.ir.name}: outermost call without an out target`);
      }
      copyInto(request.out, value);
      return undefined;
    },
  };
}
