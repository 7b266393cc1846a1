// Closure extraction: which environment names an operator body depends on

import { MATH_PRIMITIVES } from './builtins.js';
import type { EnvValue, Environment } from './environment.js';
import { ClosureError } from './errors.js';
import type { Expression, ParamSpec } from './types.js';

function collectNames(expr: Expression, bound: ReadonlySet<string>, out: Set<string>): void {
  const use = (name: string): void => {
    if (!bound.has(name) && !MATH_PRIMITIVES.has(name)) out.add(name);
  };

  switch (expr.op) {
    case 'ref':
      use(expr.id);
      return;
    case 'const':
      return;
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
      collectNames(expr.left, bound, out);
      collectNames(expr.right, bound, out);
      return;
    case 'neg':
    case 'not':
    case 'get':
      collectNames(expr.value, bound, out);
      return;
    case 'call':
      use(expr.fn);
      expr.args.forEach((arg) => collectNames(arg, bound, out));
      return;
    case 'shift':
      use(expr.offset);
      collectNames(expr.value, bound, out);
      return;
    case 'neighbor_sum':
    case 'max_over':
    case 'min_over':
      use(expr.axis);
      collectNames(expr.value, bound, out);
      return;
    case 'where':
      collectNames(expr.cond, bound, out);
      collectNames(expr.trueVal, bound, out);
      collectNames(expr.falseVal, bound, out);
      return;
    case 'broadcast':
      expr.dims.forEach(use);
      collectNames(expr.value, bound, out);
      return;
    case 'tuple':
      expr.values.forEach((v) => collectNames(v, bound, out));
      return;
    case 'let':
      collectNames(expr.value, bound, out);
      collectNames(expr.body, new Set([...bound, expr.name]), out);
      return;
    default: {
      const _exhaustive: never = expr;
      throw new Error(`Unknown expression type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Free names of an operator: everything the body references that is neither
 * a parameter, a let binding in scope nor a math primitive, plus the
 * dimensions named in parameter annotations. Sorted.
 */
export function freeNames(body: Expression, params: readonly ParamSpec[]): string[] {
  const names = new Set<string>();
  for (const param of params) {
    for (const dim of param.dims ?? []) names.add(dim);
  }
  collectNames(body, new Set(params.map((p) => p.name)), names);
  return Array.from(names).sort();
}

/**
 * Resolve an operator's free names against `env`. Fails on the first name
 * the environment does not define.
 */
export function extractClosureVars(
  body: Expression,
  params: readonly ParamSpec[],
  env: Environment,
  owner = 'operator'
): ReadonlyMap<string, EnvValue> {
  const closure = new Map<string, EnvValue>();
  for (const name of freeNames(body, params)) {
    if (!Object.prototype.hasOwnProperty.call(env, name)) {
      throw new ClosureError(`${owner} references ${name}, which is not defined in its environment`);
    }
    closure.set(name, env[name]);
  }
  return closure;
}
