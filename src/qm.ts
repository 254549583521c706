import { invalidInputError } from './errors';
import type { Literal } from './implicant';
import { minimize } from './minimize';
import { MAX_INPUTS, type BooleanFunction } from './minterm';

// Succeeds with the parts of `expr`, or fails with `[false]`.
type Dtor<T, P> = (expr: T) => [true, P] | [false, undefined?];

export type ExprConfig<T> = {
  dtorAnd: Dtor<T, {lhs: T, rhs: T}>;
  dtorOr: Dtor<T, {lhs: T, rhs: T}>;
  dtorNot: Dtor<T, {operand: T}>;
  dtorLiteral: Dtor<T, {value: boolean}>;
  equal: (lhs: T, rhs: T) => boolean;
  ctorAnd: (lhs: T, rhs: T) => T;
  ctorOr: (lhs: T, rhs: T) => T;
  ctorNot: (operand: T) => T;
  ctorLiteral: (value: boolean) => T;
}

export function buildQM<T>(cfg: ExprConfig<T>) {

  function collectAtoms(expr: T, atoms: T[]): T[] {
    {
      const [ok, result] = cfg.dtorAnd(expr);
      if (ok) {
        collectAtoms(result.lhs, atoms);
        return collectAtoms(result.rhs, atoms);
      }
    }
    {
      const [ok, result] = cfg.dtorOr(expr);
      if (ok) {
        collectAtoms(result.lhs, atoms);
        return collectAtoms(result.rhs, atoms);
      }
    }
    {
      const [ok, result] = cfg.dtorNot(expr);
      if (ok) {
        return collectAtoms(result.operand, atoms);
      }
    }
    {
      const [ok] = cfg.dtorLiteral(expr);
      if (ok) {
        return atoms;
      }
    }

    if (!atoms.some(a => cfg.equal(a, expr))) {
      atoms.push(expr);
    }
    return atoms;
  }

  function evaluate(expr: T, atoms: readonly T[], value: number): boolean {
    {
      const [ok, result] = cfg.dtorAnd(expr);
      if (ok) {
        return evaluate(result.lhs, atoms, value) && evaluate(result.rhs, atoms, value);
      }
    }
    {
      const [ok, result] = cfg.dtorOr(expr);
      if (ok) {
        return evaluate(result.lhs, atoms, value) || evaluate(result.rhs, atoms, value);
      }
    }
    {
      const [ok, result] = cfg.dtorNot(expr);
      if (ok) {
        return !evaluate(result.operand, atoms, value);
      }
    }
    {
      const [ok, result] = cfg.dtorLiteral(expr);
      if (ok) {
        return result.value;
      }
    }

    // The first atom is the most significant input.
    const index = atoms.findIndex(a => cfg.equal(a, expr));
    return ((value >> (atoms.length - 1 - index)) & 1) === 1;
  }

  function to(groups: readonly (readonly Literal[])[], inputs: readonly T[]): T {
    const result = groups.reduce<T | undefined>((acc, group) => {
      const right = group.reduce<T | undefined>((acc1, literal) => {
        const input = inputs[literal.index];
        if (input === undefined) {
          throw invalidInputError(`no expression supplied for input ${literal.input}`);
        }
        const right1 = literal.negated ? cfg.ctorNot(input) : input;
        return acc1 === undefined ? right1 : cfg.ctorAnd(acc1, right1);
      }, undefined) ?? cfg.ctorLiteral(true);
      return acc === undefined ? right : cfg.ctorOr(acc, right);
    }, undefined);
    return result ?? cfg.ctorLiteral(false);
  }

  function synthesize(fn: BooleanFunction, inputs: readonly T[]): T {
    if (inputs.length !== fn.numInputs) {
      throw invalidInputError(`expected ${fn.numInputs} input expressions, got ${inputs.length}`);
    }
    // A function that is never required to be 1 is the constant 0.
    if (fn.minterms.length === 0) {
      return cfg.ctorLiteral(false);
    }
    return to(minimize(fn).terms, inputs);
  }

  function simplify(expr: T): T {
    const atoms = collectAtoms(expr, []);
    if (atoms.length === 0) {
      return cfg.ctorLiteral(evaluate(expr, atoms, 0));
    }
    if (atoms.length > MAX_INPUTS) {
      throw invalidInputError(`expression has ${atoms.length} distinct atoms, at most ${MAX_INPUTS} are supported`);
    }

    const minterms: number[] = [];
    for (let value = 0; value < 1 << atoms.length; value++) {
      if (evaluate(expr, atoms, value)) {
        minterms.push(value);
      }
    }
    return synthesize({ numInputs: atoms.length, minterms }, atoms);
  }

  return {
    simplify,
    synthesize,
  };
}
