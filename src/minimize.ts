import { factors, type Expr } from './algebra';
import { formatCover, render, selectCheapest } from './cost';
import { covers, describe, type Implicant, type Literal } from './implicant';
import { buildMinterms, type BooleanFunction } from './minterm';
import { petrick, type PetrickOptions } from './petrick';
import { generatePrimeImplicants } from './primes';

export type MinimizeOptions = PetrickOptions;

export type Minimized = {
  numInputs: number;
  primes: readonly Implicant[];
  // Every irredundant cover left after absorption, as a sum of products.
  solutions: Expr;
  // Implicants of the cheapest cover, in term order.
  cover: readonly Implicant[];
  gateCount: number;
  terms: Literal[][];
  expression: string;
};

export function minimize(fn: BooleanFunction, options: MinimizeOptions = {}): Minimized {
  const { numInputs } = fn;
  const minterms = buildMinterms(fn);
  const primes = generatePrimeImplicants(minterms, numInputs);
  if (options.trace) {
    for (const p of primes) {
      options.trace(describe(p, numInputs));
    }
  }

  const solutions = petrick(primes, minterms, options);
  const { term, cost } = selectCheapest(solutions, numInputs);
  const cover = factors(term);
  const terms = render(cover, numInputs);

  return {
    numInputs,
    primes,
    solutions,
    cover,
    gateCount: cost,
    terms,
    expression: formatCover(terms),
  };
}

export function evaluate(cover: readonly Implicant[], value: number): boolean {
  return cover.some(implicant => covers(implicant, value));
}
