import { absorb, formatExpr, IDENTITY, leaf, level, product, sum, type Expr } from './algebra';
import { coverageGapError } from './errors';
import { covers, type Implicant } from './implicant';
import type { Minterm } from './minterm';

export type PetrickOptions = {
  trace?: (line: string) => void;
};

/**
 * Petrick's method. Multiplies, one required minterm at a time, the sum of
 * the primes covering it into a running product, simplifying after every
 * step. Each term of the resulting sum of products is an irredundant cover.
 */
export function petrick(primes: readonly Implicant[], minterms: readonly Minterm[], options: PetrickOptions = {}): Expr {
  let result: Expr = IDENTITY;
  for (const m of minterms) {
    if (m.isDontCare) continue;

    const factor = level(primes
      .filter(p => covers(p, m.value))
      .reduce((acc, p) => sum(acc, leaf(p)), IDENTITY));
    if (factor.kind === 'identity') {
      throw coverageGapError(m.value);
    }

    result = absorb(level(product(result, factor)));
    options.trace?.(`m${m.value}: ${formatExpr(factor)} => ${formatExpr(result)}`);
  }
  return result;
}
