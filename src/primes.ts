import { noPrimeImplicantsError } from './errors';
import {
  coversRequired,
  implicantLabel,
  memberKey,
  merge,
  singleton,
  type Implicant,
} from './implicant';
import type { Minterm } from './minterm';

// Generation-time view; `isPrime` is cleared once the implicant has been
// merged into a larger one.
type Candidate = {
  implicant: Implicant;
  isPrime: boolean;
};

/**
 * Quine-McCluskey tabulation over the value-ordered minterm stream
 * (required and don't-care together). Returns the prime implicants that
 * cover at least one required minterm, labelled A, B, ... in discovery order.
 */
export function generatePrimeImplicants(minterms: readonly Minterm[], numInputs: number): Implicant[] {
  const pool: Candidate[] = minterms.map(m => ({ implicant: singleton(m, numInputs), isPrime: true }));
  const seen = new Set(pool.map(c => memberKey(c.implicant)));

  let previous = pool.length;
  for (let round = 0; round < numInputs && previous > 0; round++) {
    const start = pool.length - previous;
    const end = pool.length;
    const consumed = new Set<Candidate>();

    for (let i = start; i < end; i++) {
      for (let j = i + 1; j < end; j++) {
        const a = pool[i];
        const b = pool[j];
        if (!a || !b) continue;

        const merged = merge(a.implicant, b.implicant);
        if (!merged) continue;

        consumed.add(a);
        consumed.add(b);

        const key = memberKey(merged);
        if (seen.has(key)) continue;
        seen.add(key);
        pool.push({ implicant: merged, isPrime: true });
      }
    }

    for (const c of consumed) {
      c.isPrime = false;
    }
    previous = pool.length - end;
  }

  const primes = pool
    .filter(c => c.isPrime && coversRequired(c.implicant))
    .map((c, index): Implicant => ({ ...c.implicant, label: implicantLabel(index) }));

  if (primes.length === 0) {
    throw noPrimeImplicantsError();
  }
  return primes;
}
