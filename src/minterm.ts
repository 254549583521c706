import { invalidInputError } from './errors';

// Inputs are named a..z, so that bounds the width of a function.
export const MAX_INPUTS = 26;

export type Minterm = {
  readonly value: number;
  readonly isDontCare: boolean;
  readonly popcount: number;
};

export type BooleanFunction = {
  numInputs: number;
  minterms: readonly number[];
  dontCares?: readonly number[];
};

export function popcount(n: number): number {
  let count = 0;
  while (n) {
    count += n & 1;
    n >>>= 1;
  }
  return count;
}

export function minterm(value: number, isDontCare = false): Minterm {
  return { value, isDontCare, popcount: popcount(value) };
}

export function compareMinterms(a: Minterm, b: Minterm): number {
  return a.value - b.value;
}

export function fullMask(numInputs: number): number {
  return (1 << numInputs) - 1;
}

export function validateInputCount(numInputs: number): void {
  if (!Number.isInteger(numInputs) || numInputs < 1 || numInputs > MAX_INPUTS) {
    throw invalidInputError(`number of inputs must be an integer between 1 and ${MAX_INPUTS}, got ${numInputs}`);
  }
}

function sortedValues(values: readonly number[], numInputs: number, kind: string): number[] {
  const limit = fullMask(numInputs);
  for (const value of values) {
    if (!Number.isInteger(value) || value < 0 || value > limit) {
      throw invalidInputError(`${kind} ${value} is outside [0, ${limit}]`);
    }
  }
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Validates a function and returns its minterms and don't-cares as one
 * stream ordered by value.
 */
export function buildMinterms(fn: BooleanFunction): Minterm[] {
  validateInputCount(fn.numInputs);
  const required = sortedValues(fn.minterms, fn.numInputs, 'minterm');
  const dontCares = sortedValues(fn.dontCares ?? [], fn.numInputs, "don't-care");

  const result: Minterm[] = [];
  let i = 0, j = 0;
  while (i < required.length || j < dontCares.length) {
    const m = required[i];
    const d = dontCares[j];
    if (m !== undefined && (d === undefined || m < d)) {
      result.push(minterm(m));
      i++;
    } else if (d !== undefined && (m === undefined || d < m)) {
      result.push(minterm(d, true));
      j++;
    } else {
      throw invalidInputError(`${String(m)} is listed both as a minterm and as a don't-care`);
    }
  }
  return result;
}
