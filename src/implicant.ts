import { compareMinterms, fullMask, popcount, type Minterm } from './minterm';

// A group of minterms that agree on every bit set in `commonMask`. Bits
// cleared in the mask range freely over the members.
export type Implicant = {
  readonly members: readonly Minterm[];
  readonly commonMask: number;
  readonly label: string;
};

export type Literal = {
  // 0 is the most significant input, `a`
  index: number;
  input: string;
  negated: boolean;
};

export function singleton(m: Minterm, numInputs: number): Implicant {
  return { members: [m], commonMask: fullMask(numInputs), label: '' };
}

function first(implicant: Implicant): Minterm {
  const [head] = implicant.members;
  if (!head) {
    throw new Error('implicant without members');
  }
  return head;
}

/**
 * Joins two implicants that differ in exactly one of their common bits.
 */
export function merge(a: Implicant, b: Implicant): Implicant | undefined {
  if (a.commonMask !== b.commonMask || a.members.length !== b.members.length) {
    return undefined;
  }
  const diff = (first(a).value & a.commonMask) ^ (first(b).value & b.commonMask);
  if (popcount(diff) !== 1) {
    return undefined;
  }
  return {
    members: [...a.members, ...b.members].sort(compareMinterms),
    commonMask: a.commonMask & ~diff,
    label: '',
  };
}

export function memberKey(implicant: Implicant): string {
  return implicant.members.map(m => m.value).join(',');
}

export function covers(implicant: Implicant, value: number): boolean {
  return (value & implicant.commonMask) === (first(implicant).value & implicant.commonMask);
}

export function coversRequired(implicant: Implicant): boolean {
  return implicant.members.some(m => !m.isDontCare);
}

export function inputName(index: number): string {
  return String.fromCharCode('a'.charCodeAt(0) + index);
}

export function literals(implicant: Implicant, numInputs: number): Literal[] {
  const pattern = first(implicant).value;
  const result: Literal[] = [];
  for (let index = 0; index < numInputs; index++) {
    const bit = 1 << (numInputs - 1 - index);
    if (implicant.commonMask & bit) {
      result.push({ index, input: inputName(index), negated: (pattern & bit) === 0 });
    }
  }
  return result;
}

// AND gates joining the literals plus one NOT per complemented literal.
export function gateCount(implicant: Implicant, numInputs: number): number {
  const lits = literals(implicant, numInputs);
  return Math.max(lits.length - 1, 0) + lits.filter(l => l.negated).length;
}

export function implicantLabel(index: number): string {
  let label = '';
  let n = index;
  do {
    label = String.fromCharCode(65 + (n % 26)) + label;
    n = Math.floor(n / 26) - 1;
  } while (n >= 0);
  return label;
}

// Fixed bits as 0/1 and free bits as '-', most significant input first.
export function pattern(implicant: Implicant, numInputs: number): string {
  const value = first(implicant).value;
  let out = '';
  for (let shift = numInputs - 1; shift >= 0; shift--) {
    const bit = 1 << shift;
    out += implicant.commonMask & bit ? (value & bit ? '1' : '0') : '-';
  }
  return out;
}

export function describe(implicant: Implicant, numInputs: number): string {
  return `${implicant.label} = m(${implicant.members.map(m => m.value).join(',')}) ${pattern(implicant, numInputs)}`;
}
