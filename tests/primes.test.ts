import { describe, it } from "node:test";
import assert from "node:assert";
import {
  buildMinterms,
  describe as describeImplicant,
  ErrorCodes,
  gateCount,
  generatePrimeImplicants,
  implicantLabel,
  literals,
  merge,
  minterm,
  popcount,
  singleton,
  type BooleanFunction,
} from "../src";
import { hasCode, memberValues } from "./helpers";

function primesOf(fn: BooleanFunction) {
  return generatePrimeImplicants(buildMinterms(fn), fn.numInputs);
}

describe("merge", () => {
  it("joins implicants differing in one common bit", () => {
    const merged = merge(singleton(minterm(1), 3), singleton(minterm(3), 3));
    assert.deepEqual(merged?.members.map(m => m.value), [1, 3]);
    assert.equal(merged?.commonMask, 0b101);
  });

  it("refuses implicants differing in more than one bit", () => {
    assert.equal(merge(singleton(minterm(1), 3), singleton(minterm(2), 3)), undefined);
  });

  it("refuses implicants with different masks", () => {
    const pair = merge(singleton(minterm(0), 3), singleton(minterm(1), 3));
    assert.ok(pair);
    assert.equal(merge(pair, singleton(minterm(4), 3)), undefined);
  });
});

describe("generatePrimeImplicants", () => {
  it("finds the primes of a function with don't-cares", () => {
    const primes = primesOf({ numInputs: 3, minterms: [1, 2, 5], dontCares: [3, 7] });
    assert.deepEqual(primes.map(p => p.label), ["A", "B"]);
    assert.deepEqual(memberValues(primes), [[2, 3], [1, 3, 5, 7]]);
    assert.deepEqual(primes.map(p => p.commonMask), [0b110, 0b001]);
    assert.deepEqual(primes.map(p => describeImplicant(p, 3)), ["A = m(2,3) 01-", "B = m(1,3,5,7) --1"]);
  });

  it("merges a tautology into one implicant with no common bits", () => {
    const primes = primesOf({ numInputs: 2, minterms: [0, 1, 2, 3] });
    assert.deepEqual(memberValues(primes), [[0, 1, 2, 3]]);
    assert.equal(primes[0]?.commonMask, 0);
  });

  it("keeps unmergeable minterms as primes", () => {
    const primes = primesOf({ numInputs: 3, minterms: [0, 3, 5, 6] });
    assert.deepEqual(memberValues(primes), [[0], [3], [5], [6]]);
  });

  it("drops groups made only of don't-cares", () => {
    const primes = primesOf({ numInputs: 3, minterms: [0], dontCares: [7] });
    assert.deepEqual(memberValues(primes), [[0]]);
  });

  it("holds the member count invariant and covers every minterm", () => {
    const functions: BooleanFunction[] = [
      { numInputs: 4, minterms: [4, 8, 10, 11, 12, 15], dontCares: [9, 14] },
      { numInputs: 4, minterms: [0, 2, 5, 7, 8, 10, 13, 15] },
      { numInputs: 3, minterms: [0, 1, 2, 5, 6, 7] },
      { numInputs: 5, minterms: [0, 1, 3, 7, 8, 9, 11, 15, 16, 20, 28], dontCares: [2, 24] },
    ];
    for (const fn of functions) {
      const primes = primesOf(fn);
      for (const p of primes) {
        assert.equal(p.members.length, 2 ** (fn.numInputs - popcount(p.commonMask)));
      }
      for (const m of fn.minterms) {
        assert.ok(primes.some(p => p.members.some(x => x.value === m)), `minterm ${m} is not covered`);
      }
    }
  });

  it("fails when nothing is required", () => {
    assert.throws(() => primesOf({ numInputs: 3, minterms: [] }), hasCode(ErrorCodes.NO_PRIME_IMPLICANTS));
    assert.throws(
      () => primesOf({ numInputs: 2, minterms: [], dontCares: [0, 1] }),
      hasCode(ErrorCodes.NO_PRIME_IMPLICANTS));
  });
});

describe("implicant helpers", () => {
  function scenarioPrimes() {
    const [a, b] = primesOf({ numInputs: 3, minterms: [1, 2, 5], dontCares: [3, 7] });
    assert.ok(a && b);
    return { a, b };
  }

  it("lists literals from the most significant input", () => {
    const { a, b } = scenarioPrimes();
    assert.deepEqual(literals(a, 3), [
      { index: 0, input: "a", negated: true },
      { index: 1, input: "b", negated: false },
    ]);
    assert.deepEqual(literals(b, 3), [{ index: 2, input: "c", negated: false }]);
  });

  it("counts AND and NOT gates", () => {
    const { a, b } = scenarioPrimes();
    assert.equal(gateCount(a, 3), 2);
    assert.equal(gateCount(b, 3), 0);
  });

  it("labels past Z with two letters", () => {
    assert.deepEqual([0, 25, 26, 27, 51, 52].map(implicantLabel), ["A", "Z", "AA", "AB", "AZ", "BA"]);
  });
});
