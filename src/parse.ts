import { invalidInputError } from './errors';
import type { BooleanFunction } from './minterm';

export type TruthTable = {
  numInputs: number;
  outputs: BooleanFunction[];
};

/**
 * Parses a bracketed, comma separated list such as `[1,2,3]`.
 */
export function parseMintermList(text: string): number[] {
  const trimmed = text.trim();
  if (!trimmed.startsWith('[') || !trimmed.endsWith(']')) {
    throw invalidInputError(`list should be enclosed in []: ${text}`);
  }
  const inner = trimmed.slice(1, -1).trim();
  if (inner === '') {
    return [];
  }
  return inner.split(',').map(item => {
    const token = item.trim();
    if (!/^\d+$/.test(token)) {
      throw invalidInputError(`"${token}" is not a non-negative integer`);
    }
    return Number(token);
  });
}

// 'x' stands for both 0 and 1; the first input is the most significant bit.
function expandRow(bits: readonly string[]): number[] {
  const index = bits.indexOf('x');
  if (index < 0) {
    return [bits.reduce((acc, bit) => acc * 2 + (bit === '1' ? 1 : 0), 0)];
  }
  const withBit = (bit: string) => bits.map((b, i) => (i === index ? bit : b));
  return [...expandRow(withBit('0')), ...expandRow(withBit('1'))];
}

/**
 * Reads a truth table, one row per line: input bits, a `|`, then one output
 * per column.
 *
 * ```
 * 0 0 x | 1 0
 * 0 1 0 | x 1
 * ```
 *
 * Outputs are `1`, `0` or `x` (don't-care). Blank lines and `#` comments
 * are skipped.
 */
export function parseTruthTable(text: string): TruthTable {
  let numInputs = 0;
  let outputs: { minterms: number[]; dontCares: number[] }[] = [];

  text.split(/\r?\n/).forEach((raw, lineIndex) => {
    const line = raw.replace(/#.*$/, '').trim();
    if (line === '') return;

    const where = `line ${lineIndex + 1}`;
    const halves = line.split('|');
    const [left, right] = halves;
    if (halves.length !== 2 || left === undefined || right === undefined) {
      throw invalidInputError(`${where}: expected "<inputs> | <outputs>"`);
    }
    const inputs = left.trim().split(/\s+/);
    const outs = right.trim().split(/\s+/);

    if (outputs.length === 0) {
      numInputs = inputs.length;
      outputs = outs.map(() => ({ minterms: [], dontCares: [] }));
    } else if (inputs.length !== numInputs || outs.length !== outputs.length) {
      throw invalidInputError(`${where}: expected ${numInputs} inputs and ${outputs.length} outputs`);
    }
    if (inputs.some(bit => !['0', '1', 'x'].includes(bit))) {
      throw invalidInputError(`${where}: inputs must be 0, 1 or x`);
    }

    const values = expandRow(inputs);
    outs.forEach((out, column) => {
      const target = outputs[column];
      if (!target) return;
      if (out === '1') {
        target.minterms.push(...values);
      } else if (out === 'x') {
        target.dontCares.push(...values);
      } else if (out !== '0') {
        throw invalidInputError(`${where}: outputs must be 0, 1 or x`);
      }
    });
  });

  if (outputs.length === 0) {
    throw invalidInputError('truth table has no rows');
  }
  return {
    numInputs,
    outputs: outputs.map(o => ({ numInputs, minterms: o.minterms, dontCares: o.dontCares })),
  };
}
