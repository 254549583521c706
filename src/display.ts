import chalk from 'chalk';

import { inputName, type Literal } from './implicant';
import type { BooleanFunction } from './minterm';

export function formatTruthTable(fn: BooleanFunction, name = 'Q'): string {
  const { numInputs } = fn;
  const required = new Set(fn.minterms);
  const dontCares = new Set(fn.dontCares ?? []);

  let header = '';
  for (let i = 0; i < numInputs; i++) {
    header += inputName(i);
  }
  const lines = [`${header}  ${name}`];

  for (let value = 0; value < 1 << numInputs; value++) {
    const bits = value.toString(2).padStart(numInputs, '0');
    const out = required.has(value) ? '1' : dontCares.has(value) ? 'x' : '0';
    lines.push(`${bits}  ${out}`);
  }
  return lines.join('\n');
}

// Plain inputs in green, complemented ones in red.
export function formatColoredCover(groups: readonly (readonly Literal[])[]): string {
  return groups
    .map(group => group.length === 0
      ? chalk.green('1')
      : group.map(l => l.negated ? chalk.red(l.input) : chalk.green(l.input)).join(''))
    .join(' + ');
}
