#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';

import { formatColoredCover, formatTruthTable } from './display';
import { formatError, invalidInputError } from './errors';
import { minimize } from './minimize';
import type { BooleanFunction } from './minterm';
import { parseMintermList, parseTruthTable } from './parse';

type ReportOptions = {
  colored?: boolean;
  verbose?: boolean;
  table?: boolean;
};

function report(fn: BooleanFunction, name: string, opts: ReportOptions): void {
  if (opts.table) {
    console.log(formatTruthTable(fn, name));
  }
  const result = minimize(fn, {
    trace: opts.verbose ? (line: string) => console.error(chalk.dim(line)) : undefined,
  });
  const expression = opts.colored ? formatColoredCover(result.terms) : result.expression;
  console.log(`${name}: ${expression}  Number of operations: ${result.gateCount}`);
}

function fail(error: unknown): void {
  console.error(`Error: ${formatError(error)}`);
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('sop-petrick')
    .description('Reduce a logic function to a minimal sum of products (Quine-McCluskey and Petrick\'s method)')
    .version('0.1.0');

  program
    .command('reduce')
    .description('Reduce a function given by its minterms and don\'t-cares')
    .argument('<numInputs>', 'number of inputs of the function')
    .argument('<minterms>', 'minterms as a comma separated list in [], e.g. [1,2,5]')
    .argument('[dontCares]', 'don\'t-care terms in the same format', '[]')
    .option('-c, --colored', 'show plain inputs in green and complemented ones in red', false)
    .option('-v, --verbose', 'print the prime implicants and every Petrick step', false)
    .option('-t, --table', 'print the truth table first', false)
    .action((numInputs: string, minterms: string, dontCares: string, opts: ReportOptions) => {
      try {
        if (!/^\d+$/.test(numInputs.trim())) {
          throw invalidInputError(`the number of inputs must be a number, got "${numInputs}"`);
        }
        report({
          numInputs: Number(numInputs),
          minterms: parseMintermList(minterms),
          dontCares: parseMintermList(dontCares),
        }, 'Q', opts);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('file')
    .description('Reduce every output column of a truth table file')
    .argument('<file>', 'truth table, rows of "<inputs> | <outputs>"')
    .option('-c, --colored', 'show plain inputs in green and complemented ones in red', false)
    .option('-v, --verbose', 'print the prime implicants and every Petrick step', false)
    .option('-t, --table', 'print each truth table first', false)
    .action((file: string, opts: ReportOptions) => {
      try {
        if (!existsSync(file)) {
          throw invalidInputError(`file not found: ${file}`);
        }
        const table = parseTruthTable(readFileSync(file, 'utf-8'));
        table.outputs.forEach((fn, index) => {
          console.log(`Q${index}: [${fn.minterms.join(',')}]`);
          console.log(`DNC${index}: [${(fn.dontCares ?? []).join(',')}]`);
          try {
            report(fn, `Q${index}`, opts);
          } catch (error) {
            fail(error);
          }
        });
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parse();
}
