import { factors, isSum, type Expr } from './algebra';
import { gateCount, literals, type Implicant, type Literal } from './implicant';

// Gates of every chosen implicant plus the ORs joining them.
export function termCost(term: Expr, numInputs: number): number {
  const implicants = factors(term);
  return implicants.reduce(
    (acc, implicant) => acc + gateCount(implicant, numInputs),
    Math.max(implicants.length - 1, 0));
}

export function selectCheapest(solutions: Expr, numInputs: number): { term: Expr; cost: number } {
  const candidates = isSum(solutions) ? solutions.children : [solutions];
  let best = { term: solutions, cost: Infinity };
  for (const term of candidates) {
    const cost = termCost(term, numInputs);
    if (cost < best.cost) {
      best = { term, cost };
    }
  }
  return best;
}

export function render(cover: readonly Implicant[], numInputs: number): Literal[][] {
  return cover.map(implicant => literals(implicant, numInputs));
}

export function formatCover(groups: readonly (readonly Literal[])[]): string {
  return groups
    .map(group => group.length === 0 ? '1' : group.map(l => l.negated ? `${l.input}'` : l.input).join(''))
    .join(' + ');
}
