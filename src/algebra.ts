import type { Implicant } from './implicant';

export type Operator = 'sum' | 'product';

export type Identity = { readonly kind: 'identity' };
export type Leaf = { readonly kind: 'leaf'; readonly implicant: Implicant };
export type Node = { readonly kind: 'node'; readonly op: Operator; readonly children: readonly Expr[] };

// Sum/product tree over implicants. Trees are never mutated: every
// operation below builds new nodes.
export type Expr = Identity | Leaf | Node;

export const IDENTITY: Expr = { kind: 'identity' };

export function leaf(implicant: Implicant): Expr {
  return { kind: 'leaf', implicant };
}

function node(op: Operator, children: readonly Expr[]): Expr {
  return { kind: 'node', op, children };
}

export function isSum(expr: Expr): expr is Node {
  return expr.kind === 'node' && expr.op === 'sum';
}

// A leaf behaves as a product with a single factor.
function family(expr: Expr): Operator | undefined {
  switch (expr.kind) {
    case 'identity': return undefined;
    case 'leaf': return 'product';
    case 'node': return expr.op;
  }
}

export function terms(expr: Expr): readonly Expr[] {
  switch (expr.kind) {
    case 'identity': return [];
    case 'leaf': return [expr];
    case 'node': return expr.children;
  }
}

export function factors(expr: Expr): Implicant[] {
  switch (expr.kind) {
    case 'identity': return [];
    case 'leaf': return [expr.implicant];
    case 'node': return expr.children.flatMap(factors);
  }
}

/**
 * Structural equality: same operator and the same multiset of children, in
 * any order. Leaves compare by implicant identity.
 */
export function equals(a: Expr, b: Expr): boolean {
  if (a.kind === 'leaf' && b.kind === 'leaf') {
    return a.implicant === b.implicant;
  }
  if (a.kind === 'node' && b.kind === 'node') {
    if (a.op !== b.op || a.children.length !== b.children.length) {
      return false;
    }
    const unmatched = [...b.children];
    return a.children.every(child => {
      const index = unmatched.findIndex(other => equals(child, other));
      if (index < 0) return false;
      unmatched.splice(index, 1);
      return true;
    });
  }
  return a.kind === 'identity' && b.kind === 'identity';
}

// Every term of `inner` appears among the terms of `outer`.
export function contains(outer: Expr, inner: Expr): boolean {
  const op = family(outer);
  if (op === undefined || op !== family(inner)) {
    return false;
  }
  const outerTerms = terms(outer);
  const innerTerms = terms(inner);
  if (innerTerms.length > outerTerms.length) {
    return false;
  }
  return innerTerms.every(t => outerTerms.some(u => equals(t, u)));
}

/**
 * Pulls nested nodes of the same operator up into their parent. A node left
 * with one child is replaced by that child.
 */
export function level(expr: Expr): Expr {
  if (expr.kind !== 'node') {
    return expr;
  }
  const flat: Expr[] = [];
  const visit = (e: Expr): void => {
    if (e.kind === 'node' && e.op === expr.op) {
      e.children.forEach(visit);
    } else {
      flat.push(e);
    }
  };
  expr.children.forEach(visit);

  const [only, ...rest] = flat;
  if (only === undefined) return IDENTITY;
  if (rest.length === 0) return only;
  return node(expr.op, flat);
}

export function sum(a: Expr, b: Expr): Expr {
  if (a.kind === 'identity') return b;
  if (b.kind === 'identity') return a;
  if (equals(a, b)) return b;
  return node('sum', [a, b]);
}

export function product(a: Expr, b: Expr): Expr {
  if (a.kind === 'identity') return b;
  if (b.kind === 'identity') return a;
  if (equals(a, b)) return b;

  // X * (Y + Z) = XY + XZ
  if (isSum(a)) {
    return a.children.reduce((acc, child) => sum(acc, product(b, child)), IDENTITY);
  }
  if (isSum(b)) {
    return b.children.reduce((acc, child) => sum(acc, product(a, child)), IDENTITY);
  }

  // X * XY = XY
  if (contains(a, b)) return a;
  if (contains(b, a)) return b;

  return level(node('product', [a, b]));
}

/**
 * One pass of X + XY = X over the children of a sum. When a later term is
 * more general than an earlier one, it takes the earlier slot.
 */
export function applySumAbsorption(expr: Expr): [boolean, Expr] {
  if (!isSum(expr)) {
    return [false, expr];
  }
  const children = [...expr.children];
  let changed = false;
  for (let i = 0; i < children.length; i++) {
    let j = i + 1;
    while (j < children.length) {
      const a = children[i];
      const b = children[j];
      if (!a || !b) break;
      if (contains(b, a)) {
        children.splice(j, 1);
      } else if (contains(a, b)) {
        children[i] = b;
        children.splice(j, 1);
        changed = true;
      } else {
        j++;
      }
    }
  }
  return [changed, level(node('sum', children))];
}

export function absorb(expr: Expr): Expr {
  let current = expr;
  for (;;) {
    const [changed, next] = applySumAbsorption(current);
    current = next;
    if (!changed) return current;
  }
}

export function formatExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'identity': return '()';
    case 'leaf': return expr.implicant.label;
    case 'node': {
      const body = expr.children.map(formatExpr).join(expr.op === 'sum' ? '+' : '*');
      return `[${body}]`;
    }
  }
}
