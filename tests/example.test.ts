import { describe, it } from "node:test";
import assert from "node:assert";
import { parseExpression } from '@babel/parser';
import generate from '@babel/generator';
import { buildQM, type ExprConfig } from "../src";
import * as t from "@babel/types";


describe("buildQM", () => {
  const babelConfig: ExprConfig<t.Expression> = {
    dtorAnd: (expr) => {
      return t.isLogicalExpression(expr) && expr.operator === "&&"?
        [true, { lhs: expr.left, rhs: expr.right }] :
        [false];
    },
    dtorOr: (expr) => {
      return t.isLogicalExpression(expr) && expr.operator === "||"?
        [true, { lhs: expr.left, rhs: expr.right }] :
        [false];
    },
    dtorNot: (expr) => {
      return t.isUnaryExpression(expr) && expr.operator === "!"?
        [true, { operand: expr.argument }] :
        [false];
    },
    dtorLiteral: (expr) => {
      return t.isBooleanLiteral(expr)?
        [true, { value: expr.value }] :
        [false];
    },
    equal: (lhs, rhs) => t.isNodesEquivalent(lhs, rhs),
    ctorAnd: (lhs, rhs) => t.logicalExpression("&&", lhs, rhs),
    ctorOr: (lhs, rhs) => t.logicalExpression("||", lhs, rhs),
    ctorNot: (operand) => t.unaryExpression("!", operand),
    ctorLiteral: (value) => t.booleanLiteral(value),
  };
  const qm = buildQM(babelConfig);
  const print = (expr: t.Expression) => generate(expr, { jsescOption: { quotes: 'single' } }).code;


  const cases: [string, string][] = [
    ["A", "A"],
    ["!!A", "A"],
    [`!(!(A))`, `A`],
    [`!(!(!(A)))`, `!A`],
    [`!(!(!(!(A))))`, `A`],
    ["A && A", "A"],
    ["A && B && A", "A && B"],
    ["A || B || A", "B || A"],
    ["A || B && A", "A"],
    ["A && !A", "false"],
    ["A || !A", "true"],
    ["A && B || !A", "!A || B"],
    ["(A || B) && !A", "!A && B"],
    ["A || (B && C)", "B && C || A"],
    ["A || (B && !A)", "B || A"],
    [`true && A`, `A`],
    [`true && true && A`, `A`],
    [`true && true && true && A && true`, `A`],
    ["!(true && !(false || A))", "A"],
    ["A || A && A", "A"],
    ["A && (B || !A)", "A && B"],
    ["A || (B || !A)", "true"],
    ["A && (B && !A)", "false"],
    ["true || false", "true"],
    ["false || !true", "false"],
    ["x > 1 && y || x > 1", "x > 1"],
  ];
  for (const [input, expected] of cases) {

    it(`should simplify [${input}] to [${expected}]`, () => {
      const expr = qm.simplify(parseExpression(input));
      assert.equal(print(expr), expected);
    });
  }

  it("should synthesize a function over given inputs", () => {
    const inputs = ["x", "y", "z"].map(name => t.identifier(name));
    const expr = qm.synthesize({ numInputs: 3, minterms: [1, 2, 5], dontCares: [3, 7] }, inputs);
    assert.equal(print(expr), "z || !x && y");
  });

  it("should synthesize the constant 0", () => {
    const expr = qm.synthesize({ numInputs: 1, minterms: [], dontCares: [0] }, [t.identifier("x")]);
    assert.equal(print(expr), "false");
  });
});
