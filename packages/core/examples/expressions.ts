/**
 * Arithmetic expressions
 *
 * Four operators with the usual precedence, parentheses, and decimal
 * numbers. Each level folds its operands left to right.
 *
 * Run: parseExpression("2 * (3 + 4) - 5")  // → Success(9)
 */

import { first, fwd, parse, rep, splat, textParsers } from "../src/index.js";
import type { ParseError, Result } from "../src/index.js";

const { lit, reg, seq, keepLeft, keepRight } = textParsers();

export const expression = fwd<string, number>().named("expression");

const number = reg(/\d+(\.\d+)?/).map(Number).named("number");

const factor = first(number, keepRight(lit("("), keepLeft(expression, lit(")")))).named("factor");

const product = seq(factor, rep(seq(lit("*", "/"), factor)))
  .map(splat(fold))
  .named("product");

const sum = seq(product, rep(seq(lit("+", "-"), product)))
  .map(splat(fold))
  .named("sum");

expression.define(sum);

function fold(head: number, tail: [string, number][]): number {
  return tail.reduce((acc, [operator, operand]) => {
    switch (operator) {
      case "+":
        return acc + operand;
      case "-":
        return acc - operand;
      case "*":
        return acc * operand;
      default:
        return acc / operand;
    }
  }, head);
}

export function parseExpression(source: string): Result<number, ParseError> {
  return parse(expression, source);
}
