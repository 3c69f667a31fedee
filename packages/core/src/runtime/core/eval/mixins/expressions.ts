/**
 * ExpressionsMixin: Binary and Unary Expressions
 *
 * Operands are evaluated left to right. Operators accept exactly these
 * operand types and never coerce:
 * - `==` `!=`: any pair; values of different types are unequal
 * - `<` `<=` `>` `>=`: numbers
 * - `+`: two numbers or two strings
 * - `-` `*` `/`: numbers
 * - unary `-`: a number; unary `!`: a boolean
 *
 * Arithmetic results are rounded to 32-bit floats. Division by zero
 * follows IEEE-754 and yields an infinity or NaN.
 *
 * @internal
 */

import type {
  ArithmeticOp,
  BinaryExprNode,
  ComparisonOp,
  UnaryExprNode,
} from '../../../../types.js';
import {
  LOX_ERROR_CODES,
  type LoxErrorCode,
  RuntimeError,
} from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import { toFloat32, valuesEqual } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

const ARITHMETIC_ERRORS: Readonly<Record<ArithmeticOp, LoxErrorCode>> = {
  '+': LOX_ERROR_CODES.RUNTIME_ADD_TYPE,
  '-': LOX_ERROR_CODES.RUNTIME_SUBTRACT_TYPE,
  '/': LOX_ERROR_CODES.RUNTIME_DIVIDE_TYPE,
  '*': LOX_ERROR_CODES.RUNTIME_MULTIPLY_TYPE,
};

/** Comparison operators that order numbers */
type OrderingOp = Exclude<ComparisonOp, '==' | '!='>;

function compareNumbers(op: OrderingOp, left: number, right: number): boolean {
  switch (op) {
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
  }
}

function applyArithmetic(op: ArithmeticOp, left: number, right: number): number {
  switch (op) {
    case '+':
      return toFloat32(left + right);
    case '-':
      return toFloat32(left - right);
    case '/':
      return toFloat32(left / right);
    case '*':
      return toFloat32(left * right);
  }
}

export function ExpressionsMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class ExpressionsEvaluator extends Base {
    /**
     * Evaluate binary expression: left op right.
     * Errors carry the line of the expression's leftmost token.
     */
    evaluateBinaryExpr(node: BinaryExprNode): LoxValue {
      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);
      const { op } = node;

      switch (op) {
        case '==':
          return valuesEqual(left, right);
        case '!=':
          return !valuesEqual(left, right);
        case '>':
        case '>=':
        case '<':
        case '<=':
          if (typeof left !== 'number' || typeof right !== 'number') {
            throw RuntimeError.fromNode(
              LOX_ERROR_CODES.RUNTIME_COMPARE_TYPE,
              node
            );
          }
          return compareNumbers(op, left, right);
        case '+':
          // String concatenation is the only non-numeric arithmetic
          if (typeof left === 'string' && typeof right === 'string') {
            return left + right;
          }
          return this.evaluateArithmetic(node, op, left, right);
        case '-':
        case '/':
        case '*':
          return this.evaluateArithmetic(node, op, left, right);
      }
    }

    evaluateArithmetic(
      node: BinaryExprNode,
      op: ArithmeticOp,
      left: LoxValue,
      right: LoxValue
    ): number {
      if (typeof left !== 'number' || typeof right !== 'number') {
        throw RuntimeError.fromNode(ARITHMETIC_ERRORS[op], node);
      }
      return applyArithmetic(op, left, right);
    }

    /**
     * Evaluate unary expression: `-x` or `!x`.
     */
    evaluateUnaryExpr(node: UnaryExprNode): LoxValue {
      const operand = this.evaluateExpression(node.operand);

      if (node.op === '-') {
        if (typeof operand !== 'number') {
          throw RuntimeError.fromNode(LOX_ERROR_CODES.RUNTIME_NEGATE_TYPE, node);
        }
        return toFloat32(-operand);
      }

      if (typeof operand !== 'boolean') {
        throw RuntimeError.fromNode(LOX_ERROR_CODES.RUNTIME_INVERT_TYPE, node);
      }
      return !operand;
    }
  };
}
