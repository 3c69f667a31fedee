/**
 * CoreMixin: Main Expression Dispatch
 *
 * Dispatches expression evaluation to specialized evaluators based on AST
 * node type. Expressions are pure: they read the environment and never
 * write it.
 *
 * Depends on:
 * - LiteralsMixin: evaluateLiteral()
 * - VariablesMixin: lookupVariable()
 * - ExpressionsMixin: evaluateBinaryExpr(), evaluateUnaryExpr()
 *
 * @internal
 */

import type { ExpressionNode } from '../../../../types.js';
import {
  LOX_ERROR_CODES,
  MAX_EXPRESSION_DEPTH,
  RuntimeError,
} from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type {
  EvaluatorConstructor,
  LiteralEvaluation,
  OperatorEvaluation,
  VariableAccess,
} from '../types.js';

export function CoreMixin<
  TBase extends EvaluatorConstructor<
    EvaluatorBase & LiteralEvaluation & VariableAccess & OperatorEvaluation
  >,
>(Base: TBase) {
  return class CoreEvaluator extends Base {
    /** Expressions currently being evaluated */
    private depth = 0;

    /**
     * Main expression evaluation entry point.
     * This overrides the stub in EvaluatorBase.
     *
     * Trees built by hand can be deeper than the parser allows; those stop
     * with a RuntimeError at MAX_EXPRESSION_DEPTH.
     */
    override evaluateExpression(expr: ExpressionNode): LoxValue {
      if (this.depth >= MAX_EXPRESSION_DEPTH) {
        throw RuntimeError.fromNode(
          LOX_ERROR_CODES.RUNTIME_NESTING_TOO_DEEP,
          expr,
          { limit: MAX_EXPRESSION_DEPTH }
        );
      }

      this.depth++;
      try {
        return this.dispatchExpression(expr);
      } finally {
        this.depth--;
      }
    }

    /** Route an expression to the mixin that evaluates its node type */
    private dispatchExpression(expr: ExpressionNode): LoxValue {
      switch (expr.type) {
        case 'BinaryExpr':
          return this.evaluateBinaryExpr(expr);
        case 'UnaryExpr':
          return this.evaluateUnaryExpr(expr);
        case 'Identifier':
          return this.lookupVariable(expr);
        case 'NumberLiteral':
        case 'StringLiteral':
        case 'TrueLiteral':
        case 'FalseLiteral':
        case 'NilLiteral':
          return this.evaluateLiteral(expr);
      }
    }
  };
}
