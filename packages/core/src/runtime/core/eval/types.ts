/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Defines the constructor types and capability interfaces for the mixin
 * pattern. Mixins receive a base constructor and return an extended
 * constructor.
 *
 * @internal
 */

import type {
  BinaryExprNode,
  IdentifierNode,
  LiteralNode,
  UnaryExprNode,
} from '../../../types.js';
import type { LoxValue } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 *
 * Note: `any[]` is required for constructor args because mixins don't know
 * what parameters the base constructor accepts. This is the standard
 * TypeScript mixin pattern.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> =
  new (...args: any[]) => TBase;

/** Added by LiteralsMixin */
export interface LiteralEvaluation {
  evaluateLiteral(node: LiteralNode): LoxValue;
}

/** Added by VariablesMixin */
export interface VariableAccess {
  lookupVariable(node: IdentifierNode): LoxValue;
  defineVariable(name: string, value: LoxValue): void;
}

/** Added by ExpressionsMixin */
export interface OperatorEvaluation {
  evaluateBinaryExpr(node: BinaryExprNode): LoxValue;
  evaluateUnaryExpr(node: UnaryExprNode): LoxValue;
}
