/**
 * Evaluation Public API
 *
 * Functional wrappers around the Evaluator methods.
 *
 * @internal
 */

import type { DeclarationNode, ExpressionNode } from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';
import { getEvaluator } from './evaluator.js';

/**
 * Evaluate an expression against the context's environment.
 * Expressions never modify the environment.
 *
 * @throws RuntimeError on an operand type error or an unbound name
 */
export function evaluateExpression(
  expr: ExpressionNode,
  ctx: RuntimeContext
): LoxValue {
  return getEvaluator(ctx).evaluateExpression(expr);
}

/**
 * Execute one top-level declaration.
 *
 * @throws RuntimeError if evaluation fails
 */
export function executeDeclaration(
  decl: DeclarationNode,
  ctx: RuntimeContext
): LoxValue {
  return getEvaluator(ctx).executeDeclaration(decl);
}
