/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides context access and dispatch stubs for all mixins.
 *
 * @internal
 */

import type { DeclarationNode, ExpressionNode } from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Holds the runtime context shared by every mixin.
 */
export class EvaluatorBase {
  constructor(protected readonly ctx: RuntimeContext) {}

  /**
   * Evaluate an expression.
   *
   * NOTE: Stub implementation - CoreMixin overrides this with the node-type
   * dispatch. Mixins composed below CoreMixin call it for sub-expressions.
   */
  evaluateExpression(_expr: ExpressionNode): LoxValue {
    throw new Error('evaluateExpression requires CoreMixin composition');
  }

  /**
   * Execute a top-level declaration.
   *
   * NOTE: Stub implementation - StatementsMixin overrides this.
   */
  executeDeclaration(_decl: DeclarationNode): LoxValue {
    throw new Error('executeDeclaration requires StatementsMixin composition');
  }
}
