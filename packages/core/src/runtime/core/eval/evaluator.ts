/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Context and dispatch stubs
 * 2. LiteralsMixin - Number, string, boolean, nil literals
 * 3. VariablesMixin - Environment lookup and binding
 * 4. ExpressionsMixin - Binary and unary operators
 * 5. CoreMixin - Expression dispatch
 * 6. StatementsMixin - Declarations and statements (outermost)
 *
 * Each mixin may call methods of the mixins below it. Calls that go the
 * other way (operators evaluating their operands) go through the
 * evaluateExpression stub on EvaluatorBase, which CoreMixin overrides.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { LiteralsMixin } from './mixins/literals.js';
import { StatementsMixin } from './mixins/statements.js';
import { VariablesMixin } from './mixins/variables.js';
import type { RuntimeContext } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = StatementsMixin(
  CoreMixin(ExpressionsMixin(VariablesMixin(LiteralsMixin(EvaluatorBase))))
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Cache eviction happens automatically when the RuntimeContext is
 * garbage collected, since WeakMap keys don't prevent GC.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
