/**
 * VariablesMixin: Variable Access and Binding
 *
 * One global scope. A declaration binds or rebinds a name; reading an
 * unbound name is a runtime error.
 *
 * Error Handling:
 * - Undefined variables throw RuntimeError(RUNTIME_UNDEFINED_VARIABLE)
 *
 * @internal
 */

import type { IdentifierNode } from '../../../../types.js';
import { LOX_ERROR_CODES, RuntimeError } from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function VariablesMixin<TBase extends EvaluatorConstructor>(
  Base: TBase
) {
  return class VariablesEvaluator extends Base {
    lookupVariable(node: IdentifierNode): LoxValue {
      const value = this.ctx.variables.get(node.name);
      if (value === undefined) {
        throw RuntimeError.fromNode(
          LOX_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
          node,
          { name: node.name }
        );
      }
      return value;
    }

    /** Bind a name, replacing any earlier binding */
    defineVariable(name: string, value: LoxValue): void {
      this.ctx.variables.set(name, value);
      this.ctx.observability.onDefine?.({ name, value });
    }
  };
}
