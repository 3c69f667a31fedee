/**
 * StatementsMixin: Declarations and Statements
 *
 * Executes one top-level declaration against the global environment and
 * returns the value it produced:
 * - `var name = e;` binds the value of `e`
 * - `print e;` sends the value of `e` to the onPrint callback
 * - `e;` evaluates `e` and discards it
 *
 * @internal
 */

import type { DeclarationNode } from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor, VariableAccess } from '../types.js';

export function StatementsMixin<
  TBase extends EvaluatorConstructor<EvaluatorBase & VariableAccess>,
>(Base: TBase) {
  return class StatementsEvaluator extends Base {
    /**
     * Execute a declaration.
     * This overrides the stub in EvaluatorBase.
     */
    override executeDeclaration(decl: DeclarationNode): LoxValue {
      switch (decl.type) {
        case 'VarDecl': {
          const value = this.evaluateExpression(decl.initializer);
          this.defineVariable(decl.name.name, value);
          return value;
        }
        case 'PrintStmt': {
          const value = this.evaluateExpression(decl.expression);
          this.ctx.callbacks.onPrint(value);
          return value;
        }
        case 'ExpressionStmt':
          return this.evaluateExpression(decl.expression);
      }
    }
  };
}
