/**
 * LiteralsMixin: Literal Values
 *
 * Literals evaluate to themselves. Number literals already hold their
 * 32-bit float value from the scanner.
 *
 * @internal
 */

import type { LiteralNode } from '../../../../types.js';
import type { LoxValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function LiteralsMixin<TBase extends EvaluatorConstructor>(Base: TBase) {
  return class LiteralsEvaluator extends Base {
    evaluateLiteral(node: LiteralNode): LoxValue {
      switch (node.type) {
        case 'NumberLiteral':
        case 'StringLiteral':
          return node.value;
        case 'TrueLiteral':
          return true;
        case 'FalseLiteral':
          return false;
        case 'NilLiteral':
          return null;
      }
    }
  };
}
