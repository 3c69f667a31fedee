/**
 * AST Visitor
 * Recursive traversal with enter/exit callbacks for printers and tooling.
 */

import type { ASTNode, BinaryExprNode } from './types.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * Visitor pattern interface for AST traversal.
 * Every callback receives the nesting depth: the root is visited at the
 * depth passed to visitNode, its children one deeper.
 */
export interface NodeVisitor {
  /** Called before visiting node's children */
  enter?(node: ASTNode, depth: number): void;

  /** Called between the left and right operands of a binary expression */
  infix?(node: BinaryExprNode, depth: number): void;

  /** Called after visiting node's children */
  exit?(node: ASTNode, depth: number): void;
}

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Recursively visit AST nodes with enter/exit callbacks.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children, left to right (infix between binary operands)
 * 3. visitor.exit(node)
 *
 * A declaration's variable name is part of the declaration and is not
 * visited; only its initializer is.
 */
export function visitNode(
  node: ASTNode,
  visitor: NodeVisitor,
  depth = 0
): void {
  visitor.enter?.(node, depth);

  switch (node.type) {
    case 'Program':
      for (const decl of node.declarations) {
        visitNode(decl, visitor, depth + 1);
      }
      break;

    case 'VarDecl':
      visitNode(node.initializer, visitor, depth + 1);
      break;

    case 'PrintStmt':
    case 'ExpressionStmt':
      visitNode(node.expression, visitor, depth + 1);
      break;

    case 'BinaryExpr':
      visitNode(node.left, visitor, depth + 1);
      visitor.infix?.(node, depth);
      visitNode(node.right, visitor, depth + 1);
      break;

    case 'UnaryExpr':
      visitNode(node.operand, visitor, depth + 1);
      break;

    case 'Identifier':
    case 'NumberLiteral':
    case 'StringLiteral':
    case 'TrueLiteral':
    case 'FalseLiteral':
    case 'NilLiteral':
      // Leaf nodes - no children
      break;
  }

  visitor.exit?.(node, depth);
}
