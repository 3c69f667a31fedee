/**
 * AST Debug Printer
 * Indented, parenthesis-free rendering of declarations for --debug-ast.
 */

import { formatNumber, visitNode } from '@treelox/core';
import type {
  ASTNode,
  DeclarationNode,
  NodeVisitor,
} from '@treelox/core';

/** Spaces per nesting level */
const INDENT_WIDTH = 4;

/** Text of a node's own line, or null for nodes that print nothing */
function nodeLabel(node: ASTNode): string | null {
  switch (node.type) {
    case 'VarDecl':
      return `var ${node.name.name} =`;
    case 'PrintStmt':
      return 'print';
    case 'UnaryExpr':
      return node.op;
    case 'Identifier':
      return node.name;
    case 'NumberLiteral':
      return formatNumber(node.value);
    case 'StringLiteral':
      return node.value;
    case 'TrueLiteral':
      return 'true';
    case 'FalseLiteral':
      return 'false';
    case 'NilLiteral':
      return 'nil';
    case 'Program':
    case 'ExpressionStmt':
    case 'BinaryExpr':
      // Binary operators print between their operands
      return null;
  }
}

/**
 * Render one declaration.
 *
 * Binary expressions print the left operand block, the operator at the
 * current indent, then the right operand block; operands indent one level.
 * An expression statement prints its expression with no header line.
 *
 * @example
 * formatDeclaration(parseSource('print 1 - 2;').declarations[0])
 * // ['print', '        1', '    -', '        2']
 */
export function formatDeclaration(decl: DeclarationNode): string[] {
  const lines: string[] = [];
  const emit = (text: string, depth: number): void => {
    lines.push(`${' '.repeat(depth * INDENT_WIDTH)}${text}`);
  };

  const printer: NodeVisitor = {
    enter(node, depth) {
      const label = nodeLabel(node);
      if (label !== null) emit(label, depth);
    },
    infix(node, depth) {
      emit(node.op, depth);
    },
  };

  if (decl.type === 'ExpressionStmt') {
    visitNode(decl.expression, printer);
  } else {
    visitNode(decl, printer);
  }
  return lines;
}
