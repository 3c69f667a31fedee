/**
 * treelox AST Nodes
 * Every node records the line of its leftmost token.
 */

// ============================================================
// OPERATORS
// ============================================================

/** Equality and comparison operators (Eq, Neq, Gt, GtEq, Lt, LtEq) */
export type ComparisonOp = '==' | '!=' | '>' | '>=' | '<' | '<=';

/** Arithmetic operators (Add, Sub, Div, Mult) */
export type ArithmeticOp = '+' | '-' | '/' | '*';

export type BinaryOp = ComparisonOp | ArithmeticOp;

/** Negative (`-x`) and Inverse (`!x`) */
export type UnaryOp = '-' | '!';

/**
 * Deepest expression tree the parser builds and the evaluator walks.
 * Counts operator levels and parenthesized groups.
 */
export const MAX_EXPRESSION_DEPTH = 256;

// ============================================================
// BASE NODE
// ============================================================

interface BaseNode {
  readonly line: number;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface TrueLiteralNode extends BaseNode {
  readonly type: 'TrueLiteral';
}

export interface FalseLiteralNode extends BaseNode {
  readonly type: 'FalseLiteral';
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export type LiteralNode =
  | NumberLiteralNode
  | StringLiteralNode
  | TrueLiteralNode
  | FalseLiteralNode
  | NilLiteralNode;

export type ExpressionNode =
  | BinaryExprNode
  | UnaryExprNode
  | IdentifierNode
  | LiteralNode;

// ============================================================
// STATEMENTS AND DECLARATIONS
// ============================================================

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExpressionNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExpressionNode;
}

export type StatementNode = ExpressionStmtNode | PrintStmtNode;

/** `var name = initializer;` */
export interface VarDeclNode extends BaseNode {
  readonly type: 'VarDecl';
  readonly name: IdentifierNode;
  readonly initializer: ExpressionNode;
}

export type DeclarationNode = VarDeclNode | StatementNode;

export interface ProgramNode {
  readonly type: 'Program';
  readonly declarations: readonly DeclarationNode[];
}

export type ASTNode = ProgramNode | DeclarationNode | ExpressionNode;
