import type { Token } from './token-types.js';

/**
 * Every node keeps the token it was built from. The token supplies the
 * node's literal text and the location used in error reports.
 */
interface BaseNode {
  readonly token: Token;
}

// ============================================================
// PROGRAM
// ============================================================

/**
 * Root of a parsed source. Statements appear in source order;
 * a program with no statements is valid.
 */
export interface ProgramNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

/** let <name> = <value>; */
export interface LetStatementNode extends BaseNode {
  readonly type: 'LetStatement';
  readonly name: IdentifierNode;
  readonly value: ExpressionNode;
}

/** return <value>; */
export interface ReturnStatementNode extends BaseNode {
  readonly type: 'ReturnStatement';
  readonly value: ExpressionNode;
}

/**
 * A bare expression used as a statement. The trailing semicolon is
 * optional, so `x + 1` on its own is a complete program.
 */
export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

/** { <statement>* } as used by if-expressions and function bodies */
export interface BlockStatementNode extends BaseNode {
  readonly type: 'BlockStatement';
  readonly statements: StatementNode[];
}

export type StatementNode =
  | LetStatementNode
  | ReturnStatementNode
  | ExpressionStatementNode
  | BlockStatementNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

/** Integer literal, always within the signed 64-bit range */
export interface IntegerLiteralNode extends BaseNode {
  readonly type: 'IntegerLiteral';
  readonly value: bigint;
}

export interface BooleanLiteralNode extends BaseNode {
  readonly type: 'BooleanLiteral';
  readonly value: boolean;
}

/** !<right> or -<right> */
export interface PrefixExpressionNode extends BaseNode {
  readonly type: 'PrefixExpression';
  readonly operator: string;
  readonly right: ExpressionNode;
}

/** <left> <operator> <right> */
export interface InfixExpressionNode extends BaseNode {
  readonly type: 'InfixExpression';
  readonly left: ExpressionNode;
  readonly operator: string;
  readonly right: ExpressionNode;
}

/**
 * if (<condition>) { ... } else { ... }
 * alternative is null when there is no else branch.
 */
export interface IfExpressionNode extends BaseNode {
  readonly type: 'IfExpression';
  readonly condition: ExpressionNode;
  readonly consequence: BlockStatementNode;
  readonly alternative: BlockStatementNode | null;
}

/** fn(<parameters>) { <body> } */
export interface FunctionLiteralNode extends BaseNode {
  readonly type: 'FunctionLiteral';
  readonly parameters: IdentifierNode[];
  readonly body: BlockStatementNode;
}

/**
 * <callee>(<arguments>)
 * callee is an identifier or a function literal in well-formed source,
 * but any expression is accepted.
 */
export interface CallExpressionNode extends BaseNode {
  readonly type: 'CallExpression';
  readonly callee: ExpressionNode;
  readonly arguments: ExpressionNode[];
}

export type ExpressionNode =
  | IdentifierNode
  | IntegerLiteralNode
  | BooleanLiteralNode
  | PrefixExpressionNode
  | InfixExpressionNode
  | IfExpressionNode
  | FunctionLiteralNode
  | CallExpressionNode;

// ============================================================
// NODE UNIONS
// ============================================================

export type ASTNode = ProgramNode | StatementNode | ExpressionNode;

export type NodeType = ASTNode['type'];
