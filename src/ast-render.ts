/**
 * AST Rendering
 * Converts nodes back to source text
 */

import type {
  ASTNode,
  BlockStatementNode,
  ExpressionNode,
  ProgramNode,
  StatementNode,
} from './ast-nodes.js';

/**
 * Literal text of the token a node was built from.
 * A program has no token of its own and reports its first statement's.
 */
export function tokenLiteral(node: ASTNode): string {
  if (node.type === 'Program') {
    const first = node.statements[0];
    return first ? tokenLiteral(first) : '';
  }
  return node.token.value;
}

/**
 * Render a node as source text.
 *
 * Every prefix and infix expression is wrapped in parentheses, so the output
 * shows how operators were grouped: `a + b * c` renders as `(a + (b * c))`.
 * Parsing the rendered text produces an equivalent tree.
 */
export function renderNode(node: ASTNode): string {
  switch (node.type) {
    case 'Program':
      return renderStatements(node.statements);
    case 'LetStatement':
    case 'ReturnStatement':
    case 'ExpressionStatement':
    case 'BlockStatement':
      return renderStatement(node);
    default:
      return renderExpression(node);
  }
}

function renderStatement(node: StatementNode): string {
  switch (node.type) {
    case 'LetStatement':
      return `let ${node.name.name} = ${renderExpression(node.value)};`;
    case 'ReturnStatement':
      return `return ${renderExpression(node.value)};`;
    case 'ExpressionStatement':
      return renderExpression(node.expression);
    case 'BlockStatement':
      return renderBlock(node);
    default: {
      const unreachable: never = node;
      throw new TypeError(`Unknown statement: ${JSON.stringify(unreachable)}`);
    }
  }
}

function renderExpression(node: ExpressionNode): string {
  switch (node.type) {
    case 'Identifier':
      return node.name;
    case 'IntegerLiteral':
    case 'BooleanLiteral':
      return node.token.value;
    case 'PrefixExpression':
      return `(${node.operator}${renderExpression(node.right)})`;
    case 'InfixExpression':
      return `(${renderExpression(node.left)} ${node.operator} ${renderExpression(node.right)})`;
    case 'IfExpression': {
      const head = `if (${renderExpression(node.condition)}) ${renderBlock(node.consequence)}`;
      return node.alternative
        ? `${head} else ${renderBlock(node.alternative)}`
        : head;
    }
    case 'FunctionLiteral': {
      const params = node.parameters.map((p) => p.name).join(', ');
      return `fn(${params}) ${renderBlock(node.body)}`;
    }
    case 'CallExpression': {
      const args = node.arguments.map(renderExpression).join(', ');
      return `${renderExpression(node.callee)}(${args})`;
    }
    default: {
      const unreachable: never = node;
      throw new TypeError(`Unknown expression: ${JSON.stringify(unreachable)}`);
    }
  }
}

function renderBlock(node: BlockStatementNode): string {
  if (node.statements.length === 0) return '{}';
  return `{ ${renderStatements(node.statements)} }`;
}

/**
 * Statements are separated by a space. An expression statement that is
 * followed by another statement gets a semicolon, otherwise `a` then `-b`
 * would read back as `a - b`.
 */
function renderStatements(statements: StatementNode[]): string {
  return statements
    .map((statement, i) => {
      const text = renderStatement(statement);
      const isLast = i === statements.length - 1;
      return statement.type === 'ExpressionStatement' && !isLast
        ? `${text};`
        : text;
    })
    .join(' ');
}

/** Render a whole program; alias of renderNode for the common case */
export function renderProgram(program: ProgramNode): string {
  return renderNode(program);
}
