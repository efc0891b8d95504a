/**
 * Test helpers for walking parsed programs
 */

import { expect } from 'vitest';
import { parse, renderProgram } from '../../src/index.js';
import type {
  ASTNode,
  ExpressionNode,
  NodeType,
  ParseResult,
  ProgramNode,
} from '../../src/types.js';

/** Narrow a node to the variant named by type, failing the test otherwise */
export function expectNode<T extends NodeType>(
  node: ASTNode | null | undefined,
  type: T
): Extract<ASTNode, { type: T }> {
  expect(node?.type).toBe(type);
  if (!node || !isNodeOfType(node, type)) {
    throw new Error(`expected ${type}, got ${node?.type ?? 'nothing'}`);
  }
  return node;
}

function isNodeOfType<T extends NodeType>(
  node: ASTNode,
  type: T
): node is Extract<ASTNode, { type: T }> {
  return node.type === type;
}

/** Parse source that must produce no errors */
export function parseOk(source: string): ProgramNode {
  const result = parse(source);
  expect(result.errors.map((e) => e.message)).toEqual([]);
  return result.program;
}

/** Parse source and return the expression of its only statement */
export function parseSingleExpression(source: string): ExpressionNode {
  const program = parseOk(source);
  expect(program.statements).toHaveLength(1);
  return expectNode(program.statements[0], 'ExpressionStatement').expression;
}

/** Parse source that must produce no errors and render it */
export function renderOk(source: string): string {
  return renderProgram(parseOk(source));
}

/** Messages of every recorded error, in order */
export function errorMessages(result: ParseResult): string[] {
  return result.errors.map((e) => e.toData().message);
}
