/**
 * Shared tree-sitter helpers for the Python-based extractors.
 */

import Parser from 'tree-sitter';
import type { SourceLocation } from '../../core/facts/types.js';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  parser: Parser;
  tree: Parser.Tree;
  sourceCode: string;
}

/**
 * Creates a tree-sitter parsing context.
 */
export function createContext(parser: Parser, sourceCode: string): TreeSitterContext {
  // The default input buffer rejects sources longer than 32k characters
  const tree = parser.parse(sourceCode, undefined, {
    bufferSize: Math.max(32 * 1024, sourceCode.length * 2 + 1),
  });
  return { parser, tree, sourceCode };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(node: Parser.SyntaxNode, sourceCode: string): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Walks the AST depth-first, calling the callback for each node.
 * Returning `false` from the callback skips the node's children.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Named children minus comments, which tree-sitter attaches anywhere.
 */
export function getSignificantChildren(node: Parser.SyntaxNode): Parser.SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type !== 'comment');
}

export interface SyntaxProblem {
  message: string;
  location: SourceLocation;
}

/**
 * Finds the first syntax problem in the tree: an ERROR node or a token the parser had to invent.
 * Inserted tokens are zero-width leaves.
 */
export function findSyntaxProblem(root: Parser.SyntaxNode): SyntaxProblem | null {
  let problem: SyntaxProblem | null = null;

  walkTree(root, (node) => {
    if (problem) return false;
    if (node.type === 'ERROR') {
      problem = { message: 'invalid syntax', location: getLocation(node) };
      return false;
    }
    if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex) {
      problem = { message: `missing "${node.type}"`, location: getLocation(node) };
      return false;
    }
    return true;
  });

  return problem;
}
