/**
 * Tests for shared tree-sitter utility functions, using the Python parser.
 */
import { describe, it, expect } from 'vitest';
import {
  createContext,
  findSyntaxProblem,
  getLocation,
  getNodeText,
  getSignificantChildren,
  walkTree,
} from '../../../../src/validators/tree-sitter/TreeSitterUtils.js';
import { createPythonParser } from '../../../../src/validators/tree-sitter/python-ast.js';

const parser = createPythonParser();

function parse(source: string) {
  return createContext(parser, source);
}

describe('TreeSitterUtils', () => {
  it('reads node text and 1-based locations', () => {
    const ctx = parse('x = 1\n\ny = 2\n');
    const [, second] = getSignificantChildren(ctx.tree.rootNode);

    expect(getNodeText(second, ctx.sourceCode)).toBe('y = 2');
    expect(getLocation(second)).toEqual({ line: 3, column: 1 });
  });

  it('leaves comments out of significant children', () => {
    const ctx = parse('# note\nx = 1\n');

    expect(getSignificantChildren(ctx.tree.rootNode).map((n) => n.type)).toEqual(['expression_statement']);
  });

  it('skips children when the callback returns false', () => {
    const ctx = parse('def f():\n    return 1\n');
    const visited: string[] = [];

    walkTree(ctx.tree.rootNode, (node) => {
      visited.push(node.type);
      return node.type !== 'function_definition';
    });

    expect(visited).toEqual(['module', 'function_definition']);
  });

  it('parses sources longer than the default buffer', () => {
    const source = 'x = 1\n'.repeat(10000);
    const ctx = parse(source);

    expect(getSignificantChildren(ctx.tree.rootNode)).toHaveLength(10000);
  });

  describe('findSyntaxProblem', () => {
    it('returns null for valid code', () => {
      expect(findSyntaxProblem(parse('x = 1\n').tree.rootNode)).toBeNull();
    });

    it('finds an error node', () => {
      const problem = findSyntaxProblem(parse('def f(:\n    pass\n').tree.rootNode);

      expect(problem).not.toBeNull();
    });
  });
});
