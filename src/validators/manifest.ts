/**
 * Manifest extractor: evaluates the literal dict in `__manifest__.py`.
 */
import type Parser from 'tree-sitter';
import type { IFactExtractor, ExtractionInput } from './interface.types.js';
import type { ManifestFacts, ManifestValue, SourceUnit } from '../core/facts/types.js';
import {
  createContext,
  findSyntaxProblem,
  getLocation,
  getSignificantChildren,
} from './tree-sitter/TreeSitterUtils.js';
import { createPythonParser } from './tree-sitter/python-ast.js';
import { evaluateLiteral } from './tree-sitter/python-literal.js';
import { errorMessage } from '../utils/errors.js';

function isRecord(value: ManifestValue | undefined): value is { [key: string]: ManifestValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ManifestExtractor implements IFactExtractor<ManifestFacts> {
  readonly language = 'manifest' as const;
  readonly supportedExtensions: string[] = [];
  private parser: Parser | null = null;

  extract(input: ExtractionInput): SourceUnit<ManifestFacts> {
    const unit: SourceUnit<ManifestFacts> = {
      path: input.path,
      relativePath: input.relativePath,
      facts: null,
      error: null,
    };

    try {
      this.parser ??= createPythonParser();
      const ctx = createContext(this.parser, input.content);
      const root = ctx.tree.rootNode;
      const problem = findSyntaxProblem(root);
      if (problem) {
        unit.error = { message: problem.message, line: problem.location.line };
        return unit;
      }

      const expressions = getSignificantChildren(root)
        .filter((node) => node.type === 'expression_statement')
        .map((node) => getSignificantChildren(node)[0]);
      const expression = expressions.find((node) => node?.type === 'dictionary') ?? expressions[0];
      const value = expression ? evaluateLiteral(expression, input.content) : undefined;
      if (!isRecord(value)) {
        unit.error = {
          message: 'manifest is not a literal dict',
          line: expression ? getLocation(expression).line : 1,
        };
        return unit;
      }
      unit.facts = { language: 'manifest', file: input.path, values: value };
    } catch (error) {
      unit.error = { message: `parser failure: ${errorMessage(error)}`, line: null };
    }
    return unit;
  }

  dispose(): void {
    this.parser = null;
  }
}
