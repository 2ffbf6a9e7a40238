/**
 * Python extractor: model classes, fields and methods via tree-sitter.
 */
import type Parser from 'tree-sitter';
import type { IFactExtractor, ExtractionInput } from './interface.types.js';
import type { PythonFacts, SourceUnit } from '../core/facts/types.js';
import { createContext, findSyntaxProblem } from './tree-sitter/TreeSitterUtils.js';
import { createPythonParser, extractModels } from './tree-sitter/python-ast.js';
import { errorMessage } from '../utils/errors.js';

export class PythonExtractor implements IFactExtractor<PythonFacts> {
  readonly language = 'python' as const;
  readonly supportedExtensions = ['.py'];
  private parser: Parser | null = null;

  private getParser(): Parser {
    if (!this.parser) {
      this.parser = createPythonParser();
    }
    return this.parser;
  }

  extract(input: ExtractionInput): SourceUnit<PythonFacts> {
    const unit: SourceUnit<PythonFacts> = {
      path: input.path,
      relativePath: input.relativePath,
      facts: { language: 'python', file: input.path, models: [] },
      error: null,
    };

    try {
      const ctx = createContext(this.getParser(), input.content);
      const problem = findSyntaxProblem(ctx.tree.rootNode);
      if (problem) {
        // Partial trees give misleading facts; keep the unit empty
        unit.error = { message: problem.message, line: problem.location.line };
        return unit;
      }
      unit.facts = { language: 'python', file: input.path, models: extractModels(ctx, input.path) };
    } catch (error) {
      unit.error = { message: `parser failure: ${errorMessage(error)}`, line: null };
    }
    return unit;
  }

  dispose(): void {
    this.parser = null;
  }
}
