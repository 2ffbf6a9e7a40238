/**
 * XML extractor: a line-numbered element tree built from saxes events.
 */
import { SaxesParser } from 'saxes';
import type { IFactExtractor, ExtractionInput } from './interface.types.js';
import type { ParseFailure, SourceUnit, XmlElement, XmlFacts } from '../core/facts/types.js';
import { errorMessage } from '../utils/errors.js';

export const PLACEHOLDER_ROOT = '__empty__';

export function createPlaceholderRoot(): XmlElement {
  return { name: PLACEHOLDER_ROOT, attributes: {}, children: [], parent: null, text: '', line: 1 };
}

interface ParseState {
  root: XmlElement | null;
  error: ParseFailure | null;
}

/** saxes prefixes messages with `[file:]line:column: ` */
function stripPosition(message: string): string {
  return message.replace(/^(?:[^:\n]*:)?\d+:\d+: /, '');
}

/**
 * Parse an XML document into an element tree. Stops at the first well-formedness error.
 */
export function parseXmlDocument(content: string): ParseState {
  const state: ParseState = { root: null, error: null };
  const parser = new SaxesParser({ position: true });
  const stack: XmlElement[] = [];
  let tagLine = 1;

  parser.on('opentagstart', () => {
    tagLine = parser.line;
  });

  parser.on('opentag', (tag) => {
    const parent = stack.length > 0 ? stack[stack.length - 1] : null;
    const element: XmlElement = {
      name: tag.name,
      attributes: { ...tag.attributes },
      children: [],
      parent,
      text: '',
      line: tagLine,
    };
    if (parent) {
      parent.children.push(element);
    } else if (!state.root) {
      state.root = element;
    }
    stack.push(element);
  });

  // Emitted for self-closing tags as well
  parser.on('closetag', () => {
    stack.pop();
  });

  const appendText = (text: string): void => {
    if (stack.length > 0) {
      stack[stack.length - 1].text += text;
    }
  };
  parser.on('text', appendText);
  parser.on('cdata', appendText);

  parser.on('error', (err) => {
    state.error ??= { message: stripPosition(err.message), line: parser.line };
  });

  try {
    parser.write(content).close();
  } catch (error) {
    state.error ??= { message: stripPosition(errorMessage(error)), line: parser.line };
  }

  if (!state.error && !state.root) {
    state.error = { message: 'document must contain a root element', line: 1 };
  }
  return state;
}

export class XmlExtractor implements IFactExtractor<XmlFacts> {
  readonly language = 'xml' as const;
  readonly supportedExtensions = ['.xml'];

  extract(input: ExtractionInput): SourceUnit<XmlFacts> {
    const { root, error } = parseXmlDocument(input.content);
    return {
      path: input.path,
      relativePath: input.relativePath,
      facts: {
        language: 'xml',
        file: input.path,
        dataSection: input.dataSection ?? 'data',
        root: error || !root ? createPlaceholderRoot() : root,
      },
      error,
    };
  }

  dispose(): void {
    // Nothing held between files
  }
}

/**
 * Depth-first list of the element and all of its descendants.
 */
export function descendantsAndSelf(element: XmlElement): XmlElement[] {
  const result: XmlElement[] = [];
  const visit = (node: XmlElement): void => {
    result.push(node);
    for (const child of node.children) visit(child);
  };
  visit(element);
  return result;
}
