/**
 * Constant evaluation of Python literal expressions (strings, numbers, containers).
 */

import type Parser from 'tree-sitter';
import type { ManifestValue } from '../../core/facts/types.js';
import { getNodeText, getSignificantChildren } from './TreeSitterUtils.js';

const STRING_PREFIX = /^([a-zA-Z]*)('''|"""|'|")/;

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  f: '\f',
  v: '\v',
  '\n': '',
};

function decodeEscapes(body: string): string {
  return body.replace(
    /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|[\s\S])/g,
    (whole, seq: string) => {
      const simple = SIMPLE_ESCAPES[seq];
      if (simple !== undefined) return simple;
      if (/^[0-7]+$/.test(seq)) return String.fromCodePoint(parseInt(seq, 8));
      if (seq.length > 1 && 'xuU'.includes(seq[0])) {
        return String.fromCodePoint(parseInt(seq.slice(1), 16));
      }
      return whole;
    }
  );
}

/**
 * Decode a single string literal node. Returns null for f-strings and byte strings.
 */
export function decodeStringLiteral(node: Parser.SyntaxNode, sourceCode: string): string | null {
  const text = getNodeText(node, sourceCode);
  const match = STRING_PREFIX.exec(text);
  if (!match) return null;

  const prefix = match[1].toLowerCase();
  if (prefix.includes('f') || prefix.includes('b')) return null;

  const quote = match[2];
  const start = match[0].length;
  const end = text.length - quote.length;
  if (end < start || !text.endsWith(quote)) return null;

  const body = text.slice(start, end);
  return prefix.includes('r') ? body : decodeEscapes(body);
}

/**
 * Value of a `string` or implicitly concatenated string node, or null when it is not constant.
 */
export function getStringValue(node: Parser.SyntaxNode, sourceCode: string): string | null {
  if (node.type === 'string') {
    return decodeStringLiteral(node, sourceCode);
  }
  if (node.type === 'concatenated_string') {
    let result = '';
    for (const part of getSignificantChildren(node)) {
      const value = decodeStringLiteral(part, sourceCode);
      if (value === null) return null;
      result += value;
    }
    return result;
  }
  if (node.type === 'parenthesized_expression') {
    const inner = getSignificantChildren(node);
    return inner.length === 1 ? getStringValue(inner[0], sourceCode) : null;
  }
  return null;
}

function parseNumber(text: string): number | undefined {
  const value = Number(text.replace(/_/g, ''));
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Evaluate a literal expression the way `ast.literal_eval` would, for the subset manifests use.
 * Returns undefined for anything that is not a literal.
 */
export function evaluateLiteral(node: Parser.SyntaxNode, sourceCode: string): ManifestValue | undefined {
  switch (node.type) {
    case 'string':
    case 'concatenated_string': {
      const value = getStringValue(node, sourceCode);
      return value === null ? undefined : value;
    }
    case 'integer':
    case 'float':
      return parseNumber(getNodeText(node, sourceCode));
    case 'true':
      return true;
    case 'false':
      return false;
    case 'none':
      return null;
    case 'unary_operator': {
      const operand = node.childForFieldName('argument');
      const operator = getNodeText(node, sourceCode).trim().charAt(0);
      if (!operand) return undefined;
      const value = evaluateLiteral(operand, sourceCode);
      if (typeof value !== 'number') return undefined;
      return operator === '-' ? -value : value;
    }
    case 'parenthesized_expression': {
      const inner = getSignificantChildren(node);
      return inner.length === 1 ? evaluateLiteral(inner[0], sourceCode) : undefined;
    }
    case 'list':
    case 'tuple': {
      const items: ManifestValue[] = [];
      for (const child of getSignificantChildren(node)) {
        const value = evaluateLiteral(child, sourceCode);
        if (value === undefined) return undefined;
        items.push(value);
      }
      return items;
    }
    case 'dictionary': {
      const result: { [key: string]: ManifestValue } = {};
      for (const child of getSignificantChildren(node)) {
        if (child.type !== 'pair') return undefined;
        const keyNode = child.childForFieldName('key');
        const valueNode = child.childForFieldName('value');
        if (!keyNode || !valueNode) return undefined;
        const key = evaluateLiteral(keyNode, sourceCode);
        const value = evaluateLiteral(valueNode, sourceCode);
        if ((typeof key !== 'string' && typeof key !== 'number') || value === undefined) {
          return undefined;
        }
        result[String(key)] = value;
      }
      return result;
    }
    default:
      return undefined;
  }
}
