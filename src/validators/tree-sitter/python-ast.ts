/**
 * Model facts from Python source using tree-sitter.
 * One pass over the top-level classes collects model attributes, field declarations and methods.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { FieldFact, MethodFact, ModelFact, TriState } from '../../core/facts/types.js';
import {
  getLocation,
  getNodeText,
  getSignificantChildren,
  type TreeSitterContext,
} from './TreeSitterUtils.js';
import { getStringValue } from './python-literal.js';

/** Python tree-sitter node types for definitions */
const PyDefinitionNodes = {
  CLASS_DEFINITION: 'class_definition',
  FUNCTION_DEFINITION: 'function_definition',
  DECORATED_DEFINITION: 'decorated_definition',
  DECORATOR: 'decorator',
} as const;

/** Python tree-sitter node types for statements and expressions */
const PyStatementNodes = {
  EXPRESSION_STATEMENT: 'expression_statement',
  ASSIGNMENT: 'assignment',
  CALL: 'call',
  ATTRIBUTE: 'attribute',
  IDENTIFIER: 'identifier',
  KEYWORD_ARGUMENT: 'keyword_argument',
  LIST: 'list',
  TUPLE: 'tuple',
} as const;

export const FIELD_TYPES: ReadonlySet<string> = new Set([
  'Char',
  'Text',
  'Html',
  'Integer',
  'Float',
  'Monetary',
  'Boolean',
  'Date',
  'Datetime',
  'Binary',
  'Selection',
  'Many2one',
  'One2many',
  'Many2many',
  'Reference',
  'Image',
  'Json',
  'Properties',
  'PropertiesDefinition',
]);

/**
 * Positional parameters of the relational field constructors.
 * Every other field type takes the label as its first positional argument; a `selection`
 * is only recognized as a keyword.
 */
const RELATIONAL_SIGNATURES: Readonly<Record<string, readonly string[]>> = {
  Many2one: ['comodel_name', 'string'],
  One2many: ['comodel_name', 'inverse_name', 'string'],
  Many2many: ['comodel_name', 'relation', 'column1', 'column2', 'string'],
};

const DEFAULT_SIGNATURE: readonly string[] = ['string'];

const MODEL_BASES = new Set(['Model', 'TransientModel', 'AbstractModel']);

/** One-argument wrappers that mark a string for translation */
const TRANSLATION_MARKERS = new Set(['_', '_lt']);

/**
 * Creates a Python parser instance.
 *
 * Note: The type assertion `as unknown as Parser.Language` is required because
 * tree-sitter-python's TypeScript definitions don't extend tree-sitter's Language type,
 * despite being compatible at runtime.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

/**
 * Result of matching an expression against the field constructor vocabulary.
 */
export type FieldCallMatch =
  | { kind: 'field'; fieldType: string; call: Parser.SyntaxNode }
  | { kind: 'unrecognized' };

const UNRECOGNIZED: FieldCallMatch = { kind: 'unrecognized' };

/**
 * Recognize `fields.X(...)` or a bare `X(...)` where X is a known field type.
 */
export function recognizeFieldCall(node: Parser.SyntaxNode, sourceCode: string): FieldCallMatch {
  if (node.type !== PyStatementNodes.CALL) return UNRECOGNIZED;
  const fn = node.childForFieldName('function');
  if (!fn) return UNRECOGNIZED;

  let fieldType: string | null = null;
  if (fn.type === PyStatementNodes.ATTRIBUTE) {
    const object = fn.childForFieldName('object');
    const attribute = fn.childForFieldName('attribute');
    if (object?.type === PyStatementNodes.IDENTIFIER && attribute && getNodeText(object, sourceCode) === 'fields') {
      fieldType = getNodeText(attribute, sourceCode);
    }
  } else if (fn.type === PyStatementNodes.IDENTIFIER) {
    fieldType = getNodeText(fn, sourceCode);
  }

  if (!fieldType || !FIELD_TYPES.has(fieldType)) return UNRECOGNIZED;
  return { kind: 'field', fieldType, call: node };
}

/**
 * String value of an argument, looking through `_("...")` and `_lt("...")`.
 */
function getLabelValue(node: Parser.SyntaxNode, sourceCode: string): string | null {
  if (node.type === PyStatementNodes.CALL) {
    const fn = node.childForFieldName('function');
    const args = node.childForFieldName('arguments');
    if (fn?.type !== PyStatementNodes.IDENTIFIER || !args) return null;
    if (!TRANSLATION_MARKERS.has(getNodeText(fn, sourceCode))) return null;
    const inner = getSignificantChildren(args);
    return inner.length === 1 ? getStringValue(inner[0], sourceCode) : null;
  }
  return getStringValue(node, sourceCode);
}

type ConstantValue = { constant: true; truthy: boolean; isNone: boolean } | { constant: false };

function getConstant(node: Parser.SyntaxNode, sourceCode: string): ConstantValue {
  switch (node.type) {
    case 'true':
      return { constant: true, truthy: true, isNone: false };
    case 'false':
      return { constant: true, truthy: false, isNone: false };
    case 'none':
      return { constant: true, truthy: false, isNone: true };
    case 'integer':
    case 'float':
      return { constant: true, truthy: Number(getNodeText(node, sourceCode).replace(/_/g, '')) !== 0, isNone: false };
    case 'string':
    case 'concatenated_string': {
      const value = getStringValue(node, sourceCode);
      return value === null ? { constant: false } : { constant: true, truthy: value.length > 0, isNone: false };
    }
    default:
      return { constant: false };
  }
}

function buildField(name: string, fieldType: string, call: Parser.SyntaxNode, statement: Parser.SyntaxNode, sourceCode: string): FieldFact {
  const field: FieldFact = {
    name,
    type: fieldType,
    location: getLocation(statement),
    label: null,
    help: null,
    related: null,
    compute: null,
    computeSudo: null,
    tracking: null,
    selection: false,
    comodel: null,
    isPrivate: name.startsWith('_'),
  };

  const args = call.childForFieldName('arguments');
  if (!args) return field;

  const signature = RELATIONAL_SIGNATURES[fieldType] ?? DEFAULT_SIGNATURE;
  let position = 0;

  for (const arg of getSignificantChildren(args)) {
    if (arg.type === PyStatementNodes.KEYWORD_ARGUMENT) {
      const keyNode = arg.childForFieldName('name');
      const valueNode = arg.childForFieldName('value');
      if (!keyNode || !valueNode) continue;
      applyKeyword(field, getNodeText(keyNode, sourceCode), valueNode, sourceCode);
      continue;
    }
    if (arg.type === 'list_splat' || arg.type === 'dictionary_splat') {
      continue;
    }

    const param = position < signature.length ? signature[position] : null;
    position++;
    if (param === 'string' && field.label === null) {
      field.label = getLabelValue(arg, sourceCode);
    } else if (param === 'comodel_name') {
      field.comodel = getStringValue(arg, sourceCode);
    }
  }

  return field;
}

function toTriState(value: ConstantValue, nonConstant: TriState): TriState {
  if (!value.constant) return nonConstant;
  if (value.isNone) return null;
  return value.truthy;
}

function applyKeyword(field: FieldFact, key: string, value: Parser.SyntaxNode, sourceCode: string): void {
  switch (key) {
    case 'string':
      field.label = getLabelValue(value, sourceCode);
      break;
    case 'help':
      field.help = getLabelValue(value, sourceCode);
      break;
    case 'related':
      field.related = getStringValue(value, sourceCode);
      break;
    case 'compute':
      field.compute =
        value.type === PyStatementNodes.IDENTIFIER
          ? getNodeText(value, sourceCode)
          : getStringValue(value, sourceCode);
      break;
    case 'compute_sudo':
      field.computeSudo = toTriState(getConstant(value, sourceCode), null);
      break;
    case 'tracking': {
      const constant = getConstant(value, sourceCode);
      field.tracking = constant.constant ? constant.truthy : true;
      break;
    }
    case 'selection':
      field.selection = true;
      break;
    case 'comodel_name':
      field.comodel = getStringValue(value, sourceCode);
      break;
  }
}

function extractDecoratorName(decorator: Parser.SyntaxNode, sourceCode: string): string | null {
  const [expression] = getSignificantChildren(decorator);
  if (!expression) return null;

  const target = expression.type === PyStatementNodes.CALL ? expression.childForFieldName('function') : expression;
  if (!target) return null;
  if (target.type === PyStatementNodes.IDENTIFIER) return getNodeText(target, sourceCode);
  if (target.type === PyStatementNodes.ATTRIBUTE) {
    const attribute = target.childForFieldName('attribute');
    return attribute ? getNodeText(attribute, sourceCode) : null;
  }
  return null;
}

function extractDocstring(fn: Parser.SyntaxNode, sourceCode: string): string | null {
  const body = fn.childForFieldName('body');
  if (!body) return null;
  const [first] = getSignificantChildren(body);
  if (first?.type !== PyStatementNodes.EXPRESSION_STATEMENT) return null;
  const parts = getSignificantChildren(first);
  if (parts.length !== 1) return null;
  return getStringValue(parts[0], sourceCode);
}

function buildMethod(fn: Parser.SyntaxNode, decorators: Parser.SyntaxNode[], sourceCode: string): MethodFact | null {
  const nameNode = fn.childForFieldName('name');
  if (!nameNode) return null;
  const name = getNodeText(nameNode, sourceCode);

  return {
    name,
    location: getLocation(fn),
    isPrivate: name.startsWith('_'),
    isMagic: name.startsWith('__') && name.endsWith('__'),
    isAsync: fn.children.some((child) => child.type === 'async'),
    docstring: extractDocstring(fn, sourceCode),
    decorators: decorators
      .map((d) => extractDecoratorName(d, sourceCode))
      .filter((d): d is string => d !== null),
  };
}

/** Names bound by `a = b = value`, with the final right-hand side. */
function unwrapAssignment(node: Parser.SyntaxNode, sourceCode: string): { targets: string[]; value: Parser.SyntaxNode | null } {
  const targets: string[] = [];
  let current: Parser.SyntaxNode | null = node;
  while (current?.type === PyStatementNodes.ASSIGNMENT) {
    const left = current.childForFieldName('left');
    if (left?.type === PyStatementNodes.IDENTIFIER) {
      targets.push(getNodeText(left, sourceCode));
    }
    current = current.childForFieldName('right');
  }
  return { targets, value: current };
}

function extractInherit(node: Parser.SyntaxNode, sourceCode: string): string[] {
  const single = getStringValue(node, sourceCode);
  if (single !== null) return [single];
  if (node.type === PyStatementNodes.LIST || node.type === PyStatementNodes.TUPLE) {
    return getSignificantChildren(node)
      .map((child) => getStringValue(child, sourceCode))
      .filter((value): value is string => value !== null);
  }
  return [];
}

function extractBases(classNode: Parser.SyntaxNode, sourceCode: string): string[] {
  const superclasses = classNode.childForFieldName('superclasses');
  if (!superclasses) return [];
  return getSignificantChildren(superclasses)
    .filter((child) => child.type === PyStatementNodes.IDENTIFIER || child.type === PyStatementNodes.ATTRIBUTE)
    .map((child) => getNodeText(child, sourceCode));
}

function extractModel(classNode: Parser.SyntaxNode, file: string, sourceCode: string): ModelFact | null {
  const nameNode = classNode.childForFieldName('name');
  const body = classNode.childForFieldName('body');
  if (!nameNode || !body) return null;

  const bases = extractBases(classNode, sourceCode);
  const model: ModelFact = {
    className: getNodeText(nameNode, sourceCode),
    location: getLocation(classNode),
    name: null,
    inherit: [],
    description: null,
    isOdooModel: bases.some((base) => MODEL_BASES.has(base.split('.').pop() ?? base)),
    bases,
    fields: [],
    methods: [],
    file,
    hasMailThread: false,
  };

  for (const statement of getSignificantChildren(body)) {
    if (statement.type === PyStatementNodes.EXPRESSION_STATEMENT) {
      const [expression] = getSignificantChildren(statement);
      if (expression?.type !== PyStatementNodes.ASSIGNMENT) continue;
      const { targets, value } = unwrapAssignment(expression, sourceCode);
      if (!value) continue;

      for (const target of targets) {
        if (target === '_name') {
          const name = getStringValue(value, sourceCode);
          if (name !== null) {
            model.name = name;
            model.isOdooModel = true;
          }
        } else if (target === '_inherit') {
          model.inherit = extractInherit(value, sourceCode);
          model.isOdooModel = true;
        } else if (target === '_description') {
          model.description = getStringValue(value, sourceCode);
        } else {
          const match = recognizeFieldCall(value, sourceCode);
          if (match.kind === 'field') {
            model.fields.push(buildField(target, match.fieldType, match.call, statement, sourceCode));
          }
        }
      }
    } else if (statement.type === PyDefinitionNodes.FUNCTION_DEFINITION) {
      const method = buildMethod(statement, [], sourceCode);
      if (method) model.methods.push(method);
    } else if (statement.type === PyDefinitionNodes.DECORATED_DEFINITION) {
      const definition = statement.childForFieldName('definition');
      if (definition?.type !== PyDefinitionNodes.FUNCTION_DEFINITION) continue;
      const decorators = statement.namedChildren.filter((c) => c.type === PyDefinitionNodes.DECORATOR);
      const method = buildMethod(definition, decorators, sourceCode);
      if (method) model.methods.push(method);
    }
  }

  return model;
}

/**
 * Extract one ModelFact per top-level class (decorated classes included).
 */
export function extractModels(ctx: TreeSitterContext, file: string): ModelFact[] {
  const models: ModelFact[] = [];

  for (const node of getSignificantChildren(ctx.tree.rootNode)) {
    let classNode: Parser.SyntaxNode | null = null;
    if (node.type === PyDefinitionNodes.CLASS_DEFINITION) {
      classNode = node;
    } else if (node.type === PyDefinitionNodes.DECORATED_DEFINITION) {
      const definition = node.childForFieldName('definition');
      if (definition?.type === PyDefinitionNodes.CLASS_DEFINITION) classNode = definition;
    }
    if (!classNode) continue;

    const model = extractModel(classNode, file, ctx.sourceCode);
    if (model) models.push(model);
  }

  return models;
}
