/**
 * Rule registry - maps rule names to rules.
 */
import type { RawDiagnostic } from '../diagnostics/types.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { IRule, RuleContext } from './types.js';

import {
  DuplicateFieldLabelRule,
  FieldAttributesRule,
  InconsistentComputeSudoRule,
  MethodDocstringRule,
  SelectionOnRelatedRule,
  TrackingWithoutMailThreadRule,
} from './python.js';
import {
  XmlDocumentRule,
  XmlDuplicateFieldsRule,
  XmlDuplicateRecordIdRule,
  XmlMarkupRule,
  XmlRecordRule,
  XmlViewPriorityRule,
} from './xml.js';
import { CsvDuplicateRecordIdRule } from './csv.js';
import { PoDuplicateMessageRule, PoEntryRule } from './po.js';
import { MissingReadmeRule } from './module.js';

/**
 * Registry of all rules, in reporting order.
 */
const ruleRegistry = new Map<string, IRule>();

function register(rule: IRule): void {
  ruleRegistry.set(rule.name, rule);
}

// Model classes
register(new DuplicateFieldLabelRule());
register(new InconsistentComputeSudoRule());
register(new TrackingWithoutMailThreadRule());
register(new SelectionOnRelatedRule());
register(new FieldAttributesRule());
register(new MethodDocstringRule());
// XML data
register(new XmlDuplicateRecordIdRule());
register(new XmlDuplicateFieldsRule());
register(new XmlRecordRule());
register(new XmlDocumentRule());
register(new XmlMarkupRule());
register(new XmlViewPriorityRule());
// CSV data
register(new CsvDuplicateRecordIdRule());
// Catalogs
register(new PoDuplicateMessageRule());
register(new PoEntryRule());
// Layout
register(new MissingReadmeRule());

/**
 * Get a rule by name.
 */
export function getRule(name: string): IRule | undefined {
  return ruleRegistry.get(name);
}

/**
 * Get all registered rules.
 */
export function getAllRules(): Map<string, IRule> {
  return ruleRegistry;
}

/**
 * Check if a rule exists.
 */
export function hasRule(name: string): boolean {
  return ruleRegistry.has(name);
}

/**
 * Run every registered rule over one add-on.
 * A rule that throws is logged and contributes nothing; the others still run.
 */
export function runRules(context: RuleContext, rules: Iterable<IRule> = ruleRegistry.values()): RawDiagnostic[] {
  const diagnostics: RawDiagnostic[] = [];
  for (const rule of rules) {
    try {
      diagnostics.push(...rule.check(context));
    } catch (error) {
      logger.error(`Rule "${rule.name}" failed on ${context.addon.name}: ${errorMessage(error)}`);
    }
  }
  return diagnostics;
}
