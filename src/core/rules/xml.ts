/**
 * Checks over XML data files: records, views and templates.
 */
import * as path from 'node:path';
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type { SourceUnit, XmlElement, XmlFacts } from '../facts/types.js';
import { descendantsAndSelf } from '../../validators/xml.js';
import { BaseRule, BaseUnitRule, groupBy, hasFacts, type ParsedUnit } from './base.js';
import type { AddonFacts, RuleContext } from './types.js';
import {
  DATA_ROOTS,
  attr,
  children,
  dataRecords,
  descendants,
  fieldsNamed,
  hasAttr,
  parseInteger,
} from './xml-query.js';

/** Views replacing content need at least this priority. */
export const MIN_REPLACE_PRIORITY = 99;

/** Quoted integers above this are reported as possible database ids. */
export const HARDCODED_ID_THRESHOLD = 100;

const DEFAULT_VIEW_PRIORITY = '16';
const DEPRECATED_TREE_ATTRIBUTES = ['string', 'colors', 'fonts'];
const DEPRECATED_QWEB_DIRECTIVES = ['t-esc-options', 't-field-options', 't-raw-options'];
const ACTIVE_ID_ATTRIBUTES = ['context', 'domain', 'attrs', 'options', 'filter_domain', 'default', 'eval'];
const HARDCODED_ID_ATTRIBUTES = ['domain', 'context', 'eval'];
const ALERT_ROLES: ReadonlySet<string> = new Set(['alert', 'alertdialog', 'status']);
const RESOURCE_ATTRIBUTES: ReadonlyArray<readonly [string, string]> = [
  ['link', 'href'],
  ['script', 'src'],
];

abstract class XmlUnitRule extends BaseUnitRule<XmlFacts> {
  readonly language = 'xml';

  protected selectUnits(addon: AddonFacts): SourceUnit<XmlFacts>[] {
    return addon.xml;
  }
}

/**
 * `priority` field of a view, read as an integer; 0 when absent or not numeric.
 */
export function getViewPriority(record: XmlElement): number {
  const [node] = fieldsNamed(record, 'priority');
  if (!node) return 0;
  return parseInteger(attr(node, 'eval') ?? node.text) ?? 0;
}

/**
 * Whether the view's xml arch replaces anything.
 */
export function isReplacingView(record: XmlElement): boolean {
  const arch = fieldsNamed(record, 'arch').find((field) => attr(field, 'type') === 'xml');
  if (!arch) return false;
  return descendants(arch).some((el) => attr(el, 'position') === 'replace');
}

/**
 * Record ids repeated within a data section, across every XML file of the add-on.
 */
export class XmlDuplicateRecordIdRule extends BaseRule {
  readonly name = 'xml-duplicate-record-id';
  readonly language = 'xml';
  readonly kinds: readonly DiagnosticKind[] = ['xml_duplicate_record_id'];

  check(context: RuleContext): RawDiagnostic[] {
    const occurrences: Array<{ key: string; unit: ParsedUnit<XmlFacts>; record: XmlElement }> = [];
    for (const unit of context.addon.xml) {
      if (!hasFacts(unit)) continue;
      for (const record of dataRecords(unit.facts.root)) {
        const noupdate = (record.parent && attr(record.parent, 'noupdate')) ?? '0';
        const key = `${unit.facts.dataSection}/${attr(record, 'id') ?? ''}_noupdate_${noupdate}`;
        occurrences.push({ key, unit, record });
      }
    }

    const diagnostics: RawDiagnostic[] = [];
    for (const [key, group] of groupBy(occurrences, (o) => o.key)) {
      if (group.length < 2) continue;
      const [first, ...others] = group;
      const where = others.map((o) => `${o.unit.relativePath}:${o.record.line}`).join(', ');
      diagnostics.push(
        this.createDiagnostic(
          'xml_duplicate_record_id',
          first.unit.path,
          first.record.line,
          `Duplicate xml record id "${key}" in ${where}`
        )
      );
    }
    return diagnostics;
  }
}

/**
 * `field[@name] | field/*\/field[@name] | field/*\/field/(tree|form)/field[@name]`
 * under one record, in document order.
 */
function recordFields(record: XmlElement): XmlElement[] {
  const found = new Set<XmlElement>();
  const named = (el: XmlElement): XmlElement[] =>
    children(el, 'field').filter((field) => hasAttr(field, 'name'));

  for (const field of children(record, 'field')) {
    if (hasAttr(field, 'name')) found.add(field);
    for (const wrapper of field.children) {
      for (const inner of children(wrapper, 'field')) {
        if (hasAttr(inner, 'name')) found.add(inner);
        for (const view of inner.children) {
          if (view.name === 'tree' || view.name === 'form') {
            for (const nested of named(view)) found.add(nested);
          }
        }
      }
    }
  }

  const order = new Map(descendants(record).map((el, index) => [el, index]));
  return [...found].sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));
}

export class XmlDuplicateFieldsRule extends XmlUnitRule {
  readonly name = 'xml-duplicate-fields';
  readonly kinds: readonly DiagnosticKind[] = ['xml_duplicate_fields'];

  protected checkUnit(unit: ParsedUnit<XmlFacts>): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    for (const record of dataRecords(unit.facts.root)) {
      if (fieldsNamed(record, 'inherit_id').length > 0) continue;

      // Same name, context and filter under the same parent element
      const byParent = groupBy(recordFields(record), (field) => field.parent);
      for (const siblings of byParent.values()) {
        const groups = groupBy(siblings, (field) =>
          JSON.stringify([attr(field, 'name'), attr(field, 'context'), attr(field, 'filter_domain')])
        );
        for (const fields of groups.values()) {
          if (fields.length < 2) continue;
          const [first, ...others] = fields;
          diagnostics.push(
            this.createDiagnostic(
              'xml_duplicate_fields',
              unit.path,
              first.line,
              `Duplicate xml field "${attr(first, 'name') ?? ''}" in lines ${others.map((f) => f.line).join(', ')}`
            )
          );
        }
      }
    }
    return diagnostics;
  }
}

/**
 * Per-record checks: ids, views, users and filters.
 */
export class XmlRecordRule extends XmlUnitRule {
  readonly name = 'xml-record';
  readonly kinds: readonly DiagnosticKind[] = [
    'xml_redundant_module_name',
    'xml_view_dangerous_replace_low_priority',
    'xml_deprecated_tree_attribute',
    'xml_create_user_wo_reset_password',
    'xml_dangerous_filter_wo_user',
  ];

  protected checkUnit(unit: ParsedUnit<XmlFacts>, context: RuleContext): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    const file = unit.path;

    for (const record of dataRecords(unit.facts.root)) {
      const id = attr(record, 'id') ?? '';
      const dot = id.indexOf('.');
      if (dot >= 0 && id.slice(0, dot) === context.addon.name) {
        diagnostics.push(
          this.createDiagnostic(
            'xml_redundant_module_name',
            file,
            record.line,
            `Redundant module name <record id="${id}" better using only <record id="${id.slice(dot + 1)}"`
          )
        );
      }

      const model = attr(record, 'model');
      if (model === 'ir.ui.view') {
        const priority = getViewPriority(record);
        if (isReplacingView(record) && priority < MIN_REPLACE_PRIORITY) {
          diagnostics.push(
            this.createDiagnostic(
              'xml_view_dangerous_replace_low_priority',
              file,
              record.line,
              `Dangerous "replace" with priority ${priority} < ${MIN_REPLACE_PRIORITY}`
            )
          );
        }
        for (const tree of descendants(record)) {
          if (tree.name !== 'tree') continue;
          const found = DEPRECATED_TREE_ATTRIBUTES.filter((name) => hasAttr(tree, name));
          if (found.length === 0) continue;
          diagnostics.push(
            this.createDiagnostic(
              'xml_deprecated_tree_attribute',
              file,
              tree.line,
              `Deprecated "<tree ${found.join(', ')}=..."`
            )
          );
        }
      } else if (model === 'res.users') {
        const recordContext = attr(record, 'context') ?? '';
        if (fieldsNamed(record, 'name').length > 0 && !recordContext.includes('no_reset_password')) {
          diagnostics.push(
            this.createDiagnostic(
              'xml_create_user_wo_reset_password',
              file,
              record.line,
              `record res.users without context="{'no_reset_password': True}"`
            )
          );
        }
      } else if (model === 'ir.filters') {
        if (fieldsNamed(record, 'name', 'user_id').length === 1) {
          diagnostics.push(
            this.createDiagnostic(
              'xml_dangerous_filter_wo_user',
              file,
              record.line,
              'Dangerous filter without explicit `user_id`'
            )
          );
        }
      }
    }
    return diagnostics;
  }
}

function insideTemplate(element: XmlElement): boolean {
  for (let p = element.parent; p; p = p.parent) {
    if (p.name === 'template') return true;
  }
  return false;
}

function resourceExtension(resource: string): string {
  return path.posix.extname(resource.slice(resource.lastIndexOf('/') + 1));
}

/**
 * Document-level checks: root nodes, QWeb directives and static resources.
 */
export class XmlDocumentRule extends XmlUnitRule {
  readonly name = 'xml-document';
  readonly kinds: readonly DiagnosticKind[] = [
    'xml_deprecated_data_node',
    'xml_deprecated_openerp_xml_node',
    'xml_deprecated_qweb_directive',
    'xml_not_valid_char_link',
  ];

  protected checkUnit(unit: ParsedUnit<XmlFacts>): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    const root = unit.facts.root;
    const file = unit.path;

    if (DATA_ROOTS.has(root.name)) {
      if (root.children.length === 1 && root.children[0].name === 'data') {
        diagnostics.push(
          this.createDiagnostic('xml_deprecated_data_node', file, root.line, 'Use <odoo> instead of <odoo><data>')
        );
      }
      if (root.name === 'openerp') {
        diagnostics.push(
          this.createDiagnostic(
            'xml_deprecated_openerp_xml_node',
            file,
            root.line,
            'Deprecated <openerp> xml node, use <odoo>'
          )
        );
      }
      for (const el of descendants(root)) {
        const found = DEPRECATED_QWEB_DIRECTIVES.filter((name) => hasAttr(el, name));
        if (found.length === 0 || !insideTemplate(el)) continue;
        diagnostics.push(
          this.createDiagnostic(
            'xml_deprecated_qweb_directive',
            file,
            el.line,
            `Deprecated QWeb directive "${found.join(', ')}". Use "t-options"`
          )
        );
      }
    }

    for (const el of descendants(root)) {
      for (const [tag, attribute] of RESOURCE_ATTRIBUTES) {
        if (el.name !== tag) continue;
        const resource = attr(el, attribute);
        if (resource === undefined) continue;
        if (resource.startsWith('/') && !/^\.[a-zA-Z]+$/.test(resourceExtension(resource))) {
          diagnostics.push(
            this.createDiagnostic('xml_not_valid_char_link', file, el.line, 'Resource contains invalid character')
          );
        }
      }
    }
    return diagnostics;
  }
}

/**
 * Attribute-level checks on view markup.
 */
export class XmlMarkupRule extends XmlUnitRule {
  readonly name = 'xml-markup';
  readonly kinds: readonly DiagnosticKind[] = [
    'xml_deprecated_active_id_usage',
    'xml_alert_missing_role',
    'xml_button_without_type',
    'xml_deprecated_t_raw',
    'xml_hardcoded_id',
  ];

  protected checkUnit(unit: ParsedUnit<XmlFacts>): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    const file = unit.path;
    const elements = descendantsAndSelf(unit.facts.root);

    for (const attribute of ACTIVE_ID_ATTRIBUTES) {
      for (const el of elements) {
        const value = attr(el, attribute);
        if (value === undefined) continue;
        for (const match of value.match(/\b(?:active_id|active_ids|active_model)\b/g) ?? []) {
          diagnostics.push(
            this.createDiagnostic(
              'xml_deprecated_active_id_usage',
              file,
              el.line,
              `Deprecated use of "${match}" in ${attribute}="${value.slice(0, 50)}..."`
            )
          );
        }
      }
    }

    for (const el of elements) {
      const classes = attr(el, 'class');
      if (classes?.includes('alert-') && !classes.includes('alert-link')) {
        if (!ALERT_ROLES.has(attr(el, 'role') ?? '')) {
          diagnostics.push(
            this.createDiagnostic(
              'xml_alert_missing_role',
              file,
              el.line,
              `Element with class "${classes}" should have role="alert", role="alertdialog", or role="status"`
            )
          );
        }
      }

      if (el.name === 'button' && !hasAttr(el, 'type') && !hasAttr(el, 'special')) {
        diagnostics.push(
          this.createDiagnostic(
            'xml_button_without_type',
            file,
            el.line,
            `Button "${attr(el, 'name') ?? 'unnamed'}" is missing type attribute`
          )
        );
      }

      const raw = attr(el, 't-raw');
      if (raw !== undefined) {
        diagnostics.push(
          this.createDiagnostic(
            'xml_deprecated_t_raw',
            file,
            el.line,
            `Deprecated t-raw="${raw}", use t-out with markup() instead`
          )
        );
      }
    }

    for (const attribute of HARDCODED_ID_ATTRIBUTES) {
      for (const el of elements) {
        const value = attr(el, attribute);
        if (value === undefined || value.includes('ref(')) continue;
        for (const match of value.matchAll(/['"](\d+)['"]/g)) {
          if (Number(match[1]) <= HARDCODED_ID_THRESHOLD) continue;
          diagnostics.push(
            this.createDiagnostic(
              'xml_hardcoded_id',
              file,
              el.line,
              `Possible hardcoded ID "${match[1]}" in ${attribute}, consider using ref()`
            )
          );
        }
      }
    }

    return diagnostics;
  }
}

/**
 * Inherited views of the same parent sharing a priority, within one file.
 */
export class XmlViewPriorityRule extends XmlUnitRule {
  readonly name = 'xml-view-priority';
  readonly kinds: readonly DiagnosticKind[] = ['xml_duplicate_view_priority'];

  protected checkUnit(unit: ParsedUnit<XmlFacts>): RawDiagnostic[] {
    const views: Array<{ record: XmlElement; parent: string; priority: string }> = [];
    for (const record of descendantsAndSelf(unit.facts.root)) {
      if (record.name !== 'record' || attr(record, 'model') !== 'ir.ui.view') continue;
      const [inherit] = fieldsNamed(record, 'inherit_id');
      if (!inherit) continue;
      const [priorityNode] = fieldsNamed(record, 'priority');
      const priority = priorityNode
        ? (attr(priorityNode, 'eval') ?? (priorityNode.text || DEFAULT_VIEW_PRIORITY))
        : DEFAULT_VIEW_PRIORITY;
      views.push({ record, parent: attr(inherit, 'ref') ?? '', priority });
    }

    const diagnostics: RawDiagnostic[] = [];
    for (const group of groupBy(views, (v) => JSON.stringify([v.parent, v.priority])).values()) {
      if (group.length < 2) continue;
      const [first] = group;
      const ids = group.map((v) => attr(v.record, 'id') ?? '').join(', ');
      diagnostics.push(
        this.createDiagnostic(
          'xml_duplicate_view_priority',
          unit.path,
          first.record.line,
          `Views (${ids}) inherit from "${first.parent}" with same priority ${first.priority}`
        )
      );
    }
    return diagnostics;
  }
}
