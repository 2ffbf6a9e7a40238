/**
 * Checks over translation catalogs.
 */
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type { PoFacts, SourceUnit, TranslationEntry } from '../facts/types.js';
import { checkTranslation } from '../format-string/validator.js';
import { BaseUnitRule, groupBy, type ParsedUnit } from './base.js';
import type { AddonFacts } from './types.js';

const MODULE_COMMENT = /^(modules?): (\w+)/;
const SHORT_MESSAGE_LENGTH = 40;

abstract class CatalogRule extends BaseUnitRule<PoFacts> {
  readonly language = 'po';

  protected selectUnits(addon: AddonFacts): SourceUnit<PoFacts>[] {
    return addon.po;
  }
}

function liveEntries(facts: PoFacts): TranslationEntry[] {
  return facts.entries.filter((entry) => !entry.obsolete);
}

/**
 * First 40 characters of a msgid without newlines or tabs, for messages.
 */
export function shortMessage(msgid: string): string {
  const short = msgid.slice(0, SHORT_MESSAGE_LENGTH).replace(/[\n\t]/g, '').trim();
  return msgid.length > SHORT_MESSAGE_LENGTH ? `${short}...` : short;
}

export class PoDuplicateMessageRule extends CatalogRule {
  readonly name = 'po-duplicate-message';
  readonly kinds: readonly DiagnosticKind[] = ['po_duplicate_message_definition'];

  protected checkUnit(unit: ParsedUnit<PoFacts>): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    for (const [msgid, entries] of groupBy(liveEntries(unit.facts), (entry) => entry.msgid)) {
      if (entries.length < 2) continue;
      const [first, ...others] = entries;
      const lines = others.map((entry) => entry.messageLine).join(', ');
      diagnostics.push(
        this.createDiagnostic(
          'po_duplicate_message_definition',
          unit.path,
          first.messageLine,
          `Duplicate PO message "${shortMessage(msgid)}" in lines ${lines}`
        )
      );
    }
    return diagnostics;
  }
}

export class PoEntryRule extends CatalogRule {
  readonly name = 'po-entry';
  readonly kinds: readonly DiagnosticKind[] = [
    'po_requires_module',
    'po_python_parse_printf',
    'po_python_parse_format',
  ];

  protected checkUnit(unit: ParsedUnit<PoFacts>): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    for (const entry of liveEntries(unit.facts)) {
      if (!MODULE_COMMENT.test(entry.comment)) {
        diagnostics.push(
          this.createDiagnostic(
            'po_requires_module',
            unit.path,
            entry.line,
            "Translation requires comment '#. module: MODULE'"
          )
        );
      }

      if (!entry.msgstr || !entry.flags.includes('python-format')) continue;
      const incompatibility = checkTranslation(entry.msgid, entry.msgstr);
      if (incompatibility) {
        const kind = incompatibility.grammar === 'printf' ? 'po_python_parse_printf' : 'po_python_parse_format';
        diagnostics.push(
          this.createDiagnostic(
            kind,
            unit.path,
            entry.messageLine,
            `Translation parse error (${incompatibility.grammar}): ${incompatibility.error}`
          )
        );
      }
    }
    return diagnostics;
  }
}
