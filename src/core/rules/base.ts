/**
 * Base classes for rules.
 */
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type { Facts, Language, SourceUnit } from '../facts/types.js';
import type { AddonFacts, IRule, RuleContext } from './types.js';

/** A unit whose extraction produced facts. */
export type ParsedUnit<F extends Facts> = SourceUnit<F> & { facts: F };

export function hasFacts<F extends Facts>(unit: SourceUnit<F>): unit is ParsedUnit<F> {
  return unit.facts !== null;
}

export abstract class BaseRule implements IRule {
  abstract readonly name: string;
  abstract readonly language: Language;
  abstract readonly kinds: readonly DiagnosticKind[];

  abstract check(context: RuleContext): RawDiagnostic[];

  protected createDiagnostic(
    kind: DiagnosticKind,
    file: string,
    line: number | null,
    message: string,
    snippet?: string
  ): RawDiagnostic {
    const diagnostic: RawDiagnostic = { kind, file, line, message };
    if (snippet !== undefined) {
      diagnostic.snippet = snippet;
    }
    return diagnostic;
  }
}

/**
 * A rule that looks at one unit at a time.
 */
export abstract class BaseUnitRule<F extends Facts> extends BaseRule {
  protected abstract selectUnits(addon: AddonFacts): SourceUnit<F>[];

  protected abstract checkUnit(unit: ParsedUnit<F>, context: RuleContext): RawDiagnostic[];

  check(context: RuleContext): RawDiagnostic[] {
    const diagnostics: RawDiagnostic[] = [];
    for (const unit of this.selectUnits(context.addon)) {
      if (hasFacts(unit)) {
        diagnostics.push(...this.checkUnit(unit, context));
      }
    }
    return diagnostics;
  }
}

/**
 * Group items by key, keeping first-seen key order.
 */
export function groupBy<T, K>(items: Iterable<T>, keyOf: (item: T) => K | null): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}
