/**
 * Rule type definitions.
 */
import type { LintConfig } from '../config/loader.js';
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type {
  CsvFacts,
  Language,
  ManifestFacts,
  PoFacts,
  PythonFacts,
  SourceUnit,
  XmlFacts,
} from '../facts/types.js';

/**
 * Everything extracted from one add-on, grouped by language.
 */
export interface AddonFacts {
  /** Technical name (directory name) */
  name: string;
  /** Resolved add-on root */
  path: string;
  manifest: SourceUnit<ManifestFacts>;
  python: SourceUnit<PythonFacts>[];
  xml: SourceUnit<XmlFacts>[];
  csv: SourceUnit<CsvFacts>[];
  po: SourceUnit<PoFacts>[];
  /** Name of the README found at the root, if any */
  readme: string | null;
}

/**
 * Context passed to rules.
 */
export interface RuleContext {
  addon: AddonFacts;
  config: LintConfig;
}

/**
 * A named check. Rules are pure: they read facts and return findings, never throw.
 */
export interface IRule {
  /** Registry name */
  readonly name: string;

  /** Source language the rule reads */
  readonly language: Language;

  /** Kinds this rule can emit */
  readonly kinds: readonly DiagnosticKind[];

  check(context: RuleContext): RawDiagnostic[];
}
