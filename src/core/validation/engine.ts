/**
 * Lint engine: loads add-ons, extracts their files on a bounded pool, resolves model
 * capabilities across the batch, then runs the rules and aggregates what survives scope
 * and severity policy.
 */
import * as path from 'node:path';
import os from 'node:os';
import '../../validators/register.js';
import { extractorRegistry, type IFactExtractor } from '../../validators/extractor-registry.js';
import type { LintConfig } from '../config/loader.js';
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type {
  CsvFacts,
  Facts,
  Language,
  PoFacts,
  PythonFacts,
  SourceUnit,
  XmlFacts,
} from '../facts/types.js';
import { resolveCapabilities } from '../inheritance/resolver.js';
import { loadAddon, type AddonDescriptor, type AddonFile } from '../module/loader.js';
import { runRules, getAllRules } from '../rules/registry.js';
import type { AddonFacts } from '../rules/types.js';
import { ScopeFilter } from '../scope/filter.js';
import type { ExecutionContext } from '../scope/context.js';
import { SeverityPolicy } from '../severity/policy.js';
import { aggregateAddon, aggregateBatch, skippedAddon } from '../report/aggregator.js';
import type { AddonResult, LintOptions, LintRun } from './types.js';
import { readFile } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('engine');

/** Below this many files extraction runs one file at a time. */
export const PARALLEL_THRESHOLD = 8;

export const PARSE_ERROR_KIND: Readonly<Record<Language, DiagnosticKind>> = {
  python: 'python_syntax_error',
  xml: 'xml_syntax_error',
  csv: 'csv_syntax_error',
  po: 'po_syntax_error',
  manifest: 'manifest_syntax_error',
};

interface ExtractionTask {
  addon: number;
  file: AddonFile;
  extractor: IFactExtractor;
}

interface ExtractedUnit {
  language: Language;
  unit: SourceUnit;
}

interface LoadedAddon {
  descriptor: AddonDescriptor;
  units: ExtractedUnit[];
}

export function defaultConcurrency(): number {
  return Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 2), 16);
}

/** Freeze an extracted fact and everything it holds. */
function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
}

function narrow<F extends Facts>(unit: SourceUnit, guard: (facts: Facts) => facts is F): SourceUnit<F> {
  return { ...unit, facts: unit.facts !== null && guard(unit.facts) ? unit.facts : null };
}

const isPython = (facts: Facts): facts is PythonFacts => facts.language === 'python';
const isXml = (facts: Facts): facts is XmlFacts => facts.language === 'xml';
const isCsv = (facts: Facts): facts is CsvFacts => facts.language === 'csv';
const isPo = (facts: Facts): facts is PoFacts => facts.language === 'po';

function buildAddonFacts(loaded: LoadedAddon): AddonFacts {
  const { descriptor, units } = loaded;
  const of = (language: Language): SourceUnit[] =>
    units.filter((u) => u.language === language).map((u) => u.unit);
  return {
    name: descriptor.name,
    path: descriptor.path,
    manifest: descriptor.manifest,
    python: of('python').map((unit) => narrow(unit, isPython)),
    xml: of('xml').map((unit) => narrow(unit, isXml)),
    csv: of('csv').map((unit) => narrow(unit, isCsv)),
    po: of('po').map((unit) => narrow(unit, isPo)),
    readme: descriptor.readme,
  };
}

function parseDiagnostic(language: Language, unit: SourceUnit): RawDiagnostic | null {
  if (!unit.error) return null;
  const message =
    language === 'manifest'
      ? `Manifest could not be loaded: ${unit.error.message}`
      : `Could not parse ${unit.relativePath}: ${unit.error.message}`;
  return { kind: PARSE_ERROR_KIND[language], file: unit.path, line: unit.error.line, message };
}

export class LintEngine {
  private readonly policy: SeverityPolicy;
  private readonly concurrency: number;

  constructor(
    private readonly config: LintConfig,
    private readonly scopeFilter: ScopeFilter = ScopeFilter.full(),
    private readonly context: ExecutionContext | null = null
  ) {
    this.policy = new SeverityPolicy(config);
    this.concurrency = config.concurrency ?? defaultConcurrency();
  }

  /**
   * Check add-on directories. A failure in one add-on or file never stops the batch.
   */
  async run(dirs: readonly string[], options: LintOptions = {}): Promise<LintRun> {
    const results: AddonResult[] = new Array(dirs.length);
    const loaded: Array<{ index: number; addon: LoadedAddon }> = [];

    for (const [index, dir] of dirs.entries()) {
      let descriptor: AddonDescriptor;
      try {
        descriptor = await loadAddon(dir, this.config);
      } catch (error) {
        log.warn(`Skipping ${dir}: ${errorMessage(error)}`);
        const root = path.resolve(dir);
        results[index] = skippedAddon(path.basename(root), root, errorMessage(error));
        continue;
      }

      if (!descriptor.manifest.error && !descriptor.installable) {
        log.debug(`Skipping ${descriptor.name}: not installable`);
        results[index] = skippedAddon(descriptor.name, descriptor.path, 'not installable');
        continue;
      }
      loaded.push({ index, addon: { descriptor, units: [] } });
    }

    await this.extractAll(loaded.map((entry) => entry.addon), options.languages);

    // Barrier: every unit is extracted before capabilities are resolved
    const facts = loaded.map((entry) => buildAddonFacts(entry.addon));
    const models = facts.flatMap((addon) => addon.python.flatMap((unit) => unit.facts?.models ?? []));
    const marked = resolveCapabilities(models);
    log.debug(`${models.length} model class(es), ${marked.size} mail-thread name(s)`);
    for (const model of models) deepFreeze(model);

    for (const [position, entry] of loaded.entries()) {
      results[entry.index] = this.checkAddon(entry.addon, facts[position], options.languages);
    }

    return {
      result: aggregateBatch(results, this.scopeFilter.scope, this.context),
      addons: facts,
    };
  }

  private checkAddon(
    loaded: LoadedAddon,
    addon: AddonFacts,
    languages: ReadonlySet<Language> | undefined
  ): AddonResult {
    const raw: RawDiagnostic[] = [];
    const manifestError = parseDiagnostic('manifest', loaded.descriptor.manifest);
    if (manifestError) {
      raw.push(manifestError);
    } else {
      for (const { language, unit } of loaded.units) {
        const diagnostic = parseDiagnostic(language, unit);
        if (diagnostic) raw.push(diagnostic);
      }
      const rules = [...getAllRules().values()].filter(
        (rule) => !languages || languages.has(rule.language)
      );
      raw.push(...runRules({ addon, config: this.config }, rules));
    }

    const relativePaths = new Map<string, string>([
      [loaded.descriptor.manifest.path, loaded.descriptor.manifest.relativePath],
      ...loaded.units.map(({ unit }): [string, string] => [unit.path, unit.relativePath]),
    ]);
    const relativeOf = (file: string): string =>
      relativePaths.get(file) ?? path.relative(addon.path, file);

    const retained = this.policy.apply(this.scopeFilter.apply(raw));
    log.debug(`${addon.name}: ${raw.length} finding(s), ${retained.length} retained`);
    return aggregateAddon(addon.name, addon.path, retained, relativeOf);
  }

  /**
   * Extract every file of every add-on, `concurrency` files at a time.
   */
  private async extractAll(
    addons: LoadedAddon[],
    languages: ReadonlySet<Language> | undefined
  ): Promise<void> {
    const tasks: ExtractionTask[] = [];
    for (const [addon, loaded] of addons.entries()) {
      if (loaded.descriptor.manifest.error) continue;
      for (const file of loaded.descriptor.files) {
        const extractor = extractorRegistry.getForExtension(path.extname(file.path));
        if (!extractor || (languages && !languages.has(extractor.language))) continue;
        tasks.push({ addon, file, extractor });
      }
    }

    const width = tasks.length < PARALLEL_THRESHOLD ? 1 : this.concurrency;
    for (let i = 0; i < tasks.length; i += width) {
      const batch = tasks.slice(i, i + width);
      const settled = await Promise.allSettled(batch.map((task) => this.extractFile(task)));

      // Rejected extractions become parse errors of their unit
      for (const [j, outcome] of settled.entries()) {
        const task = batch[j];
        const unit: SourceUnit =
          outcome.status === 'fulfilled'
            ? outcome.value
            : {
                path: task.file.path,
                relativePath: task.file.relativePath,
                facts: null,
                error: { message: errorMessage(outcome.reason), line: null },
              };
        addons[task.addon].units.push({ language: task.extractor.language, unit });
      }
    }
  }

  private async extractFile(task: ExtractionTask): Promise<SourceUnit> {
    const content = await readFile(task.file.path);
    return task.extractor.extract({
      path: task.file.path,
      relativePath: task.file.relativePath,
      content,
      dataSection: task.file.dataSection,
    });
  }
}
