/**
 * Documentation coverage of model classes: method docstrings, field labels and help texts.
 * Computed from every add-on's facts; the changed-file scope does not apply.
 */
import * as path from 'node:path';
import type { LintConfig } from '../config/loader.js';
import type { FieldFact, MethodFact, ModelFact } from '../facts/types.js';
import type { AddonFacts } from '../rules/types.js';
import type { SeverityCounts } from '../validation/types.js';

export type CoverageConfig = Pick<LintConfig, 'skipStringFields' | 'skipHelpFields' | 'skipDocstringMethods'>;

export interface CoverageCount {
  documented: number;
  total: number;
}

/**
 * Figures printed on the METRICS line. Skip-listed names are left out of the totals.
 */
export interface CoverageMetrics {
  docstring: CoverageCount;
  string: CoverageCount;
  help: CoverageCount;
  models: number;
}

export interface MethodCoverageJson {
  total: number;
  documented: number;
  coverage: number;
}

/** Skip-listed names count as having the attribute. */
export interface FieldCoverageJson {
  total: number;
  with_string: number;
  with_help: number;
  string_coverage: number;
  help_coverage: number;
}

export interface ModelCoverageJson {
  class_name: string;
  model_name: string;
  filename: string;
  method_coverage: number;
  string_coverage: number;
  help_coverage: number;
}

export interface ModuleCoverageJson {
  name: string;
  path: string;
  models_count: number;
  methods: MethodCoverageJson;
  fields: FieldCoverageJson;
  models: ModelCoverageJson[];
}

export interface CoverageReport {
  summary: {
    modules_count: number;
    models_count: number;
    methods: MethodCoverageJson;
    fields: FieldCoverageJson;
    issues: { errors: number; warnings: number; info: number };
  };
  modules: ModuleCoverageJson[];
}

/** Percentage; 100 when there is nothing to cover. */
export function percent(documented: number, total: number): number {
  return total > 0 ? (documented / total) * 100 : 100;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function documentedModels(addon: AddonFacts): ModelFact[] {
  return addon.python.flatMap((unit) => unit.facts?.models ?? []).filter((model) => model.isOdooModel);
}

/** Public and protected-dunder methods that are not skip-listed. */
function countedMethods(model: ModelFact, config: CoverageConfig): MethodFact[] {
  return model.methods.filter((method) => {
    const protectedName = method.name.startsWith('_') && !method.name.startsWith('__');
    return !protectedName && !config.skipDocstringMethods.has(method.name);
  });
}

function countedFields(model: ModelFact): FieldFact[] {
  return model.fields.filter((field) => !field.isPrivate && !field.related);
}

export function computeMetrics(addons: readonly AddonFacts[], config: CoverageConfig): CoverageMetrics {
  const metrics: CoverageMetrics = {
    docstring: { documented: 0, total: 0 },
    string: { documented: 0, total: 0 },
    help: { documented: 0, total: 0 },
    models: 0,
  };

  for (const addon of addons) {
    for (const model of documentedModels(addon)) {
      metrics.models += 1;
      for (const method of countedMethods(model, config)) {
        metrics.docstring.total += 1;
        if (method.docstring !== null) metrics.docstring.documented += 1;
      }
      for (const field of countedFields(model)) {
        if (!config.skipStringFields.has(field.name)) {
          metrics.string.total += 1;
          if (field.label) metrics.string.documented += 1;
        }
        if (!config.skipHelpFields.has(field.name)) {
          metrics.help.total += 1;
          if (field.help) metrics.help.documented += 1;
        }
      }
    }
  }
  return metrics;
}

/**
 * `METRICS:docstring_cov=80.0,docstring_documented=4,...,models=3`
 */
export function formatMetricsLine(metrics: CoverageMetrics): string {
  const part = (name: string, count: CoverageCount): string =>
    `${name}_cov=${percent(count.documented, count.total).toFixed(1)},` +
    `${name}_documented=${count.documented},${name}_total=${count.total}`;
  return (
    `METRICS:${part('docstring', metrics.docstring)},${part('string', metrics.string)},` +
    `${part('help', metrics.help)},models=${metrics.models}`
  );
}

interface Tally {
  methods: number;
  documentedMethods: number;
  fields: number;
  withString: number;
  withHelp: number;
}

function emptyTally(): Tally {
  return { methods: 0, documentedMethods: 0, fields: 0, withString: 0, withHelp: 0 };
}

function addTally(into: Tally, from: Tally): void {
  into.methods += from.methods;
  into.documentedMethods += from.documentedMethods;
  into.fields += from.fields;
  into.withString += from.withString;
  into.withHelp += from.withHelp;
}

function tallyModel(model: ModelFact, config: CoverageConfig): Tally {
  const tally = emptyTally();
  for (const method of countedMethods(model, config)) {
    if (method.isPrivate) continue;
    tally.methods += 1;
    if (method.docstring !== null) tally.documentedMethods += 1;
  }
  for (const field of countedFields(model)) {
    tally.fields += 1;
    if (config.skipStringFields.has(field.name) || field.label) tally.withString += 1;
    if (config.skipHelpFields.has(field.name) || field.help) tally.withHelp += 1;
  }
  return tally;
}

function methodJson(tally: Tally): MethodCoverageJson {
  return {
    total: tally.methods,
    documented: tally.documentedMethods,
    coverage: round1(percent(tally.documentedMethods, tally.methods)),
  };
}

function fieldJson(tally: Tally): FieldCoverageJson {
  return {
    total: tally.fields,
    with_string: tally.withString,
    with_help: tally.withHelp,
    string_coverage: round1(percent(tally.withString, tally.fields)),
    help_coverage: round1(percent(tally.withHelp, tally.fields)),
  };
}

/**
 * Coverage report by module and model. Models with neither counted methods nor fields are left out.
 */
export function buildCoverageReport(
  addons: readonly AddonFacts[],
  issues: SeverityCounts,
  config: CoverageConfig
): CoverageReport {
  const total = emptyTally();
  let modelsCount = 0;
  const modules: ModuleCoverageJson[] = [];

  for (const addon of addons) {
    const moduleTally = emptyTally();
    const models: ModelCoverageJson[] = [];
    for (const model of documentedModels(addon)) {
      const hasCounted = countedMethods(model, config).length > 0 || countedFields(model).length > 0;
      if (!hasCounted) continue;
      const tally = tallyModel(model, config);
      addTally(moduleTally, tally);
      models.push({
        class_name: model.className,
        model_name: model.name ?? model.className,
        filename: path.relative(addon.path, model.file).split(path.sep).join('/'),
        method_coverage: round1(percent(tally.documentedMethods, tally.methods)),
        string_coverage: round1(percent(tally.withString, tally.fields)),
        help_coverage: round1(percent(tally.withHelp, tally.fields)),
      });
    }
    addTally(total, moduleTally);
    modelsCount += models.length;
    modules.push({
      name: addon.name,
      path: addon.path,
      models_count: models.length,
      methods: methodJson(moduleTally),
      fields: fieldJson(moduleTally),
      models,
    });
  }

  return {
    summary: {
      modules_count: modules.length,
      models_count: modelsCount,
      methods: methodJson(total),
      fields: fieldJson(total),
      issues: { errors: issues.error, warnings: issues.warning, info: issues.info },
    },
    modules,
  };
}
