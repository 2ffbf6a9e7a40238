/**
 * Fact builders shared by the rule tests.
 */
import type {
  CsvFacts,
  FieldFact,
  ManifestFacts,
  MethodFact,
  ModelFact,
  PoFacts,
  PythonFacts,
  SourceUnit,
  XmlFacts,
} from '../../../../src/core/facts/types.js';
import type { AddonFacts, RuleContext } from '../../../../src/core/rules/types.js';
import { getDefaultConfig, type LintConfig } from '../../../../src/core/config/loader.js';
import { XmlExtractor } from '../../../../src/validators/xml.js';
import { CsvExtractor } from '../../../../src/validators/csv.js';
import { PoExtractor } from '../../../../src/validators/po.js';

export const ADDON_PATH = '/addons/sale';
export const MODEL_FILE = `${ADDON_PATH}/models/sale.py`;

export function createField(overrides: Partial<FieldFact> & { name: string }): FieldFact {
  return {
    type: 'Char',
    location: { line: 1, column: 5 },
    label: null,
    help: null,
    related: null,
    compute: null,
    computeSudo: null,
    tracking: null,
    selection: false,
    comodel: null,
    isPrivate: overrides.name.startsWith('_'),
    ...overrides,
  };
}

export function createMethod(overrides: Partial<MethodFact> & { name: string }): MethodFact {
  return {
    location: { line: 1, column: 5 },
    isPrivate: overrides.name.startsWith('_'),
    isMagic: overrides.name.startsWith('__') && overrides.name.endsWith('__'),
    isAsync: false,
    docstring: null,
    decorators: [],
    ...overrides,
  };
}

export function createModel(overrides: Partial<ModelFact> = {}): ModelFact {
  return {
    className: 'SaleOrder',
    location: { line: 1, column: 1 },
    name: 'sale.order',
    inherit: [],
    description: null,
    isOdooModel: true,
    bases: ['models.Model'],
    fields: [],
    methods: [],
    file: MODEL_FILE,
    hasMailThread: false,
    ...overrides,
  };
}

export function pythonUnit(models: ModelFact[], file = MODEL_FILE): SourceUnit<PythonFacts> {
  return {
    path: file,
    relativePath: file.slice(ADDON_PATH.length + 1),
    facts: { language: 'python', file, models },
    error: null,
  };
}

export function xmlUnit(content: string, relativePath = 'views/views.xml', dataSection = 'data'): SourceUnit<XmlFacts> {
  return new XmlExtractor().extract({ path: `${ADDON_PATH}/${relativePath}`, relativePath, content, dataSection });
}

export function csvUnit(content: string, relativePath = 'data/res.partner.csv', dataSection = 'data'): SourceUnit<CsvFacts> {
  return new CsvExtractor().extract({ path: `${ADDON_PATH}/${relativePath}`, relativePath, content, dataSection });
}

export function poUnit(content: string, relativePath = 'i18n/fr.po'): SourceUnit<PoFacts> {
  return new PoExtractor().extract({ path: `${ADDON_PATH}/${relativePath}`, relativePath, content });
}

export function manifestUnit(values: ManifestFacts['values'] = { name: 'Sale' }): SourceUnit<ManifestFacts> {
  const file = `${ADDON_PATH}/__manifest__.py`;
  return { path: file, relativePath: '__manifest__.py', facts: { language: 'manifest', file, values }, error: null };
}

export function createAddon(overrides: Partial<AddonFacts> = {}): AddonFacts {
  return {
    name: 'sale',
    path: ADDON_PATH,
    manifest: manifestUnit(),
    python: [],
    xml: [],
    csv: [],
    po: [],
    readme: 'README.rst',
    ...overrides,
  };
}

export function ruleContext(addon: AddonFacts, config: LintConfig = getDefaultConfig()): RuleContext {
  return { addon, config };
}

/** XML document wrapped in `<odoo>`, each line of `body` on its own line starting at line 2. */
export function odoo(...body: string[]): string {
  return ['<odoo>', ...body, '</odoo>', ''].join('\n');
}
