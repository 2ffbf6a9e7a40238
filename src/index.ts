/**
 * addonlint: static checks for Odoo add-on modules.
 * Library exports barrel file.
 */

// Configuration
export * from './core/config/schema.js';
export * from './core/config/loader.js';

// Facts and diagnostics
export * from './core/facts/types.js';
export * from './core/diagnostics/kinds.js';
export * from './core/diagnostics/types.js';

// Add-ons
export * from './core/module/loader.js';
export * from './core/module/discovery.js';

// Checks
export { resolveCapabilities } from './core/inheritance/resolver.js';
export { getRule, getAllRules, hasRule, runRules } from './core/rules/registry.js';
export type { IRule, RuleContext, AddonFacts } from './core/rules/types.js';
export { checkTranslation } from './core/format-string/validator.js';

// Scope, severity and reporting
export * from './core/scope/context.js';
export * from './core/scope/changed-files.js';
export * from './core/scope/filter.js';
export { SeverityPolicy } from './core/severity/policy.js';
export * from './core/report/aggregator.js';
export * from './core/report/coverage.js';

// Engine
export * from './core/validation/types.js';
export { LintEngine, PARSE_ERROR_KIND } from './core/validation/engine.js';

// Extractors
export { extractorRegistry } from './validators/extractor-registry.js';

// Utilities
export * from './utils/errors.js';
export { logger, Logger, type LogLevel } from './utils/logger.js';

// CLI
export { createCli } from './cli/index.js';
