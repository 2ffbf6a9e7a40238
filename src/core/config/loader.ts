import * as path from 'node:path';
import {
  ConfigSchema,
  DUNDER_SKIP_METHODS,
  type Config,
  type ContextOverride,
  type ValidationScope,
} from './schema.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  isDiagnosticKind,
  isSeverity,
  type DiagnosticKind,
  type Severity,
} from '../diagnostics/kinds.js';

export const DEFAULT_CONFIG_FILE = '.addonlint.yaml';

/**
 * Resolved settings passed explicitly through the pipeline. Built once, never mutated.
 */
export interface LintConfig {
  readonly severityOverrides: ReadonlyMap<DiagnosticKind, Severity>;
  readonly blockingSeverities: ReadonlySet<Severity>;
  readonly disabledChecks: ReadonlySet<string>;
  readonly skipStringFields: ReadonlySet<string>;
  readonly skipHelpFields: ReadonlySet<string>;
  readonly skipDocstringMethods: ReadonlySet<string>;
  readonly minDocstringLength: number;
  readonly excludePaths: readonly string[];
  readonly validationScope: ValidationScope;
  readonly baseBranch: string | undefined;
  readonly context: ContextOverride;
  readonly concurrency: number | undefined;
}

/**
 * Turn the parsed file into LintConfig, dropping entries that name an unknown kind or severity.
 */
export function buildLintConfig(raw: Config): LintConfig {
  const overrides = new Map<DiagnosticKind, Severity>();
  for (const [kind, value] of Object.entries(raw.severity_overrides)) {
    if (!isDiagnosticKind(kind)) {
      logger.warn(`Ignoring severity override for unknown check "${kind}"`);
      continue;
    }
    const severity = typeof value === 'string' ? value.toLowerCase() : '';
    if (!isSeverity(severity)) {
      logger.warn(`Ignoring invalid severity "${String(value)}" for "${kind}" (use error, warning or info)`);
      continue;
    }
    overrides.set(kind, severity);
  }

  const blocking = new Set<Severity>();
  for (const value of raw.blocking_severities) {
    const severity = value.toLowerCase();
    if (isSeverity(severity)) {
      blocking.add(severity);
    } else {
      logger.warn(`Ignoring invalid blocking severity "${value}"`);
    }
  }

  return Object.freeze({
    severityOverrides: overrides,
    blockingSeverities: blocking,
    disabledChecks: new Set(raw.disabled_checks),
    skipStringFields: new Set(raw.skip_string_fields),
    skipHelpFields: new Set(raw.skip_help_fields),
    skipDocstringMethods: new Set([...raw.skip_docstring_methods, ...DUNDER_SKIP_METHODS]),
    minDocstringLength: raw.min_docstring_length,
    excludePaths: Object.freeze([...raw.exclude_paths]),
    validationScope: raw.validation_scope,
    baseBranch: raw.base_branch,
    context: raw.context,
    concurrency: raw.concurrency,
  });
}

/**
 * Build a LintConfig from an in-memory object (same keys as the YAML file).
 * @throws ConfigError when the object does not match the schema
 */
export function createConfig(input: Record<string, unknown> = {}): LintConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID, `Invalid configuration: ${formatZodError(result.error)}`, {
      errors: result.error.issues,
    });
  }
  return buildLintConfig(result.data);
}

/**
 * Default configuration values.
 * Used when no config file exists or the file is malformed.
 */
export function getDefaultConfig(): LintConfig {
  return buildLintConfig(ConfigSchema.parse({}));
}

/**
 * Load configuration from a file.
 * A missing file gives the defaults; so does a malformed one, after a warning.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<LintConfig> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_FILE);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      logger.warn(`Config file not found: ${fullPath}, using defaults`);
    }
    return getDefaultConfig();
  }

  try {
    const raw = await loadYamlWithSchema(fullPath, ConfigSchema);
    logger.debug(`Loaded config from ${fullPath}`);
    return buildLintConfig(raw);
  } catch (error) {
    const configError = new ConfigError(
      ErrorCodes.CONFIG_LOAD,
      `Failed to load config from ${fullPath}: ${errorMessage(error)}`,
      { path: fullPath }
    );
    logger.warn(`${configError.message}; using defaults`);
    return getDefaultConfig();
  }
}

export interface ConfigOverrides {
  validationScope?: ValidationScope;
  context?: ContextOverride;
  baseBranch?: string;
}

/**
 * Copy of `config` with command-line values applied.
 */
export function withOverrides(config: LintConfig, overrides: ConfigOverrides): LintConfig {
  return Object.freeze({
    ...config,
    validationScope: overrides.validationScope ?? config.validationScope,
    context: overrides.context ?? config.context,
    baseBranch: overrides.baseBranch ?? config.baseBranch,
  });
}
