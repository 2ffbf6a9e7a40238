/**
 * Configuration file schema (`.addonlint.yaml`).
 */
import { z } from 'zod';

/**
 * Accept a single string where a list is expected.
 */
function stringOrList(defaults: string[]) {
  return z.preprocess(
    (val) => (typeof val === 'string' ? [val] : val ?? defaults),
    z.array(z.string())
  );
}

export const DEFAULT_SKIP_STRING_FIELDS = [
  'active',
  'name',
  'sequence',
  'company_id',
  'currency_id',
  'create_uid',
  'create_date',
  'write_uid',
  'write_date',
  'message_ids',
  'message_follower_ids',
  'activity_ids',
];

export const DEFAULT_SKIP_HELP_FIELDS = ['active', 'name', 'sequence', 'company_id', 'currency_id'];

export const DEFAULT_EXCLUDE_PATHS = [
  '**/migrations/**',
  '**/tests/**',
  '**/static/**',
  '**/__pycache__/**',
  '**/node_modules/**',
];

export const ValidationScopeSchema = z.enum(['changed', 'full']);
export type ValidationScope = z.infer<typeof ValidationScopeSchema>;

export const ContextOverrideSchema = z.enum(['auto', 'local', 'ci']);
export type ContextOverride = z.infer<typeof ContextOverrideSchema>;

export const ConfigSchema = z.object({
  /** kind -> error | warning | info; invalid entries are dropped by the loader */
  severity_overrides: z.preprocess(
    (val) => val ?? {},
    z.record(z.string(), z.unknown())
  ),
  blocking_severities: stringOrList(['error']),
  disabled_checks: stringOrList([]),
  skip_string_fields: stringOrList(DEFAULT_SKIP_STRING_FIELDS),
  skip_help_fields: stringOrList(DEFAULT_SKIP_HELP_FIELDS),
  /** Merged with the dunder methods, which are always skipped */
  skip_docstring_methods: stringOrList([]),
  min_docstring_length: z.number().int().min(0).default(10),
  exclude_paths: stringOrList(DEFAULT_EXCLUDE_PATHS),
  validation_scope: ValidationScopeSchema.default('changed'),
  base_branch: z.string().min(1).optional(),
  context: ContextOverrideSchema.default('auto'),
  /** Parallel extraction width (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Special methods never checked for docstrings. */
export const DUNDER_SKIP_METHODS = [
  '__init__',
  '__str__',
  '__repr__',
  '__len__',
  '__bool__',
  '__getitem__',
  '__setitem__',
  '__delitem__',
  '__iter__',
  '__next__',
  '__contains__',
  '__call__',
  '__enter__',
  '__exit__',
  '__eq__',
  '__ne__',
  '__lt__',
  '__le__',
  '__gt__',
  '__ge__',
  '__hash__',
  '__format__',
];
