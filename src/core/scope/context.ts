/**
 * Execution context: a developer's working copy or a CI job.
 */
import type { ContextOverride } from '../config/schema.js';

export type ExecutionContext = 'local' | 'ci' | 'unknown';

export type Environment = Readonly<Record<string, string | undefined>>;

/** Any of these being set means CI. */
export const CI_ENV_VARS = ['CI', 'GITHUB_ACTIONS', 'GITHUB_BASE_REF', 'ADDONLINT_BASE_BRANCH'] as const;

export function isCiEnvironment(env: Environment): boolean {
  return CI_ENV_VARS.some((name) => Boolean(env[name]));
}

/**
 * Decide the context. An explicit override wins, then the CI variables, then the presence of
 * staged files; otherwise the context stays unknown.
 */
export function detectContext(
  override: ContextOverride,
  env: Environment,
  hasStagedFiles: boolean
): ExecutionContext {
  if (override !== 'auto') return override;
  if (isCiEnvironment(env)) return 'ci';
  if (hasStagedFiles) return 'local';
  return 'unknown';
}
