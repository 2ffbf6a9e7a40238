/**
 * Tests for the configuration file schema.
 */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  DEFAULT_EXCLUDE_PATHS,
  DEFAULT_SKIP_HELP_FIELDS,
} from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should fill every default for an empty file', () => {
    const config = ConfigSchema.parse({});

    expect(config.severity_overrides).toEqual({});
    expect(config.blocking_severities).toEqual(['error']);
    expect(config.disabled_checks).toEqual([]);
    expect(config.skip_help_fields).toEqual(DEFAULT_SKIP_HELP_FIELDS);
    expect(config.exclude_paths).toEqual(DEFAULT_EXCLUDE_PATHS);
    expect(config.min_docstring_length).toBe(10);
    expect(config.validation_scope).toBe('changed');
    expect(config.context).toBe('auto');
    expect(config.base_branch).toBeUndefined();
    expect(config.concurrency).toBeUndefined();
  });

  it('should accept a single string where a list is expected', () => {
    const config = ConfigSchema.parse({ disabled_checks: 'missing_readme' });

    expect(config.disabled_checks).toEqual(['missing_readme']);
  });

  it('should treat null lists as the defaults', () => {
    const config = ConfigSchema.parse({ blocking_severities: null });

    expect(config.blocking_severities).toEqual(['error']);
  });

  it('should reject an unknown scope', () => {
    expect(ConfigSchema.safeParse({ validation_scope: 'some' }).success).toBe(false);
  });

  it('should reject a concurrency out of range', () => {
    expect(ConfigSchema.safeParse({ concurrency: 0 }).success).toBe(false);
    expect(ConfigSchema.safeParse({ concurrency: 65 }).success).toBe(false);
    expect(ConfigSchema.parse({ concurrency: 4 }).concurrency).toBe(4);
  });
});
