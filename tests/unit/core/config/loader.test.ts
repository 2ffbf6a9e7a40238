/**
 * Tests for configuration loading.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  createConfig,
  getDefaultConfig,
  loadConfig,
  withOverrides,
} from '../../../../src/core/config/loader.js';
import { ConfigError } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';

describe('config loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `addonlint-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('getDefaultConfig', () => {
    it('should block on errors only', () => {
      const config = getDefaultConfig();

      expect([...config.blockingSeverities]).toEqual(['error']);
      expect(config.severityOverrides.size).toBe(0);
      expect(config.validationScope).toBe('changed');
    });

    it('should always skip dunder methods', () => {
      const config = getDefaultConfig();

      expect(config.skipDocstringMethods.has('__init__')).toBe(true);
      expect(config.skipDocstringMethods.has('__repr__')).toBe(true);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(getDefaultConfig())).toBe(true);
    });
  });

  describe('createConfig', () => {
    it('should keep valid severity overrides, lower-casing them', () => {
      const config = createConfig({ severity_overrides: { missing_readme: 'ERROR' } });

      expect(config.severityOverrides.get('missing_readme')).toBe('error');
    });

    it('should drop overrides for unknown checks and invalid severities', () => {
      const config = createConfig({
        severity_overrides: { not_a_check: 'error', xml_deprecated_t_raw: 'fatal' },
      });

      expect(config.severityOverrides.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('should drop invalid blocking severities', () => {
      const config = createConfig({ blocking_severities: ['error', 'Warning', 'critical'] });

      expect([...config.blockingSeverities]).toEqual(['error', 'warning']);
    });

    it('should merge configured docstring skips with dunder methods', () => {
      const config = createConfig({ skip_docstring_methods: ['create'] });

      expect(config.skipDocstringMethods.has('create')).toBe(true);
      expect(config.skipDocstringMethods.has('__str__')).toBe(true);
    });

    it('should throw ConfigError for a schema mismatch', () => {
      expect(() => createConfig({ min_docstring_length: 'long' })).toThrow(ConfigError);
    });
  });

  describe('loadConfig', () => {
    it('should use defaults when the file is missing', async () => {
      const config = await loadConfig(tempDir);

      expect(config.minDocstringLength).toBe(10);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should warn when an explicit file is missing', async () => {
      await loadConfig(tempDir, 'custom.yaml');

      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should read the YAML file', async () => {
      writeFileSync(
        join(tempDir, '.addonlint.yaml'),
        'validation_scope: full\nbase_branch: origin/17.0\ndisabled_checks:\n  - missing_readme\n'
      );

      const config = await loadConfig(tempDir);

      expect(config.validationScope).toBe('full');
      expect(config.baseBranch).toBe('origin/17.0');
      expect(config.disabledChecks.has('missing_readme')).toBe(true);
    });

    it('should fall back to defaults for a malformed file', async () => {
      writeFileSync(join(tempDir, '.addonlint.yaml'), 'validation_scope: [full\n');

      const config = await loadConfig(tempDir);

      expect(config.validationScope).toBe('changed');
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('withOverrides', () => {
    it('should replace only the given values', () => {
      const base = createConfig({ base_branch: 'origin/main' });

      const config = withOverrides(base, { validationScope: 'full' });

      expect(config.validationScope).toBe('full');
      expect(config.baseBranch).toBe('origin/main');
      expect(config.context).toBe('auto');
      expect(Object.isFrozen(config)).toBe(true);
    });
  });
});
