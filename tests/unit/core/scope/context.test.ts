import { describe, it, expect } from 'vitest';
import { detectContext, isCiEnvironment } from '../../../../src/core/scope/context.js';

describe('detectContext', () => {
  it('lets an explicit override win', () => {
    expect(detectContext('local', { CI: 'true' }, false)).toBe('local');
    expect(detectContext('ci', {}, true)).toBe('ci');
  });

  it('detects CI from the environment', () => {
    expect(detectContext('auto', { GITHUB_ACTIONS: 'true' }, true)).toBe('ci');
    expect(detectContext('auto', { ADDONLINT_BASE_BRANCH: 'main' }, false)).toBe('ci');
  });

  it('falls back on staged files', () => {
    expect(detectContext('auto', {}, true)).toBe('local');
    expect(detectContext('auto', {}, false)).toBe('unknown');
  });
});

describe('isCiEnvironment', () => {
  it('ignores empty values', () => {
    expect(isCiEnvironment({ CI: '' })).toBe(false);
  });
});
