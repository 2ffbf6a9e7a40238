/**
 * Tests for YAML parsing with schema validation.
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { SystemError } from '../../../src/utils/errors.js';

describe('parseYaml', () => {
  it('should parse mappings', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('should wrap syntax errors', () => {
    expect(() => parseYaml('a: [1, 2')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  const schema = z.object({ level: z.number() });

  it('should return the validated value', () => {
    expect(parseYamlWithSchema('level: 3', schema)).toEqual({ level: 3 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('level: high', schema)).toThrow(/YAML validation failed: level: /);
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });
    if (result.success) throw new Error('expected failure');

    const formatted = formatZodError(result.error);

    expect(formatted.split('; ')).toHaveLength(2);
    expect(formatted.startsWith('a: ')).toBe(true);
  });
});
