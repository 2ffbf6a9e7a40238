/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, readFileSync as fsReadFileSync, symlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  readFile,
  writeFile,
  fileExists,
  isDirectory,
  globFiles,
  realPath,
  walkFiles,
  findUpSync,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `addonlint-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write into missing directories and read back', async () => {
    const filePath = join(tempDir, 'a', 'b', 'report.json');

    await writeFile(filePath, '{}');

    expect(fsReadFileSync(filePath, 'utf-8')).toBe('{}');
    expect(await readFile(filePath)).toBe('{}');
  });

  it('should tell files from directories', async () => {
    writeFileSync(join(tempDir, 'f.txt'), 'x');

    expect(await fileExists(join(tempDir, 'f.txt'))).toBe(true);
    expect(await fileExists(join(tempDir, 'missing.txt'))).toBe(false);
    expect(await isDirectory(tempDir)).toBe(true);
    expect(await isDirectory(join(tempDir, 'f.txt'))).toBe(false);
  });

  it('should glob relative paths in sorted order', async () => {
    mkdirSync(join(tempDir, 'i18n'));
    writeFileSync(join(tempDir, 'i18n', 'fr.po'), '');
    writeFileSync(join(tempDir, 'i18n', 'de.po'), '');

    expect(await globFiles('i18n/*.po', { cwd: tempDir, absolute: false })).toEqual(['i18n/de.po', 'i18n/fr.po']);
  });

  it('should walk files and skip named directories', async () => {
    mkdirSync(join(tempDir, 'models'));
    mkdirSync(join(tempDir, '__pycache__'));
    writeFileSync(join(tempDir, 'models', 'order.py'), '');
    writeFileSync(join(tempDir, '__pycache__', 'order.pyc'), '');
    writeFileSync(join(tempDir, '__init__.py'), '');

    const files = await walkFiles(tempDir, new Set(['__pycache__']));

    expect(files).toEqual([join(tempDir, '__init__.py'), join(tempDir, 'models', 'order.py')]);
  });

  it('should resolve symlinks and fall back for missing paths', async () => {
    writeFileSync(join(tempDir, 'target.py'), '');
    symlinkSync(join(tempDir, 'target.py'), join(tempDir, 'link.py'));
    const real = await realPath(join(tempDir, 'target.py'));

    expect(await realPath(join(tempDir, 'link.py'))).toBe(real);
    expect(await realPath(join(tempDir, 'gone.py'))).toBe(join(tempDir, 'gone.py'));
  });

  it('should find a file in an ancestor', () => {
    mkdirSync(join(tempDir, 'x', 'y'), { recursive: true });
    writeFileSync(join(tempDir, 'marker.json'), '{}');

    expect(findUpSync(join(tempDir, 'x', 'y'), 'marker.json')).toBe(join(tempDir, 'marker.json'));
  });
});
