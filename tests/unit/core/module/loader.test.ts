/**
 * Tests for add-on loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import {
  createExcludeMatcher,
  findManifest,
  isTruthy,
  loadAddon,
} from '../../../../src/core/module/loader.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import { SystemError } from '../../../../src/utils/errors.js';
import { createTempTree, saleAddon, type TempTree } from '../../../helpers/addon-tree.js';

const config = getDefaultConfig();

describe('loadAddon', () => {
  let tree: TempTree;

  beforeEach(() => {
    tree = createTempTree('loader');
  });

  afterEach(() => {
    tree.remove();
  });

  it('lists python sources, then data files in manifest order, then catalogs', async () => {
    tree.write(
      saleAddon({
        'i18n/fr.po': 'msgid "Sale"\nmsgstr "Vente"\n',
        'tests/test_sale.py': 'pass\n',
        'static/lib/vendor.py': 'pass\n',
      }),
      'sale'
    );

    const addon = await loadAddon(join(tree.root, 'sale'), config);

    expect(addon.name).toBe('sale');
    expect(addon.path).toBe(join(tree.root, 'sale'));
    expect(addon.installable).toBe(true);
    expect(addon.readme).toBe('README.rst');
    expect(addon.files.map((f) => [f.relativePath, f.dataSection])).toEqual([
      ['__init__.py', undefined],
      ['models/__init__.py', undefined],
      ['models/sale.py', undefined],
      ['views/views.xml', 'data'],
      ['data/res.partner.csv', 'data'],
      ['i18n/fr.po', undefined],
    ]);
  });

  it('prefers __manifest__.py over __openerp__.py', async () => {
    tree.write(saleAddon({ '__openerp__.py': "{'name': 'Old'}\n" }));

    expect(await findManifest(tree.root)).toBe(join(tree.root, '__manifest__.py'));
  });

  it('marks installable=False add-ons and lists no files', async () => {
    tree.write(saleAddon({ '__manifest__.py': "{'name': 'Sale', 'installable': False}\n" }));

    const addon = await loadAddon(tree.root, config);

    expect(addon.installable).toBe(false);
    expect(addon.files).toEqual([]);
  });

  it('keeps data files that do not exist', async () => {
    tree.write(saleAddon({ '__manifest__.py': "{'name': 'Sale', 'demo': ['demo/missing.xml', 'demo/notes.txt']}\n" }));

    const addon = await loadAddon(tree.root, config);

    expect(addon.files.filter((f) => f.dataSection)).toEqual([
      { path: join(tree.root, 'demo/missing.xml'), relativePath: 'demo/missing.xml', dataSection: 'demo' },
    ]);
  });

  it('reports an add-on without __init__.py through its manifest', async () => {
    tree.write({ '__manifest__.py': "{'name': 'Sale'}\n" });

    const addon = await loadAddon(tree.root, config);

    expect(addon.manifest.error).toEqual({ message: 'add-on has no __init__.py', line: null });
    expect(addon.installable).toBe(false);
  });

  it('reports an empty manifest', async () => {
    tree.write({ '__init__.py': '', '__manifest__.py': '{}\n' });

    const addon = await loadAddon(tree.root, config);

    expect(addon.manifest.error?.message).toBe('manifest is empty');
  });

  it('finds no README when there is none', async () => {
    const files = saleAddon();
    delete files['README.rst'];
    tree.write(files);

    expect((await loadAddon(tree.root, config)).readme).toBeNull();
  });

  it('throws for a directory without manifest', async () => {
    await expect(loadAddon(tree.root, config)).rejects.toThrow(SystemError);
  });
});

describe('isTruthy', () => {
  it('follows Python truthiness', () => {
    expect(isTruthy(true)).toBe(true);
    expect(isTruthy(0)).toBe(false);
    expect(isTruthy('')).toBe(false);
    expect(isTruthy([])).toBe(false);
    expect(isTruthy({ a: 1 })).toBe(true);
    expect(isTruthy(null)).toBe(false);
  });
});

describe('createExcludeMatcher', () => {
  it('matches the default exclusions', () => {
    const isExcluded = createExcludeMatcher(config.excludePaths);

    expect(isExcluded('migrations/17.0.1.0/pre-migrate.py')).toBe(true);
    expect(isExcluded('tests/test_sale.py')).toBe(true);
    expect(isExcluded('models/sale.py')).toBe(false);
  });
});
