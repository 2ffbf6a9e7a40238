/**
 * Tests for add-on discovery.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { discoverAddons, findAddonRoot, resolveAddonDirs } from '../../../../src/core/module/discovery.js';
import { createTempTree, saleAddon, type TempTree } from '../../../helpers/addon-tree.js';

describe('add-on discovery', () => {
  let tree: TempTree;

  beforeEach(() => {
    tree = createTempTree('discovery');
    tree.write(saleAddon(), 'addons/sale');
    tree.write(saleAddon(), 'addons/stock');
    tree.write(saleAddon(), 'build/sale_copy');
    tree.write({ 'README.md': 'notes\n' }, 'docs');
  });

  afterEach(() => {
    tree.remove();
  });

  describe('findAddonRoot', () => {
    it('walks up from a file to its add-on', async () => {
      expect(await findAddonRoot(join(tree.root, 'addons/sale/models/sale.py'))).toBe(join(tree.root, 'addons/sale'));
    });

    it('gives null outside any add-on', async () => {
      expect(await findAddonRoot(join(tree.root, 'docs/README.md'))).toBeNull();
    });
  });

  describe('resolveAddonDirs', () => {
    it('maps paths to distinct sorted add-on roots', async () => {
      const dirs = await resolveAddonDirs(
        ['addons/stock', 'addons/sale/views/views.xml', 'addons/sale/models/sale.py', 'docs'],
        tree.root
      );

      expect(dirs).toEqual([join(tree.root, 'addons/sale'), join(tree.root, 'addons/stock')]);
    });
  });

  describe('discoverAddons', () => {
    it('finds every manifest below the directory', async () => {
      expect(await discoverAddons(tree.root)).toEqual([
        join(tree.root, 'addons/sale'),
        join(tree.root, 'addons/stock'),
        join(tree.root, 'build/sale_copy'),
      ]);
    });

    it('honors .gitignore', async () => {
      tree.write({ '.gitignore': '# generated\nbuild/\n' });

      expect(await discoverAddons(tree.root)).toEqual([
        join(tree.root, 'addons/sale'),
        join(tree.root, 'addons/stock'),
      ]);
    });
  });
});
