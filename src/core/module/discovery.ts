/**
 * Turning command-line paths into add-on directories.
 */
import * as path from 'node:path';
import { MANIFEST_NAMES, findManifest } from './loader.js';
import { fileExists, globFiles, isDirectory, readFile, realPath } from '../../utils/file-system.js';
import { createPathMatcher } from '../../utils/path-matcher.js';

/** How far up from a file to look for its add-on. */
const MAX_PARENT_LEVELS = 10;

const DISCOVERY_IGNORE = ['**/node_modules/**', '**/.git/**'];

/**
 * Nearest ancestor directory (the path itself included) holding a manifest.
 */
export async function findAddonRoot(filePath: string): Promise<string | null> {
  let current = path.resolve(filePath);
  if (!(await isDirectory(current))) current = path.dirname(current);

  for (let level = 0; level < MAX_PARENT_LEVELS; level++) {
    if (await findManifest(current)) return current;
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

/**
 * Add-on directories for the given paths. Directories holding a manifest are taken as they
 * are; any other path resolves to its enclosing add-on. Paths outside any add-on are dropped.
 */
export async function resolveAddonDirs(paths: readonly string[], cwd: string): Promise<string[]> {
  const dirs = new Set<string>();
  for (const given of paths) {
    const root = await findAddonRoot(path.resolve(cwd, given));
    if (root) dirs.add(root);
  }
  return [...dirs].sort();
}

async function loadGitignore(cwd: string): Promise<string[]> {
  const file = path.join(cwd, '.gitignore');
  if (!(await fileExists(file))) return [];
  return (await readFile(file))
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Find add-on directories below `cwd` by their manifest files, honoring `.gitignore` there.
 */
export async function discoverAddons(cwd: string): Promise<string[]> {
  const manifests = await globFiles(
    MANIFEST_NAMES.map((name) => `**/${name}`),
    { cwd, ignore: DISCOVERY_IGNORE, absolute: false }
  );
  const matcher = createPathMatcher([], await loadGitignore(cwd));
  const dirs = new Set<string>();
  for (const manifest of matcher.filter(manifests)) {
    dirs.add(await realPath(path.resolve(cwd, path.dirname(manifest))));
  }
  return [...dirs].sort();
}
