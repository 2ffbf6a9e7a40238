/**
 * Add-on descriptor loading: manifest, installable flag and the files to check.
 */
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import type { LintConfig } from '../config/loader.js';
import type { ManifestFacts, ManifestValue, SourceUnit } from '../facts/types.js';
import { ManifestExtractor } from '../../validators/manifest.js';
import {
  fileExists,
  globFiles,
  readFile,
  realPath,
  walkFiles,
} from '../../utils/file-system.js';
import { ErrorCodes, SystemError, errorMessage } from '../../utils/errors.js';

export const MANIFEST_NAMES = ['__manifest__.py', '__openerp__.py'];

/** Manifest keys listing data files, in reporting order. */
export const DATA_SECTIONS = ['data', 'demo', 'demo_xml', 'init_xml', 'test', 'update_xml'];

export const README_FILES = ['README.md', 'README.txt', 'README.rst'];

const DATA_EXTENSIONS: ReadonlySet<string> = new Set(['.xml', '.csv']);
const PYTHON_SKIP_DIRS: ReadonlySet<string> = new Set(['__pycache__', '.git', 'node_modules', 'static', 'lib']);
const CATALOG_PATTERNS = ['i18n*/*.po', 'i18n*/*.pot'];

/**
 * A file of the add-on to extract.
 */
export interface AddonFile {
  /** Resolved absolute path */
  path: string;
  /** Relative to the add-on root, forward slashes */
  relativePath: string;
  /** Manifest section for data files */
  dataSection?: string;
}

export interface AddonDescriptor {
  /** Technical name (directory name) */
  name: string;
  /** Resolved add-on root */
  path: string;
  manifest: SourceUnit<ManifestFacts>;
  /** False when the manifest says so or could not be loaded */
  installable: boolean;
  /** Python sources, then data files in manifest order, then catalogs */
  files: AddonFile[];
  readme: string | null;
}

/** Python truthiness of a manifest value. */
export function isTruthy(value: ManifestValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Locate the manifest file of an add-on directory.
 */
export async function findManifest(dir: string): Promise<string | null> {
  for (const name of MANIFEST_NAMES) {
    const candidate = path.join(dir, name);
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Matcher for `exclude_paths`; dot files are matched like any other.
 */
export function createExcludeMatcher(patterns: readonly string[]): (relativePath: string) => boolean {
  return (relativePath) => patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

async function readManifest(manifestPath: string, root: string): Promise<SourceUnit<ManifestFacts>> {
  const relativePath = path.basename(manifestPath);
  const failed = (message: string): SourceUnit<ManifestFacts> => ({
    path: manifestPath,
    relativePath,
    facts: null,
    error: { message, line: null },
  });

  if (!(await fileExists(path.join(root, '__init__.py')))) {
    return failed('add-on has no __init__.py');
  }

  let content: string;
  try {
    content = await readFile(manifestPath);
  } catch (error) {
    return failed(errorMessage(error));
  }

  const unit = new ManifestExtractor().extract({ path: manifestPath, relativePath, content });
  if (unit.facts && Object.keys(unit.facts.values).length === 0) {
    return failed('manifest is empty');
  }
  return unit;
}

function dataFileNames(values: Record<string, ManifestValue>, section: string): string[] {
  const listed = values[section];
  if (!Array.isArray(listed)) return [];
  return listed.filter((entry): entry is string => typeof entry === 'string');
}

async function collectDataFiles(
  root: string,
  values: Record<string, ManifestValue>,
  isExcluded: (relativePath: string) => boolean
): Promise<AddonFile[]> {
  const files: AddonFile[] = [];
  for (const section of DATA_SECTIONS) {
    for (const name of dataFileNames(values, section)) {
      const relativePath = toPosix(path.normalize(name));
      if (!DATA_EXTENSIONS.has(path.extname(relativePath).toLowerCase())) continue;
      if (isExcluded(relativePath)) continue;
      files.push({
        path: await realPath(path.join(root, relativePath)),
        relativePath,
        dataSection: section,
      });
    }
  }
  return files;
}

async function collectPythonFiles(
  root: string,
  isExcluded: (relativePath: string) => boolean
): Promise<AddonFile[]> {
  const files: AddonFile[] = [];
  for (const file of await walkFiles(root, PYTHON_SKIP_DIRS)) {
    if (!file.endsWith('.py')) continue;
    const relativePath = toPosix(path.relative(root, file));
    if (MANIFEST_NAMES.includes(relativePath) || isExcluded(relativePath)) continue;
    files.push({ path: await realPath(file), relativePath });
  }
  return files;
}

async function collectCatalogs(
  root: string,
  isExcluded: (relativePath: string) => boolean
): Promise<AddonFile[]> {
  const files: AddonFile[] = [];
  for (const relativePath of await globFiles(CATALOG_PATTERNS, { cwd: root, absolute: false })) {
    if (isExcluded(relativePath)) continue;
    files.push({ path: await realPath(path.join(root, relativePath)), relativePath });
  }
  return files;
}

async function findReadme(root: string): Promise<string | null> {
  for (const name of README_FILES) {
    if (await fileExists(path.join(root, name))) return name;
  }
  return null;
}

/**
 * Load an add-on directory.
 * A manifest that cannot be loaded leaves the add-on with no files to check.
 * @throws SystemError when the directory has no manifest
 */
export async function loadAddon(
  dir: string,
  config: Pick<LintConfig, 'excludePaths'>
): Promise<AddonDescriptor> {
  const root = await realPath(dir);
  const manifestPath = await findManifest(root);
  if (!manifestPath) {
    throw new SystemError(ErrorCodes.INVALID_MANIFEST, `No manifest found in ${root}`, { path: root });
  }

  const manifest = await readManifest(manifestPath, root);
  const descriptor: AddonDescriptor = {
    name: path.basename(root),
    path: root,
    manifest,
    installable: false,
    files: [],
    readme: await findReadme(root),
  };
  if (!manifest.facts) return descriptor;

  const values = manifest.facts.values;
  descriptor.installable = values.installable === undefined || isTruthy(values.installable);
  if (!descriptor.installable) return descriptor;

  const isExcluded = createExcludeMatcher(config.excludePaths);
  descriptor.files = [
    ...(await collectPythonFiles(root, isExcluded)),
    ...(await collectDataFiles(root, values, isExcluded)),
    ...(await collectCatalogs(root, isExcluded)),
  ];
  return descriptor;
}
