/**
 * File system operations - reading, writing, walking and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
  });
  return files.sort();
}

/**
 * Resolve symlinks, falling back to a plain absolute path when the file is gone.
 */
export async function realPath(filePath: string): Promise<string> {
  try {
    return await fs.promises.realpath(filePath);
  } catch { /* deleted or dangling path */
    return path.resolve(filePath);
  }
}

/**
 * Recursively list files under a directory, skipping the named directories.
 * Results are sorted so that runs are deterministic.
 */
export async function walkFiles(
  root: string,
  skipDirs: ReadonlySet<string>
): Promise<string[]> {
  const results: string[] = [];

  async function visit(dir: string): Promise<void> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!skipDirs.has(entry.name)) {
          await visit(full);
        }
      } else if (entry.isFile()) {
        results.push(full);
      }
    }
  }

  await visit(root);
  return results.sort();
}

/**
 * Walk up from a directory until `relative` exists below one of its ancestors.
 */
export function findUpSync(startDir: string, relative: string): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, relative);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}
