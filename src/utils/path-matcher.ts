/**
 * Path matcher for include/exclude patterns (gitignore syntax).
 * Used to narrow the add-on directories picked up by discovery.
 */

import ignore, { type Ignore } from 'ignore';

export interface PathMatcher {
  /**
   * Returns true if the path should be kept.
   * @param filePath - Relative path from the project root
   */
  matches(filePath: string): boolean;

  filter(filePaths: string[]): string[];
}

/**
 * Create a PathMatcher.
 *
 * - With no include patterns every path starts included
 * - With include patterns a path must match at least one
 * - Exclude patterns then drop paths from the included set
 */
export function createPathMatcher(
  include: string[] = [],
  exclude: string[] = []
): PathMatcher {
  const includeFilter: Ignore | null = include.length > 0 ? ignore().add(include) : null;
  const excludeFilter: Ignore = ignore().add(exclude);

  const matches = (filePath: string): boolean => {
    const normalizedPath = filePath.replace(/\\/g, '/').replace(/^\.\//, '');
    if (normalizedPath === '' || normalizedPath === '.' || normalizedPath.startsWith('../')) {
      return true;
    }
    if (includeFilter && !includeFilter.ignores(normalizedPath)) {
      return false;
    }
    return !excludeFilter.ignores(normalizedPath);
  };

  return {
    matches,
    filter(filePaths: string[]): string[] {
      return filePaths.filter(matches);
    },
  };
}

