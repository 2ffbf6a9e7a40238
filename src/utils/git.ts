/**
 * Git integration for scope detection.
 * Every call has a bounded wait; callers treat failures as "no files".
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ScopeDetectionError, ErrorCodes, errorMessage } from './errors.js';

const execFileAsync = promisify(execFile);

/** Default timeout for git commands in milliseconds */
export const GIT_COMMAND_TIMEOUT_MS = 10000;

/**
 * Runs `git <args>` in `cwd` and resolves with stdout.
 * Rejects with ScopeDetectionError when git fails or times out.
 */
export type GitRunner = (args: string[], cwd: string) => Promise<string>;

export const runGit: GitRunner = async (args, cwd) => {
  try {
    const { stdout } = await execFileAsync('git', args, {
      cwd,
      encoding: 'utf-8',
      timeout: GIT_COMMAND_TIMEOUT_MS,
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout;
  } catch (error) {
    const timedOut = error instanceof Error && 'killed' in error && error.killed === true;
    throw new ScopeDetectionError(
      timedOut ? ErrorCodes.GIT_TIMEOUT : ErrorCodes.GIT_FAILED,
      `git ${args.join(' ')} failed: ${errorMessage(error)}`,
      { args, cwd }
    );
  }
};

/**
 * Split git's name-only output into paths.
 */
export function parseNameList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Get files staged for the next commit, relative to the repository root.
 */
export async function getStagedFiles(cwd: string, git: GitRunner = runGit): Promise<string[]> {
  const stdout = await git(['diff', '--cached', '--name-only', '--diff-filter=ACMR'], cwd);
  return parseNameList(stdout);
}

/**
 * Get the repository top-level directory.
 */
export async function getTopLevel(cwd: string, git: GitRunner = runGit): Promise<string> {
  const stdout = await git(['rev-parse', '--show-toplevel'], cwd);
  return stdout.trim();
}

/**
 * Check whether a ref resolves in this repository.
 */
export async function refExists(ref: string, cwd: string, git: GitRunner = runGit): Promise<boolean> {
  try {
    await git(['rev-parse', '--verify', '--quiet', ref], cwd);
    return true;
  } catch { /* unknown ref */
    return false;
  }
}

/**
 * Files changed on this branch relative to `base`.
 * Prefers the merge-base diff (`base...HEAD`) and falls back to a two-point diff.
 */
export async function getChangedFilesSince(
  base: string,
  cwd: string,
  git: GitRunner = runGit
): Promise<string[]> {
  try {
    const stdout = await git(['diff', '--name-only', '--diff-filter=ACMR', `${base}...HEAD`], cwd);
    return parseNameList(stdout);
  } catch { /* no merge base, shallow clone */
    const stdout = await git(['diff', '--name-only', '--diff-filter=ACMR', base], cwd);
    return parseNameList(stdout);
  }
}
