/**
 * Changed-file detection through git.
 *
 * - local: files staged for commit
 * - ci: the branch diff against a base reference
 * - unknown: staged files when there are any, else the branch diff
 *
 * Every failure degrades to an empty set; nothing here throws.
 */
import * as path from 'node:path';
import type { ContextOverride } from '../config/schema.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { realPath } from '../../utils/file-system.js';
import {
  getChangedFilesSince,
  getStagedFiles,
  getTopLevel,
  refExists,
  runGit,
  type GitRunner,
} from '../../utils/git.js';
import { detectContext, type Environment, type ExecutionContext } from './context.js';

const log = logger.child('scope');

export const FALLBACK_BASE_REF = 'HEAD~1';
const KNOWN_BASE_BRANCHES = ['main', 'master', 'develop'];

export interface ChangedFilesOptions {
  cwd: string;
  context?: ContextOverride;
  /** Configured base reference; wins over everything else */
  baseBranch?: string;
  env?: Environment;
  git?: GitRunner;
}

export interface ChangedFiles {
  context: ExecutionContext;
  /** Only set when the branch diff was consulted */
  baseRef: string | null;
  /** Resolved absolute paths */
  files: ReadonlySet<string>;
}

export class ChangedFilesDetector {
  private readonly cwd: string;
  private readonly override: ContextOverride;
  private readonly baseBranch: string | undefined;
  private readonly env: Environment;
  private readonly git: GitRunner;
  private cached: Promise<ChangedFiles> | null = null;

  constructor(options: ChangedFilesOptions) {
    this.cwd = options.cwd;
    this.override = options.context ?? 'auto';
    this.baseBranch = options.baseBranch;
    this.env = options.env ?? process.env;
    this.git = options.git ?? runGit;
  }

  /**
   * Detect once per instance.
   */
  detect(): Promise<ChangedFiles> {
    this.cached ??= this.run();
    return this.cached;
  }

  /**
   * Base reference for the branch diff, first match wins:
   * configured value, ADDONLINT_BASE_BRANCH, GITHUB_BASE_REF, a well-known remote branch, HEAD~1.
   */
  async resolveBaseRef(): Promise<string> {
    if (this.baseBranch) return this.baseBranch;

    const explicit = this.env.ADDONLINT_BASE_BRANCH;
    if (explicit) {
      return explicit.startsWith('origin/') ? explicit : `origin/${explicit}`;
    }

    const githubBase = this.env.GITHUB_BASE_REF;
    if (githubBase) return `origin/${githubBase}`;

    for (const branch of KNOWN_BASE_BRANCHES) {
      if (await refExists(`origin/${branch}`, this.cwd, this.git)) {
        return `origin/${branch}`;
      }
    }
    return FALLBACK_BASE_REF;
  }

  private async run(): Promise<ChangedFiles> {
    const topLevel = await this.topLevel();
    const needsStaged = this.override !== 'ci';
    const staged = needsStaged ? await this.staged() : [];
    const context = detectContext(this.override, this.env, staged.length > 0);
    log.debug(`Execution context: ${context}`);

    let baseRef: string | null = null;
    let relative = staged;
    if (context === 'ci' || (context === 'unknown' && staged.length === 0)) {
      baseRef = await this.resolveBaseRef();
      relative = await this.branchDiff(baseRef);
    }

    const files = new Set<string>();
    for (const file of relative) {
      files.add(await realPath(path.resolve(topLevel, file)));
    }
    log.debug(`${files.size} changed file(s)`, { context, baseRef });
    return { context, baseRef, files };
  }

  private async topLevel(): Promise<string> {
    try {
      return await getTopLevel(this.cwd, this.git);
    } catch (error) {
      log.debug(`Not a git work tree: ${errorMessage(error)}`);
      return this.cwd;
    }
  }

  private async staged(): Promise<string[]> {
    try {
      return await getStagedFiles(this.cwd, this.git);
    } catch (error) {
      log.debug(`Failed to get staged files: ${errorMessage(error)}`);
      return [];
    }
  }

  private async branchDiff(baseRef: string): Promise<string[]> {
    if (baseRef !== FALLBACK_BASE_REF && !(await refExists(baseRef, this.cwd, this.git))) {
      log.debug(`Base reference ${baseRef} not available`);
      return [];
    }
    try {
      return await getChangedFilesSince(baseRef, this.cwd, this.git);
    } catch (error) {
      log.debug(`Branch diff against ${baseRef} failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
