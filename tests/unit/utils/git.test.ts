/**
 * Tests for git helpers, with a fake runner standing in for git.
 */
import { describe, it, expect } from 'vitest';
import {
  parseNameList,
  getStagedFiles,
  getTopLevel,
  refExists,
  getChangedFilesSince,
  type GitRunner,
} from '../../../src/utils/git.js';
import { ScopeDetectionError, ErrorCodes } from '../../../src/utils/errors.js';

function createGit(responses: Record<string, string | Error>): { git: GitRunner; calls: string[] } {
  const calls: string[] = [];
  const git: GitRunner = async (args) => {
    const key = args.join(' ');
    calls.push(key);
    const response = responses[key];
    if (response === undefined) {
      throw new ScopeDetectionError(ErrorCodes.GIT_FAILED, `unexpected: git ${key}`);
    }
    if (response instanceof Error) throw response;
    return response;
  };
  return { git, calls };
}

describe('parseNameList', () => {
  it('should drop blank lines and surrounding whitespace', () => {
    expect(parseNameList('a/b.py\n\n  c.xml \n')).toEqual(['a/b.py', 'c.xml']);
  });
});

describe('getStagedFiles', () => {
  it('should list added, copied, modified and renamed staged files', async () => {
    const { git, calls } = createGit({
      'diff --cached --name-only --diff-filter=ACMR': 'shop/models/order.py\nshop/views/order.xml\n',
    });

    expect(await getStagedFiles('/repo', git)).toEqual(['shop/models/order.py', 'shop/views/order.xml']);
    expect(calls).toEqual(['diff --cached --name-only --diff-filter=ACMR']);
  });
});

describe('getTopLevel', () => {
  it('should trim the trailing newline', async () => {
    const { git } = createGit({ 'rev-parse --show-toplevel': '/repo\n' });

    expect(await getTopLevel('/repo/shop', git)).toBe('/repo');
  });
});

describe('refExists', () => {
  it('should be true when the ref resolves', async () => {
    const { git } = createGit({ 'rev-parse --verify --quiet origin/main': 'abc123\n' });

    expect(await refExists('origin/main', '/repo', git)).toBe(true);
  });

  it('should be false when git fails', async () => {
    const { git } = createGit({});

    expect(await refExists('origin/nope', '/repo', git)).toBe(false);
  });
});

describe('getChangedFilesSince', () => {
  it('should use the merge-base diff first', async () => {
    const { git, calls } = createGit({
      'diff --name-only --diff-filter=ACMR origin/main...HEAD': 'a.py\n',
    });

    expect(await getChangedFilesSince('origin/main', '/repo', git)).toEqual(['a.py']);
    expect(calls).toHaveLength(1);
  });

  it('should fall back to a two-point diff', async () => {
    const { git, calls } = createGit({
      'diff --name-only --diff-filter=ACMR origin/main': 'b.xml\n',
    });

    expect(await getChangedFilesSince('origin/main', '/repo', git)).toEqual(['b.xml']);
    expect(calls).toEqual([
      'diff --name-only --diff-filter=ACMR origin/main...HEAD',
      'diff --name-only --diff-filter=ACMR origin/main',
    ]);
  });

  it('should reject when both diffs fail', async () => {
    const { git } = createGit({});

    await expect(getChangedFilesSince('HEAD~1', '/repo', git)).rejects.toBeInstanceOf(ScopeDetectionError);
  });
});
