import { execFileSync } from 'node:child_process';
import { CollaboratorError } from '@/errors';
import { GitCli, getLogRangeArgs, parseLogOutput, parseTagOutput } from '@/git';
import { createTestConfig } from '@/tests/helpers/config';
import { debug, info } from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));
vi.mock('which', () => ({
  default: { sync: vi.fn(() => '/usr/bin/git') },
}));

const gitFailure = (stderr: string): Error =>
  Object.assign(new Error('Command failed: git'), { status: 128, stderr: `${stderr}\n` });

describe('git', () => {
  describe('getLogRangeArgs', () => {
    it('should build revision ranges for tags and hashes', () => {
      expect(getLogRangeArgs({ type: 'tag', start: 'v1.0.0', end: '' })).toEqual(['v1.0.0..HEAD']);
      expect(getLogRangeArgs({ type: 'tag', start: 'v1.0.0', end: 'v1.1.0' })).toEqual(['v1.0.0..v1.1.0']);
      expect(getLogRangeArgs({ type: 'tag', start: '', end: '' })).toEqual(['HEAD']);
      expect(getLogRangeArgs({ type: 'hash', start: 'abc123', end: 'def456' })).toEqual(['abc123..def456']);
    });

    it('should build date filters', () => {
      expect(getLogRangeArgs({ type: 'date', start: '2024-01-01', end: '2024-02-01' })).toEqual([
        '--since=2024-01-01',
        '--until=2024-02-01',
      ]);
      expect(getLogRangeArgs({ type: 'date', start: '', end: '2024-02-01' })).toEqual(['--until=2024-02-01']);
      expect(getLogRangeArgs({ type: 'date', start: '', end: '' })).toEqual([]);
    });
  });

  describe('parseLogOutput', () => {
    it('should keep multi-line messages intact', () => {
      const output = 'aaa111\x1f2024-02-01\x1ffeat: add X\n\nSome body\n\x1e\nbbb222\x1f2024-01-01\x1ffix: y\n\x1e';

      expect(parseLogOutput(output)).toEqual([
        { hash: 'aaa111', date: '2024-02-01', message: 'feat: add X\n\nSome body' },
        { hash: 'bbb222', date: '2024-01-01', message: 'fix: y' },
      ]);
    });

    it('should return no commits for empty output', () => {
      expect(parseLogOutput('')).toEqual([]);
    });
  });

  describe('parseTagOutput', () => {
    it('should keep version tags under the prefix, oldest first', () => {
      const output = ['1706745600|2024-02-01|v1.1.0', '1704067200|2024-01-01|v1.0.0', '1704067300|2024-01-01|latest', ''].join(
        '\n',
      );

      expect(parseTagOutput(output, 'v')).toEqual([
        { name: 'v1.0.0', date: '2024-01-01', timestamp: 1704067200 },
        { name: 'v1.1.0', date: '2024-02-01', timestamp: 1706745600 },
      ]);
    });
  });

  describe('GitCli', () => {
    const config = createTestConfig();
    let git: GitCli;

    beforeEach(() => {
      vi.mocked(execFileSync).mockReset();
      git = new GitCli(config, '/repo');
    });

    it('should return the most recent tag under the prefix', () => {
      vi.mocked(execFileSync).mockReturnValue('v1.2.0\n');

      expect(git.lastTag()).toBe('v1.2.0');
      expect(execFileSync).toHaveBeenCalledWith(
        '/usr/bin/git',
        ['describe', '--tags', '--abbrev=0', '--match=v*'],
        expect.objectContaining({ cwd: '/repo', encoding: 'utf8' }),
      );
    });

    it('should return an empty tag when the repository has no tags', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw gitFailure('fatal: No names found, cannot describe anything.');
      });

      expect(git.lastTag()).toBe('');
      expect(debug).toHaveBeenCalledWith('git describe failed: fatal: No names found, cannot describe anything.');
    });

    it('should list tags', () => {
      vi.mocked(execFileSync).mockReturnValue('1704067200|2024-01-01|v1.0.0\n');

      expect(git.tags()).toEqual([{ name: 'v1.0.0', date: '2024-01-01', timestamp: 1704067200 }]);
      expect(execFileSync).toHaveBeenCalledWith(
        '/usr/bin/git',
        [
          'for-each-ref',
          '--sort=creatordate',
          '--format=%(creatordate:unix)|%(creatordate:short)|%(refname:strip=2)',
          'refs/tags/v*',
        ],
        expect.anything(),
      );
    });

    it('should read the log of a range', () => {
      vi.mocked(execFileSync).mockReturnValue('aaa111\x1f2024-02-01\x1ffeat: add X\x1e');

      expect(git.log({ type: 'tag', start: 'v1.0.0', end: '' })).toEqual([
        { hash: 'aaa111', date: '2024-02-01', message: 'feat: add X' },
      ]);
      expect(execFileSync).toHaveBeenCalledWith(
        '/usr/bin/git',
        ['log', '--date=short', '--pretty=format:%H%x1f%ad%x1f%B%x1e', 'v1.0.0..HEAD'],
        expect.anything(),
      );
    });

    it('should raise a collaborator error when git fails', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw gitFailure("fatal: ambiguous argument 'v9.0.0..HEAD'");
      });

      expect(() => git.log({ type: 'tag', start: 'v9.0.0', end: '' })).toThrow(
        new CollaboratorError("git log failed: fatal: ambiguous argument 'v9.0.0..HEAD'"),
      );
    });

    it('should fall back to the error message when git writes nothing to stderr', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw new Error('spawn git ENOENT');
      });

      expect(() => git.tags()).toThrow('git for-each-ref failed: spawn git ENOENT');
    });

    it('should report the current branch', () => {
      vi.mocked(execFileSync).mockReturnValue('feature/JIRA-12\n');

      expect(git.branch()).toBe('feature/JIRA-12');
      expect(git.isDetached()).toBe(false);
    });

    it('should report a detached HEAD', () => {
      vi.mocked(execFileSync).mockImplementation(() => {
        throw gitFailure('');
      });

      expect(git.branch()).toBe('');
      expect(git.isDetached()).toBe(true);
    });

    it('should commit with one -m argument per non-empty part', () => {
      vi.mocked(execFileSync).mockReturnValue('[main abc1234] feat: add X\n');

      git.commit('feat: add X', '', 'Refs: JIRA-12');

      expect(execFileSync).toHaveBeenCalledWith(
        '/usr/bin/git',
        ['commit', '-m', 'feat: add X', '-m', 'Refs: JIRA-12'],
        expect.anything(),
      );
      expect(info).toHaveBeenCalledWith('[main abc1234] feat: add X');
    });

    it('should create an annotated tag without pushing it', () => {
      vi.mocked(execFileSync).mockReturnValue('');

      git.createTag('v1.3.0', 'Version 1.3.0', false);

      expect(execFileSync).toHaveBeenCalledOnce();
      expect(execFileSync).toHaveBeenCalledWith(
        '/usr/bin/git',
        ['tag', '-a', 'v1.3.0', '-m', 'Version 1.3.0'],
        expect.anything(),
      );
    });

    it('should push the tag when asked to', () => {
      vi.mocked(execFileSync).mockReturnValue('');

      git.createTag('v1.3.0', 'Version 1.3.0', true);

      expect(execFileSync).toHaveBeenLastCalledWith('/usr/bin/git', ['push', 'origin', 'v1.3.0'], expect.anything());
      expect(info).toHaveBeenCalledWith('Pushed tag v1.3.0 to origin');
    });

    it('should explain the missing permission when the push is rejected', () => {
      vi.mocked(execFileSync)
        .mockReturnValueOnce('')
        .mockImplementationOnce(() => {
          throw gitFailure('fatal: unable to access: The requested URL returned error: 403');
        });

      expect(() => git.createTag('v1.3.0', 'Version 1.3.0', true)).toThrow(/contents: write/);
    });
  });
});
