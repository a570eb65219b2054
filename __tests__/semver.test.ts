import { parseCommitMessage } from '@/commit-message';
import { VersionParseError } from '@/errors';
import {
  computeReleaseType,
  formatTag,
  formatVersion,
  getNextVersion,
  higherPriorityReleaseType,
  isVersionTag,
  parseVersion,
} from '@/semver';
import { createTestConfig } from '@/tests/helpers/config';
import type { Config, ParsedCommit } from '@/types';
import { describe, expect, it } from 'vitest';

describe('semver', () => {
  const config = createTestConfig();

  const commits = (...messages: string[]): ParsedCommit[] =>
    messages.map((message) => parseCommitMessage(config, message));

  describe('parseVersion', () => {
    it('should strip the tag prefix', () => {
      expect(parseVersion('v1.2.3', 'v').version).toBe('1.2.3');
      expect(parseVersion('1.2.3', 'v').version).toBe('1.2.3');
      expect(parseVersion('release-2.0.0', 'release-').version).toBe('2.0.0');
    });

    it('should return 0.0.0 when there is no tag', () => {
      expect(parseVersion('', 'v').version).toBe('0.0.0');
    });

    it('should keep prerelease identifiers', () => {
      expect(parseVersion('v1.0.0-rc.1', 'v').prerelease).toEqual(['rc', 1]);
    });

    it('should reject tags that are not semantic versions', () => {
      expect(() => parseVersion('v1.2', 'v')).toThrow(new VersionParseError('error parsing version from git tag "v1.2"'));
      expect(() => parseVersion('latest', 'v')).toThrow(VersionParseError);
    });
  });

  describe('formatVersion / formatTag', () => {
    it('should format the version with and without the prefix', () => {
      const version = parseVersion('v1.4.0', 'v');
      expect(formatVersion(version)).toBe('1.4.0');
      expect(formatTag(config, version)).toBe('v1.4.0');
      expect(formatTag(createTestConfig({ tagPrefix: '' }), version)).toBe('1.4.0');
    });
  });

  describe('higherPriorityReleaseType', () => {
    it('should rank major over minor over patch over none', () => {
      expect(higherPriorityReleaseType('none', 'patch')).toBe('patch');
      expect(higherPriorityReleaseType('patch', 'minor')).toBe('minor');
      expect(higherPriorityReleaseType('major', 'patch')).toBe('major');
      expect(higherPriorityReleaseType('minor', 'none')).toBe('minor');
      expect(higherPriorityReleaseType('none', 'none')).toBe('none');
    });
  });

  describe('computeReleaseType', () => {
    it('should use the configured severity of each type', () => {
      expect(computeReleaseType(config, commits('feat: a'))).toBe('minor');
      expect(computeReleaseType(config, commits('fix: a'))).toBe('patch');
      expect(computeReleaseType(config, commits('perf: a'))).toBe('patch');
      expect(computeReleaseType(config, commits('docs: a', 'chore: b'))).toBe('none');
    });

    it('should not depend on the order of the commits', () => {
      const messages = ['fix: a', 'feat: b', 'docs!: c'];
      const orders = [
        [0, 1, 2],
        [0, 2, 1],
        [1, 0, 2],
        [1, 2, 0],
        [2, 0, 1],
        [2, 1, 0],
      ];

      for (const order of orders) {
        expect(computeReleaseType(config, commits(...order.map((index) => messages[index])))).toBe('major');
      }
    });
  });

  describe('getNextVersion', () => {
    const current = parseVersion('v1.2.3', 'v');

    it('should keep the version when there are no commits', () => {
      const next = getNextVersion(config, current, []);
      expect(formatVersion(next.version)).toBe('1.2.3');
      expect(next.changed).toBe(false);
      expect(next.releaseType).toBe('none');
    });

    it('should keep the version when no commit type bumps', () => {
      const next = getNextVersion(config, current, commits('docs: readme', 'ci: cache deps'));
      expect(formatVersion(next.version)).toBe('1.2.3');
      expect(next.changed).toBe(false);
    });

    it('should bump minor for a feature and patch for a fix', () => {
      expect(formatVersion(getNextVersion(config, current, commits('feat: a')).version)).toBe('1.3.0');
      expect(formatVersion(getNextVersion(config, current, commits('fix: a')).version)).toBe('1.2.4');
    });

    it('should bump major for a breaking change from 1.0.0 on', () => {
      const next = getNextVersion(config, current, commits('fix!: remove flag'));
      expect(formatVersion(next.version)).toBe('2.0.0');
      expect(next.releaseType).toBe('major');
      expect(next.changed).toBe(true);
    });

    it('should give the same result for mixed commits as for the breaking commit alone', () => {
      const mixed = getNextVersion(config, current, commits('fix: a', 'feat: b', 'feat: c\n\nBREAKING CHANGE: d'));
      const alone = getNextVersion(config, current, commits('feat: c\n\nBREAKING CHANGE: d'));
      expect(formatVersion(mixed.version)).toBe(formatVersion(alone.version));
      expect(formatVersion(mixed.version)).toBe('2.0.0');
    });

    it('should bump major for a breaking change footer wrapped over two lines', () => {
      const next = getNextVersion(
        config,
        current,
        commits('fix: a', 'feat!: drop v1\n\nBREAKING CHANGE: the v1 endpoints\nare removed'),
      );
      expect(formatVersion(next.version)).toBe('2.0.0');
      expect(next.releaseType).toBe('major');
    });

    it('should bump from the release triple of a pre-release', () => {
      const rc = parseVersion('v1.2.0-rc.1', 'v');
      expect(formatVersion(getNextVersion(config, rc, commits('feat: a')).version)).toBe('1.3.0');
      expect(formatVersion(getNextVersion(config, rc, commits('fix: a')).version)).toBe('1.2.1');
      expect(formatVersion(getNextVersion(config, parseVersion('v2.0.0-rc.1', 'v'), commits('fix!: x')).version)).toBe(
        '3.0.0',
      );
    });

    it('should bump minor for a breaking change before 1.0.0', () => {
      const next = getNextVersion(config, parseVersion('v0.3.1', 'v'), commits('feat!: new api'));
      expect(formatVersion(next.version)).toBe('0.4.0');
      expect(next.releaseType).toBe('minor');
    });

    it('should bump major before 1.0.0 when the pre-1.0 policy is off', () => {
      const strictConfig: Config = createTestConfig({ versioning: { zeroMajorBreakingBumpsMinor: false } });
      const next = getNextVersion(strictConfig, parseVersion('v0.3.1', 'v'), commits('feat!: new api'));
      expect(formatVersion(next.version)).toBe('1.0.0');
      expect(next.releaseType).toBe('major');
    });

    it('should start from 0.0.0 when there is no tag', () => {
      expect(formatVersion(getNextVersion(config, parseVersion('', 'v'), commits('fix: a')).version)).toBe('0.0.1');
    });

    it('should not modify the current version', () => {
      getNextVersion(config, current, commits('feat: a'));
      expect(current.version).toBe('1.2.3');
    });
  });

  describe('isVersionTag', () => {
    it('should accept semantic versions under the prefix only', () => {
      expect(isVersionTag('v1.2.3', 'v')).toBe(true);
      expect(isVersionTag('v1.2.3-beta.1', 'v')).toBe(true);
      expect(isVersionTag('v1.2', 'v')).toBe(false);
      expect(isVersionTag('release-1.0.0', 'v')).toBe(false);
      expect(isVersionTag('1.0.0', '')).toBe(true);
    });
  });
});
