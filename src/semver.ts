import semver from 'semver';
import type { SemVer } from 'semver';
import { VersionParseError } from '@/errors';
import type { Config, NextVersionResult, ParsedCommit, ReleaseType } from '@/types';
import { RELEASE_TYPE } from '@/utils/constants';

/**
 * Parses a version tag into a {@link SemVer}.
 *
 * An empty tag (no release yet) is `0.0.0`. The configured prefix is removed before parsing,
 * and parsing is strict: `v1.2` or `release-1.2.3` are rejected.
 *
 * @param {string} tag - The tag name, e.g. `v1.2.3`.
 * @param {string} tagPrefix - The configured tag prefix, e.g. `v`.
 * @returns {SemVer} The parsed version.
 * @throws {VersionParseError} When the tag is not a semantic version.
 */
export function parseVersion(tag: string, tagPrefix: string): SemVer {
  if (tag === '') {
    return new semver.SemVer('0.0.0');
  }

  const source = tagPrefix !== '' && tag.startsWith(tagPrefix) ? tag.slice(tagPrefix.length) : tag;
  const version = semver.parse(source);
  if (version === null) {
    throw new VersionParseError(`error parsing version from git tag "${tag}"`);
  }

  return version;
}

/**
 * Formats the `major.minor.patch[-prerelease]` part of a version.
 */
export function formatVersion(version: SemVer): string {
  return version.version;
}

/**
 * Formats the tag name of a version using the configured prefix.
 *
 * @example
 * formatTag(config, parseVersion('1.4.0', 'v')) // → 'v1.4.0'
 */
export function formatTag(config: Config, version: SemVer): string {
  return `${config.tagPrefix}${formatVersion(version)}`;
}

/**
 * Determines the bump a single commit implies: major when breaking, otherwise the severity
 * configured for its type, otherwise none.
 */
export function getCommitReleaseType(config: Config, commit: ParsedCommit): ReleaseType {
  if (commit.breaking) {
    return RELEASE_TYPE.MAJOR;
  }

  const commitType = config.commitTypes.find(({ type }) => type === commit.type);
  return commitType?.releaseType ?? RELEASE_TYPE.NONE;
}

/**
 * Returns the higher-priority release type between two values (MAJOR > MINOR > PATCH > NONE).
 *
 * @example
 * ```typescript
 * higherPriorityReleaseType('none', 'patch')  // → 'patch'
 * higherPriorityReleaseType('patch', 'minor') // → 'minor'
 * higherPriorityReleaseType('major', 'patch') // → 'major'
 * ```
 */
export function higherPriorityReleaseType(current: ReleaseType, candidate: ReleaseType): ReleaseType {
  if (candidate === RELEASE_TYPE.MAJOR || current === RELEASE_TYPE.MAJOR) {
    return RELEASE_TYPE.MAJOR;
  }
  if (candidate === RELEASE_TYPE.MINOR || current === RELEASE_TYPE.MINOR) {
    return RELEASE_TYPE.MINOR;
  }
  if (candidate === RELEASE_TYPE.PATCH || current === RELEASE_TYPE.PATCH) {
    return RELEASE_TYPE.PATCH;
  }
  return RELEASE_TYPE.NONE;
}

/**
 * Computes the highest release type across a set of commits. The result only depends on the
 * severities present, never on the order of the commits.
 */
export function computeReleaseType(config: Config, commits: ReadonlyArray<ParsedCommit>): ReleaseType {
  let result: ReleaseType = RELEASE_TYPE.NONE;

  for (const commit of commits) {
    result = higherPriorityReleaseType(result, getCommitReleaseType(config, commit));
  }

  return result;
}

/**
 * Computes the version that follows `current` once `commits` are released.
 *
 * - major: increments major and resets minor and patch
 * - minor: increments minor and resets patch
 * - patch: increments patch
 * - none: keeps `current` and reports `changed: false`
 *
 * Pre-release and build identifiers of `current` are dropped before bumping, so `1.2.0-rc.1`
 * bumps to `1.3.0` for minor.
 *
 * While the major version is 0 a breaking change bumps minor instead, unless
 * `versioning.zeroMajorBreakingBumpsMinor` is turned off.
 *
 * @param {Config} config - Supplies the type severities and the pre-1.0 policy.
 * @param {SemVer} current - The version of the last release (`0.0.0` when there is none).
 * @param {ParsedCommit[]} commits - Commits since the last release.
 * @returns {NextVersionResult}
 *
 * @example
 * ```typescript
 * getNextVersion(config, parseVersion('v1.2.3', 'v'), [feat])
 * // → { version: 1.3.0, changed: true, releaseType: 'minor' }
 * ```
 */
export function getNextVersion(
  config: Config,
  current: SemVer,
  commits: ReadonlyArray<ParsedCommit>,
): NextVersionResult {
  let releaseType = computeReleaseType(config, commits);

  if (releaseType === RELEASE_TYPE.NONE) {
    return { version: current, changed: false, releaseType };
  }

  if (releaseType === RELEASE_TYPE.MAJOR && current.major === 0 && config.versioning.zeroMajorBreakingBumpsMinor) {
    releaseType = RELEASE_TYPE.MINOR;
  }

  // Bump the release triple: SemVer#inc would only drop the pre-release of 1.2.0-rc.1 for minor.
  const version = new semver.SemVer(`${current.major}.${current.minor}.${current.patch}`).inc(releaseType);

  return { version, changed: true, releaseType };
}

/**
 * Whether a tag name is a version tag under the configured prefix.
 */
export function isVersionTag(tag: string, tagPrefix: string): boolean {
  if (!tag.startsWith(tagPrefix)) {
    return false;
  }

  return semver.valid(tag.slice(tagPrefix.length)) !== null;
}
