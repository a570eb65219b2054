import type { Config } from '@/types';

/**
 * Release type constants for semantic versioning, ordered from highest to lowest priority.
 */
export const RELEASE_TYPE = {
  MAJOR: 'major',
  MINOR: 'minor',
  PATCH: 'patch',
  NONE: 'none',
} as const;

/**
 * Supported commit log range selectors.
 */
export const LOG_RANGE = {
  TAG: 'tag',
  DATE: 'date',
  HASH: 'hash',
} as const;

/**
 * Commands accepted by the `command` input.
 */
export const COMMAND = {
  CURRENT_VERSION: 'current-version',
  NEXT_VERSION: 'next-version',
  COMMIT_LOG: 'commit-log',
  COMMIT_NOTES: 'commit-notes',
  RELEASE_NOTES: 'release-notes',
  CHANGELOG: 'changelog',
  TAG: 'tag',
  COMMIT: 'commit',
  VALIDATE_COMMIT_MESSAGE: 'validate-commit-message',
  CONFIG_DEFAULT: 'config-default',
  CONFIG_SHOW: 'config-show',
} as const;

/**
 * Footer tokens that mark a breaking change. The first one is used when formatting.
 */
export const BREAKING_CHANGE_FOOTER_KEYS = ['BREAKING CHANGE', 'BREAKING-CHANGE'] as const;

/**
 * Line git writes into the commit message template when `commit.verbose` is on. Everything
 * from this line on is not part of the message.
 */
export const GIT_SCISSORS_LINE = '# ------------------------ >8 ------------------------';

export const DEFAULT_CONFIG_PATH = '.semver.yml';
export const DEFAULT_COMMIT_MESSAGE_FILE = 'COMMIT_EDITMSG';
export const DEFAULT_CHANGELOG_SIZE = 10;
export const SHORT_HASH_LENGTH = 7;

export const DEFAULT_CONFIG: Config = {
  tagPrefix: 'v',
  commitTypes: [
    { type: 'feat', releaseType: RELEASE_TYPE.MINOR, section: 'Features' },
    { type: 'fix', releaseType: RELEASE_TYPE.PATCH, section: 'Bug Fixes' },
    { type: 'perf', releaseType: RELEASE_TYPE.PATCH, section: 'Performance Improvements' },
    { type: 'revert', releaseType: RELEASE_TYPE.PATCH, section: 'Reverts' },
    { type: 'build', releaseType: null, section: null },
    { type: 'chore', releaseType: null, section: null },
    { type: 'ci', releaseType: null, section: null },
    { type: 'docs', releaseType: null, section: null },
    { type: 'refactor', releaseType: null, section: null },
    { type: 'style', releaseType: null, section: null },
    { type: 'test', releaseType: null, section: null },
  ],
  scope: {
    values: [],
    pattern: '',
  },
  issue: {
    footerKey: 'Refs',
    footerKeySynonyms: ['Issue'],
    useHash: false,
    pattern: '[A-Z]+-[0-9]+',
  },
  branches: {
    prefixPattern: '([a-z]+\\/)?',
    suffixPattern: '(-.*)?',
    skip: ['main', 'master', 'develop'],
  },
  versioning: {
    zeroMajorBreakingBumpsMinor: true,
  },
  releaseNotes: {
    headerTemplate: '## {{version}} ({{date}})',
    sectionTemplate: '### {{title}}',
    entryTemplate: '- {{scope}}{{subject}} ({{shortHash}}){{issue}}',
    breakingChangeTemplate: '- {{description}}',
    breakingChangesTitle: 'Breaking Changes',
    unreleasedTitle: 'Unreleased',
    changelogTitle: '# Changelog',
  },
  githubToken: '',
};
