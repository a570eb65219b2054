import type { SemVer } from 'semver';
import type { ParsedCommit } from '@/types/commit.types';
import type { RawCommit } from '@/types/git.types';

/**
 * Release note related types
 */

/**
 * The version a release note describes. Notes built from a range that has not been tagged yet
 * are `unreleased`.
 */
export type ReleaseVersion = { kind: 'released'; version: SemVer } | { kind: 'unreleased' };

/**
 * Outcome of parsing one raw commit for release notes. Commits that do not follow the grammar
 * are kept as `skipped` rather than raising.
 */
export type CommitParseOutcome =
  | { status: 'parsed'; raw: RawCommit; commit: ParsedCommit }
  | { status: 'skipped'; raw: RawCommit; reason: string };

export interface ReleaseNoteEntry {
  subject: string;
  scope: string | null;
  hash: string;

  /**
   * First seven characters of the hash.
   */
  shortHash: string;
  issue: string | null;
}

export interface ReleaseNoteSection {
  /**
   * The commit type grouped in this section.
   */
  type: string;
  title: string;

  /**
   * Entries in input order (newest first when read from git).
   */
  entries: ReleaseNoteEntry[];
}

export interface ReleaseNote {
  version: ReleaseVersion;

  /**
   * Release date formatted as `YYYY-MM-DD`.
   */
  date: string;

  /**
   * Non-empty sections ordered as the commit types are configured.
   */
  sections: ReleaseNoteSection[];

  /**
   * Breaking change descriptions in input order.
   */
  breakingChanges: string[];

  /**
   * Commits left out of the note because they do not follow the grammar.
   */
  skipped: Extract<CommitParseOutcome, { status: 'skipped' }>[];
}
