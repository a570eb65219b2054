import { parseCommitMessage } from '@/commit-message';
import type {
  CommitParseOutcome,
  Config,
  ParsedCommit,
  RawCommit,
  ReleaseNote,
  ReleaseNoteEntry,
  ReleaseNoteSection,
  ReleaseVersion,
} from '@/types';
import { SHORT_HASH_LENGTH } from '@/utils/constants';
import { debug } from '@actions/core';

/**
 * Parses every raw commit, keeping the ones that do not follow the grammar as `skipped`
 * outcomes instead of failing the batch.
 *
 * @param {Config} config - Grammar configuration.
 * @param {RawCommit[]} rawCommits - Commits as read from git, newest first.
 * @returns {CommitParseOutcome[]} One outcome per commit, in input order.
 */
export function parseCommits(config: Config, rawCommits: ReadonlyArray<RawCommit>): CommitParseOutcome[] {
  return rawCommits.map((raw): CommitParseOutcome => {
    try {
      return { status: 'parsed', raw, commit: parseCommitMessage(config, raw.message) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      debug(`Skipping commit ${raw.hash.slice(0, SHORT_HASH_LENGTH)}: ${reason}`);
      return { status: 'skipped', raw, reason };
    }
  });
}

/**
 * Returns only the commits that parsed.
 */
export function getParsedCommits(outcomes: ReadonlyArray<CommitParseOutcome>): ParsedCommit[] {
  return outcomes.flatMap((outcome) => (outcome.status === 'parsed' ? [outcome.commit] : []));
}

function toEntry(raw: RawCommit, commit: ParsedCommit): ReleaseNoteEntry {
  return {
    subject: commit.subject,
    scope: commit.scope,
    hash: raw.hash,
    shortHash: raw.hash.slice(0, SHORT_HASH_LENGTH),
    issue: commit.issue,
  };
}

/**
 * Builds the release note of one version, or of an unreleased window of commits.
 *
 * Sections follow the configured commit type order and only include types that have a section
 * title. Entries keep the order of `rawCommits`. Every breaking commit adds its description (or
 * its subject when it has none) to `breakingChanges`, whether or not its type has a section.
 *
 * @param {Config} config - Grammar and section configuration.
 * @param {ReleaseVersion} version - The version the note describes.
 * @param {string} date - Release date as `YYYY-MM-DD`.
 * @param {RawCommit[]} rawCommits - Commits of the release, newest first.
 * @returns {ReleaseNote}
 */
export function createReleaseNote(
  config: Config,
  version: ReleaseVersion,
  date: string,
  rawCommits: ReadonlyArray<RawCommit>,
): ReleaseNote {
  const outcomes = parseCommits(config, rawCommits);
  const entriesByType = new Map<string, ReleaseNoteEntry[]>();
  const breakingChanges: string[] = [];
  const skipped: ReleaseNote['skipped'] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'skipped') {
      skipped.push(outcome);
      continue;
    }

    const { raw, commit } = outcome;
    const entries = entriesByType.get(commit.type) ?? [];
    entries.push(toEntry(raw, commit));
    entriesByType.set(commit.type, entries);

    if (commit.breaking) {
      breakingChanges.push(commit.breakingDescription ?? commit.subject);
    }
  }

  const sections: ReleaseNoteSection[] = [];
  for (const { type, section } of config.commitTypes) {
    const entries = entriesByType.get(type);
    if (section !== null && entries !== undefined) {
      sections.push({ type, title: section, entries });
    }
  }

  return { version, date, sections, breakingChanges, skipped };
}
