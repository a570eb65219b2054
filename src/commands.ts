import { readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { formatChangelog, formatReleaseNote } from '@/changelog';
import {
  appendToCommitMessage,
  enhanceCommitMessage,
  formatCommitMessage,
  getIssueId,
  joinCommitMessage,
  shouldSkipBranch,
  validateCommitMessage,
} from '@/commit-message';
import { CollaboratorError, ConfigError, LogRangeError, NotFoundError } from '@/errors';
import { createReleaseNote, getParsedCommits, parseCommits } from '@/release-notes';
import { createGitHubRelease } from '@/releases';
import { formatTag, formatVersion, getNextVersion, parseVersion } from '@/semver';
import type {
  CommandDependencies,
  CommandInputs,
  CommandName,
  CommandResult,
  Config,
  LogRange,
  NextVersionResult,
  ParsedCommit,
  RawCommit,
  ReleaseNote,
  Tag,
} from '@/types';
import { COMMAND, DEFAULT_COMMIT_MESSAGE_FILE, DEFAULT_CONFIG, LOG_RANGE } from '@/utils/constants';
import { formatDate } from '@/utils/string';
import { info, warning } from '@actions/core';
import * as yaml from 'js-yaml';

interface NextVersionInfo extends NextVersionResult {
  lastTag: string;
  commits: RawCommit[];
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Shared helpers
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Computes the next version from the most recent tag and the commits made since.
 */
function getNextVersionInfo({ config, git }: CommandDependencies): NextVersionInfo {
  const lastTag = git.lastTag();
  const current = parseVersion(lastTag, config.tagPrefix);
  const commits = git.log({ type: LOG_RANGE.TAG, start: lastTag, end: '' });
  const next = getNextVersion(config, current, getParsedCommits(parseCommits(config, commits)));

  return { ...next, lastTag, commits };
}

/**
 * Finds a tag and the commits it introduced since the tag before it.
 *
 * @throws {NotFoundError} When the tag does not exist.
 */
function getTagCommits({ git }: CommandDependencies, tagName: string): { tag: Tag; commits: RawCommit[] } {
  const tags = git.tags();
  const index = tags.findIndex(({ name }) => name === tagName);
  if (index === -1) {
    throw new NotFoundError(`tag ${tagName} not found`);
  }

  const previous = index > 0 ? tags[index - 1].name : '';
  return { tag: tags[index], commits: git.log({ type: LOG_RANGE.TAG, start: previous, end: tagName }) };
}

/**
 * Builds the log range selected by the `range`, `start` and `end` inputs. A tag range without a
 * start begins at the most recent tag.
 *
 * @throws {LogRangeError} When the range selector is not supported.
 */
function getLogRange({ git }: CommandDependencies, inputs: CommandInputs): LogRange {
  const type = inputs.range === '' ? LOG_RANGE.TAG : inputs.range;

  switch (type) {
    case LOG_RANGE.TAG:
      return { type, start: inputs.start !== '' ? inputs.start : git.lastTag(), end: inputs.end };
    case LOG_RANGE.DATE:
    case LOG_RANGE.HASH:
      return { type, start: inputs.start, end: inputs.end };
    default:
      throw new LogRangeError(`invalid range: ${type}, expected: ${Object.values(LOG_RANGE).join(', ')}`);
  }
}

function assertTagWithoutRange(inputs: CommandInputs): void {
  if (inputs.tag !== '' && (inputs.range !== '' || inputs.start !== '' || inputs.end !== '')) {
    throw new LogRangeError('cannot define tag input with range, start or end inputs');
  }
}

function releasedNote(config: Config, next: NextVersionResult, date: string, commits: RawCommit[]): ReleaseNote {
  return createReleaseNote(config, { kind: 'released', version: next.version }, date, commits);
}

function dumpConfig({ githubToken: _githubToken, ...config }: Config): string {
  return yaml.dump(config, { noRefs: true, lineWidth: -1 });
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Version commands
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Reports the version of the most recent tag (`0.0.0` when there is none).
 */
export function currentVersionCommand(deps: CommandDependencies): CommandResult {
  const lastTag = deps.git.lastTag();
  const version = formatVersion(parseVersion(lastTag, deps.config.tagPrefix));

  return { text: version, outputs: { 'current-version': version, 'current-tag': lastTag } };
}

/**
 * Reports the version the commits since the most recent tag lead to, without tagging.
 */
export function nextVersionCommand(deps: CommandDependencies): CommandResult {
  const next = getNextVersionInfo(deps);
  const version = formatVersion(next.version);

  return {
    text: version,
    outputs: {
      'next-version': version,
      'next-tag': formatTag(deps.config, next.version),
      'release-type': next.releaseType,
      changed: next.changed,
    },
  };
}

/**
 * Creates the next version tag. Nothing is tagged when the commits do not require a release.
 * Optionally pushes the tag and publishes a GitHub release with the rendered notes.
 */
export async function tagCommand(deps: CommandDependencies, inputs: CommandInputs): Promise<CommandResult> {
  const { config, git, context, now } = deps;
  const next = getNextVersionInfo(deps);
  const version = formatVersion(next.version);
  const tagName = formatTag(config, next.version);

  if (!next.changed) {
    info(`No release required since ${next.lastTag || 'the first commit'}. Skipping tag creation.`);
    return {
      text: '',
      outputs: { 'next-version': version, 'next-tag': next.lastTag, 'release-type': next.releaseType, changed: false },
    };
  }

  git.createTag(tagName, `Version ${version}`, inputs.pushTag);

  const outputs: CommandResult['outputs'] = {
    'next-version': version,
    'next-tag': tagName,
    'release-type': next.releaseType,
    changed: true,
  };

  if (inputs.createRelease) {
    const body = formatReleaseNote(config, releasedNote(config, next, formatDate(now()), next.commits));
    const release = await createGitHubRelease(context, {
      tagName,
      name: tagName,
      body,
      prerelease: next.version.prerelease.length > 0,
    });
    outputs['release-url'] = release.url;
  }

  return { text: tagName, outputs };
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Log and note commands
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Prints one JSON record per commit of a range or of a tag. Commits that do not follow the
 * grammar are left out.
 */
export function commitLogCommand(deps: CommandDependencies, inputs: CommandInputs): CommandResult {
  assertTagWithoutRange(inputs);

  const commits = inputs.tag !== '' ? getTagCommits(deps, inputs.tag).commits : deps.git.log(getLogRange(deps, inputs));

  const lines: string[] = [];
  for (const outcome of parseCommits(deps.config, commits)) {
    if (outcome.status === 'parsed') {
      const record: { hash: string; date: string; message: ParsedCommit } = {
        hash: outcome.raw.hash,
        date: outcome.raw.date,
        message: outcome.commit,
      };
      lines.push(JSON.stringify(record));
    }
  }

  return { text: lines.join('\n'), outputs: { 'commit-count': lines.length } };
}

/**
 * Renders an unreleased note for a range, dated by its newest commit.
 */
export function commitNotesCommand(deps: CommandDependencies, inputs: CommandInputs): CommandResult {
  const commits = deps.git.log(getLogRange(deps, inputs));
  const date = commits.length > 0 ? commits[0].date : formatDate(deps.now());
  const text = formatReleaseNote(deps.config, createReleaseNote(deps.config, { kind: 'unreleased' }, date, commits));

  return { text, outputs: { 'release-notes': text } };
}

/**
 * Renders the note of an existing tag, or of the next version when no tag is given.
 */
export function releaseNotesCommand(deps: CommandDependencies, inputs: CommandInputs): CommandResult {
  const { config } = deps;

  let note: ReleaseNote;
  if (inputs.tag !== '') {
    const version = parseVersion(inputs.tag, config.tagPrefix);
    const { tag, commits } = getTagCommits(deps, inputs.tag);
    note = createReleaseNote(config, { kind: 'released', version }, tag.date, commits);
  } else {
    const next = getNextVersionInfo(deps);
    note = releasedNote(config, next, formatDate(deps.now()), next.commits);
  }

  const text = formatReleaseNote(config, note);
  const version = note.version.kind === 'released' ? formatVersion(note.version.version) : '';

  return { text, outputs: { 'release-notes': text, version } };
}

/**
 * Renders a changelog of the newest tags (all tags with `all`). The next version, or an
 * unreleased note of the commits since the last tag, can be placed in front.
 */
export function changelogCommand(deps: CommandDependencies, inputs: CommandInputs): CommandResult {
  const { config, git, now } = deps;

  if (!inputs.all && (!Number.isInteger(inputs.size) || inputs.size < 1)) {
    throw new ConfigError(`Changelog size must be an integer greater than or equal to one. Got: '${inputs.size}'`);
  }

  const tags = [...git.tags()].sort((a, b) => b.timestamp - a.timestamp);
  const notes: ReleaseNote[] = [];

  if (inputs.addNextVersion || inputs.addUnreleased) {
    const next = getNextVersionInfo(deps);
    if (inputs.addNextVersion && next.changed) {
      notes.push(releasedNote(config, next, formatDate(now()), next.commits));
    } else if (inputs.addUnreleased && next.commits.length > 0) {
      notes.push(createReleaseNote(config, { kind: 'unreleased' }, next.commits[0].date, next.commits));
    }
  }

  const limit = inputs.all ? tags.length : Math.min(inputs.size, tags.length);
  for (let i = 0; i < limit; i++) {
    const tag = tags[i];
    const previous = i + 1 < tags.length ? tags[i + 1].name : '';
    const commits = git.log({ type: LOG_RANGE.TAG, start: previous, end: tag.name });
    const version = parseVersion(tag.name, config.tagPrefix);

    notes.push(createReleaseNote(config, { kind: 'released', version }, tag.date, commits));
  }

  const text = formatChangelog(config, notes);
  return { text, outputs: { changelog: text } };
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Commit message commands
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Resolves the issue of a new commit: the `commit-issue` input, or the id found in the branch name.
 */
function resolveCommitIssue({ config, git }: CommandDependencies, inputs: CommandInputs): string | null {
  if (inputs.commitIssue !== '') {
    return inputs.commitIssue;
  }

  const branch = git.branch();
  try {
    const issue = getIssueId(config, branch);
    return issue === '' ? null : issue;
  } catch (error) {
    if (error instanceof NotFoundError) {
      info(`No issue id found in branch "${branch}"`);
      return null;
    }
    throw error;
  }
}

/**
 * Composes a commit message from the `commit-*` inputs, validates it and commits the staged changes.
 */
export function commitCommand(deps: CommandDependencies, inputs: CommandInputs): CommandResult {
  const { config, git } = deps;

  const commit: ParsedCommit = {
    type: inputs.commitType,
    scope: inputs.commitScope !== '' ? inputs.commitScope : null,
    subject: inputs.commitSubject,
    body: inputs.commitBody !== '' ? inputs.commitBody : null,
    footers: [],
    breaking: inputs.commitBreakingChange !== '',
    breakingDescription: inputs.commitBreakingChange !== '' ? inputs.commitBreakingChange : null,
    issue: resolveCommitIssue(deps, inputs),
  };

  const formatted = formatCommitMessage(config, commit);
  const message = joinCommitMessage(formatted);
  validateCommitMessage(config, message);

  git.commit(formatted.header, formatted.body, formatted.footer);

  return { text: message, outputs: { header: formatted.header } };
}

/**
 * Validates a commit message file, meant to run from a `commit-msg` hook, then appends the issue
 * footer derived from the branch when `enhance` is on.
 */
export function validateCommitMessageCommand(deps: CommandDependencies, inputs: CommandInputs): CommandResult {
  const { config, git, context } = deps;
  const branch = git.branch();

  if (shouldSkipBranch(config, branch, git.isDetached())) {
    warning('commit message validation skipped, branch in ignore list or detached...');
    return { text: '', outputs: { status: 'skipped' } };
  }

  if (inputs.source === 'merge') {
    warning(`commit message validation skipped, ignoring source: ${inputs.source}...`);
    return { text: '', outputs: { status: 'skipped' } };
  }

  const filePath = join(resolve(context.workspaceDir, inputs.path), inputs.file || DEFAULT_COMMIT_MESSAGE_FILE);

  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new CollaboratorError(
      `failed to read commit message ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  validateCommitMessage(config, raw);
  info(`Commit message in ${filePath} is valid`);

  if (!inputs.enhance) {
    return { text: '', outputs: { status: 'valid', enhanced: false } };
  }

  let outcome: ReturnType<typeof enhanceCommitMessage>;
  try {
    outcome = enhanceCommitMessage(config, branch, raw);
  } catch (error) {
    warning(`could not enhance commit message, ${error instanceof Error ? error.message : String(error)}`);
    return { text: '', outputs: { status: 'valid', enhanced: false } };
  }

  if (outcome.status === 'skipped') {
    info(`Commit message not enhanced: ${outcome.reason}`);
    return { text: '', outputs: { status: 'valid', enhanced: false } };
  }

  try {
    writeFileSync(filePath, appendToCommitMessage(raw, outcome.footer), 'utf8');
  } catch (error) {
    throw new CollaboratorError(
      `failed to append issue footer to ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  return { text: outcome.footer.trim(), outputs: { status: 'valid', enhanced: true } };
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Config commands
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

export function configDefaultCommand(): CommandResult {
  return { text: dumpConfig(DEFAULT_CONFIG), outputs: {} };
}

export function configShowCommand({ config }: CommandDependencies): CommandResult {
  return { text: dumpConfig(config), outputs: {} };
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Dispatch
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

type CommandHandler = (deps: CommandDependencies, inputs: CommandInputs) => CommandResult | Promise<CommandResult>;

const COMMAND_HANDLERS: Record<CommandName, CommandHandler> = {
  [COMMAND.CURRENT_VERSION]: currentVersionCommand,
  [COMMAND.NEXT_VERSION]: nextVersionCommand,
  [COMMAND.COMMIT_LOG]: commitLogCommand,
  [COMMAND.COMMIT_NOTES]: commitNotesCommand,
  [COMMAND.RELEASE_NOTES]: releaseNotesCommand,
  [COMMAND.CHANGELOG]: changelogCommand,
  [COMMAND.TAG]: tagCommand,
  [COMMAND.COMMIT]: commitCommand,
  [COMMAND.VALIDATE_COMMIT_MESSAGE]: validateCommitMessageCommand,
  [COMMAND.CONFIG_DEFAULT]: configDefaultCommand,
  [COMMAND.CONFIG_SHOW]: configShowCommand,
};

export function isCommandName(name: string): name is CommandName {
  return Object.values<string>(COMMAND).includes(name);
}

/**
 * Runs a command by name.
 *
 * @param {CommandName} name - One of the COMMAND values.
 * @param {CommandDependencies} deps - Config, git client, context and clock.
 * @param {CommandInputs} inputs - Parsed action inputs.
 * @returns {Promise<CommandResult>}
 */
export async function runCommand(
  name: CommandName,
  deps: CommandDependencies,
  inputs: CommandInputs,
): Promise<CommandResult> {
  return COMMAND_HANDLERS[name](deps, inputs);
}
