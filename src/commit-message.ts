import { CommitParser } from 'conventional-commits-parser';
import { minimatch } from 'minimatch';
import { ConfigError, GrammarError, NotFoundError } from '@/errors';
import type { CommitFooter, Config, EnhanceOutcome, FormattedCommitMessage, ParsedCommit } from '@/types';
import { BREAKING_CHANGE_FOOTER_KEYS, GIT_SCISSORS_LINE } from '@/utils/constants';
import { compilePattern, splitParagraphs } from '@/utils/string';

/**
 * Header parser. Only the header line is handed to it; body and footers are split by
 * {@link splitMessage} so that the footer block follows the trailer rules below rather than
 * the library's looser note detection.
 *
 * - `headerPattern` matches `<type>[(<scope>)][!]: <subject>`.
 * - `breakingHeaderPattern` is the same with `!` required. When it matches, the library pushes a
 *   `BREAKING CHANGE` note, so `notes.length > 0` means the header carried `!`.
 */
const commitParser = new CommitParser({
  headerPattern: /^(\w*)(?:\((.*)\))?!?: (.*)$/,
  breakingHeaderPattern: /^(\w*)(?:\((.*)\))?!: (.*)$/,
  headerCorrespondence: ['type', 'scope', 'subject'],
  noteKeywords: [...BREAKING_CHANGE_FOOTER_KEYS],
});

/**
 * A trailer line: `Token: value` or `Token #value`. Tokens use `-` in place of spaces, except
 * for `BREAKING CHANGE`.
 */
const FOOTER_LINE_REGEX = /^(BREAKING CHANGE|[\w-]+)(: | #)(.*)$/;

interface MessageParts {
  header: string;
  paragraphs: string[];
  footerBlock: string | null;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Message structure
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Cleans a raw message the way git does before storing it: normalises line endings, drops
 * everything below the scissors line, drops comment lines and trims surrounding whitespace.
 *
 * @param {string} raw - Message as written by the user or read from `COMMIT_EDITMSG`.
 * @returns {string} The cleaned message, possibly empty.
 */
export function normalizeCommitMessage(raw: string): string {
  const lines = raw.replace(/\r\n?/g, '\n').split('\n');
  const scissorsIndex = lines.indexOf(GIT_SCISSORS_LINE);
  const kept = scissorsIndex === -1 ? lines : lines.slice(0, scissorsIndex);

  return kept
    .filter((line) => !line.startsWith('#'))
    .join('\n')
    .trim();
}

/**
 * Splits a normalised message into its header, body paragraphs and footer block. The last
 * paragraph is the footer block when its first line has the trailer form.
 */
function splitMessage(message: string): MessageParts {
  const [header, ...rest] = message.split('\n');
  const paragraphs = splitParagraphs(rest.join('\n'));

  const last = paragraphs.at(-1);
  if (last !== undefined && FOOTER_LINE_REGEX.test(last.split('\n')[0])) {
    return { header: header.trim(), paragraphs: paragraphs.slice(0, -1), footerBlock: last };
  }

  return { header: header.trim(), paragraphs, footerBlock: null };
}

/**
 * Parses a footer block into ordered footers. A value runs on over the following lines until the
 * next `Token: value` or `Token #value` line.
 *
 * @throws {GrammarError} When text comes before the first trailer.
 */
function parseFooters(footerBlock: string): CommitFooter[] {
  const footers: CommitFooter[] = [];

  for (const line of footerBlock.split('\n')) {
    const match = FOOTER_LINE_REGEX.exec(line);
    if (match) {
      footers.push({ token: match[1], value: match[3].trim(), hash: match[2] === ' #' });
      continue;
    }

    const previous = footers.at(-1);
    if (previous) {
      previous.value = `${previous.value}\n${line.trim()}`;
      continue;
    }

    throw new GrammarError(`invalid footer line "${line}", expected "Token: value" or "Token #value"`);
  }

  return footers;
}

function isBreakingChangeToken(token: string): boolean {
  return BREAKING_CHANGE_FOOTER_KEYS.some((key) => key === token);
}

function isIssueToken(config: Config, token: string): boolean {
  return token === config.issue.footerKey || config.issue.footerKeySynonyms.includes(token);
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Parse / validate
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Checks a scope against the configured allow-list and pattern.
 *
 * @throws {GrammarError} When the scope is not accepted.
 * @throws {ConfigError} When the configured pattern does not compile.
 */
function assertValidScope(config: Config, scope: string): void {
  const { values, pattern } = config.scope;

  if (values.length > 0 && !values.includes(scope)) {
    throw new GrammarError(`invalid scope "${scope}", expected one of: ${values.join(', ')}`);
  }

  if (pattern !== '') {
    const regex = compilePattern(`^(?:${pattern})$`);
    if (regex === null) {
      throw new ConfigError(`Invalid scope pattern "${pattern}"`);
    }
    if (!regex.test(scope)) {
      throw new GrammarError(`invalid scope "${scope}", expected to match "${pattern}"`);
    }
  }
}

/**
 * Parses a raw commit message into a {@link ParsedCommit}.
 *
 * The expected format is:
 *
 * ```
 * <type>[(<scope>)][!]: <subject>
 *
 * [body paragraphs]
 *
 * [Token: value | Token #value ...]
 * ```
 *
 * @param {Config} config - Grammar configuration (commit types, scope and issue rules).
 * @param {string} raw - The full commit message.
 * @returns {ParsedCommit} The structured commit.
 * @throws {GrammarError} When the message is empty, the header does not match, the type is not
 *   configured, the scope is rejected, the subject is empty or a footer line is malformed.
 *
 * @example
 * ```typescript
 * parseCommitMessage(config, 'feat(api)!: drop v1 endpoints\n\nRefs: API-12')
 * // → { type: 'feat', scope: 'api', subject: 'drop v1 endpoints', breaking: true, issue: 'API-12', ... }
 * ```
 */
export function parseCommitMessage(config: Config, raw: string): ParsedCommit {
  const message = normalizeCommitMessage(raw);
  if (message === '') {
    throw new GrammarError('commit message is empty');
  }

  const { header, paragraphs, footerBlock } = splitMessage(message);
  const parsed = commitParser.parse(header);

  if (!parsed.type) {
    throw new GrammarError(`invalid commit header "${header}", expected "type(scope)!: subject"`);
  }

  const type = parsed.type;
  if (!config.commitTypes.some((commitType) => commitType.type === type)) {
    throw new GrammarError(
      `invalid commit type "${type}", expected one of: ${config.commitTypes.map(({ type }) => type).join(', ')}`,
    );
  }

  const scope = parsed.scope ? parsed.scope : null;
  if (scope !== null) {
    assertValidScope(config, scope);
  }

  const subject = (parsed.subject ?? '').trim();
  if (subject === '') {
    throw new GrammarError('commit subject is empty');
  }

  const footers = footerBlock === null ? [] : parseFooters(footerBlock);
  const breakingFooter = footers.find((footer) => isBreakingChangeToken(footer.token));
  const issueFooter = footers.find((footer) => isIssueToken(config, footer.token));

  return {
    type,
    scope,
    subject,
    body: paragraphs.length > 0 ? paragraphs.join('\n\n') : null,
    footers,
    breaking: parsed.notes.length > 0 || breakingFooter !== undefined,
    breakingDescription: breakingFooter?.value ?? null,
    issue: issueFooter?.value ?? null,
  };
}

/**
 * Checks a commit message against the configured grammar without returning the parsed value.
 * Intended as a `commit-msg` hook gate.
 *
 * @throws {GrammarError} Under the same conditions as {@link parseCommitMessage}.
 */
export function validateCommitMessage(config: Config, raw: string): void {
  parseCommitMessage(config, raw);
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Format
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

function formatFooterLine(token: string, value: string, hash: boolean): string {
  const separator = hash ? ' #' : ': ';
  // Continuation lines are indented so they parse back into the same value.
  return `${token}${separator}${value.split('\n').join('\n ')}`;
}

/**
 * Renders the configured issue footer line, e.g. `Refs: JIRA-12` or `Refs #JIRA-12`.
 */
export function formatIssueFooter(config: Config, issue: string): string {
  return formatFooterLine(config.issue.footerKey, issue, config.issue.useHash);
}

/**
 * Formats a structured commit back into the header, body and footer passed to `git commit`.
 *
 * Footer lines are emitted in this order: the `BREAKING CHANGE` description (when breaking and
 * described), the issue footer (when an issue is set), then every other footer in its original
 * order. The footers that produced `breakingDescription` and `issue` are not repeated.
 *
 * @param {Config} config - Supplies the issue footer key and separator.
 * @param {ParsedCommit} commit - The commit to format.
 * @returns {FormattedCommitMessage}
 */
export function formatCommitMessage(config: Config, commit: ParsedCommit): FormattedCommitMessage {
  const scope = commit.scope ? `(${commit.scope})` : '';
  const header = `${commit.type}${scope}${commit.breaking ? '!' : ''}: ${commit.subject}`;

  const footerLines: string[] = [];
  let breakingEmitted = false;
  let issueEmitted = false;

  if (commit.breaking && commit.breakingDescription) {
    footerLines.push(formatFooterLine(BREAKING_CHANGE_FOOTER_KEYS[0], commit.breakingDescription, false));
    breakingEmitted = true;
  }
  if (commit.issue) {
    footerLines.push(formatIssueFooter(config, commit.issue));
    issueEmitted = true;
  }

  for (const footer of commit.footers) {
    if (breakingEmitted && isBreakingChangeToken(footer.token) && footer.value === commit.breakingDescription) {
      breakingEmitted = false;
      continue;
    }
    if (issueEmitted && isIssueToken(config, footer.token) && footer.value === commit.issue) {
      issueEmitted = false;
      continue;
    }
    footerLines.push(formatFooterLine(footer.token, footer.value, footer.hash));
  }

  return {
    header,
    body: commit.body ?? '',
    footer: footerLines.join('\n'),
  };
}

/**
 * Joins formatted parts into a single message, separating the non-empty parts by a blank line.
 */
export function joinCommitMessage({ header, body, footer }: FormattedCommitMessage): string {
  return [header, body, footer].filter((part) => part !== '').join('\n\n');
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Branch helpers
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Whether commit message validation should be bypassed for the current checkout.
 *
 * @param {Config} config - Supplies `branches.skip`.
 * @param {string} branch - Current branch name.
 * @param {boolean} detached - Whether `HEAD` is detached (rebase, bisect, CI checkouts).
 * @returns {boolean} True when detached, or when the branch equals or glob-matches a skip entry.
 */
export function shouldSkipBranch(config: Config, branch: string, detached: boolean): boolean {
  if (detached) {
    return true;
  }

  return config.branches.skip.some((pattern) => pattern === branch || minimatch(branch, pattern));
}

/**
 * Looks up the issue id in a branch name, `null` when the branch does not carry one.
 *
 * @throws {ConfigError} When the assembled branch expression does not compile.
 */
function findIssueId(config: Config, branch: string): string | null {
  const { prefixPattern, suffixPattern } = config.branches;
  const source = `^${prefixPattern}(?<issue>${config.issue.pattern})${suffixPattern}$`;
  const regex = compilePattern(source);
  if (regex === null) {
    throw new ConfigError(`Invalid branch issue expression "${source}"`);
  }

  return regex.exec(branch)?.groups?.issue ?? null;
}

/**
 * Extracts the issue id from a branch name using `<prefixPattern><issue pattern><suffixPattern>`.
 *
 * @param {Config} config - Supplies the issue pattern and branch prefix/suffix expressions.
 * @param {string} branch - Branch name, e.g. `feature/JIRA-12-add-login`.
 * @returns {string} The issue id (`JIRA-12`), or `''` when no issue pattern is configured.
 * @throws {NotFoundError} When a pattern is configured but the branch does not match it.
 * @throws {ConfigError} When the configured expressions do not compile.
 */
export function getIssueId(config: Config, branch: string): string {
  if (config.issue.pattern === '') {
    return '';
  }

  const issue = findIssueId(config, branch);
  if (issue === null) {
    throw new NotFoundError(`could not find an issue id matching "${config.issue.pattern}" in branch "${branch}"`);
  }

  return issue;
}

/**
 * Works out the issue footer to append to a commit message, based on the branch name.
 *
 * The returned footer starts with a blank line when the message does not end with a footer block
 * yet, and always ends with a newline, so it can be appended to the end of the message as-is.
 *
 * @param {Config} config - Supplies the issue and branch rules.
 * @param {string} branch - Current branch name.
 * @param {string} raw - The commit message being written.
 * @returns {EnhanceOutcome} `applied` with the footer text, or `skipped` with the reason.
 * @throws {ConfigError} Only when the configured expressions do not compile.
 */
export function enhanceCommitMessage(config: Config, branch: string, raw: string): EnhanceOutcome {
  if (config.issue.pattern === '') {
    return { status: 'skipped', reason: 'issue-not-configured' };
  }

  const { footerBlock } = splitMessage(normalizeCommitMessage(raw));
  const hasIssueFooter =
    footerBlock !== null &&
    footerBlock.split('\n').some((line) => {
      const match = FOOTER_LINE_REGEX.exec(line);
      return match !== null && isIssueToken(config, match[1]);
    });
  if (hasIssueFooter) {
    return { status: 'skipped', reason: 'issue-already-present' };
  }

  const issue = findIssueId(config, branch);
  if (issue === null) {
    return { status: 'skipped', reason: 'issue-not-found' };
  }

  const separator = footerBlock === null ? '\n' : '';
  return { status: 'applied', footer: `${separator}${formatIssueFooter(config, issue)}\n` };
}

/**
 * Adds enhancement text to a raw commit message file content. The text goes right after the last
 * line of the message, so it joins an existing footer block. Trailing blank lines, git's comment
 * lines and everything from the scissors line on stay below it.
 *
 * @param {string} raw - The file content as read from disk.
 * @param {string} text - Text returned by {@link enhanceCommitMessage}.
 * @returns {string} The new file content.
 */
export function appendToCommitMessage(raw: string, text: string): string {
  const lines = raw.split('\n');
  const scissorsIndex = lines.findIndex((line) => line.trimEnd() === GIT_SCISSORS_LINE);
  const end = scissorsIndex === -1 ? lines.length : scissorsIndex;

  let insertAt = 0;
  for (let i = 0; i < end; i++) {
    const line = lines[i];
    if (line.trim() !== '' && !line.startsWith('#')) {
      insertAt = i + 1;
    }
  }

  const before = lines.slice(0, insertAt).join('\n');
  const after = lines.slice(insertAt).join('\n');
  const separator = before === '' ? '' : '\n';

  return `${before}${separator}${text}${after}`;
}
