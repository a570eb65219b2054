/**
 * Commit message related types
 */

/**
 * A single trailer line of the footer block.
 *
 * @example
 * `Refs: JIRA-12` is `{ token: 'Refs', value: 'JIRA-12', hash: false }` and
 * `Closes #42` is `{ token: 'Closes', value: '42', hash: true }`.
 */
export interface CommitFooter {
  token: string;
  value: string;

  /**
   * Whether the footer used the `Token #value` separator instead of `Token: value`.
   */
  hash: boolean;
}

/**
 * Structured representation of a conventional commit message.
 */
export interface ParsedCommit {
  type: string;
  scope: string | null;
  subject: string;

  /**
   * Body paragraphs joined by a blank line, or `null` when the message has no body.
   */
  body: string | null;

  /**
   * Footers in the order they appear in the message. Duplicate tokens are kept.
   */
  footers: CommitFooter[];

  /**
   * Set by a `!` in the header or by a `BREAKING CHANGE` footer.
   */
  breaking: boolean;

  /**
   * Value of the first `BREAKING CHANGE` footer, if any.
   */
  breakingDescription: string | null;

  /**
   * Value of the first footer whose token is the configured issue key or one of its synonyms.
   */
  issue: string | null;
}

/**
 * A commit message split into the three parts `git commit -m` takes.
 */
export interface FormattedCommitMessage {
  header: string;
  body: string;
  footer: string;
}

/**
 * Result of trying to append an issue footer derived from the branch name.
 */
export type EnhanceOutcome =
  | { status: 'applied'; footer: string }
  | { status: 'skipped'; reason: 'issue-not-configured' | 'issue-already-present' | 'issue-not-found' };
