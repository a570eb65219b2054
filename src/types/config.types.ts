import type { ReleaseType } from '@/types/common.types';

/**
 * Configuration related types
 */

/**
 * A commit type accepted by the grammar, in the order its section is rendered.
 */
export interface CommitTypeConfig {
  /**
   * The literal type token used in the commit header (e.g. `feat`). Matching is case-sensitive.
   */
  type: string;

  /**
   * The bump this type implies on its own. `null` means the type never changes the version.
   * Breaking commits always imply a major bump regardless of this value.
   */
  releaseType: Exclude<ReleaseType, 'none'> | null;

  /**
   * Heading used for this type's section in release notes. `null` keeps the type out of the notes.
   */
  section: string | null;
}

export interface ScopeConfig {
  /**
   * Allow-list of scopes. Empty means any scope is accepted.
   */
  values: string[];

  /**
   * Regular expression the whole scope must match. Empty disables the check.
   */
  pattern: string;
}

/**
 * How an issue reference is carried in the commit footer and derived from a branch name.
 */
export interface IssueConfig {
  /**
   * Footer token written when enhancing or formatting a message (e.g. `Refs`).
   */
  footerKey: string;

  /**
   * Additional footer tokens recognised as issue references when parsing.
   */
  footerKeySynonyms: string[];

  /**
   * Writes the footer as `Refs #ID` instead of `Refs: ID`.
   */
  useHash: boolean;

  /**
   * Regular expression matching the issue id. Empty disables issue handling altogether.
   */
  pattern: string;
}

export interface BranchesConfig {
  /**
   * Expression allowed before the issue id in a branch name, e.g. `feature/`.
   */
  prefixPattern: string;

  /**
   * Expression allowed after the issue id in a branch name, e.g. `-add-login`.
   */
  suffixPattern: string;

  /**
   * Branch names (or minimatch globs) on which commit message validation is skipped.
   */
  skip: string[];
}

export interface VersioningConfig {
  /**
   * While the major version is 0, a breaking change bumps minor instead of major.
   */
  zeroMajorBreakingBumpsMinor: boolean;
}

/**
 * Templates used by the release note renderer. Placeholders use the `{{name}}` syntax.
 */
export interface ReleaseNotesConfig {
  /**
   * Available variables: `{{version}}`, `{{date}}`.
   */
  headerTemplate: string;

  /**
   * Available variables: `{{title}}`.
   */
  sectionTemplate: string;

  /**
   * Available variables: `{{scope}}`, `{{subject}}`, `{{hash}}`, `{{shortHash}}`, `{{issue}}`.
   */
  entryTemplate: string;

  /**
   * Available variables: `{{description}}`.
   */
  breakingChangeTemplate: string;

  breakingChangesTitle: string;

  /**
   * Text shown in place of the version for notes that are not tied to a tag.
   */
  unreleasedTitle: string;

  /**
   * First line of a rendered changelog. Empty omits it.
   */
  changelogTitle: string;
}

/**
 * The immutable configuration built once per invocation. Every component receives it by
 * reference; nothing mutates it after {@link getConfig} returns.
 */
export interface Config {
  /**
   * Prefix placed in front of every version tag (e.g. `v` in `v1.2.3`).
   */
  tagPrefix: string;

  commitTypes: CommitTypeConfig[];

  scope: ScopeConfig;

  issue: IssueConfig;

  branches: BranchesConfig;

  versioning: VersioningConfig;

  releaseNotes: ReleaseNotesConfig;

  /**
   * Token used to publish GitHub releases. Only required by `tag` with `create-release`.
   */
  githubToken: string;
}

/**
 * Keys of {@link Config} that can be overridden directly by an action input.
 */
export type InputConfigKey = {
  [K in keyof Config]: Config[K] extends string ? K : never;
}[keyof Config];
