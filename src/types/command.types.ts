import type { ActionOutputs } from '@/types/common.types';
import type { Config } from '@/types/config.types';
import type { Context } from '@/types/context.types';
import type { GitClient } from '@/types/git.types';
import type { COMMAND } from '@/utils/constants';

/**
 * Command related types
 */

export type CommandName = (typeof COMMAND)[keyof typeof COMMAND];

/**
 * What a command produced: text to print and values to expose as step outputs.
 */
export interface CommandResult {
  text: string;
  outputs: ActionOutputs;
}

/**
 * Everything a command needs besides its inputs.
 */
export interface CommandDependencies {
  config: Config;
  git: GitClient;
  context: Context;

  /**
   * Clock used to date notes of versions that are not tagged yet.
   */
  now: () => Date;
}

/**
 * Action inputs consumed by the commands. Each command only reads the inputs it documents.
 */
export interface CommandInputs {
  /**
   * Log range selector: `tag`, `date` or `hash`. Defaults to `tag`.
   */
  range: string;
  start: string;
  end: string;

  /**
   * An existing tag to report on. Cannot be combined with `range`, `start` or `end`.
   */
  tag: string;

  /**
   * Number of tags rendered by `changelog`.
   */
  size: number;
  all: boolean;
  addNextVersion: boolean;
  addUnreleased: boolean;

  pushTag: boolean;
  createRelease: boolean;

  commitType: string;
  commitScope: string;
  commitSubject: string;
  commitBody: string;
  commitIssue: string;
  commitBreakingChange: string;

  /**
   * Directory and file name of the commit message to validate, relative to the workspace.
   */
  path: string;
  file: string;

  /**
   * Source of the commit message as passed by the `prepare-commit-msg`/`commit-msg` hook.
   */
  source: string;
  enhance: boolean;
}
