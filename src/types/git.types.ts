import type { LOG_RANGE } from '@/utils/constants';

/**
 * Version control related types
 */

/**
 * A commit as read from `git log`.
 */
export interface RawCommit {
  /**
   * Full SHA-1 of the commit.
   */
  hash: string;

  /**
   * Author date formatted as `YYYY-MM-DD`.
   */
  date: string;

  /**
   * Raw commit message, including body and footers.
   */
  message: string;
}

export type LogRangeType = (typeof LOG_RANGE)[keyof typeof LOG_RANGE];

/**
 * A window over the commit history.
 *
 * - `tag` and `hash` ranges select `start..end`; an empty `end` means `HEAD` and an empty
 *   `start` means the beginning of history.
 * - `date` ranges select commits between `start` and `end` (inclusive, `YYYY-MM-DD`).
 */
export interface LogRange {
  type: LogRangeType;
  start: string;
  end: string;
}

export interface Tag {
  /**
   * The tag name. E.g. `v1.2.0`
   */
  name: string;

  /**
   * Creation date formatted as `YYYY-MM-DD`.
   */
  date: string;

  /**
   * Creation time in seconds since the epoch. Used to order tags.
   */
  timestamp: number;
}

/**
 * Operations this action needs from the version control system. The production implementation
 * shells out to `git`; tests supply an in-memory one.
 */
export interface GitClient {
  /**
   * Most recent tag reachable from `HEAD` that carries the configured prefix, or `''` when none exists.
   */
  lastTag(): string;

  /**
   * All version tags ordered by creation date, oldest first.
   */
  tags(): Tag[];

  /**
   * Commits in the range, newest first.
   */
  log(range: LogRange): RawCommit[];

  /**
   * Name of the checked out branch, or `''` when `HEAD` is detached.
   */
  branch(): string;

  isDetached(): boolean;

  commit(header: string, body: string, footer: string): void;

  /**
   * Creates an annotated tag on `HEAD` and optionally pushes it to `origin`.
   */
  createTag(name: string, message: string, push: boolean): void;
}
