import { execFileSync } from 'node:child_process';
import { CollaboratorError } from '@/errors';
import { isVersionTag } from '@/semver';
import type { Config, ExecSyncError, GitClient, LogRange, RawCommit, Tag } from '@/types';
import { LOG_RANGE } from '@/utils/constants';
import { debug, info } from '@actions/core';
import which from 'which';

// Unit and record separators keep multi-line messages intact in `git log` output.
const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';

function isExecSyncError(error: unknown): error is ExecSyncError {
  return error instanceof Error && 'status' in error && 'stderr' in error;
}

/**
 * Builds the revision arguments of `git log` for a range.
 *
 * @param {LogRange} range - The range to select.
 * @returns {string[]} Arguments to append to `git log`.
 */
export function getLogRangeArgs(range: LogRange): string[] {
  if (range.type === LOG_RANGE.DATE) {
    const args: string[] = [];
    if (range.start !== '') {
      args.push(`--since=${range.start}`);
    }
    if (range.end !== '') {
      args.push(`--until=${range.end}`);
    }
    return args;
  }

  const end = range.end === '' ? 'HEAD' : range.end;
  return [range.start === '' ? end : `${range.start}..${end}`];
}

/**
 * Parses `git log` output written with the record/field separated format used by {@link GitCli.log}.
 */
export function parseLogOutput(output: string): RawCommit[] {
  const commits: RawCommit[] = [];

  for (const record of output.split(RECORD_SEPARATOR)) {
    const trimmed = record.replace(/^\n+/, '');
    if (trimmed === '') {
      continue;
    }

    const [hash, date, message = ''] = trimmed.split(FIELD_SEPARATOR);
    commits.push({ hash, date, message: message.trimEnd() });
  }

  return commits;
}

/**
 * Parses `git for-each-ref` output written as `<unix>|<YYYY-MM-DD>|<name>` lines.
 */
export function parseTagOutput(output: string, tagPrefix: string): Tag[] {
  const tags: Tag[] = [];

  for (const line of output.split('\n')) {
    const [timestamp, date, name] = line.trim().split('|');
    if (!name || !isVersionTag(name, tagPrefix)) {
      continue;
    }
    tags.push({ name, date, timestamp: Number.parseInt(timestamp, 10) });
  }

  return tags.sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * {@link GitClient} backed by the `git` executable found on the PATH.
 */
export class GitCli implements GitClient {
  private readonly gitPath: string;
  private readonly tagPrefix: string;
  private readonly cwd: string;

  /**
   * @param {Config} config - Supplies the tag prefix used to filter tags.
   * @param {string} cwd - Directory of the repository checkout.
   * @throws {Error} If git is not found in PATH
   */
  constructor(config: Config, cwd: string) {
    this.gitPath = which.sync('git');
    this.tagPrefix = config.tagPrefix;
    this.cwd = cwd;
  }

  /**
   * Runs git and returns its stdout.
   *
   * @throws {CollaboratorError} When git exits with a non-zero status.
   */
  private run(args: string[]): string {
    debug(`Executing: git ${args.join(' ')}`);

    try {
      return execFileSync(this.gitPath, args, {
        cwd: this.cwd,
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'pipe'],
        maxBuffer: 64 * 1024 * 1024,
      });
    } catch (error) {
      const stderr = isExecSyncError(error) ? String(error.stderr).trim() : '';
      const reason = stderr !== '' ? stderr : error instanceof Error ? error.message : String(error);

      throw new CollaboratorError(`git ${args[0]} failed: ${reason}`, { cause: error });
    }
  }

  /**
   * Runs git, returning `null` instead of throwing when it fails. Used for queries where a
   * non-zero exit status is an answer (no tags yet, detached HEAD).
   */
  private query(args: string[]): string | null {
    try {
      return this.run(args);
    } catch (error) {
      debug(error instanceof Error ? error.message : String(error));
      return null;
    }
  }

  lastTag(): string {
    const output = this.query(['describe', '--tags', '--abbrev=0', `--match=${this.tagPrefix}*`]);
    return output?.trim() ?? '';
  }

  tags(): Tag[] {
    const output = this.run([
      'for-each-ref',
      '--sort=creatordate',
      '--format=%(creatordate:unix)|%(creatordate:short)|%(refname:strip=2)',
      `refs/tags/${this.tagPrefix}*`,
    ]);

    return parseTagOutput(output, this.tagPrefix);
  }

  log(range: LogRange): RawCommit[] {
    console.time('Elapsed time reading git log');

    try {
      const output = this.run([
        'log',
        '--date=short',
        '--pretty=format:%H%x1f%ad%x1f%B%x1e',
        ...getLogRangeArgs(range),
      ]);

      return parseLogOutput(output);
    } finally {
      console.timeEnd('Elapsed time reading git log');
    }
  }

  branch(): string {
    return this.query(['symbolic-ref', '--short', 'HEAD'])?.trim() ?? '';
  }

  isDetached(): boolean {
    return this.query(['symbolic-ref', '-q', 'HEAD']) === null;
  }

  commit(header: string, body: string, footer: string): void {
    const args = ['commit', '-m', header];
    for (const part of [body, footer]) {
      if (part !== '') {
        args.push('-m', part);
      }
    }

    info(this.run(args).trim());
  }

  createTag(name: string, message: string, push: boolean): void {
    this.run(['tag', '-a', name, '-m', message]);
    info(`Created tag ${name}`);

    if (!push) {
      return;
    }

    try {
      this.run(['push', 'origin', name]);
      info(`Pushed tag ${name} to origin`);
    } catch (error) {
      if (error instanceof Error && error.message.includes('The requested URL returned error: 403')) {
        throw new CollaboratorError(
          [
            `Failed to push tag ${name}: ${error.message} - Ensure that the`,
            'GitHub Actions workflow has the correct permissions to create tags. To grant the required permissions,',
            'update your workflow YAML file with the following block under "permissions":\n\npermissions:\n',
            ' contents: write',
          ].join(' '),
          { cause: error },
        );
      }
      throw error;
    }
  }
}
