import type { OctokitRestApi, Repo } from '@/types/github.types';

/**
 * Context and runtime related types
 */

/**
 * Runtime details gathered from the environment the action runs in.
 */
export interface Context {
  /**
   * Directory holding the repository checkout. `GITHUB_WORKSPACE` when set, else the working directory.
   */
  workspaceDir: string;

  /**
   * The repository details, or `null` when `GITHUB_REPOSITORY` is not set (e.g. running as a git hook).
   */
  repo: Repo | null;

  /**
   * The URL of the repository (e.g. https://github.com/octo-org/octo-repo), or `null` without a repository.
   */
  repoUrl: string | null;

  /**
   * Authenticated REST client, or `null` when no token is configured.
   */
  octokit: OctokitRestApi | null;
}
