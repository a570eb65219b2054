import type { Api } from '@octokit/plugin-rest-endpoint-methods';

/**
 * GitHub API and repository related types
 */

/**
 * Octokit extended with the REST endpoint methods plugin.
 */
export type OctokitRestApi = Api;

/**
 * Interface representing the repository structure of a GitHub repo in the form of the owner and name.
 */
export interface Repo {
  /**
   * The owner of the repository, typically a GitHub user or an organization.
   */
  owner: string;

  /**
   * The name of the repository.
   */
  repo: string;
}

/**
 * Parameters for publishing a GitHub release on an existing tag.
 */
export interface GitHubReleaseRequest {
  tagName: string;
  name: string;
  body: string;
  prerelease: boolean;
}

export interface GitHubRelease {
  id: number;
  tagName: string;
  url: string;
}
