import { CollaboratorError } from '@/errors';
import type { Context, GitHubRelease, GitHubReleaseRequest } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import { RequestError } from '@octokit/request-error';

/**
 * Publishes a GitHub release for a tag that already exists on the remote.
 *
 * Note: Requires GitHub action permissions > contents: write
 *
 * @param {Context} context - Supplies the authenticated client and the repository.
 * @param {GitHubReleaseRequest} request - Tag, title, markdown body and prerelease flag.
 * @returns {Promise<GitHubRelease>} The created release.
 * @throws {CollaboratorError} When no token or repository is available, or the API call fails.
 */
export async function createGitHubRelease(context: Context, request: GitHubReleaseRequest): Promise<GitHubRelease> {
  const { octokit, repo } = context;
  if (octokit === null || repo === null) {
    throw new CollaboratorError(
      'Cannot create a GitHub release without a github_token input and a GITHUB_REPOSITORY environment variable',
    );
  }

  console.time('Elapsed time creating release');
  startGroup(`Creating GitHub release ${request.tagName}`);

  try {
    const response = await octokit.rest.repos.createRelease({
      owner: repo.owner,
      repo: repo.repo,
      tag_name: request.tagName,
      name: request.name,
      body: request.body,
      draft: false,
      prerelease: request.prerelease,
    });

    info(`Created release ${response.data.html_url}`);

    return {
      id: response.data.id,
      tagName: response.data.tag_name,
      url: response.data.html_url,
    };
  } catch (error) {
    if (error instanceof RequestError && error.status === 403) {
      throw new CollaboratorError(
        [
          `Failed to create release ${request.tagName}: ${error.message.trim()}.\nEnsure that the`,
          'GitHub Actions workflow has the correct permissions to create releases by ensuring that',
          'your workflow YAML file has the following block under "permissions":\n\npermissions:\n',
          ' contents: write',
        ].join(' '),
        { cause: error },
      );
    }

    let errorMessage: string;
    if (error instanceof RequestError) {
      errorMessage = `Failed to create release ${request.tagName}: ${error.message.trim()} (status: ${error.status})`;
    } else if (error instanceof Error) {
      errorMessage = `Failed to create release ${request.tagName}: ${error.message.trim()}`;
    } else {
      errorMessage = String(error).trim();
    }

    throw new CollaboratorError(errorMessage, { cause: error });
  } finally {
    console.timeEnd('Elapsed time creating release');
    endGroup();
  }
}
