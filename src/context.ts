import type { Config, Context, Repo } from '@/types';
import { getWorkspaceDir } from '@/utils/environment';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

const USER_AGENT = '[octokit] conventional-semver-action';

/**
 * Clears the cached context instance during testing.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - Typically used in beforeEach() test setup or before testing different context variations
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Splits `GITHUB_REPOSITORY` (`owner/name`) into its parts.
 *
 * @param {string | undefined} repository - The raw environment value.
 * @returns {Repo | null} The repository, or `null` when the value is missing or malformed.
 */
function parseRepository(repository: string | undefined): Repo | null {
  if (!repository) {
    return null;
  }

  const [owner, repo, ...rest] = repository.split('/');
  if (!owner || !repo || rest.length > 0) {
    return null;
  }

  return { owner, repo };
}

/**
 * Lazily initializes the runtime context. Outside GitHub Actions (e.g. as a git hook) the
 * repository and the REST client are simply absent; only commands that publish releases need them.
 *
 * @param {Config} config - Supplies the GitHub token.
 * @returns {Context}
 */
function initializeContext(config: Config): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const serverUrl = process.env.GITHUB_SERVER_URL || 'https://github.com';
    const repo = parseRepository(process.env.GITHUB_REPOSITORY);

    // Extend Octokit with REST API methods using the plugin
    const OctokitRestApi = Octokit.plugin(restEndpointMethods);
    const octokit =
      config.githubToken === ''
        ? null
        : new OctokitRestApi({
            auth: `token ${config.githubToken}`,
            userAgent: USER_AGENT,
            baseUrl: process.env.GITHUB_API_URL || 'https://api.github.com',
          });

    contextInstance = {
      workspaceDir: getWorkspaceDir(),
      repo,
      repoUrl: repo ? `${serverUrl}/${repo.owner}/${repo.repo}` : null,
      octokit,
    };

    info(`Workspace Directory: ${contextInstance.workspaceDir}`);
    info(`Repository: ${repo ? `${repo.owner}/${repo.repo}` : '(none)'}`);
    info(`Repository URL: ${contextInstance.repoUrl ?? '(none)'}`);
    info(`GitHub API Client: ${octokit ? 'enabled' : 'disabled (no token)'}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (config: Config): Context => {
  return initializeContext(config);
};
