/**
 * Directory holding the repository checkout: `GITHUB_WORKSPACE` inside a workflow run, the
 * current working directory otherwise (e.g. when invoked from a git hook).
 */
export function getWorkspaceDir(): string {
  const workspace = process.env.GITHUB_WORKSPACE;
  return workspace !== undefined && workspace !== '' ? workspace : process.cwd();
}
