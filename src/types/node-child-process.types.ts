/**
 * Error type for command execution failures thrown by `execFileSync`.
 */
export interface ExecSyncError extends Error {
  /**
   * The exit code of the subprocess, or null if the subprocess terminated due to a signal.
   */
  status: number | null;

  /**
   * The contents of output[2].
   */
  stderr: Buffer | string;
}
