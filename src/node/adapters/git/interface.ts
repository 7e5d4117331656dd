/**
 * Git Adapter Interface
 *
 * The version-control queries the status report depends on. Each one maps to a
 * single read-only git invocation, so the inspector can run against a fake
 * adapter instead of a repository on disk.
 */

export interface GitAdapter {
  /**
   * Get the adapter name for logging/debugging
   */
  readonly name: string

  /**
   * Check whether `dir` is inside a working copy.
   *
   * Runs the status query with its output captured. Never throws: any failure
   * means "not a repository".
   */
  isRepository(dir: string): Promise<boolean>

  /**
   * Short name of the checked-out branch ('HEAD' when detached).
   *
   * @throws GitError when the query fails
   */
  currentBranch(dir: string): Promise<string>

  /**
   * Full message of the most recent commit, trimmed.
   *
   * @throws GitError when the query fails, e.g. before the first commit
   */
  lastCommitMessage(dir: string): Promise<string>

  /**
   * Porcelain status output. Empty (after trimming) when the tree is clean.
   *
   * @throws GitError when the query fails
   */
  workingTreeStatus(dir: string): Promise<string>

  /**
   * Number of commits reachable from HEAD but not from its upstream.
   *
   * @returns the count, or null when no upstream is configured
   */
  countUnpushed(dir: string): Promise<number | null>
}
