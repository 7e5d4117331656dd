/**
 * RepoInspector - Collects the status facts of configured directories.
 *
 * One directory never affects another: every failure becomes an outcome on
 * that directory's result and inspection moves on.
 */

import { log } from '../../shared/logger'
import type { InspectionOutcome, InspectionResult, UnpushedStatus } from '../../shared/types'
import fs from 'fs'
import path from 'path'
import { getGitAdapter, type GitAdapter } from '../adapters/git'

export class RepoInspector {
  constructor(private readonly git: GitAdapter = getGitAdapter()) {}

  /**
   * Inspects each directory in turn. Results keep the input order.
   */
  async inspectAll(directories: string[]): Promise<InspectionResult[]> {
    const results: InspectionResult[] = []
    for (const directory of directories) {
      results.push(await this.inspect(directory))
    }
    return results
  }

  async inspect(directory: string): Promise<InspectionResult> {
    const resolved = await RepoInspector.resolvePath(directory)
    const outcome = await this.inspectResolved(resolved)
    log.debug(`[RepoInspector] ${resolved}: ${outcome.kind}`)
    return { path: resolved, outcome }
  }

  /**
   * Absolute, symlink-free form of `directory`. Paths that do not exist fall
   * back to their lexical absolute form.
   */
  static async resolvePath(directory: string): Promise<string> {
    const absolute = path.resolve(directory)
    try {
      return await fs.promises.realpath(absolute)
    } catch {
      return absolute
    }
  }

  private async inspectResolved(dir: string): Promise<InspectionOutcome> {
    if (!(await RepoInspector.isDirectory(dir))) {
      return { kind: 'invalid' }
    }

    if (!(await this.git.isRepository(dir))) {
      return { kind: 'not-a-repository' }
    }

    let branch: string
    let lastCommitMessage: string
    let status: string
    try {
      branch = await this.git.currentBranch(dir)
      lastCommitMessage = await this.git.lastCommitMessage(dir)
      status = await this.git.workingTreeStatus(dir)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      log.debug(`[RepoInspector] failed to inspect ${dir}:`, message)
      return { kind: 'inspection-failed', error: message }
    }

    return {
      kind: 'inspected',
      branch,
      lastCommitMessage,
      isClean: status.trim().length === 0,
      unpushed: RepoInspector.toUnpushedStatus(await this.git.countUnpushed(dir))
    }
  }

  private static toUnpushedStatus(count: number | null): UnpushedStatus {
    if (count === null) return { kind: 'no-upstream' }
    if (count > 0) return { kind: 'has-unpushed', count }
    return { kind: 'up-to-date' }
  }

  private static async isDirectory(dir: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(dir)
      return stats.isDirectory()
    } catch {
      return false
    }
  }
}
