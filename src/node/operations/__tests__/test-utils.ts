/**
 * Test utilities for inspection tests.
 *
 * FakeGitAdapter answers the five status queries from in-memory state keyed by
 * directory, so no git process is spawned.
 */

import fs from 'fs'
import os from 'os'
import path from 'path'
import { GitError } from '../../shared/errors'
import type { GitAdapter } from '../../adapters/git'

export type FakeRepoState = {
  branch: string
  lastCommitMessage: string
  /** Porcelain status output; blank means clean */
  status: string
  /** Commits ahead of upstream, or null when no upstream is configured */
  unpushed: number | null
  /** Query that should fail with a GitError */
  failOn?: 'currentBranch' | 'lastCommitMessage' | 'workingTreeStatus'
}

export class FakeGitAdapter implements GitAdapter {
  readonly name = 'fake'
  readonly calls: string[] = []
  private readonly repos = new Map<string, FakeRepoState>()

  addRepo(dir: string, state: Partial<FakeRepoState> = {}): this {
    this.repos.set(dir, {
      branch: 'main',
      lastCommitMessage: 'initial commit',
      status: '',
      unpushed: 0,
      ...state
    })
    return this
  }

  async isRepository(dir: string): Promise<boolean> {
    this.calls.push(`isRepository ${dir}`)
    return this.repos.has(dir)
  }

  async currentBranch(dir: string): Promise<string> {
    return this.query(dir, 'currentBranch').branch
  }

  async lastCommitMessage(dir: string): Promise<string> {
    return this.query(dir, 'lastCommitMessage').lastCommitMessage
  }

  async workingTreeStatus(dir: string): Promise<string> {
    return this.query(dir, 'workingTreeStatus').status
  }

  async countUnpushed(dir: string): Promise<number | null> {
    this.calls.push(`countUnpushed ${dir}`)
    return this.repos.get(dir)?.unpushed ?? null
  }

  private query(dir: string, operation: NonNullable<FakeRepoState['failOn']>): FakeRepoState {
    this.calls.push(`${operation} ${dir}`)
    const repo = this.repos.get(dir)
    if (!repo) {
      throw new GitError('fatal: not a git repository', operation)
    }
    if (repo.failOn === operation) {
      throw new GitError(`fatal: ${operation} exploded\nsecond line`, operation)
    }
    return repo
  }
}

/**
 * Create a temporary directory, returned in canonical form (tmpdir may be a symlink)
 */
export async function createTempDir(prefix = 'repo-pulse-test-'): Promise<string> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix))
  return fs.promises.realpath(dir)
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true })
}
