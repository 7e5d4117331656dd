/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood; every call captures its output
 * instead of writing to the console.
 */

import { log } from '../../../shared/logger'
import simpleGit, { type SimpleGit, type SimpleGitOptions } from 'simple-git'
import { GitError } from '../../shared/errors'
import type { GitAdapter } from './interface'

export type SimpleGitAdapterOptions = {
  /**
   * Kill a git process that produces no output for this long.
   * Undefined means wait indefinitely.
   */
  timeoutMs?: number
}

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  constructor(private readonly options: SimpleGitAdapterOptions = {}) {}

  private createGit(dir: string): SimpleGit {
    const config: Partial<SimpleGitOptions> = { baseDir: dir }
    if (this.options.timeoutMs !== undefined) {
      config.timeout = { block: this.options.timeoutMs }
    }
    return simpleGit(config)
  }

  async isRepository(dir: string): Promise<boolean> {
    try {
      await this.createGit(dir).raw(['status'])
      return true
    } catch (error) {
      log.debug(`[SimpleGitAdapter] status failed for ${dir}:`, this.messageOf(error))
      return false
    }
  }

  async currentBranch(dir: string): Promise<string> {
    try {
      const branch = await this.createGit(dir).revparse(['--abbrev-ref', 'HEAD'])
      return branch.trim()
    } catch (error) {
      throw this.createError('currentBranch', error)
    }
  }

  async lastCommitMessage(dir: string): Promise<string> {
    try {
      const message = await this.createGit(dir).raw(['log', '-1', '--pretty=%B'])
      return message.trim()
    } catch (error) {
      throw this.createError('lastCommitMessage', error)
    }
  }

  async workingTreeStatus(dir: string): Promise<string> {
    try {
      return await this.createGit(dir).raw(['status', '--porcelain'])
    } catch (error) {
      throw this.createError('workingTreeStatus', error)
    }
  }

  async countUnpushed(dir: string): Promise<number | null> {
    let output: string
    try {
      output = await this.createGit(dir).raw(['rev-list', '--count', '@{u}..HEAD'])
    } catch (error) {
      // git refuses to resolve @{u} when the branch has no upstream
      log.debug(`[SimpleGitAdapter] no upstream for ${dir}:`, this.messageOf(error))
      return null
    }

    const trimmed = output.trim()
    if (!/^\d+$/.test(trimmed)) {
      log.debug(`[SimpleGitAdapter] unexpected rev-list output for ${dir}: ${trimmed}`)
      return null
    }
    return parseInt(trimmed, 10)
  }

  private messageOf(error: unknown): string {
    return error instanceof Error ? error.message.trim() : String(error)
  }

  private createError(operation: string, originalError: unknown): GitError {
    return new GitError(this.messageOf(originalError), operation, originalError)
  }
}
