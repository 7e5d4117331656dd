/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create and access Git adapter instances.
 */

import { log } from '../../../shared/logger'
import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './SimpleGitAdapter'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Upper bound, in milliseconds, on a single git invocation that produces no output
   */
  timeoutMs?: number

  /**
   * Whether to log adapter creation
   */
  verbose?: boolean
}

/**
 * Singleton adapter instance
 * Cached to avoid recreating adapters on every operation
 */
let cachedAdapter: GitAdapter | null = null

/**
 * Create a Git adapter instance
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (config.verbose) {
    const bound = config.timeoutMs !== undefined ? `${config.timeoutMs}ms timeout` : 'no timeout'
    log.info(`[GitAdapter] Creating adapter: simple-git (${bound})`)
  }

  return new SimpleGitAdapter({ timeoutMs: config.timeoutMs })
}

/**
 * Get the singleton Git adapter instance
 *
 * The instance is cached and reused across calls; `config` only applies to
 * the first call after a reset.
 */
export function getGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (cachedAdapter) {
    return cachedAdapter
  }

  cachedAdapter = createGitAdapter(config)
  return cachedAdapter
}

/**
 * Reset the cached adapter instance
 *
 * Useful for testing, so the next getGitAdapter call builds a fresh adapter
 */
export function resetGitAdapter(): void {
  cachedAdapter = null
}
