/**
 * Git Adapter Module
 *
 * Usage:
 * ```typescript
 * import { getGitAdapter } from '../adapters/git'
 *
 * const git = getGitAdapter()
 * const branch = await git.currentBranch(repoPath)
 * ```
 */

export { createGitAdapter, getGitAdapter, resetGitAdapter } from './factory'
export type { GitAdapterConfig } from './factory'

export type { GitAdapter } from './interface'

// Adapter implementations (for testing)
export { SimpleGitAdapter } from './SimpleGitAdapter'
