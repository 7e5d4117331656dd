/**
 * Report Types
 *
 * Values produced while inspecting configured directories and turning them
 * into report rows. Every stage builds new values; nothing is edited in place.
 */

/**
 * Local commits relative to the branch's upstream.
 */
export type UnpushedStatus =
  | { kind: 'has-unpushed'; count: number }
  | { kind: 'up-to-date' }
  | { kind: 'no-upstream' }

/**
 * What inspecting a single directory found. Exactly one variant applies.
 */
export type InspectionOutcome =
  | { kind: 'invalid' }
  | { kind: 'not-a-repository' }
  | { kind: 'inspection-failed'; error: string }
  | {
      kind: 'inspected'
      branch: string
      lastCommitMessage: string
      isClean: boolean
      unpushed: UnpushedStatus
    }

export type InspectionResult = {
  /** Absolute, canonical path of the configured directory */
  path: string
  outcome: InspectionOutcome
}

export type StatusGlyph = 'clean' | 'ahead' | 'no-upstream' | 'dirty' | 'error'

/**
 * One line of the rendered report. Blank strings stand for absent values.
 */
export type ReportRow = {
  directory: string
  branch: string
  glyph: StatusGlyph
  lastCommit: string
  /** Human-readable error, or '-' when the directory was inspected */
  error: string
}
