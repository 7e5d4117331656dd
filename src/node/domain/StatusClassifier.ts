/**
 * StatusClassifier - Pure mapping from inspection outcomes to report values.
 *
 * No I/O here: everything is derived from the InspectionOutcome alone.
 */

import type {
  InspectionOutcome,
  InspectionResult,
  ReportRow,
  StatusGlyph,
  UnpushedStatus
} from '../../shared/types'

export class StatusClassifier {
  // Prevent instantiation - use static methods
  private constructor() {}

  /**
   * Picks the glyph for an outcome.
   * An unclean tree is always 'dirty', whatever the upstream state.
   */
  public static classify(outcome: InspectionOutcome): StatusGlyph {
    switch (outcome.kind) {
      case 'invalid':
      case 'not-a-repository':
      case 'inspection-failed':
        return 'error'
      case 'inspected':
        return outcome.isClean ? StatusClassifier.classifyUnpushed(outcome.unpushed) : 'dirty'
    }
  }

  private static classifyUnpushed(unpushed: UnpushedStatus): StatusGlyph {
    switch (unpushed.kind) {
      case 'up-to-date':
        return 'clean'
      case 'has-unpushed':
        return 'ahead'
      case 'no-upstream':
        return 'no-upstream'
    }
  }

  /**
   * Text for the Error column; '-' when the directory was inspected.
   */
  public static describeError(outcome: InspectionOutcome): string {
    switch (outcome.kind) {
      case 'invalid':
        return 'Not a valid directory'
      case 'not-a-repository':
        return 'Not a Git repository'
      case 'inspection-failed': {
        const detail = StatusClassifier.failureLine(outcome.error)
        return detail ? `Failed to retrieve Git info: ${detail}` : 'Failed to retrieve Git info'
      }
      case 'inspected':
        return '-'
    }
  }

  /**
   * git's own diagnostic line from a failure message. simple-git puts the
   * command's stdout ahead of stderr, so an echoed `HEAD` can come first.
   */
  private static failureLine(error: string): string {
    const lines = error
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
    return lines.find((line) => /^(fatal|error):/.test(line)) ?? lines[0] ?? ''
  }

  public static toReportRow(result: InspectionResult): ReportRow {
    const { outcome } = result
    return {
      directory: result.path,
      branch: outcome.kind === 'inspected' ? outcome.branch : '',
      glyph: StatusClassifier.classify(outcome),
      lastCommit: outcome.kind === 'inspected' ? outcome.lastCommitMessage : '',
      error: StatusClassifier.describeError(outcome)
    }
  }
}
