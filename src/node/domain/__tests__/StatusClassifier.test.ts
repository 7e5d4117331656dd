/**
 * Tests for StatusClassifier pure functions
 */

import { describe, expect, it } from 'vitest'
import type { InspectionOutcome, UnpushedStatus } from '../../../shared/types'
import { StatusClassifier } from '../StatusClassifier'

function inspected(isClean: boolean, unpushed: UnpushedStatus): InspectionOutcome {
  return { kind: 'inspected', branch: 'main', lastCommitMessage: 'msg', isClean, unpushed }
}

describe('StatusClassifier', () => {
  describe('classify', () => {
    it('maps every failure outcome to error', () => {
      expect(StatusClassifier.classify({ kind: 'invalid' })).toBe('error')
      expect(StatusClassifier.classify({ kind: 'not-a-repository' })).toBe('error')
      expect(StatusClassifier.classify({ kind: 'inspection-failed', error: 'boom' })).toBe('error')
    })

    it('maps a clean, synced repository to clean', () => {
      expect(StatusClassifier.classify(inspected(true, { kind: 'up-to-date' }))).toBe('clean')
    })

    it('maps a clean repository with local commits to ahead', () => {
      expect(StatusClassifier.classify(inspected(true, { kind: 'has-unpushed', count: 4 }))).toBe(
        'ahead'
      )
    })

    it('maps a clean repository without upstream to no-upstream', () => {
      expect(StatusClassifier.classify(inspected(true, { kind: 'no-upstream' }))).toBe(
        'no-upstream'
      )
    })

    it('reports dirty regardless of upstream state', () => {
      expect(StatusClassifier.classify(inspected(false, { kind: 'up-to-date' }))).toBe('dirty')
      expect(StatusClassifier.classify(inspected(false, { kind: 'has-unpushed', count: 1 }))).toBe(
        'dirty'
      )
      expect(StatusClassifier.classify(inspected(false, { kind: 'no-upstream' }))).toBe('dirty')
    })
  })

  describe('describeError', () => {
    it('describes directory problems', () => {
      expect(StatusClassifier.describeError({ kind: 'invalid' })).toBe('Not a valid directory')
      expect(StatusClassifier.describeError({ kind: 'not-a-repository' })).toBe(
        'Not a Git repository'
      )
    })

    it('keeps only the first line of a git failure', () => {
      const outcome: InspectionOutcome = {
        kind: 'inspection-failed',
        error: "fatal: your current branch 'main' does not have any commits yet\nhint: extra"
      }

      expect(StatusClassifier.describeError(outcome)).toBe(
        "Failed to retrieve Git info: fatal: your current branch 'main' does not have any commits yet"
      )
    })

    it('prefers the fatal line over stdout echoed ahead of it', () => {
      const outcome: InspectionOutcome = {
        kind: 'inspection-failed',
        error:
          "HEAD\nfatal: ambiguous argument 'HEAD': unknown revision or path not in the working tree.\nUse '--' to separate paths from revisions"
      }

      expect(StatusClassifier.describeError(outcome)).toBe(
        "Failed to retrieve Git info: fatal: ambiguous argument 'HEAD': unknown revision or path not in the working tree."
      )
    })

    it('falls back to the first non-empty line without a fatal line', () => {
      expect(
        StatusClassifier.describeError({
          kind: 'inspection-failed',
          error: '\n  timed out after 5000ms  \nkilled'
        })
      ).toBe('Failed to retrieve Git info: timed out after 5000ms')
    })

    it('omits the detail when the failure has no text', () => {
      expect(StatusClassifier.describeError({ kind: 'inspection-failed', error: '  ' })).toBe(
        'Failed to retrieve Git info'
      )
    })

    it('uses a dash for inspected directories', () => {
      expect(StatusClassifier.describeError(inspected(true, { kind: 'up-to-date' }))).toBe('-')
    })
  })

  describe('toReportRow', () => {
    it('fills every column for an inspected repository', () => {
      const row = StatusClassifier.toReportRow({
        path: '/work/api',
        outcome: {
          kind: 'inspected',
          branch: 'feature/login',
          lastCommitMessage: 'Add login form',
          isClean: true,
          unpushed: { kind: 'has-unpushed', count: 2 }
        }
      })

      expect(row).toEqual({
        directory: '/work/api',
        branch: 'feature/login',
        glyph: 'ahead',
        lastCommit: 'Add login form',
        error: '-'
      })
    })

    it('leaves branch and commit blank for error rows', () => {
      const row = StatusClassifier.toReportRow({ path: '/nowhere', outcome: { kind: 'invalid' } })

      expect(row).toEqual({
        directory: '/nowhere',
        branch: '',
        glyph: 'error',
        lastCommit: '',
        error: 'Not a valid directory'
      })
    })
  })
})
