/**
 * StatusReportOperation - Orchestrates a status report run
 *
 * Loads the configuration, inspects every directory in file order, classifies
 * the results and renders the table exactly once.
 */

import { log } from '../../shared/logger'
import type { ReportRow } from '../../shared/types'
import { loadConfiguration } from '../core/config'
import { renderReport, type RenderOptions } from '../core/utils/render-report'
import { StatusClassifier } from '../domain/StatusClassifier'
import { RepoInspector } from './RepoInspector'

const REPORT_TITLE = 'Git Repository Overview'

export type StatusReportOptions = RenderOptions & {
  inspector?: RepoInspector
  /** Receives the rendered table; defaults to standard output */
  write?: (output: string) => void
}

export class StatusReportOperation {
  /**
   * Runs the report for the configuration at `configPath`.
   * A ConfigError is fatal and propagates before anything is written.
   */
  static async run(configPath: string, options: StatusReportOptions = {}): Promise<ReportRow[]> {
    const config = await loadConfiguration(configPath)
    log.debug(
      `[StatusReportOperation] ${config.directories.length} directories from ${config.configPath}`
    )

    const inspector = options.inspector ?? new RepoInspector()
    const results = await inspector.inspectAll(config.directories)
    const rows = results.map((result) => StatusClassifier.toReportRow(result))

    const write = options.write ?? ((output: string) => process.stdout.write(`${output}\n`))
    write(
      renderReport(rows, {
        color: options.color,
        nameOnly: options.nameOnly,
        maxCommitWidth: options.maxCommitWidth,
        title: options.title ?? REPORT_TITLE
      })
    )

    return rows
  }
}
