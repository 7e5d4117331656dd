export type {
  InspectionOutcome,
  InspectionResult,
  ReportRow,
  StatusGlyph,
  UnpushedStatus
} from './report'
