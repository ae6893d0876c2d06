import { InvalidRowPolicyEnum } from '../enums/invalid-row-policy.enum'
import { NormalizedDataset } from './campaign-record.type'
import { InsightResult } from './insight.type'
import { DatasetSummary, KpiRow } from './kpi.type'

export type SpreadsheetSource = {
  kind: 'spreadsheet'
  file: Buffer
  fileName?: string
  sheetName?: string
}

export type AdsApiSource = {
  kind: 'ads-api'
  accessToken: string
  accountIds: string[]
  /** inclusive, YYYY-MM-DD */
  since: string
  until: string
}

export type DataSource = SpreadsheetSource | AdsApiSource

/** What a run remembers about its input; never the file bytes or the token. */
export type SourceDescriptor =
  | { kind: 'spreadsheet'; fileName: string | null; sheetName: string | null }
  | { kind: 'ads-api'; accountIds: string[]; since: string; until: string }

export type PipelineOptions = {
  invalidRowPolicy?: InvalidRowPolicyEnum
  /** extra header aliases, alias → canonical field */
  aliases?: Record<string, string>
  openaiApiKey?: string
}

export type PipelineRun = {
  runId: string
  sessionId: string
  source: SourceDescriptor
  startedAt: string
  finishedAt: string
  dataset: NormalizedDataset
  summary: DatasetSummary
  kpis: KpiRow[]
  campaignSummary: KpiRow[]
  insights: InsightResult
}
