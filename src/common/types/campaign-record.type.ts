import { CellValue } from './raw-table.type'

export const CANONICAL_FIELD_NAMES = [
  'account_id',
  'campaign_id',
  'date',
  'spend',
  'impressions',
  'clicks',
  'purchases',
  'revenue',
  'ad_id',
  'ad_name',
  'campaign_name',
  'objective',
  'creative_id',
] as const

export type CanonicalField = (typeof CANONICAL_FIELD_NAMES)[number]

export type MetricField = 'spend' | 'impressions' | 'clicks' | 'purchases' | 'revenue'

export type IssueReason = 'missing' | 'not_a_number' | 'negative' | 'not_an_integer' | 'invalid_date'

export type RowIssue = {
  /** sheet row number (header is row 1) or record position for API data */
  row: number
  field: CanonicalField
  /** source header the value came from */
  column: string
  value: CellValue
  reason: IssueReason
}

export type CampaignRecord = {
  account_id: string
  campaign_id: string
  date: string
  spend: number | null
  impressions: number | null
  clicks: number | null
  purchases: number | null
  revenue: number | null
  ad_id: string | null
  ad_name: string | null
  campaign_name: string | null
  objective: string | null
  creative_id: string | null
  sourceRow: number
  /** non-empty only for rows kept under the flag policy */
  issues: RowIssue[]
}

export type RejectedRow = {
  row: number
  issues: RowIssue[]
}

export type NormalizedDataset = {
  records: CampaignRecord[]
  rejected: RejectedRow[]
  flagged: number
  duplicatesRemoved: number
  /** source rows of the dropped duplicates */
  duplicateRows: number[]
  /** source header → canonical field */
  columnMapping: Record<string, CanonicalField>
  warnings: string[]
}

export function isCanonicalField(value: string): value is CanonicalField {
  return (CANONICAL_FIELD_NAMES as ReadonlyArray<string>).includes(value)
}
