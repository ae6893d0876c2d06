import { AggregationLevelEnum } from '../enums/aggregation-level.enum'

/** `null` marks a ratio whose denominator is zero or unknown. */
export type KpiValue = number | null

export type KpiName =
  | 'cpc'
  | 'cpm'
  | 'ctr'
  | 'cpa'
  | 'roas'
  | 'cvr'
  | 'aov'
  | 'revenue_per_click'
  | 'revenue_per_impression'
  | 'cost_per_impression'
  | 'purchase_rate'

export type KpiValues = Record<KpiName, KpiValue>

export type MetricTotals = {
  spend: number | null
  impressions: number | null
  clicks: number | null
  purchases: number | null
  revenue: number | null
}

export type KpiDimensions = {
  account_id?: string
  campaign_id?: string
  campaign_name?: string | null
  ad_id?: string | null
  ad_name?: string | null
  date?: string
  period?: { from: string; to: string }
}

export type KpiRow = {
  key: string
  level: AggregationLevelEnum
  dimensions: KpiDimensions
  records: number
  totals: MetricTotals
  kpis: KpiValues
}

export type DateRange = {
  from?: string
  to?: string
}

export type DatasetSummary = {
  records: number
  accounts: number
  campaigns: number
  dateRange: { start: string; end: string } | null
  totals: MetricTotals
  kpis: KpiValues
}
