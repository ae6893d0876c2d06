import { DatasetSummary, KpiRow, KpiValues } from './kpi.type'

export type WeekOverWeek = {
  spendChangePct: number | null
  ctrChangePct: number | null
}

/** Structured summary handed to the AI model. */
export type InsightPayload = {
  currency: string
  overview: DatasetSummary
  overallKpis: KpiValues
  campaigns: KpiRow[]
  topSpending: KpiRow[]
  bestCtr: KpiRow[]
  worstCtr: KpiRow[]
  trend: {
    daily: KpiRow[]
    weekOverWeek: WeekOverWeek | null
  }
}

export type InsightResult =
  | {
      status: 'available'
      text: string
      model: string
      requestId: string | null
    }
  | {
      status: 'unavailable'
      reason: string
      /** rule-based markdown built from the payload */
      fallback: string
    }
