import { groupBy, mapValues, maxBy, minBy, orderBy, uniq } from 'lodash'
import moment from 'moment'
import { AggregationLevelEnum, PERIOD_LEVELS } from '@common/enums/aggregation-level.enum'
import { CampaignRecord, MetricField } from '@common/types/campaign-record.type'
import { DatasetSummary, DateRange, KpiDimensions, KpiName, KpiRow, KpiValues, MetricTotals } from '@common/types/kpi.type'
import { safeDivide } from '@utils/safe-divide'
import { DATE_OUTPUT_FORMAT } from '@utils/parse-date'

export type KpiDefinition = {
  label: string
  numerator: MetricField
  denominator: MetricField
  scale: number
}

export const KPI_DEFINITIONS: Record<KpiName, KpiDefinition> = {
  cpc: { label: 'CPC', numerator: 'spend', denominator: 'clicks', scale: 1 },
  cpm: { label: 'CPM', numerator: 'spend', denominator: 'impressions', scale: 1000 },
  ctr: { label: 'CTR', numerator: 'clicks', denominator: 'impressions', scale: 1 },
  cpa: { label: 'CPA', numerator: 'spend', denominator: 'purchases', scale: 1 },
  roas: { label: 'ROAS', numerator: 'revenue', denominator: 'spend', scale: 1 },
  cvr: { label: 'CVR', numerator: 'purchases', denominator: 'clicks', scale: 1 },
  aov: { label: 'AOV', numerator: 'revenue', denominator: 'purchases', scale: 1 },
  revenue_per_click: { label: 'Revenue/Click', numerator: 'revenue', denominator: 'clicks', scale: 1 },
  revenue_per_impression: { label: 'Revenue/Impression', numerator: 'revenue', denominator: 'impressions', scale: 1 },
  cost_per_impression: { label: 'Cost/Impression', numerator: 'spend', denominator: 'impressions', scale: 1 },
  // purchases per impression; per click is `cvr`
  purchase_rate: { label: 'Purchase Rate', numerator: 'purchases', denominator: 'impressions', scale: 1 },
}

export const KPI_NAMES: ReadonlyArray<KpiName> = [
  'cpc',
  'cpm',
  'ctr',
  'cpa',
  'roas',
  'cvr',
  'aov',
  'revenue_per_click',
  'revenue_per_impression',
  'cost_per_impression',
  'purchase_rate',
]

export const METRIC_FIELDS: ReadonlyArray<MetricField> = ['spend', 'impressions', 'clicks', 'purchases', 'revenue']

export type AggregateOptions = {
  groupBy: AggregationLevelEnum
  dateRange?: DateRange
}

/** Sum of the known values, or `null` when every value is unknown. */
function sumKnown(values: ReadonlyArray<number | null>): number | null {
  let total: number | null = null
  for (const v of values) if (v !== null) total = (total ?? 0) + v
  return total
}

export function sumTotals(records: ReadonlyArray<CampaignRecord>): MetricTotals {
  return {
    spend: sumKnown(records.map((r) => r.spend)),
    impressions: sumKnown(records.map((r) => r.impressions)),
    clicks: sumKnown(records.map((r) => r.clicks)),
    purchases: sumKnown(records.map((r) => r.purchases)),
    revenue: sumKnown(records.map((r) => r.revenue)),
  }
}

/**
 * Ratio KPIs over a set of records: summed numerator over summed denominator,
 * counting only records where both sides are known.
 */
export function computeKpis(records: ReadonlyArray<CampaignRecord>): KpiValues {
  return mapValues(KPI_DEFINITIONS, (def) => {
    const pairs = records.filter((r) => r[def.numerator] !== null && r[def.denominator] !== null)
    return safeDivide(
      sumKnown(pairs.map((r) => r[def.numerator])),
      sumKnown(pairs.map((r) => r[def.denominator])),
      def.scale,
    )
  })
}

export function filterByDateRange(records: ReadonlyArray<CampaignRecord>, range: DateRange = {}): CampaignRecord[] {
  return records.filter((r) => (!range.from || r.date >= range.from) && (!range.to || r.date <= range.to))
}

export function computeRowKpis(records: ReadonlyArray<CampaignRecord>): KpiRow[] {
  return records.map((r) => ({
    key: `${r.sourceRow}`,
    level: AggregationLevelEnum.ROW,
    dimensions: {
      account_id: r.account_id,
      campaign_id: r.campaign_id,
      campaign_name: r.campaign_name,
      ad_id: r.ad_id,
      ad_name: r.ad_name,
      date: r.date,
    },
    records: 1,
    totals: sumTotals([r]),
    kpis: computeKpis([r]),
  }))
}

function firstKnown<T>(records: ReadonlyArray<CampaignRecord>, pick: (r: CampaignRecord) => T | null): T | null {
  for (const r of records) {
    const value = pick(r)
    if (value !== null) return value
  }
  return null
}

function periodOf(level: AggregationLevelEnum, date: string): { key: string; from: string; to: string } {
  const day = moment.utc(date, DATE_OUTPUT_FORMAT, true)
  const unit = level === AggregationLevelEnum.WEEK ? 'isoWeek' : 'month'
  const key = level === AggregationLevelEnum.WEEK ? day.format('GGGG-[W]WW') : day.format('YYYY-MM')
  return {
    key,
    from: day.clone().startOf(unit).format(DATE_OUTPUT_FORMAT),
    to: day.clone().endOf(unit).format(DATE_OUTPUT_FORMAT),
  }
}

function groupKey(level: AggregationLevelEnum, r: CampaignRecord): string {
  switch (level) {
    case AggregationLevelEnum.ACCOUNT:
      return r.account_id
    case AggregationLevelEnum.CAMPAIGN:
      return `${r.account_id}|${r.campaign_id}`
    case AggregationLevelEnum.AD:
      return `${r.account_id}|${r.campaign_id}|${r.ad_id ?? r.ad_name ?? ''}`
    case AggregationLevelEnum.DATE:
      return r.date
    case AggregationLevelEnum.WEEK:
    case AggregationLevelEnum.MONTH:
      return periodOf(level, r.date).key
    default:
      return 'total'
  }
}

function dimensionsOf(level: AggregationLevelEnum, group: ReadonlyArray<CampaignRecord>): KpiDimensions {
  const [head] = group
  switch (level) {
    case AggregationLevelEnum.ACCOUNT:
      return { account_id: head.account_id }
    case AggregationLevelEnum.CAMPAIGN:
      return {
        account_id: head.account_id,
        campaign_id: head.campaign_id,
        campaign_name: firstKnown(group, (r) => r.campaign_name),
      }
    case AggregationLevelEnum.AD:
      return {
        account_id: head.account_id,
        campaign_id: head.campaign_id,
        campaign_name: firstKnown(group, (r) => r.campaign_name),
        ad_id: head.ad_id,
        ad_name: firstKnown(group, (r) => r.ad_name),
      }
    case AggregationLevelEnum.DATE:
      return { date: head.date }
    case AggregationLevelEnum.WEEK:
    case AggregationLevelEnum.MONTH: {
      const { from, to } = periodOf(level, head.date)
      return { period: { from, to } }
    }
    default: {
      const first = minBy(group, (r) => r.date)
      const last = maxBy(group, (r) => r.date)
      return first && last ? { period: { from: first.date, to: last.date } } : {}
    }
  }
}

/**
 * Groups records at the requested level and derives KPIs from the group sums.
 * Period levels come back in chronological order, the others by spend.
 */
export function aggregateKpis(records: ReadonlyArray<CampaignRecord>, options: AggregateOptions): KpiRow[] {
  const selected = filterByDateRange(records, options.dateRange)
  if (options.groupBy === AggregationLevelEnum.ROW) return computeRowKpis(selected)
  if (selected.length === 0) return []

  const level = options.groupBy
  const rows: KpiRow[] = Object.entries(groupBy(selected, (r) => groupKey(level, r))).map(([key, group]) => ({
    key,
    level,
    dimensions: dimensionsOf(level, group),
    records: group.length,
    totals: sumTotals(group),
    kpis: computeKpis(group),
  }))

  if (PERIOD_LEVELS.includes(level)) return orderBy(rows, [(r) => r.key], ['asc'])
  return orderBy(rows, [(r) => r.totals.spend ?? -1, (r) => r.key], ['desc', 'asc'])
}

export function summarizeDataset(records: ReadonlyArray<CampaignRecord>): DatasetSummary {
  const dates = records.map((r) => r.date).sort()
  return {
    records: records.length,
    accounts: uniq(records.map((r) => r.account_id)).length,
    campaigns: uniq(records.map((r) => `${r.account_id}|${r.campaign_id}`)).length,
    dateRange: dates.length ? { start: dates[0], end: dates[dates.length - 1] } : null,
    totals: sumTotals(records),
    kpis: computeKpis(records),
  }
}
