import { orderBy, sumBy } from 'lodash'
import moment from 'moment'
import { AggregationLevelEnum } from '@common/enums/aggregation-level.enum'
import { CampaignRecord } from '@common/types/campaign-record.type'
import { InsightPayload, WeekOverWeek } from '@common/types/insight.type'
import { KpiRow, KpiValue } from '@common/types/kpi.type'
import { aggregateKpis, summarizeDataset } from '@modules/kpi/kpi-calculator'
import { safeDivide } from '@utils/safe-divide'
import { percentChange } from '@utils/calculate-percentage'
import { DATE_OUTPUT_FORMAT } from '@utils/parse-date'

const MAX_CAMPAIGNS = 50
const TOP_N = 5
const CTR_N = 3
const WEEK_DAYS = 7

/**
 * Compares the seven calendar days ending on the last date with the seven
 * before them. Days without data count as zero; `null` when the data covers
 * fewer than fourteen days.
 */
function weekOverWeek(daily: ReadonlyArray<KpiRow>): WeekOverWeek | null {
  if (daily.length === 0) return null
  const last = moment.utc(daily[daily.length - 1].key, DATE_OUTPUT_FORMAT, true)
  const currentFrom = last.clone().subtract(WEEK_DAYS - 1, 'days').format(DATE_OUTPUT_FORMAT)
  const previousFrom = last.clone().subtract(2 * WEEK_DAYS - 1, 'days').format(DATE_OUTPUT_FORMAT)
  if (daily[0].key > previousFrom) return null

  const current = daily.filter((r) => r.key >= currentFrom)
  const previous = daily.filter((r) => r.key >= previousFrom && r.key < currentFrom)
  const spend = (rows: ReadonlyArray<KpiRow>) => sumBy(rows, (r) => r.totals.spend ?? 0)
  const ctr = (rows: ReadonlyArray<KpiRow>) =>
    safeDivide(
      sumBy(rows, (r) => r.totals.clicks ?? 0),
      sumBy(rows, (r) => r.totals.impressions ?? 0),
    )
  return {
    spendChangePct: percentChange(spend(current), spend(previous)),
    ctrChangePct: percentChange(ctr(current), ctr(previous)),
  }
}

/** Condenses a normalized dataset into what the model (and the fallback report) needs. */
export function buildInsightPayload(records: ReadonlyArray<CampaignRecord>, currency: string): InsightPayload {
  const overview = summarizeDataset(records)
  const campaigns = aggregateKpis(records, { groupBy: AggregationLevelEnum.CAMPAIGN })
  const withCtr = campaigns.filter((c) => c.kpis.ctr !== null)
  const daily = aggregateKpis(records, { groupBy: AggregationLevelEnum.DATE })

  return {
    currency,
    overview,
    overallKpis: overview.kpis,
    campaigns: campaigns.slice(0, MAX_CAMPAIGNS),
    topSpending: campaigns.slice(0, TOP_N),
    bestCtr: orderBy(withCtr, [(c) => c.kpis.ctr], ['desc']).slice(0, CTR_N),
    worstCtr: orderBy(withCtr, [(c) => c.kpis.ctr], ['asc']).slice(0, CTR_N),
    trend: { daily, weekOverWeek: weekOverWeek(daily) },
  }
}

function amount(value: number | null, currency: string) {
  if (value === null) return 'n/a'
  return `${currency} ${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`
}

function count(value: number | null) {
  return value === null ? 'n/a' : value.toLocaleString('en-US')
}

function pct(value: KpiValue) {
  return value === null ? 'n/a' : `${(value * 100).toFixed(2)}%`
}

function campaignLabel(row: KpiRow) {
  return row.dimensions.campaign_name ?? row.dimensions.campaign_id ?? row.key
}

/** Rule-based markdown report used whenever the model cannot be reached. */
export function buildFallbackInsights(payload: InsightPayload): string {
  const { overview, overallKpis: kpis, currency } = payload
  const lines: string[] = ['# Campaign Performance Analysis (Basic Insights)', '', '## Campaign Overview']

  lines.push(`- **Total Campaigns:** ${overview.campaigns}`)
  lines.push(`- **Total Records:** ${overview.records}`)
  if (overview.dateRange) lines.push(`- **Date Range:** ${overview.dateRange.start} to ${overview.dateRange.end}`)
  lines.push(`- **Total Spend:** ${amount(overview.totals.spend, currency)}`)
  lines.push(`- **Total Impressions:** ${count(overview.totals.impressions)}`)
  lines.push(`- **Total Clicks:** ${count(overview.totals.clicks)}`)
  if (overview.totals.purchases !== null) lines.push(`- **Total Conversions:** ${count(overview.totals.purchases)}`)

  lines.push('', '## Key Performance Metrics')
  lines.push(`- **CTR (Click-Through Rate):** ${pct(kpis.ctr)}`)
  lines.push(`- **CPC (Cost Per Click):** ${amount(kpis.cpc, currency)}`)
  lines.push(`- **CPM (Cost Per 1000 Impressions):** ${amount(kpis.cpm, currency)}`)
  if (overview.totals.purchases !== null) {
    lines.push(`- **CVR (Conversion Rate):** ${pct(kpis.cvr)}`)
    lines.push(`- **CPA (Cost Per Acquisition):** ${amount(kpis.cpa, currency)}`)
  }
  if (overview.totals.revenue !== null) lines.push(`- **ROAS (Return On Ad Spend):** ${kpis.roas?.toFixed(2) ?? 'n/a'}`)
  if (overview.totals.revenue !== null && overview.totals.purchases !== null) {
    lines.push(`- **AOV (Average Order Value):** ${amount(kpis.aov, currency)}`)
    lines.push(`- **Revenue Per Click:** ${amount(kpis.revenue_per_click, currency)}`)
  }

  if (payload.topSpending.length) {
    lines.push('', '## Top Campaigns by Spend')
    payload.topSpending.forEach((row, i) => {
      lines.push(`${i + 1}. **${campaignLabel(row)}**: ${amount(row.totals.spend, currency)}`)
    })
  }

  lines.push('', '## Basic Recommendations')
  if (kpis.ctr !== null && kpis.ctr < 0.01) {
    lines.push('- **Improve Ad Creative**: CTR is below 1%, test new visuals and copy')
  }
  if (kpis.cpc !== null && kpis.cpc > 50) {
    lines.push('- **Optimize Targeting**: a high CPC points to audiences that need refining')
  }
  if (overview.totals.purchases === 0) {
    lines.push('- **Conversion Tracking**: no conversions were recorded, verify the tracking setup')
  } else if (kpis.cvr !== null && kpis.cvr < 0.01) {
    lines.push('- **Landing Page Optimization**: conversion rate is below 1%, review the landing experience')
  }
  lines.push('- **Budget Optimization**: shift budget towards the best performing campaigns')
  lines.push('- **A/B Testing**: test ad variations systematically')
  lines.push('- **Performance Monitoring**: review performance on a regular schedule')

  return lines.join('\n')
}
