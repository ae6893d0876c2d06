import { AggregationLevelEnum } from '@common/enums/aggregation-level.enum'
import { campaignRecord } from '../../test/fixtures'
import { aggregateKpis, computeKpis, computeRowKpis, summarizeDataset } from './kpi-calculator'

describe('kpi-calculator', () => {
  it('computes every KPI for a single record', () => {
    const kpis = computeKpis([
      campaignRecord({ spend: 100, impressions: 10000, clicks: 50, purchases: 5, revenue: 400 }),
    ])

    expect(kpis).toEqual({
      cpc: 2,
      cpm: 10,
      ctr: 0.005,
      cpa: 20,
      roas: 4,
      cvr: 0.1,
      aov: 80,
      revenue_per_click: 8,
      revenue_per_impression: 0.04,
      cost_per_impression: 0.01,
      purchase_rate: 0.0005,
    })
  })

  it('returns null for zero or unknown denominators', () => {
    const kpis = computeKpis([campaignRecord({ spend: 25, impressions: 0, clicks: 0, purchases: null, revenue: null })])

    expect(kpis).toEqual({
      cpc: null,
      cpm: null,
      ctr: null,
      cpa: null,
      roas: null,
      cvr: null,
      aov: null,
      revenue_per_click: null,
      revenue_per_impression: null,
      cost_per_impression: null,
      purchase_rate: null,
    })
  })

  it('divides sums instead of averaging ratios', () => {
    const records = [
      campaignRecord({ date: '2024-03-01', spend: 10, impressions: 100, clicks: 1 }),
      campaignRecord({ date: '2024-03-02', spend: 10, impressions: 100, clicks: 9 }),
    ]

    const [row] = aggregateKpis(records, { groupBy: AggregationLevelEnum.CAMPAIGN })

    expect(row.kpis.cpc).toBe(2)
    expect(row.totals).toEqual({ spend: 20, impressions: 200, clicks: 10, purchases: null, revenue: null })
    expect(computeRowKpis(records).map((r) => r.kpis.cpc)).toEqual([10, 10 / 9])
  })

  it('only pairs records where both sides of a ratio are known', () => {
    const records = [
      campaignRecord({ spend: 10, clicks: 5, purchases: 1 }),
      campaignRecord({ date: '2024-03-02', spend: 30, clicks: 10, purchases: null }),
      campaignRecord({ date: '2024-03-03', spend: null, clicks: 4, purchases: 2 }),
    ]

    const kpis = computeKpis(records)

    expect(kpis.cpa).toBe(10)
    expect(kpis.cpc).toBeCloseTo(40 / 15)
    expect(kpis.cvr).toBeCloseTo(3 / 9)
  })

  it('groups ads without ids by name', () => {
    const records = [
      campaignRecord({ ad_name: 'Video A', spend: 10, clicks: 5 }),
      campaignRecord({ ad_name: 'Carousel B', spend: 30, clicks: 10, sourceRow: 3 }),
    ]

    const rows = aggregateKpis(records, { groupBy: AggregationLevelEnum.AD })

    expect(rows.map((r) => [r.key, r.dimensions.ad_name, r.totals.spend, r.kpis.cpc])).toEqual([
      ['act_1|c1|Carousel B', 'Carousel B', 30, 3],
      ['act_1|c1|Video A', 'Video A', 10, 2],
    ])
  })

  it('groups by ISO week in chronological order', () => {
    const records = [
      campaignRecord({ date: '2024-03-10', spend: 3 }),
      campaignRecord({ date: '2024-03-03', spend: 1 }),
      campaignRecord({ date: '2024-03-04', spend: 2 }),
    ]

    const rows = aggregateKpis(records, { groupBy: AggregationLevelEnum.WEEK })

    expect(rows.map((r) => [r.key, r.dimensions.period, r.totals.spend, r.records])).toEqual([
      ['2024-W09', { from: '2024-02-26', to: '2024-03-03' }, 1, 1],
      ['2024-W10', { from: '2024-03-04', to: '2024-03-10' }, 5, 2],
    ])
  })

  it('groups by month', () => {
    const rows = aggregateKpis([campaignRecord({ date: '2024-02-29' }), campaignRecord({ date: '2024-03-15' })], {
      groupBy: AggregationLevelEnum.MONTH,
    })

    expect(rows.map((r) => [r.key, r.dimensions.period])).toEqual([
      ['2024-02', { from: '2024-02-01', to: '2024-02-29' }],
      ['2024-03', { from: '2024-03-01', to: '2024-03-31' }],
    ])
  })

  it('orders campaigns by spend and applies the date range first', () => {
    const records = [
      campaignRecord({ campaign_id: 'small', date: '2024-03-01', spend: 5 }),
      campaignRecord({ campaign_id: 'big', date: '2024-03-01', spend: 50, campaign_name: 'Big one' }),
      campaignRecord({ campaign_id: 'small', date: '2024-03-05', spend: 500 }),
    ]

    const rows = aggregateKpis(records, {
      groupBy: AggregationLevelEnum.CAMPAIGN,
      dateRange: { from: '2024-03-01', to: '2024-03-02' },
    })

    expect(rows.map((r) => [r.key, r.totals.spend, r.dimensions.campaign_name])).toEqual([
      ['act_1|big', 50, 'Big one'],
      ['act_1|small', 5, null],
    ])
  })

  it('summarizes a dataset', () => {
    const summary = summarizeDataset([
      campaignRecord({ date: '2024-03-05', spend: 10, impressions: 1000, clicks: 10 }),
      campaignRecord({ campaign_id: 'c2', date: '2024-03-01', spend: 30, impressions: 1000, clicks: 30 }),
      campaignRecord({ account_id: 'act_2', campaign_id: 'c2', date: '2024-03-03', spend: 0, impressions: 0, clicks: 0 }),
    ])

    expect(summary).toMatchObject({
      records: 3,
      accounts: 2,
      campaigns: 3,
      dateRange: { start: '2024-03-01', end: '2024-03-05' },
      totals: { spend: 40, impressions: 2000, clicks: 40, purchases: null, revenue: null },
    })
    expect(summary.kpis.cpc).toBe(1)
    expect(summary.kpis.ctr).toBe(0.02)
  })

  it('returns no rows for an empty selection', () => {
    expect(aggregateKpis([], { groupBy: AggregationLevelEnum.TOTAL })).toEqual([])
  })
})
