import { GraphAction, GraphInsightRow } from './types/ads.type'

export const REQUIRED_PERMISSIONS = ['ads_read', 'read_insights']

export const INSIGHT_FIELDS = [
  'account_id',
  'campaign_id',
  'campaign_name',
  'ad_id',
  'ad_name',
  'objective',
  'date_start',
  'date_stop',
  'spend',
  'impressions',
  'clicks',
  'actions',
  'action_values',
]

/** Canonical headers of the raw table built from insights, so both sources share one validator. */
export const INSIGHT_HEADERS = [
  'account_id',
  'campaign_id',
  'campaign_name',
  'ad_id',
  'ad_name',
  'date',
  'spend',
  'impressions',
  'clicks',
  'purchases',
  'revenue',
  'objective',
]

/** `123` / `act_123` → `act_123` */
export function normalizeAccountId(id: string) {
  const trimmed = id.trim()
  return trimmed.startsWith('act_') ? trimmed : `act_${trimmed}`
}

/** Sum of the values reported for one action type; 0 when the type is absent. */
export function extractActionValue(actions: GraphAction[] | undefined, actionType: string): number {
  if (!Array.isArray(actions)) return 0
  return actions
    .filter((a) => a.action_type === actionType)
    .reduce((sum, a) => {
      const n = Number(a.value)
      return Number.isFinite(n) ? sum + n : sum
    }, 0)
}

export function insightToRow(row: GraphInsightRow, accountId: string, purchaseActionType: string) {
  return [
    row.account_id ?? accountId.replace(/^act_/, ''),
    row.campaign_id ?? null,
    row.campaign_name ?? null,
    row.ad_id ?? null,
    row.ad_name ?? null,
    row.date_start ?? null,
    row.spend ?? null,
    row.impressions ?? null,
    row.clicks ?? null,
    extractActionValue(row.actions, purchaseActionType),
    extractActionValue(row.action_values, purchaseActionType),
    row.objective ?? null,
  ]
}
