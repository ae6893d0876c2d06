import { KpiValue } from '@common/types/kpi.type'
import { safeDivide } from './safe-divide'

export function calculatePercentage(part: number | null, total: number | null): KpiValue {
  return safeDivide(part, total, 100)
}

/** Relative change from `previous` to `current`, in percent. */
export function percentChange(current: number | null, previous: number | null): KpiValue {
  if (current == null || previous == null) return null
  return calculatePercentage(current - previous, previous)
}
