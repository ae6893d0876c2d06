import { KpiValue } from '@common/types/kpi.type'

/**
 * Ratio of two sums. Zero, missing or non-finite denominators give `null`
 * instead of Infinity/NaN so callers can tell "no denominator" from zero.
 */
export function safeDivide(part: number | null, total: number | null, scale = 1): KpiValue {
  if (part == null || total == null) return null
  if (!Number.isFinite(part) || !Number.isFinite(total) || total === 0) return null
  return (part / total) * scale
}
