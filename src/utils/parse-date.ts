import moment from 'moment'

export type DateParseResult = { kind: 'empty' } | { kind: 'date'; value: string } | { kind: 'invalid' }

export const DATE_OUTPUT_FORMAT = 'YYYY-MM-DD'

export const DEFAULT_DATE_FORMATS: ReadonlyArray<string> = [
  'YYYY-MM-DD',
  'DD/MM/YYYY',
  'DD-MM-YYYY',
  'DD.MM.YYYY',
  'MM/DD/YYYY',
  'DD MMM YYYY',
  'MMM DD, YYYY',
  'YYYY/MM/DD',
]

// a full calendar date, extended (2024-03-05) or basic (20240305)
const ISO_FULL_DATE = /^\d{4}-?\d{2}-?\d{2}(?!\d)/

// Excel serial day 1 is 1900-01-01; the epoch below absorbs the 1900 leap-year bug
const EXCEL_EPOCH = '1899-12-30'
const MAX_EXCEL_SERIAL = 2958465

const setDay = (format: string, token: 'D' | 'DD') => format.replace(/(?<!D)D{1,2}(?![Do])/g, token)
const setMonth = (format: string, token: 'M' | 'MM') => format.replace(/(?<!M)M{1,2}(?!M)/g, token)

/**
 * Strict parsing reads `D` and `M` without a leading zero and `DD` and `MM`
 * with exactly two digits, so each format is tried in every padding.
 */
export function paddingVariants(format: string): string[] {
  const variants: string[] = []
  for (const day of ['DD', 'D'] as const) {
    for (const month of ['MM', 'M'] as const) {
      const variant = setMonth(setDay(format, day), month)
      if (!variants.includes(variant)) variants.push(variant)
    }
  }
  return variants
}

/**
 * Parses a spreadsheet/API date cell into a calendar date (`YYYY-MM-DD`).
 * Strings are matched strictly against ISO 8601 first and then `formats` in
 * order, so the earlier format wins when a date fits several (05/01/2024).
 * ISO input must carry a day; `2024` or `2024-03` is invalid.
 */
export function parseCalendarDate(input: unknown, formats: ReadonlyArray<string> = DEFAULT_DATE_FORMATS): DateParseResult {
  if (input === null || input === undefined) return { kind: 'empty' }

  if (input instanceof Date) {
    return Number.isNaN(input.getTime())
      ? { kind: 'invalid' }
      : { kind: 'date', value: moment(input).format(DATE_OUTPUT_FORMAT) }
  }

  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 1 || input > MAX_EXCEL_SERIAL) return { kind: 'invalid' }
    return { kind: 'date', value: moment.utc(EXCEL_EPOCH).add(Math.floor(input), 'days').format(DATE_OUTPUT_FORMAT) }
  }

  if (typeof input !== 'string') return { kind: 'invalid' }
  const s = input.trim()
  if (!s) return { kind: 'empty' }

  if (ISO_FULL_DATE.test(s)) {
    const iso = moment.parseZone(s, moment.ISO_8601, true)
    if (iso.isValid()) return { kind: 'date', value: iso.format(DATE_OUTPUT_FORMAT) }
  }

  for (const format of formats.flatMap(paddingVariants)) {
    const parsed = moment.utc(s, format, true)
    if (parsed.isValid()) return { kind: 'date', value: parsed.format(DATE_OUTPUT_FORMAT) }
  }
  return { kind: 'invalid' }
}
