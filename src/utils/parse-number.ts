export type NumberParseResult = { kind: 'empty' } | { kind: 'number'; value: number } | { kind: 'invalid' }

const CURRENCY_SYMBOLS = /[₹$€£¥₩₫₱฿]/g
const CURRENCY_CODES = /\b(?:INR|USD|EUR|GBP|JPY|VND|AUD|CAD|SGD|IDR|THB|PHP|Rs\.?)(?=\s|\d|$|[-(])/gi
// whitespace (NBSP included) and apostrophes are only ever used as thousands separators
const GROUPING_CHARS = /[\s'’]/g

const THOUSANDS_COMMA = /^\d{1,3}(,\d{3})+$/
const THOUSANDS_DOT = /^\d{1,3}(\.\d{3})+$/
const PLAIN_DECIMAL = /^\d+(\.\d+)?$/

function count(s: string, ch: string) {
  return s.split(ch).length - 1
}

/**
 * Locale tolerant number parsing for spreadsheet cells.
 *
 * Accepts `1,234.50`, `1.234,50`, `1 234,5`, `₹2,500`, `INR 2500`, `(12.5)`.
 * A single separator followed by exactly three digits groups thousands when it
 * is a comma (`1,234` → 1234) and is a decimal point when it is a dot
 * (`1.234` → 1.234). Percent signs and any other text make the value invalid.
 */
export function parseLocaleNumber(input: unknown): NumberParseResult {
  if (input === null || input === undefined) return { kind: 'empty' }
  if (typeof input === 'number') return Number.isFinite(input) ? { kind: 'number', value: input } : { kind: 'invalid' }
  if (typeof input !== 'string') return { kind: 'invalid' }

  const trimmed = input.trim()
  if (!trimmed) return { kind: 'empty' }

  let s = trimmed.replace(CURRENCY_CODES, '').replace(CURRENCY_SYMBOLS, '').replace(GROUPING_CHARS, '')
  let sign = 1
  if (s.startsWith('(') && s.endsWith(')')) {
    sign = -1
    s = s.slice(1, -1)
  }
  if (s.startsWith('-')) {
    sign = -sign
    s = s.slice(1)
  } else if (s.startsWith('+')) {
    s = s.slice(1)
  }
  if (!/^[\d.,]+$/.test(s)) return { kind: 'invalid' }

  const lastDot = s.lastIndexOf('.')
  const lastComma = s.lastIndexOf(',')
  let normalized: string
  if (lastDot >= 0 && lastComma >= 0) {
    const [decimal, grouping] = lastDot > lastComma ? ['.', ','] : [',', '.']
    if (count(s, decimal) !== 1) return { kind: 'invalid' }
    normalized = s.split(grouping).join('').replace(decimal, '.')
  } else if (lastComma >= 0) {
    if (THOUSANDS_COMMA.test(s)) normalized = s.split(',').join('')
    else if (count(s, ',') === 1) normalized = s.replace(',', '.')
    else return { kind: 'invalid' }
  } else if (lastDot >= 0 && count(s, '.') > 1) {
    if (!THOUSANDS_DOT.test(s)) return { kind: 'invalid' }
    normalized = s.split('.').join('')
  } else {
    normalized = s
  }

  if (!PLAIN_DECIMAL.test(normalized)) return { kind: 'invalid' }
  const value = Number(normalized) * sign
  return Number.isFinite(value) ? { kind: 'number', value: value === 0 ? 0 : value } : { kind: 'invalid' }
}
