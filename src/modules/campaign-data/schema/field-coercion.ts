import { FieldTypeEnum } from '@common/enums/field-type.enum'
import { IssueReason } from '@common/types/campaign-record.type'
import { CellValue } from '@common/types/raw-table.type'
import { parseCalendarDate } from '@utils/parse-date'
import { parseLocaleNumber } from '@utils/parse-number'
import moment from 'moment'

export type CoercedValue = string | number | null

export type CoercionResult = { ok: true; value: CoercedValue } | { ok: false; reason: IssueReason }

export type CoercionOptions = {
  dateFormats: ReadonlyArray<string>
}

function coerceText(value: CellValue): string | null {
  if (value === null) return null
  if (typeof value === 'number') return Number.isInteger(value) ? value.toFixed(0) : String(value)
  if (value instanceof Date) return moment(value).format('YYYY-MM-DD')
  const s = String(value).trim()
  return s.length ? s : null
}

/**
 * Converts one raw cell to the canonical type of its field. Blank cells are
 * `null`; whether that is acceptable is decided by the caller (required vs optional).
 */
export function coerceCell(type: FieldTypeEnum, value: CellValue, options: CoercionOptions): CoercionResult {
  switch (type) {
    case FieldTypeEnum.ID:
    case FieldTypeEnum.TEXT:
      return { ok: true, value: coerceText(value) }

    case FieldTypeEnum.DATE: {
      const parsed = parseCalendarDate(value, options.dateFormats)
      if (parsed.kind === 'invalid') return { ok: false, reason: 'invalid_date' }
      return { ok: true, value: parsed.kind === 'date' ? parsed.value : null }
    }

    case FieldTypeEnum.AMOUNT:
    case FieldTypeEnum.COUNT: {
      const parsed = parseLocaleNumber(value)
      if (parsed.kind === 'invalid') return { ok: false, reason: 'not_a_number' }
      if (parsed.kind === 'empty') return { ok: true, value: null }
      if (parsed.value < 0) return { ok: false, reason: 'negative' }
      if (type === FieldTypeEnum.COUNT && !Number.isInteger(parsed.value)) return { ok: false, reason: 'not_an_integer' }
      return { ok: true, value: parsed.value }
    }
  }
}

export function isBlankCell(value: CellValue) {
  return value === null || (typeof value === 'string' && value.trim() === '')
}
