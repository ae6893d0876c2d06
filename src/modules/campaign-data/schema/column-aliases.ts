import { BadRequestException } from '@nestjs/common'
import { CANONICAL_FIELD_NAMES, CanonicalField, isCanonicalField } from '@common/types/campaign-record.type'
import { normalizeHeader } from '@utils/normalize-header'
import DEFAULT_ALIASES from './column-aliases.json'

/** normalized header → canonical field */
export type AliasTable = ReadonlyMap<string, CanonicalField>

export type ColumnResolution = {
  /** canonical field → index into the table's headers */
  columns: Map<CanonicalField, number>
  /** original header → canonical field, for every header that was mapped */
  columnMapping: Record<string, CanonicalField>
  /** headers ignored because an earlier header already supplied the field */
  shadowed: Array<{ header: string; field: CanonicalField; kept: string }>
}

function defaultEntries(): Array<[string, CanonicalField]> {
  return Object.entries(DEFAULT_ALIASES).map(([alias, target]) => {
    if (!isCanonicalField(target)) throw new Error(`column-aliases.json: "${alias}" maps to unknown field "${target}"`)
    return [normalizeHeader(alias), target]
  })
}

/**
 * Builds the alias lookup: shipped defaults, then caller supplied aliases
 * (which win over defaults). Canonical names always map to themselves.
 */
export function buildAliasTable(extra: Record<string, string> = {}): AliasTable {
  const table = new Map<string, CanonicalField>(defaultEntries())
  for (const [alias, target] of Object.entries(extra)) {
    if (!isCanonicalField(target)) {
      throw new BadRequestException(
        `Alias "${alias}" targets unknown field "${target}"; expected one of ${CANONICAL_FIELD_NAMES.join(', ')}`,
      )
    }
    table.set(normalizeHeader(alias), target)
  }
  for (const name of CANONICAL_FIELD_NAMES) table.set(normalizeHeader(name), name)
  return table
}

export function aliasesFor(table: AliasTable, field: CanonicalField): string[] {
  return [...table.entries()].filter(([, target]) => target === field).map(([alias]) => alias)
}

export function resolveColumns(headers: ReadonlyArray<string>, aliases: AliasTable): ColumnResolution {
  const columns = new Map<CanonicalField, number>()
  const columnMapping: Record<string, CanonicalField> = {}
  const shadowed: ColumnResolution['shadowed'] = []

  headers.forEach((header, index) => {
    const field = aliases.get(normalizeHeader(header))
    if (!field) return
    const existing = columns.get(field)
    if (existing !== undefined) {
      shadowed.push({ header, field, kept: headers[existing] })
      return
    }
    columns.set(field, index)
    columnMapping[header] = field
  })

  return { columns, columnMapping, shadowed }
}
