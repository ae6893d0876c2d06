import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { AppConfig } from '@config/app.config'
import { SchemaViolation, SchemaViolationError } from '@common/exceptions/pipeline.exceptions'
import { CanonicalField, RowIssue } from '@common/types/campaign-record.type'
import { RawRow, RawTable } from '@common/types/raw-table.type'
import { safeDivide } from '@utils/safe-divide'
import { CANONICAL_SCHEMA, REQUIRED_FIELDS } from './schema/canonical-schema'
import { aliasesFor, buildAliasTable, resolveColumns } from './schema/column-aliases'
import { CoercedValue, coerceCell, isBlankCell } from './schema/field-coercion'

export type ValidationOptions = {
  /** extra header aliases for this run, alias → canonical field */
  aliases?: Record<string, string>
}

export type ValidationReport = {
  valid: boolean
  violations: SchemaViolation[]
  rowIssues: RowIssue[]
  warnings: string[]
  /** source header → canonical field */
  columnMapping: Record<string, CanonicalField>
  /** canonical field → header index */
  columns: ReadonlyMap<CanonicalField, number>
}

export type DataRow = { rowNumber: number; cells: RawRow }

const EMPTY_COLUMN_WARN_RATIO = 0.1

export function isBlankRow(row: RawRow) {
  return row.every(isBlankCell)
}

/** Non-blank rows paired with their sheet row number. */
export function dataRows(table: RawTable): DataRow[] {
  return table.rows
    .map((cells, i) => ({ rowNumber: table.firstRowNumber + i, cells }))
    .filter((row) => !isBlankRow(row.cells))
}

function rowFingerprint(row: RawRow) {
  return JSON.stringify(row.map((cell) => (cell instanceof Date ? cell.toISOString() : cell)))
}

function numeric(value: CoercedValue | undefined) {
  return typeof value === 'number' ? value : null
}

@Injectable()
export class SchemaValidatorService {
  private readonly logger = new Logger(SchemaValidatorService.name)

  constructor(private readonly configService: ConfigService) {}

  validate(table: RawTable, options: ValidationOptions = {}): ValidationReport {
    const { pipeline } = this.configService.getOrThrow<AppConfig>('app')
    const aliases = buildAliasTable(options.aliases)
    const { columns, columnMapping, shadowed } = resolveColumns(table.headers, aliases)
    const rows = dataRows(table)

    const violations: SchemaViolation[] = []
    const warnings: string[] = shadowed.map(
      (s) => `Column "${s.header}" also maps to ${s.field}; using "${s.kept}"`,
    )

    if (rows.length === 0) {
      violations.push({ kind: 'empty_table', message: 'The table has no data rows' })
    }

    for (const field of REQUIRED_FIELDS) {
      if (columns.has(field)) continue
      violations.push({
        kind: 'missing_column',
        field,
        message: `Missing required column "${field}" (accepted headers: ${aliasesFor(aliases, field).join(', ')})`,
      })
    }

    const emptyColumns = new Set<CanonicalField>()
    if (rows.length > 0) {
      for (const field of REQUIRED_FIELDS) {
        const index = columns.get(field)
        if (index === undefined) continue
        if (rows.every((r) => isBlankCell(r.cells[index] ?? null))) {
          emptyColumns.add(field)
          violations.push({
            kind: 'empty_column',
            field,
            column: table.headers[index],
            message: `Required column "${table.headers[index]}" (${field}) has no values`,
          })
        }
      }
    }

    const rowIssues: RowIssue[] = []
    const seen = new Set<string>()
    let duplicates = 0
    let clicksOverImpressions = 0
    let highCpc = 0

    for (const { rowNumber, cells } of rows) {
      const values = new Map<CanonicalField, CoercedValue>()
      for (const def of CANONICAL_SCHEMA) {
        const index = columns.get(def.name)
        if (index === undefined || emptyColumns.has(def.name)) continue
        const raw = cells[index] ?? null
        const column = table.headers[index]
        if (isBlankCell(raw)) {
          if (def.required) rowIssues.push({ row: rowNumber, field: def.name, column, value: raw, reason: 'missing' })
          continue
        }
        const result = coerceCell(def.type, raw, { dateFormats: pipeline.dateFormats })
        if (result.ok) values.set(def.name, result.value)
        else rowIssues.push({ row: rowNumber, field: def.name, column, value: raw, reason: result.reason })
      }

      const fingerprint = rowFingerprint(cells)
      if (seen.has(fingerprint)) duplicates++
      else seen.add(fingerprint)

      const clicks = numeric(values.get('clicks'))
      const impressions = numeric(values.get('impressions'))
      if (clicks !== null && impressions !== null && clicks > impressions) clicksOverImpressions++

      const cpc = safeDivide(numeric(values.get('spend')), clicks)
      if (cpc !== null && cpc > pipeline.highCpcThreshold) highCpc++
    }

    const blankRows = table.rows.length - rows.length
    if (blankRows > 0) warnings.push(`${blankRows} empty row(s) skipped`)

    if (rows.length > 0) {
      table.headers.forEach((header, index) => {
        const blanks = rows.filter((r) => isBlankCell(r.cells[index] ?? null)).length
        const ratio = blanks / rows.length
        if (ratio > EMPTY_COLUMN_WARN_RATIO && ratio < 1) {
          warnings.push(`Column "${header}" is ${(ratio * 100).toFixed(1)}% empty`)
        }
      })
    }
    if (duplicates > 0) warnings.push(`${duplicates} exact duplicate row(s)`)
    if (clicksOverImpressions > 0) warnings.push(`${clicksOverImpressions} row(s) report more clicks than impressions`)
    if (highCpc > 0) warnings.push(`${highCpc} row(s) have a CPC above ${pipeline.highCpcThreshold}`)

    const report: ValidationReport = {
      valid: violations.length === 0,
      violations,
      rowIssues,
      warnings,
      columnMapping,
      columns,
    }
    this.logger.log(
      `STEP validate: rows=${rows.length} mapped=${columns.size} violations=${violations.length} issues=${rowIssues.length}`,
    )
    return report
  }

  assertValid(report: ValidationReport) {
    if (!report.valid) throw new SchemaViolationError(report.violations)
  }
}
