import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { groupBy, sortBy } from 'lodash'
import { AppConfig } from '@config/app.config'
import { InvalidRowPolicyEnum } from '@common/enums/invalid-row-policy.enum'
import { TypeCoercionError } from '@common/exceptions/pipeline.exceptions'
import {
  CampaignRecord,
  CanonicalField,
  NormalizedDataset,
  RejectedRow,
  RowIssue,
} from '@common/types/campaign-record.type'
import { RawTable } from '@common/types/raw-table.type'
import { CANONICAL_SCHEMA } from './schema/canonical-schema'
import { CoercedValue, coerceCell } from './schema/field-coercion'
import { SchemaValidatorService, ValidationOptions, ValidationReport, dataRows } from './schema-validator.service'

export type NormalizeOptions = ValidationOptions & {
  invalidRowPolicy?: InvalidRowPolicyEnum
}

const LISTED_ROWS = 10

/** Ads without an id are told apart by name. */
export function recordKey(r: Pick<CampaignRecord, 'account_id' | 'campaign_id' | 'ad_id' | 'ad_name' | 'date'>) {
  return [r.account_id, r.campaign_id, r.ad_id ?? r.ad_name ?? '', r.date].join('|')
}

function listRows(rows: ReadonlyArray<number>) {
  return `${rows.slice(0, LISTED_ROWS).join(', ')}${rows.length > LISTED_ROWS ? ', …' : ''}`
}

@Injectable()
export class ColumnNormalizerService {
  private readonly logger = new Logger(ColumnNormalizerService.name)

  constructor(
    private readonly configService: ConfigService,
    private readonly validator: SchemaValidatorService,
  ) {}

  /**
   * Maps headers onto the canonical schema and coerces every row. Rows with
   * unusable values are dropped, flagged or abort the import depending on the
   * invalid-row policy. The input table is left untouched.
   */
  normalize(table: RawTable, options: NormalizeOptions = {}, report?: ValidationReport): NormalizedDataset {
    const { pipeline } = this.configService.getOrThrow<AppConfig>('app')
    const validation = report ?? this.validator.validate(table, options)
    this.validator.assertValid(validation)

    const policy = options.invalidRowPolicy ?? pipeline.invalidRowPolicy
    if (policy === InvalidRowPolicyEnum.ABORT && validation.rowIssues.length > 0) {
      throw new TypeCoercionError(validation.rowIssues)
    }

    const issuesByRow = groupBy(validation.rowIssues, (i) => i.row)
    const records: CampaignRecord[] = []
    const rejected: RejectedRow[] = []
    const seen = new Set<string>()
    const duplicateRows: number[] = []
    let flagged = 0

    for (const { rowNumber, cells } of dataRows(table)) {
      const issues: RowIssue[] = issuesByRow[rowNumber] ?? []
      if (issues.length > 0 && policy === InvalidRowPolicyEnum.DROP) {
        rejected.push({ row: rowNumber, issues })
        continue
      }

      const values = new Map<CanonicalField, CoercedValue>()
      for (const def of CANONICAL_SCHEMA) {
        const index = validation.columns.get(def.name)
        if (index === undefined) continue
        const result = coerceCell(def.type, cells[index] ?? null, { dateFormats: pipeline.dateFormats })
        values.set(def.name, result.ok ? result.value : null)
      }
      const text = (field: CanonicalField) => {
        const v = values.get(field)
        return typeof v === 'string' ? v : null
      }
      const num = (field: CanonicalField) => {
        const v = values.get(field)
        return typeof v === 'number' ? v : null
      }

      const accountId = text('account_id')
      const campaignId = text('campaign_id')
      const date = text('date')
      // a record without its keys cannot be grouped, so even the flag policy rejects it
      if (accountId === null || campaignId === null || date === null) {
        rejected.push({ row: rowNumber, issues })
        continue
      }

      const record: CampaignRecord = {
        account_id: accountId,
        campaign_id: campaignId,
        date,
        spend: num('spend'),
        impressions: num('impressions'),
        clicks: num('clicks'),
        purchases: num('purchases'),
        revenue: num('revenue'),
        ad_id: text('ad_id'),
        ad_name: text('ad_name'),
        campaign_name: text('campaign_name'),
        objective: text('objective'),
        creative_id: text('creative_id'),
        sourceRow: rowNumber,
        issues,
      }

      const key = recordKey(record)
      if (seen.has(key)) {
        duplicateRows.push(rowNumber)
        continue
      }
      seen.add(key)
      if (issues.length > 0) flagged++
      records.push(record)
    }

    const warnings = [...validation.warnings]
    if (rejected.length > 0) {
      warnings.push(`${rejected.length} row(s) rejected: ${listRows(rejected.map((r) => r.row))}`)
      this.logger.warn(`Rejected ${rejected.length} row(s) under policy=${policy}`)
    }
    if (flagged > 0) {
      warnings.push(`${flagged} row(s) kept with unusable values set to null`)
      this.logger.warn(`Flagged ${flagged} row(s)`)
    }
    if (duplicateRows.length > 0) {
      warnings.push(`${duplicateRows.length} duplicate record(s) removed: ${listRows(duplicateRows)}`)
    }

    this.logger.log(
      `STEP normalize: records=${records.length} rejected=${rejected.length} flagged=${flagged} duplicates=${duplicateRows.length}`,
    )
    return {
      records: sortBy(records, [(r) => r.date, (r) => r.campaign_name ?? r.campaign_id]),
      rejected,
      flagged,
      duplicatesRemoved: duplicateRows.length,
      duplicateRows,
      columnMapping: validation.columnMapping,
      warnings,
    }
  }
}
