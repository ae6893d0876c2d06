import { InvalidRowPolicyEnum } from '@common/enums/invalid-row-policy.enum'
import { SchemaViolationError, TypeCoercionError } from '@common/exceptions/pipeline.exceptions'
import { CellValue } from '@common/types/raw-table.type'
import { rawTable, testConfigService } from '../../test/fixtures'
import { ColumnNormalizerService } from './column-normalizer.service'
import { SchemaValidatorService } from './schema-validator.service'

const HEADERS = ['Account ID', 'Campaign ID', 'Campaign Name', 'Date', 'Amount Spent', 'Impressions', 'Link Clicks', 'Purchases']

function sampleRows(): CellValue[][] {
  return [
    ['act_1', 'c2', 'Beta', '2024-03-02', '1,000', 5000, 50, 2],
    ['act_1', 'c1', 'Alpha', '2024-03-02', 'abc', 1000, 10, 1],
    ['act_1', 'c1', 'Alpha', '01/03/2024', 200, 4000, 40, null],
    [null, null, null, null, null, null, null, null],
  ]
}

describe('ColumnNormalizerService', () => {
  function createService(env: NodeJS.ProcessEnv = {}) {
    const config = testConfigService(env)
    return new ColumnNormalizerService(config, new SchemaValidatorService(config))
  }

  it('drops only the row with a non-numeric spend', () => {
    const table = rawTable(HEADERS, sampleRows())

    const dataset = createService().normalize(table)

    expect(dataset.records.map((r) => [r.sourceRow, r.date, r.campaign_id, r.spend])).toEqual([
      [4, '2024-03-01', 'c1', 200],
      [2, '2024-03-02', 'c2', 1000],
    ])
    expect(dataset.rejected).toEqual([
      {
        row: 3,
        issues: [{ row: 3, field: 'spend', column: 'Amount Spent', value: 'abc', reason: 'not_a_number' }],
      },
    ])
    expect(dataset.flagged).toBe(0)
    expect(dataset.columnMapping).toEqual({
      'Account ID': 'account_id',
      'Campaign ID': 'campaign_id',
      'Campaign Name': 'campaign_name',
      Date: 'date',
      'Amount Spent': 'spend',
      Impressions: 'impressions',
      'Link Clicks': 'clicks',
      Purchases: 'purchases',
    })
    expect(table.rows[1][4]).toBe('abc')
  })

  it('fills canonical records with nulls for absent optional fields', () => {
    const dataset = createService().normalize(rawTable(HEADERS, sampleRows()))

    expect(dataset.records[0]).toEqual({
      account_id: 'act_1',
      campaign_id: 'c1',
      date: '2024-03-01',
      spend: 200,
      impressions: 4000,
      clicks: 40,
      purchases: null,
      revenue: null,
      ad_id: null,
      ad_name: null,
      campaign_name: 'Alpha',
      objective: null,
      creative_id: null,
      sourceRow: 4,
      issues: [],
    })
  })

  it('keeps flagged rows with the bad value nulled', () => {
    const dataset = createService().normalize(rawTable(HEADERS, sampleRows()), {
      invalidRowPolicy: InvalidRowPolicyEnum.FLAG,
    })

    expect(dataset.records.map((r) => [r.sourceRow, r.campaign_name, r.spend])).toEqual([
      [4, 'Alpha', 200],
      [3, 'Alpha', null],
      [2, 'Beta', 1000],
    ])
    expect(dataset.records[1].issues).toHaveLength(1)
    expect(dataset.flagged).toBe(1)
    expect(dataset.rejected).toEqual([])
  })

  it('rejects rows without a usable date even when flagging', () => {
    const rows = sampleRows()
    rows[0][3] = 'someday'

    const dataset = createService().normalize(rawTable(HEADERS, rows), { invalidRowPolicy: InvalidRowPolicyEnum.FLAG })

    expect(dataset.rejected.map((r) => r.row)).toEqual([2])
    expect(dataset.records.map((r) => r.sourceRow)).toEqual([4, 3])
  })

  it('aborts the import when configured to', () => {
    const service = createService({ INVALID_ROW_POLICY: 'abort' })

    expect(() => service.normalize(rawTable(HEADERS, sampleRows()))).toThrow(TypeCoercionError)
  })

  it('refuses tables that fail schema validation', () => {
    const headers = HEADERS.filter((h) => h !== 'Link Clicks')
    const rows = sampleRows().map((r) => r.filter((_, i) => i !== 6))

    expect(() => createService().normalize(rawTable(headers, rows))).toThrow(SchemaViolationError)
  })

  it('collapses duplicate account/campaign/ad/date rows keeping the first', () => {
    const rows: CellValue[][] = [
      ['act_1', 'c1', 'Alpha', '2024-03-01', 10, 100, 1, 0],
      ['act_1', 'c1', 'Alpha', '2024-03-01', 99, 100, 1, 0],
    ]

    const dataset = createService().normalize(rawTable(HEADERS, rows))

    expect(dataset.duplicatesRemoved).toBe(1)
    expect(dataset.records).toHaveLength(1)
    expect(dataset.records[0].spend).toBe(10)
  })

  it('reports the source rows of removed duplicates', () => {
    const rows: CellValue[][] = [
      ['act_1', 'c1', 'Alpha', '2024-03-01', 10, 100, 1, 0],
      ['act_1', 'c1', 'Alpha', '2024-03-01', 99, 100, 1, 0],
      ['act_1', 'c2', 'Beta', '2024-03-01', 5, 100, 1, 0],
      ['act_1', 'c1', 'Alpha', '01/03/2024', 7, 100, 1, 0],
    ]

    const dataset = createService().normalize(rawTable(HEADERS, rows))

    expect(dataset.duplicatesRemoved).toBe(2)
    expect(dataset.duplicateRows).toEqual([3, 5])
    expect(dataset.warnings).toContain('2 duplicate record(s) removed: 3, 5')
  })

  it('keeps ads without ids apart by name', () => {
    const headers = ['Account ID', 'Campaign ID', 'Ad Name', 'Date', 'Amount Spent', 'Impressions', 'Link Clicks']
    const rows: CellValue[][] = [
      ['act_1', 'c1', 'Video A', '2024-03-01', 10, 100, 1],
      ['act_1', 'c1', 'Carousel B', '2024-03-01', 30, 300, 3],
      ['act_1', 'c1', 'Video A', '2024-03-01', 12, 100, 1],
    ]

    const dataset = createService().normalize(rawTable(headers, rows))

    expect(dataset.records.map((r) => [r.ad_id, r.ad_name, r.spend])).toEqual([
      [null, 'Video A', 10],
      [null, 'Carousel B', 30],
    ])
    expect(dataset.duplicateRows).toEqual([4])
  })

  it('reads zero-padded day-first and month-first dates', () => {
    const rows: CellValue[][] = [
      ['act_1', 'c1', 'Alpha', '05/03/2024', 1, 100, 1, 0],
      ['act_1', 'c2', 'Beta', '03/25/2024', 1, 100, 1, 0],
      ['act_1', 'c3', 'Gamma', '2024/03/07', 1, 100, 1, 0],
      ['act_1', 'c4', 'Delta', '2024-03', 1, 100, 1, 0],
    ]

    const dataset = createService().normalize(rawTable(HEADERS, rows))

    expect(dataset.records.map((r) => [r.campaign_id, r.date])).toEqual([
      ['c1', '2024-03-05'],
      ['c3', '2024-03-07'],
      ['c2', '2024-03-25'],
    ])
    expect(dataset.rejected).toEqual([
      { row: 5, issues: [{ row: 5, field: 'date', column: 'Date', value: '2024-03', reason: 'invalid_date' }] },
    ])
  })
})
