import * as XLSX from 'xlsx'
import { FileReadError } from '@common/exceptions/pipeline.exceptions'
import { SpreadsheetReaderService, detectFormat } from './spreadsheet-reader.service'

function workbookBuffer(sheets: Record<string, unknown[][]>, bookType: XLSX.BookType): Buffer {
  const workbook = XLSX.utils.book_new()
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name)
  }
  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType }))
}

const ROWS: unknown[][] = [
  [' Account ID ', 'Campaign ID', 'Date', 'Amount Spent', 'Impressions', 'Clicks'],
  ['act_1', 'c1', '2024-03-01', 120.5, 1000, 20],
  [],
  ['act_1', 'c2', '2024-03-02', 80, 500],
]

describe('SpreadsheetReaderService', () => {
  const reader = new SpreadsheetReaderService()

  it.each<[XLSX.BookType, string]>([
    ['xlsx', 'xlsx'],
    ['biff8', 'xls'],
  ])('reads %s workbooks', (bookType, format) => {
    const file = workbookBuffer({ Sheet1: ROWS }, bookType)
    expect(detectFormat(file)).toBe(format)

    const table = reader.read(file, { fileName: `report.${format}` })

    expect(table.headers).toEqual(['Account ID', 'Campaign ID', 'Date', 'Amount Spent', 'Impressions', 'Clicks'])
    expect(table.rows).toEqual([
      ['act_1', 'c1', '2024-03-01', 120.5, 1000, 20],
      [null, null, null, null, null, null],
      ['act_1', 'c2', '2024-03-02', 80, 500, null],
    ])
    expect(table.firstRowNumber).toBe(2)
    expect(table.sheetName).toBe('Sheet1')
    expect(table.source).toBe('spreadsheet')
  })

  it('reads the named sheet', () => {
    const file = workbookBuffer({ Notes: [['hello']], Data: ROWS }, 'xlsx')

    expect(reader.read(file).headers).toEqual(['hello'])
    expect(reader.read(file, { sheetName: 'Data' }).rows).toHaveLength(3)
    expect(() => reader.read(file, { sheetName: 'Missing' })).toThrow('Sheet "Missing" not found (available: Notes, Data)')
  })

  it('rejects empty and unsupported files', () => {
    expect(() => reader.read(Buffer.alloc(0))).toThrow(FileReadError)
    expect(() => reader.read(Buffer.from('account_id,campaign_id\n1,2\n'), { fileName: 'data.csv' })).toThrow(
      'Unsupported file type; upload an .xlsx or .xls spreadsheet',
    )
  })

  it('rejects a corrupt compound document', () => {
    const corrupt = Buffer.concat([Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]), Buffer.alloc(1024, 0xff)])

    expect(() => reader.read(corrupt, { fileName: 'broken.xls' })).toThrow(FileReadError)
  })
})
