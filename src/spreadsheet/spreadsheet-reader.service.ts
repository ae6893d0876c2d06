import { Injectable, Logger } from '@nestjs/common'
import * as XLSX from 'xlsx'
import { FileReadError } from '@common/exceptions/pipeline.exceptions'
import { CellValue, RawTable } from '@common/types/raw-table.type'

export type SpreadsheetFormat = 'xlsx' | 'xls'

export type ReadOptions = {
  fileName?: string
  sheetName?: string
}

// zip local file header / OLE compound document header
const SIGNATURES: Array<{ format: SpreadsheetFormat; bytes: number[] }> = [
  { format: 'xlsx', bytes: [0x50, 0x4b, 0x03, 0x04] },
  { format: 'xls', bytes: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1] },
]

export function detectFormat(file: Buffer): SpreadsheetFormat | null {
  const match = SIGNATURES.find(({ bytes }) => bytes.every((b, i) => file[i] === b))
  return match?.format ?? null
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  if (value instanceof Date) return value
  return String(value)
}

function headerText(value: CellValue, index: number) {
  const text = value instanceof Date ? value.toISOString() : String(value ?? '').trim()
  return text || `Column ${index + 1}`
}

@Injectable()
export class SpreadsheetReaderService {
  private readonly logger = new Logger(SpreadsheetReaderService.name)

  /** Reads one sheet into a raw table: first row is the header, everything else is data. */
  read(file: Buffer, options: ReadOptions = {}): RawTable {
    const { fileName } = options
    if (file.length === 0) throw new FileReadError('The uploaded file is empty', fileName)

    const format = detectFormat(file)
    if (!format) throw new FileReadError('Unsupported file type; upload an .xlsx or .xls spreadsheet', fileName)

    let workbook: XLSX.WorkBook
    try {
      workbook = XLSX.read(file, { type: 'buffer', cellDates: true })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      this.logger.warn(`Failed to parse ${format} file ${fileName ?? '-'}: ${message}`)
      throw new FileReadError(`The ${format} file could not be read: ${message}`, fileName)
    }

    const sheetName = options.sheetName ?? workbook.SheetNames[0]
    if (sheetName === undefined || !workbook.SheetNames.includes(sheetName)) {
      const available = workbook.SheetNames.join(', ') || 'none'
      throw new FileReadError(`Sheet "${sheetName ?? ''}" not found (available: ${available})`, fileName)
    }
    const sheet = workbook.Sheets[sheetName]

    const matrix = XLSX.utils
      .sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: true })
      .map((row) => row.map(toCell))
    const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1')

    const [headerRow = [], ...body] = matrix
    let width = headerRow.length
    while (width > 0 && (headerRow[width - 1] === null || String(headerRow[width - 1]).trim() === '')) width--
    const headers = headerRow.slice(0, width).map(headerText)
    const rows = body.map((row) => Array.from({ length: width }, (_, i) => row[i] ?? null))

    this.logger.log(
      `STEP read: ${format} ${fileName ?? '-'} sheet="${sheetName}" columns=${headers.length} rows=${rows.length}`,
    )
    return {
      source: 'spreadsheet',
      headers,
      rows,
      firstRowNumber: range.s.r + 2,
      fileName,
      sheetName,
    }
  }
}
