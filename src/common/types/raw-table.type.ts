export type CellValue = string | number | boolean | Date | null

export type RawRow = CellValue[]

export type SourceKind = 'spreadsheet' | 'ads-api'

/** Tabular data exactly as a source adapter produced it, headers untouched. */
export type RawTable = {
  source: SourceKind
  headers: string[]
  rows: RawRow[]
  /** 1-based row number of rows[0] in the original sheet (header sits right above it) */
  firstRowNumber: number
  fileName?: string
  sheetName?: string
}
