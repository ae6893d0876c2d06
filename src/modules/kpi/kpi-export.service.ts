import { Injectable, Logger } from '@nestjs/common'
import ExcelJS from 'exceljs'
import moment from 'moment'
import { KpiRow } from '@common/types/kpi.type'
import { KPI_DEFINITIONS, KPI_NAMES, METRIC_FIELDS } from './kpi-calculator'

export enum ExportFormatEnum {
  XLSX = 'xlsx',
  CSV = 'csv',
}

export type ExportedFile = {
  buffer: Buffer
  contentType: string
  fileName: string
}

const CONTENT_TYPES: Record<ExportFormatEnum, string> = {
  [ExportFormatEnum.XLSX]: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  [ExportFormatEnum.CSV]: 'text/csv; charset=utf-8',
}

const COLUMNS: Array<Partial<ExcelJS.Column>> = [
  { header: 'Key', key: 'key', width: 28 },
  { header: 'Level', key: 'level', width: 10 },
  { header: 'Account ID', key: 'account_id', width: 18 },
  { header: 'Campaign ID', key: 'campaign_id', width: 18 },
  { header: 'Campaign name', key: 'campaign_name', width: 28 },
  { header: 'Ad ID', key: 'ad_id', width: 18 },
  { header: 'Ad name', key: 'ad_name', width: 28 },
  { header: 'From', key: 'from', width: 12 },
  { header: 'To', key: 'to', width: 12 },
  { header: 'Records', key: 'records', width: 10 },
  ...METRIC_FIELDS.map((field) => ({ header: field, key: field, width: 14, style: { numFmt: '#,##0.##' } })),
  ...KPI_NAMES.map((name) => ({ header: KPI_DEFINITIONS[name].label, key: name, width: 10, style: { numFmt: '0.0000' } })),
]

@Injectable()
export class KpiExportService {
  private readonly logger = new Logger(KpiExportService.name)

  buildWorkbook(rows: ReadonlyArray<KpiRow>) {
    const workbook = new ExcelJS.Workbook()
    const worksheet = workbook.addWorksheet('KPIs')
    worksheet.columns = COLUMNS

    for (const row of rows) {
      const { dimensions: d } = row
      worksheet.addRow({
        key: row.key,
        level: row.level,
        account_id: d.account_id ?? null,
        campaign_id: d.campaign_id ?? null,
        campaign_name: d.campaign_name ?? null,
        ad_id: d.ad_id ?? null,
        ad_name: d.ad_name ?? null,
        from: d.period?.from ?? d.date ?? null,
        to: d.period?.to ?? d.date ?? null,
        records: row.records,
        ...row.totals,
        ...row.kpis,
      })
    }

    const header = worksheet.getRow(1)
    header.font = { bold: true }
    header.eachCell((cell) => {
      cell.border = { bottom: { style: 'thin' } }
    })
    return workbook
  }

  async export(rows: ReadonlyArray<KpiRow>, format: ExportFormatEnum, baseName = 'kpis'): Promise<ExportedFile> {
    const workbook = this.buildWorkbook(rows)
    const data = format === ExportFormatEnum.CSV ? await workbook.csv.writeBuffer() : await workbook.xlsx.writeBuffer()
    const fileName = `${baseName}-${moment().format('YYYYMMDD-HHmmss')}.${format}`
    this.logger.log(`STEP export: ${rows.length} row(s) as ${format}`)
    return { buffer: Buffer.from(data), contentType: CONTENT_TYPES[format], fileName }
  }
}
