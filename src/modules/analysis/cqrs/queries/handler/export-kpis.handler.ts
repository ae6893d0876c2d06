import { Logger } from '@nestjs/common'
import { IQueryHandler, QueryBus, QueryHandler } from '@nestjs/cqrs'
import { ExportedFile, KpiExportService } from '@modules/kpi/kpi-export.service'
import { ExportKpisQuery } from '../impl/export-kpis.query'
import { GetKpisQuery } from '../impl/get-kpis.query'

@QueryHandler(ExportKpisQuery)
export class ExportKpisQueryHandler implements IQueryHandler<ExportKpisQuery> {
  private readonly logger = new Logger(ExportKpisQueryHandler.name)

  constructor(
    private readonly queryBus: QueryBus,
    private readonly exportService: KpiExportService,
  ) {}

  async execute(query: ExportKpisQuery): Promise<ExportedFile> {
    const { sessionId, format, groupBy, dateRange } = query
    const rows = await this.queryBus.execute(new GetKpisQuery(sessionId, groupBy, dateRange))
    this.logger.log(`Exporting ${groupBy} KPIs of session ${sessionId}`)
    return this.exportService.export(rows, format, `kpis-${groupBy}`)
  }
}
