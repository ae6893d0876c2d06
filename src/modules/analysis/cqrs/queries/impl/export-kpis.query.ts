import { Query } from '@nestjs/cqrs'
import { AggregationLevelEnum } from '@common/enums/aggregation-level.enum'
import { DateRange } from '@common/types/kpi.type'
import { ExportedFile, ExportFormatEnum } from '@modules/kpi/kpi-export.service'

export class ExportKpisQuery extends Query<ExportedFile> {
  constructor(
    public readonly sessionId: string,
    public readonly format: ExportFormatEnum,
    public readonly groupBy: AggregationLevelEnum,
    public readonly dateRange: DateRange = {},
  ) {
    super()
  }
}
