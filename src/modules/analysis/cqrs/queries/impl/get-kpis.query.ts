import { Query } from '@nestjs/cqrs'
import { AggregationLevelEnum } from '@common/enums/aggregation-level.enum'
import { DateRange, KpiRow } from '@common/types/kpi.type'

export class GetKpisQuery extends Query<KpiRow[]> {
  constructor(
    public readonly sessionId: string,
    public readonly groupBy: AggregationLevelEnum,
    public readonly dateRange: DateRange = {},
  ) {
    super()
  }
}
