import { IQueryHandler, QueryHandler } from '@nestjs/cqrs'
import { KpiRow } from '@common/types/kpi.type'
import { aggregateKpis } from '@modules/kpi/kpi-calculator'
import { SessionStore } from '@modules/sessions/session.store'
import { GetKpisQuery } from '../impl/get-kpis.query'

@QueryHandler(GetKpisQuery)
export class GetKpisQueryHandler implements IQueryHandler<GetKpisQuery> {
  constructor(private readonly store: SessionStore) {}

  async execute(query: GetKpisQuery): Promise<KpiRow[]> {
    const { sessionId, groupBy, dateRange } = query
    const { dataset } = this.store.lastRun(sessionId)
    return aggregateKpis(dataset.records, { groupBy, dateRange })
  }
}
