import { IQueryHandler, QueryHandler } from '@nestjs/cqrs'
import moment from 'moment'
import { ExportedFile } from '@modules/kpi/kpi-export.service'
import { SessionStore } from '@modules/sessions/session.store'
import { GetInsightsReportQuery } from '../impl/get-insights-report.query'

@QueryHandler(GetInsightsReportQuery)
export class GetInsightsReportQueryHandler implements IQueryHandler<GetInsightsReportQuery> {
  constructor(private readonly store: SessionStore) {}

  async execute(query: GetInsightsReportQuery): Promise<ExportedFile> {
    const { insights, finishedAt } = this.store.lastRun(query.sessionId)
    const text =
      insights.status === 'available'
        ? insights.text
        : `> AI insights unavailable: ${insights.reason}\n\n${insights.fallback}`
    return {
      buffer: Buffer.from(text, 'utf8'),
      contentType: 'text/plain; charset=utf-8',
      fileName: `campaign-insights-${moment(finishedAt).format('YYYYMMDD-HHmmss')}.txt`,
    }
  }
}
