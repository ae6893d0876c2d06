import { Query } from '@nestjs/cqrs'
import { ExportedFile } from '@modules/kpi/kpi-export.service'

export class GetInsightsReportQuery extends Query<ExportedFile> {
  constructor(public readonly sessionId: string) {
    super()
  }
}
