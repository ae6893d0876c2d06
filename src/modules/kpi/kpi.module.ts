import { Module } from '@nestjs/common'
import { KpiExportService } from './kpi-export.service'

@Module({
  providers: [KpiExportService],
  exports: [KpiExportService],
})
export class KpiModule {}
