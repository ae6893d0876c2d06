import { Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { CqrsModule } from '@nestjs/cqrs'
import { MulterModule } from '@nestjs/platform-express'
import { AppConfig } from '@config/app.config'
import { CampaignDataModule } from '@modules/campaign-data/campaign-data.module'
import { KpiModule } from '@modules/kpi/kpi.module'
import { SessionsModule } from '@modules/sessions/sessions.module'
import { FacebookAdsModule } from 'src/facebook-ads/facebook-ads.module'
import { OpenaiModule } from 'src/openai/openai.module'
import { SpreadsheetModule } from 'src/spreadsheet/spreadsheet.module'
import { CloseSessionCommandHandler } from './cqrs/commands/handler/close-session.handler'
import { CreateSessionCommandHandler } from './cqrs/commands/handler/create-session.handler'
import { RunPipelineCommandHandler } from './cqrs/commands/handler/run-pipeline.handler'
import { ExportKpisQueryHandler } from './cqrs/queries/handler/export-kpis.handler'
import { GetInsightsReportQueryHandler } from './cqrs/queries/handler/get-insights-report.handler'
import { GetKpisQueryHandler } from './cqrs/queries/handler/get-kpis.handler'
import { GetSchemaQueryHandler } from './cqrs/queries/handler/get-schema.handler'
import { GetSessionQueryHandler } from './cqrs/queries/handler/get-session.handler'
import { SchemaController } from './controllers/schema.controller'
import { SessionsController } from './controllers/sessions.controller'

const CommandHandlers = [CreateSessionCommandHandler, CloseSessionCommandHandler, RunPipelineCommandHandler]

const QueriesHandler = [
  GetSessionQueryHandler,
  GetKpisQueryHandler,
  ExportKpisQueryHandler,
  GetSchemaQueryHandler,
  GetInsightsReportQueryHandler,
]

@Module({
  imports: [
    CqrsModule,
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        limits: { fileSize: configService.getOrThrow<AppConfig>('app').uploads.maxBytes, files: 1 },
      }),
    }),
    SessionsModule,
    SpreadsheetModule,
    FacebookAdsModule,
    CampaignDataModule,
    KpiModule,
    OpenaiModule,
  ],
  controllers: [SessionsController, SchemaController],
  providers: [...CommandHandlers, ...QueriesHandler],
})
export class AnalysisModule {}
