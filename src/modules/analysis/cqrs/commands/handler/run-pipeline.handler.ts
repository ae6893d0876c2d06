import { Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { CommandHandler, ICommandHandler } from '@nestjs/cqrs'
import { randomUUID } from 'node:crypto'
import { AppConfig } from '@config/app.config'
import { AggregationLevelEnum } from '@common/enums/aggregation-level.enum'
import { RawTable } from '@common/types/raw-table.type'
import { DataSource, PipelineRun, SourceDescriptor } from '@common/types/pipeline.type'
import { ColumnNormalizerService } from '@modules/campaign-data/column-normalizer.service'
import { SchemaValidatorService } from '@modules/campaign-data/schema-validator.service'
import { aggregateKpis, computeRowKpis, summarizeDataset } from '@modules/kpi/kpi-calculator'
import { SessionStore } from '@modules/sessions/session.store'
import { FacebookAdsService } from 'src/facebook-ads/facebook-ads.service'
import { buildInsightPayload } from 'src/openai/insight-summary'
import { OpenaiService } from 'src/openai/openai.service'
import { SpreadsheetReaderService } from 'src/spreadsheet/spreadsheet-reader.service'
import { RunPipelineCommand } from '../impl/run-pipeline.command'

function describeSource(source: DataSource): SourceDescriptor {
  switch (source.kind) {
    case 'spreadsheet':
      return { kind: 'spreadsheet', fileName: source.fileName ?? null, sheetName: source.sheetName ?? null }
    case 'ads-api':
      return { kind: 'ads-api', accountIds: source.accountIds, since: source.since, until: source.until }
  }
}

/**
 * source → validate → normalize → KPIs → insights. A failing stage aborts the
 * run and leaves the session's previous run in place.
 */
@CommandHandler(RunPipelineCommand)
export class RunPipelineCommandHandler implements ICommandHandler<RunPipelineCommand> {
  private readonly logger = new Logger(RunPipelineCommandHandler.name)

  constructor(
    private readonly configService: ConfigService,
    private readonly store: SessionStore,
    private readonly spreadsheetReader: SpreadsheetReaderService,
    private readonly fbService: FacebookAdsService,
    private readonly validator: SchemaValidatorService,
    private readonly normalizer: ColumnNormalizerService,
    private readonly openaiService: OpenaiService,
  ) {}

  private async load(source: DataSource): Promise<RawTable> {
    switch (source.kind) {
      case 'spreadsheet':
        return this.spreadsheetReader.read(source.file, { fileName: source.fileName, sheetName: source.sheetName })
      case 'ads-api':
        return this.fbService.fetchInsights(source.accessToken, source.accountIds, source.since, source.until)
    }
  }

  async execute(command: RunPipelineCommand): Promise<PipelineRun> {
    const { sessionId, source, options } = command
    const { pipeline } = this.configService.getOrThrow<AppConfig>('app')
    // fail fast on an unknown session before reading anything
    this.store.get(sessionId)

    const runId = randomUUID()
    const startedAt = new Date().toISOString()
    this.logger.log(`STEP 1: run ${runId} for session ${sessionId} from ${source.kind}`)

    const table = await this.load(source)
    this.logger.log(`STEP 2: ${table.rows.length} raw row(s), ${table.headers.length} column(s)`)

    const report = this.validator.validate(table, options)
    this.validator.assertValid(report)
    const dataset = this.normalizer.normalize(table, options, report)
    this.logger.log(
      `STEP 3: ${dataset.records.length} record(s), ${dataset.rejected.length} rejected, ${dataset.flagged} flagged`,
    )

    const summary = summarizeDataset(dataset.records)
    const kpis = computeRowKpis(dataset.records)
    const campaignSummary = aggregateKpis(dataset.records, { groupBy: AggregationLevelEnum.CAMPAIGN })
    this.logger.log(`STEP 4: KPIs for ${kpis.length} row(s), ${campaignSummary.length} campaign(s)`)

    const payload = buildInsightPayload(dataset.records, pipeline.reportCurrency)
    const insights = await this.openaiService.generateInsights(payload, { apiKey: options.openaiApiKey })
    this.logger.log(`STEP 5: insights ${insights.status}`)

    const run: PipelineRun = {
      runId,
      sessionId,
      source: describeSource(source),
      startedAt,
      finishedAt: new Date().toISOString(),
      dataset,
      summary,
      kpis,
      campaignSummary,
      insights,
    }
    this.store.saveRun(sessionId, run)
    return run
  }
}
