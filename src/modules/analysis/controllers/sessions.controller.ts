import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Res,
  StreamableFile,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common'
import { CommandBus, QueryBus } from '@nestjs/cqrs'
import { FileInterceptor } from '@nestjs/platform-express'
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger'
import { Response } from 'express'
import { FileReadError } from '@common/exceptions/pipeline.exceptions'
import { KpiRow } from '@common/types/kpi.type'
import { PipelineRun } from '@common/types/pipeline.type'
import { ExportedFile } from '@modules/kpi/kpi-export.service'
import { SessionContext } from '@modules/sessions/session.store'
import { CloseSessionCommand } from '../cqrs/commands/impl/close-session.command'
import { CreateSessionCommand } from '../cqrs/commands/impl/create-session.command'
import { RunPipelineCommand } from '../cqrs/commands/impl/run-pipeline.command'
import { ExportKpisQuery } from '../cqrs/queries/impl/export-kpis.query'
import { GetInsightsReportQuery } from '../cqrs/queries/impl/get-insights-report.query'
import { GetKpisQuery } from '../cqrs/queries/impl/get-kpis.query'
import { GetSessionQuery } from '../cqrs/queries/impl/get-session.query'
import { AdsApiRunDto } from '../dto/ads-api-run.dto'
import { ExportKpisDto, KpiQueryDto } from '../dto/kpi-query.dto'
import { SpreadsheetRunDto } from '../dto/spreadsheet-run.dto'

function download(res: Response, file: ExportedFile) {
  res.set({
    'Content-Type': file.contentType,
    'Content-Disposition': `attachment; filename="${file.fileName}"`,
  })
  return new StreamableFile(file.buffer)
}

@Controller('sessions')
@ApiTags('sessions')
export class SessionsController {
  constructor(
    private readonly queryBus: QueryBus,
    private readonly commandBus: CommandBus,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Open a session context' })
  async create(): Promise<SessionContext> {
    return this.commandBus.execute(new CreateSessionCommand())
  }

  @Get(':id')
  @ApiParam({ name: 'id' })
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<SessionContext> {
    return this.queryBus.execute(new GetSessionQuery(id))
  }

  @Delete(':id')
  @HttpCode(204)
  @ApiParam({ name: 'id' })
  async close(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    await this.commandBus.execute(new CloseSessionCommand(id))
  }

  @Post(':id/runs/spreadsheet')
  @ApiOperation({ summary: 'Run the pipeline on an uploaded spreadsheet' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({ type: SpreadsheetRunDto })
  @UseInterceptors(FileInterceptor('file'))
  async runSpreadsheet(
    @Param('id', ParseUUIDPipe) id: string,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: SpreadsheetRunDto,
  ): Promise<PipelineRun> {
    if (!file) throw new FileReadError('No file uploaded; send the spreadsheet in the "file" field')
    return this.commandBus.execute(
      new RunPipelineCommand(
        id,
        { kind: 'spreadsheet', file: file.buffer, fileName: file.originalname, sheetName: dto.sheetName },
        dto.toOptions(),
      ),
    )
  }

  @Post(':id/runs/ads-api')
  @ApiOperation({ summary: 'Run the pipeline on Meta Ads insights' })
  async runAdsApi(@Param('id', ParseUUIDPipe) id: string, @Body() dto: AdsApiRunDto): Promise<PipelineRun> {
    return this.commandBus.execute(
      new RunPipelineCommand(
        id,
        {
          kind: 'ads-api',
          accessToken: dto.accessToken,
          accountIds: dto.accountIds,
          since: dto.startDate,
          until: dto.endDate,
        },
        dto.toOptions(),
      ),
    )
  }

  @Get(':id/kpis')
  @ApiParam({ name: 'id' })
  async kpis(@Param('id', ParseUUIDPipe) id: string, @Query() query: KpiQueryDto): Promise<KpiRow[]> {
    return this.queryBus.execute(new GetKpisQuery(id, query.groupBy, query.toDateRange()))
  }

  @Get(':id/kpis/export')
  @ApiParam({ name: 'id' })
  async exportKpis(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: ExportKpisDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const file = await this.queryBus.execute(new ExportKpisQuery(id, query.format, query.groupBy, query.toDateRange()))
    return download(res, file)
  }

  @Get(':id/insights/report')
  @ApiParam({ name: 'id' })
  async insightsReport(
    @Param('id', ParseUUIDPipe) id: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const file = await this.queryBus.execute(new GetInsightsReportQuery(id))
    return download(res, file)
  }
}
