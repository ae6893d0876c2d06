import { Command } from '@nestjs/cqrs'
import { DataSource, PipelineOptions, PipelineRun } from '@common/types/pipeline.type'

export class RunPipelineCommand extends Command<PipelineRun> {
  constructor(
    public readonly sessionId: string,
    public readonly source: DataSource,
    public readonly options: PipelineOptions = {},
  ) {
    super()
  }
}
