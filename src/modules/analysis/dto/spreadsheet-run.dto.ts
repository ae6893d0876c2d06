import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger'
import { IsNotEmpty, IsOptional, IsString } from 'class-validator'
import { PipelineOptionsDto } from './pipeline-options.dto'

export class SpreadsheetRunDto extends PipelineOptionsDto {
  @ApiProperty({ type: 'string', format: 'binary', description: '.xlsx or .xls export' })
  file?: unknown

  @ApiPropertyOptional({ description: 'Sheet to read; defaults to the first one' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  sheetName?: string
}
