import { ApiProperty } from '@nestjs/swagger'
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsString, Matches } from 'class-validator'
import { PipelineOptionsDto } from './pipeline-options.dto'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export class AdsApiRunDto extends PipelineOptionsDto {
  @ApiProperty({ description: 'Meta access token with ads_read and read_insights' })
  @IsString()
  @IsNotEmpty()
  accessToken!: string

  @ApiProperty({ type: [String], example: ['act_123456789'] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  accountIds!: string[]

  @ApiProperty({ example: '2024-03-01' })
  @Matches(ISO_DATE, { message: 'startDate must be YYYY-MM-DD' })
  startDate!: string

  @ApiProperty({ example: '2024-03-31' })
  @Matches(ISO_DATE, { message: 'endDate must be YYYY-MM-DD' })
  endDate!: string
}
