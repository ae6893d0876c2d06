import { ApiPropertyOptional } from '@nestjs/swagger'
import { IsEnum, IsOptional, Matches } from 'class-validator'
import { AggregationLevelEnum } from '@common/enums/aggregation-level.enum'
import { DateRange } from '@common/types/kpi.type'
import { ExportFormatEnum } from '@modules/kpi/kpi-export.service'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export class KpiQueryDto {
  @ApiPropertyOptional({ enum: AggregationLevelEnum, default: AggregationLevelEnum.CAMPAIGN })
  @IsOptional()
  @IsEnum(AggregationLevelEnum)
  groupBy: AggregationLevelEnum = AggregationLevelEnum.CAMPAIGN

  @ApiPropertyOptional({ example: '2024-03-01', description: 'inclusive' })
  @IsOptional()
  @Matches(ISO_DATE, { message: 'from must be YYYY-MM-DD' })
  from?: string

  @ApiPropertyOptional({ example: '2024-03-31', description: 'inclusive' })
  @IsOptional()
  @Matches(ISO_DATE, { message: 'to must be YYYY-MM-DD' })
  to?: string

  toDateRange(): DateRange {
    return { from: this.from, to: this.to }
  }
}

export class ExportKpisDto extends KpiQueryDto {
  @ApiPropertyOptional({ enum: ExportFormatEnum, default: ExportFormatEnum.XLSX })
  @IsOptional()
  @IsEnum(ExportFormatEnum)
  format: ExportFormatEnum = ExportFormatEnum.XLSX
}
