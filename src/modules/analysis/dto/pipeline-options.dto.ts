import { ApiPropertyOptional } from '@nestjs/swagger'
import { Transform, TransformFnParams } from 'class-transformer'
import { IsEnum, IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator'
import { InvalidRowPolicyEnum } from '@common/enums/invalid-row-policy.enum'
import { PipelineOptions } from '@common/types/pipeline.type'

/** Multipart fields arrive as text; objects are sent as JSON strings. */
export function parseJsonField({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') return value
  if (!value.trim()) return undefined
  try {
    return JSON.parse(value)
  } catch {
    // left as a string so @IsObject reports it
    return value
  }
}

export class PipelineOptionsDto {
  @ApiPropertyOptional({ enum: InvalidRowPolicyEnum, description: 'What to do with rows that have unusable values' })
  @IsOptional()
  @IsEnum(InvalidRowPolicyEnum)
  invalidRowPolicy?: InvalidRowPolicyEnum

  @ApiPropertyOptional({
    description: 'Extra header aliases, header → canonical field, e.g. {"Kosten":"spend"}',
    type: 'object',
    additionalProperties: { type: 'string' },
  })
  @IsOptional()
  @Transform(parseJsonField)
  @IsObject()
  aliases?: Record<string, string>

  @ApiPropertyOptional({ description: 'OpenAI key for this run only; falls back to the server key' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  openaiApiKey?: string

  toOptions(): PipelineOptions {
    return { invalidRowPolicy: this.invalidRowPolicy, aliases: this.aliases, openaiApiKey: this.openaiApiKey }
  }
}
