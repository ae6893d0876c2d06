import { Module } from '@nestjs/common'
import { ColumnNormalizerService } from './column-normalizer.service'
import { SchemaValidatorService } from './schema-validator.service'

@Module({
  providers: [SchemaValidatorService, ColumnNormalizerService],
  exports: [SchemaValidatorService, ColumnNormalizerService],
})
export class CampaignDataModule {}
