import { Module } from '@nestjs/common'
import { SpreadsheetReaderService } from './spreadsheet-reader.service'

@Module({
  providers: [SpreadsheetReaderService],
  exports: [SpreadsheetReaderService],
})
export class SpreadsheetModule {}
