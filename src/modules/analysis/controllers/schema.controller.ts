import { Controller, Get } from '@nestjs/common'
import { QueryBus } from '@nestjs/cqrs'
import { ApiOperation, ApiTags } from '@nestjs/swagger'
import { GetSchemaQuery, SchemaDescription } from '../cqrs/queries/impl/get-schema.query'

@Controller('schema')
@ApiTags('schema')
export class SchemaController {
  constructor(private readonly queryBus: QueryBus) {}

  @Get()
  @ApiOperation({ summary: 'Required and optional columns with the headers accepted for each' })
  async find(): Promise<SchemaDescription> {
    return this.queryBus.execute(new GetSchemaQuery())
  }
}
