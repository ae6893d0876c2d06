import { Query } from '@nestjs/cqrs'
import { FieldTypeEnum } from '@common/enums/field-type.enum'
import { CanonicalField } from '@common/types/campaign-record.type'

export type SchemaField = {
  name: CanonicalField
  label: string
  type: FieldTypeEnum
  required: boolean
  aliases: string[]
}

export type SchemaDescription = {
  required: CanonicalField[]
  optional: CanonicalField[]
  fields: SchemaField[]
}

export class GetSchemaQuery extends Query<SchemaDescription> {
  constructor() {
    super()
  }
}
