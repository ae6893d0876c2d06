import { IQueryHandler, QueryHandler } from '@nestjs/cqrs'
import { CANONICAL_SCHEMA, OPTIONAL_FIELDS, REQUIRED_FIELDS } from '@modules/campaign-data/schema/canonical-schema'
import { aliasesFor, buildAliasTable } from '@modules/campaign-data/schema/column-aliases'
import { GetSchemaQuery, SchemaDescription } from '../impl/get-schema.query'

@QueryHandler(GetSchemaQuery)
export class GetSchemaQueryHandler implements IQueryHandler<GetSchemaQuery> {
  async execute(): Promise<SchemaDescription> {
    const aliases = buildAliasTable()
    return {
      required: [...REQUIRED_FIELDS],
      optional: [...OPTIONAL_FIELDS],
      fields: CANONICAL_SCHEMA.map((field) => ({
        name: field.name,
        label: field.label,
        type: field.type,
        required: field.required,
        aliases: aliasesFor(aliases, field.name),
      })),
    }
  }
}
