import { FieldTypeEnum } from '@common/enums/field-type.enum'
import { CanonicalField } from '@common/types/campaign-record.type'

export type FieldDefinition = {
  name: CanonicalField
  type: FieldTypeEnum
  required: boolean
  label: string
}

export const CANONICAL_SCHEMA: ReadonlyArray<FieldDefinition> = [
  { name: 'account_id', type: FieldTypeEnum.ID, required: true, label: 'Account ID' },
  { name: 'campaign_id', type: FieldTypeEnum.ID, required: true, label: 'Campaign ID' },
  { name: 'date', type: FieldTypeEnum.DATE, required: true, label: 'Date' },
  { name: 'spend', type: FieldTypeEnum.AMOUNT, required: true, label: 'Spend' },
  { name: 'impressions', type: FieldTypeEnum.COUNT, required: true, label: 'Impressions' },
  { name: 'clicks', type: FieldTypeEnum.COUNT, required: true, label: 'Clicks' },
  { name: 'purchases', type: FieldTypeEnum.COUNT, required: false, label: 'Purchases' },
  { name: 'revenue', type: FieldTypeEnum.AMOUNT, required: false, label: 'Revenue' },
  { name: 'ad_id', type: FieldTypeEnum.ID, required: false, label: 'Ad ID' },
  { name: 'ad_name', type: FieldTypeEnum.TEXT, required: false, label: 'Ad name' },
  { name: 'campaign_name', type: FieldTypeEnum.TEXT, required: false, label: 'Campaign name' },
  { name: 'objective', type: FieldTypeEnum.TEXT, required: false, label: 'Objective' },
  { name: 'creative_id', type: FieldTypeEnum.ID, required: false, label: 'Creative ID' },
]

export const REQUIRED_FIELDS: ReadonlyArray<CanonicalField> = CANONICAL_SCHEMA.filter((f) => f.required).map(
  (f) => f.name,
)

export const OPTIONAL_FIELDS: ReadonlyArray<CanonicalField> = CANONICAL_SCHEMA.filter((f) => !f.required).map(
  (f) => f.name,
)
