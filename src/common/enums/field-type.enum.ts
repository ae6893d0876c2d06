export enum FieldTypeEnum {
  ID = 'id',
  TEXT = 'text',
  DATE = 'date',
  AMOUNT = 'amount',
  COUNT = 'count',
}
