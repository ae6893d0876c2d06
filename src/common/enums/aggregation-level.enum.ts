export enum AggregationLevelEnum {
  ROW = 'row',
  ACCOUNT = 'account',
  CAMPAIGN = 'campaign',
  AD = 'ad',
  DATE = 'date',
  WEEK = 'week',
  MONTH = 'month',
  TOTAL = 'total',
}

export const PERIOD_LEVELS: ReadonlyArray<AggregationLevelEnum> = [
  AggregationLevelEnum.DATE,
  AggregationLevelEnum.WEEK,
  AggregationLevelEnum.MONTH,
]
