/** What the normalizer does with a row whose values cannot be coerced. */
export enum InvalidRowPolicyEnum {
  DROP = 'drop',
  FLAG = 'flag',
  ABORT = 'abort',
}
