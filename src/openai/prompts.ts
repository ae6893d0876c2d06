import { InsightPayload } from '@common/types/insight.type'

export const SYSTEM_PROMPT =
  'You are a performance marketing analyst. You review paid social campaign data and give concrete, ' +
  'numbers-backed advice on creative, targeting and budget.'

export function buildAnalystPrompt(payload: InsightPayload) {
  return [
    `Analyse the campaign performance data below. Amounts are in ${payload.currency}.`,
    'CTR, CVR, purchase_rate and ROAS are ratios (0.015 means 1.5%); a null KPI means its denominator was zero.',
    '',
    'Structure the answer in markdown with these sections:',
    '1. Funnel summary: impressions → clicks → purchases, with CTR, CVR, CPC, CPM, CPA and ROAS.',
    '2. Performance gaps: campaigns or days that underperform and the likely reason.',
    '3. Recommendations: specific actions for creative, targeting and bidding.',
    '4. Priority: order the recommendations by expected impact.',
    '5. Budget reallocation: where to move spend, with amounts or percentages.',
    'Spell out every abbreviation the first time it is used.',
    '',
    'DATA (JSON):',
    JSON.stringify(payload, null, 2),
  ].join('\n')
}
