import { ConfigService } from '@nestjs/config'
import { loadAppConfig } from '@config/app.config'
import { CampaignRecord } from '@common/types/campaign-record.type'
import { CellValue, RawTable } from '@common/types/raw-table.type'

export function testConfigService(env: NodeJS.ProcessEnv = {}) {
  return new ConfigService({ app: loadAppConfig(env) })
}

export function rawTable(headers: string[], rows: CellValue[][]): RawTable {
  return { source: 'spreadsheet', headers, rows, firstRowNumber: 2 }
}

export function campaignRecord(overrides: Partial<CampaignRecord> = {}): CampaignRecord {
  return {
    account_id: 'act_1',
    campaign_id: 'c1',
    date: '2024-03-01',
    spend: 0,
    impressions: 0,
    clicks: 0,
    purchases: null,
    revenue: null,
    ad_id: null,
    ad_name: null,
    campaign_name: null,
    objective: null,
    creative_id: null,
    sourceRow: 2,
    issues: [],
    ...overrides,
  }
}
