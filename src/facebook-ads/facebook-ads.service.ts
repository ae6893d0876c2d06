import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { AxiosInstance } from 'axios'
import { AppConfig } from '@config/app.config'
import { AdsApiError } from '@common/exceptions/pipeline.exceptions'
import { describeHttpError, upstreamTraceId } from '@common/http/axios-helpers'
import { RawTable } from '@common/types/raw-table.type'
import { FacebookGraphClientFactory } from './facebook-graph.client'
import { INSIGHT_FIELDS, INSIGHT_HEADERS, REQUIRED_PERMISSIONS, insightToRow, normalizeAccountId } from './facebook-helpers'
import { AdAccount, GraphInsightRow, GraphPage, GraphPermission, GraphUser, TokenValidation } from './types/ads.type'

type QueryParams = Record<string, string | number>

/** Strips the query string (tokens live there on paging URLs). */
function safePath(url: string) {
  return url.split('?')[0]
}

@Injectable()
export class FacebookAdsService {
  private readonly logger = new Logger(FacebookAdsService.name)

  constructor(
    private readonly clients: FacebookGraphClientFactory,
    private readonly configService: ConfigService,
  ) {}

  /** Logs a failed Graph call (never the token) and wraps it for the caller. */
  private fail(context: string, err: unknown): AdsApiError {
    const d = describeHttpError(err)
    const traceId = upstreamTraceId(d.data)
    const status = d.status ?? d.networkHint ?? d.code ?? 'error'
    this.logger.error(`❌ ${context} → ${status} (${d.durationMs ?? '-'}ms) fbtrace_id=${traceId ?? '-'}: ${d.message}`)
    return new AdsApiError(context, { status: d.status, message: d.message, traceId })
  }

  private async paginate<T>(fb: AxiosInstance, path: string, params: QueryParams, context: string): Promise<T[]> {
    const items: T[] = []
    let url: string | null = path
    let query: QueryParams | undefined = params
    while (url) {
      this.logger.log(`STEP ${context} paginate → GET ${safePath(url)}`)
      const res: { data: GraphPage<T> } = await fb.get<GraphPage<T>>(url, { params: query })
      items.push(...(res.data.data ?? []))
      url = res.data.paging?.next ?? null
      query = undefined
    }
    return items
  }

  async validateToken(accessToken: string): Promise<TokenValidation> {
    const fb = this.clients.create(accessToken, 10_000)
    let me: GraphUser
    try {
      const res = await fb.get<GraphUser>('/me', { params: { fields: 'id,name' } })
      me = res.data
    } catch (err) {
      const failure = describeHttpError(err)
      if (failure.status !== null && failure.status >= 400 && failure.status < 500) {
        this.logger.warn(`Token rejected by Graph API (${failure.status})`)
        return {
          valid: false,
          message: `Invalid token: ${failure.message}`,
          userId: null,
          userName: null,
          granted: [],
          missing: [...REQUIRED_PERMISSIONS],
        }
      }
      throw this.fail('GET /me', err)
    }

    let permissions: GraphPermission[]
    try {
      permissions = await this.paginate<GraphPermission>(fb, '/me/permissions', {}, 'permissions')
    } catch (err) {
      throw this.fail('GET /me/permissions', err)
    }

    const granted = permissions.filter((p) => p.status === 'granted').map((p) => p.permission)
    const missing = REQUIRED_PERMISSIONS.filter((p) => !granted.includes(p))
    return {
      valid: missing.length === 0,
      message: missing.length
        ? `Missing required permissions: ${missing.join(', ')}`
        : `Token valid for user: ${me.name ?? 'Unknown'}`,
      userId: me.id,
      userName: me.name ?? null,
      granted,
      missing,
    }
  }

  async listAdAccounts(accessToken: string): Promise<AdAccount[]> {
    const fb = this.clients.create(accessToken, 15_000)
    try {
      const accounts = await this.paginate<AdAccount>(
        fb,
        '/me/adaccounts',
        { fields: 'id,account_id,name,currency,account_status', limit: 100 },
        'adaccounts',
      )
      this.logger.log(`STEP adaccounts: ${accounts.length} account(s)`)
      return accounts
    } catch (err) {
      throw this.fail('GET /me/adaccounts', err)
    }
  }

  /**
   * Daily ad-level insights for every account in [since, until], flattened into
   * a raw table whose headers are already canonical field names.
   */
  async fetchInsights(accessToken: string, accountIds: string[], since: string, until: string): Promise<RawTable> {
    const { facebook } = this.configService.getOrThrow<AppConfig>('app')
    const fb = this.clients.create(accessToken)
    const rows: RawTable['rows'] = []

    for (const accountId of accountIds.map(normalizeAccountId)) {
      const path = `/${accountId}/insights`
      let insights: GraphInsightRow[]
      try {
        insights = await this.paginate<GraphInsightRow>(
          fb,
          path,
          {
            level: 'ad',
            time_increment: 1,
            time_range: JSON.stringify({ since, until }),
            fields: INSIGHT_FIELDS.join(','),
            limit: 500,
          },
          'insights',
        )
      } catch (err) {
        throw this.fail(`GET ${path}`, err)
      }
      this.logger.log(`STEP insights ${accountId}: ${insights.length} row(s)`)
      rows.push(...insights.map((row) => insightToRow(row, accountId, facebook.purchaseActionType)))
    }

    return { source: 'ads-api', headers: [...INSIGHT_HEADERS], rows, firstRowNumber: 1 }
  }
}
