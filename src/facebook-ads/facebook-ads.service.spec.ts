import axios, { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import crypto from 'node:crypto'
import { AdsApiError } from '@common/exceptions/pipeline.exceptions'
import { ColumnNormalizerService } from '@modules/campaign-data/column-normalizer.service'
import { SchemaValidatorService } from '@modules/campaign-data/schema-validator.service'
import { testConfigService } from '../test/fixtures'
import { FacebookAdsService } from './facebook-ads.service'
import { FacebookGraphClientFactory } from './facebook-graph.client'
import { INSIGHT_HEADERS } from './facebook-helpers'

function ok<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } }
}

function graphError(status: number, message: string, traceId: string) {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', undefined, undefined, {
    data: { error: { message, type: 'OAuthException', code: 190, fbtrace_id: traceId } },
    status,
    statusText: 'Bad Request',
    headers: {},
    config: { headers: new AxiosHeaders() },
  })
}

const NEXT_PAGE = 'https://graph.facebook.com/v19.0/act_111/insights?after=cursor-1&access_token=test-token'

describe('FacebookAdsService', () => {
  const config = testConfigService({ FB_APP_SECRET: 'test-secret' })
  let factory: FacebookGraphClientFactory
  let service: FacebookAdsService
  let http: ReturnType<typeof axios.create>
  let get: jest.SpyInstance

  beforeEach(() => {
    factory = new FacebookGraphClientFactory(config)
    http = axios.create()
    jest.spyOn(factory, 'create').mockReturnValue(http)
    get = jest.spyOn(http, 'get')
    service = new FacebookAdsService(factory, config)
  })

  afterEach(() => jest.restoreAllMocks())

  describe('fetchInsights', () => {
    beforeEach(() => {
      get
        .mockResolvedValueOnce(
          ok({
            data: [
              {
                account_id: '111',
                campaign_id: 'c1',
                campaign_name: 'Spring',
                ad_id: 'a1',
                ad_name: 'Ad 1',
                objective: 'OUTCOME_SALES',
                date_start: '2024-03-01',
                date_stop: '2024-03-01',
                spend: '12.50',
                impressions: '1000',
                clicks: '25',
                actions: [
                  { action_type: 'link_click', value: '25' },
                  { action_type: 'purchase', value: '2' },
                ],
                action_values: [{ action_type: 'purchase', value: '80.5' }],
              },
            ],
            paging: { next: NEXT_PAGE },
          }),
        )
        .mockResolvedValueOnce(
          ok({ data: [{ campaign_id: 'c1', ad_id: 'a2', date_start: '2024-03-02', spend: '3', impressions: '200', clicks: '4' }] }),
        )
    })

    it('follows paging and maps insights onto canonical headers', async () => {
      const table = await service.fetchInsights('test-token', ['111'], '2024-03-01', '2024-03-07')

      expect(table.source).toBe('ads-api')
      expect(table.headers).toEqual(INSIGHT_HEADERS)
      expect(table.rows).toEqual([
        ['111', 'c1', 'Spring', 'a1', 'Ad 1', '2024-03-01', '12.50', '1000', '25', 2, 80.5, 'OUTCOME_SALES'],
        ['111', 'c1', null, 'a2', null, '2024-03-02', '3', '200', '4', 0, 0, null],
      ])
      expect(get).toHaveBeenNthCalledWith(1, '/act_111/insights', {
        params: expect.objectContaining({
          level: 'ad',
          time_increment: 1,
          time_range: '{"since":"2024-03-01","until":"2024-03-07"}',
          limit: 500,
        }),
      })
      expect(get).toHaveBeenNthCalledWith(2, NEXT_PAGE, { params: undefined })
    })

    it('produces rows the normalizer accepts unchanged', async () => {
      const table = await service.fetchInsights('test-token', ['act_111'], '2024-03-01', '2024-03-07')
      const normalizer = new ColumnNormalizerService(config, new SchemaValidatorService(config))

      const dataset = normalizer.normalize(table)

      expect(dataset.rejected).toEqual([])
      expect(dataset.records.map((r) => [r.date, r.spend, r.clicks, r.purchases, r.revenue])).toEqual([
        ['2024-03-01', 12.5, 25, 2, 80.5],
        ['2024-03-02', 3, 4, 0, 0],
      ])
    })
  })

  it('wraps Graph errors with status and trace id', async () => {
    get.mockRejectedValueOnce(graphError(400, 'Invalid OAuth access token.', 'trace-1'))

    const error = await service.fetchInsights('test-token', ['111'], '2024-03-01', '2024-03-07').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AdsApiError)
    expect(error).toMatchObject({
      upstream: { status: 400, message: 'Invalid OAuth access token.', traceId: 'trace-1' },
    })
  })

  describe('validateToken', () => {
    it('reports missing permissions', async () => {
      get.mockResolvedValueOnce(ok({ id: 'u1', name: 'Test User' })).mockResolvedValueOnce(
        ok({
          data: [
            { permission: 'ads_read', status: 'granted' },
            { permission: 'read_insights', status: 'declined' },
          ],
        }),
      )

      await expect(service.validateToken('test-token')).resolves.toEqual({
        valid: false,
        message: 'Missing required permissions: read_insights',
        userId: 'u1',
        userName: 'Test User',
        granted: ['ads_read'],
        missing: ['read_insights'],
      })
    })

    it('treats a rejected token as invalid rather than failing', async () => {
      get.mockRejectedValueOnce(graphError(401, 'Error validating access token', 'trace-2'))

      const result = await service.validateToken('test-token')

      expect(result.valid).toBe(false)
      expect(result.message).toBe('Invalid token: Error validating access token')
    })
  })
})

describe('FacebookGraphClientFactory', () => {
  it('signs requests with appsecret_proof', async () => {
    const factory = new FacebookGraphClientFactory(testConfigService({ FB_APP_SECRET: 'test-secret' }))
    const client = factory.create('test-token')
    const seen: InternalAxiosRequestConfig[] = []
    client.defaults.adapter = async (cfg) => {
      seen.push(cfg)
      return { data: {}, status: 200, statusText: 'OK', headers: {}, config: cfg }
    }

    await client.get('/me', { params: { fields: 'id' } })

    const expected = crypto.createHmac('sha256', 'test-secret').update('test-token').digest('hex')
    expect(seen[0].params).toEqual({ fields: 'id', appsecret_proof: expected })
    expect(seen[0].baseURL).toBe('https://graph.facebook.com/v19.0')
    expect(seen[0].headers.Authorization).toBe('Bearer test-token')
  })
})
