import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import axios, { AxiosInstance } from 'axios'
import { AppConfig } from '@config/app.config'
import { attachRequestTiming, describeHttpError, headerValue } from '@common/http/axios-helpers'
import { InsightPayload, InsightResult } from '@common/types/insight.type'
import { buildFallbackInsights } from './insight-summary'
import { SYSTEM_PROMPT, buildAnalystPrompt } from './prompts'

type ChatCompletionResponse = {
  model?: string
  choices?: Array<{ message?: { role?: string; content?: string | null } }>
}

export type GenerateInsightsOptions = {
  /** per-request key; falls back to OPENAI_API_KEY */
  apiKey?: string
}

@Injectable()
export class OpenaiService {
  private readonly logger = new Logger(OpenaiService.name)
  private readonly http: AxiosInstance

  constructor(private readonly configService: ConfigService) {
    const { openai } = this.configService.getOrThrow<AppConfig>('app')
    // one instance + interceptors so every call logs duration and request id
    this.http = attachRequestTiming(
      axios.create({ baseURL: openai.baseUrl, timeout: openai.timeoutMs }),
      this.logger,
      'OpenAI',
      'x-request-id',
    )
  }

  /**
   * Asks the chat model for a narrative analysis. Never throws: any failure
   * comes back as `unavailable` together with the rule-based report.
   */
  async generateInsights(payload: InsightPayload, options: GenerateInsightsOptions = {}): Promise<InsightResult> {
    const { openai } = this.configService.getOrThrow<AppConfig>('app')
    const unavailable = (reason: string): InsightResult => {
      this.logger.warn(`Insights unavailable: ${reason}`)
      return { status: 'unavailable', reason, fallback: buildFallbackInsights(payload) }
    }

    const apiKey = options.apiKey?.trim() || openai.apiKey
    if (!apiKey) return unavailable('No OpenAI API key configured')

    try {
      const { data, headers } = await this.http.post<ChatCompletionResponse>(
        '/chat/completions',
        {
          model: openai.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildAnalystPrompt(payload) },
          ],
          max_tokens: 2000,
          temperature: 0.7,
        },
        { headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' } },
      )
      const text = data?.choices?.[0]?.message?.content?.trim()
      if (!text) return unavailable('OpenAI returned an empty response')

      this.logger.log(`STEP insights: ${text.length} chars from ${data.model ?? openai.model}`)
      return {
        status: 'available',
        text,
        model: data.model ?? openai.model,
        requestId: headerValue(headers['x-request-id']),
      }
    } catch (err) {
      return unavailable(this.describeFailure(err))
    }
  }

  private describeFailure(err: unknown): string {
    const d = describeHttpError(err)
    const rid = axios.isAxiosError(err) ? headerValue(err.response?.headers?.['x-request-id']) : null
    this.logger.error(
      [
        'OpenAI ERROR in generateInsights',
        d.status ? `status=${d.status}` : '',
        d.code ? `code=${d.code}` : '',
        d.durationMs !== undefined ? `duration=${d.durationMs}ms` : '',
        rid ? `reqId=${rid}` : '',
        `msg="${d.message}"`,
      ]
        .filter(Boolean)
        .join(' | '),
    )

    switch (d.status) {
      case 400:
        return `OpenAI 400: ${d.message}`
      case 401:
        return 'OpenAI 401: Invalid API key or permissions'
      case 403:
        return 'OpenAI 403: Forbidden'
      case 404:
        return 'OpenAI 404: Not found (model/endpoint)'
      case 408:
        return 'OpenAI timeout'
      case 413:
        return 'OpenAI 413: Payload too large for the context window'
      case 429:
        return 'OpenAI 429: Rate limit or quota exhausted'
      case 500:
      case 502:
      case 503:
      case 504:
        return `OpenAI ${d.status}: Upstream unavailable`
    }
    if (d.code === 'ECONNABORTED') return 'OpenAI timeout'
    if (d.networkHint) return `OpenAI network error: ${d.networkHint}`
    return `OpenAI error: ${d.message}`
  }
}
