import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import axios, { AxiosInstance } from 'axios'
import crypto from 'node:crypto'
import { AppConfig } from '@config/app.config'
import { attachRequestTiming } from '@common/http/axios-helpers'

export function buildAppSecretProof(token: string, secret: string | null) {
  if (!token || !secret) return undefined
  return crypto.createHmac('sha256', secret).update(token).digest('hex')
}

/** Builds per-token Graph API clients. */
@Injectable()
export class FacebookGraphClientFactory {
  private readonly logger = new Logger('GraphApi')

  constructor(private readonly configService: ConfigService) {}

  create(token: string, timeoutMs = 30_000): AxiosInstance {
    const { facebook } = this.configService.getOrThrow<AppConfig>('app')
    const client = axios.create({
      baseURL: `https://graph.facebook.com/${facebook.graphVersion}`,
      timeout: timeoutMs,
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${token}`,
      },
    })
    client.interceptors.request.use((config) => {
      const proof = buildAppSecretProof(token, facebook.appSecret)
      // paging.next URLs already carry their own proof
      if (proof && !config.url?.includes('appsecret_proof=')) {
        config.params = { ...(config.params ?? {}), appsecret_proof: proof }
      }
      return config
    })
    return attachRequestTiming(client, this.logger, 'Graph', 'x-fb-trace-id')
  }
}
