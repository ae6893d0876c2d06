import { Logger } from '@nestjs/common'
import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios'

declare module 'axios' {
  interface InternalAxiosRequestConfig {
    startedAt?: number
  }
}

export function elapsedMs(config?: InternalAxiosRequestConfig): number | undefined {
  return config?.startedAt ? Date.now() - config.startedAt : undefined
}

export function headerValue(value: unknown): string | null {
  if (typeof value === 'string') return value
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0]
  return null
}

/** Stamps every request with its start time and logs successful calls at debug level. */
export function attachRequestTiming(http: AxiosInstance, logger: Logger, label: string, requestIdHeader: string) {
  http.interceptors.request.use((config) => {
    config.startedAt = Date.now()
    return config
  })
  http.interceptors.response.use((res) => {
    const rid = headerValue(res.headers?.[requestIdHeader])
    logger.debug(`${label} OK ${res.status} (${elapsedMs(res.config) ?? '-'}ms) reqId=${rid ?? '-'}`)
    return res
  })
  return http
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Pulls the human readable message out of `{ error: { message } }` / `{ message }` bodies. */
export function upstreamMessage(data: unknown): string | undefined {
  if (!isRecord(data)) return typeof data === 'string' && data.length ? data : undefined
  const error = data.error
  if (isRecord(error)) {
    const userMsg = error.error_user_msg
    if (typeof userMsg === 'string' && userMsg) return userMsg
    if (typeof error.message === 'string') return error.message
  }
  if (typeof error === 'string') return error
  if (typeof data.message === 'string') return data.message
  return undefined
}

export function upstreamTraceId(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.error)) return undefined
  const trace = data.error.fbtrace_id
  return typeof trace === 'string' ? trace : undefined
}

const NETWORK_HINTS: Record<string, string> = {
  ECONNABORTED: 'Timeout',
  ETIMEDOUT: 'Network timeout',
  ENOTFOUND: 'DNS not found',
  ECONNRESET: 'Socket reset',
  ECONNREFUSED: 'Connection refused',
}

export type DescribedHttpError = {
  status: number | null
  code: string | null
  message: string
  networkHint: string | null
  durationMs: number | undefined
  data: unknown
}

export function describeHttpError(err: unknown): DescribedHttpError {
  if (axios.isAxiosError(err)) {
    const code = err.code ?? null
    return {
      status: err.response?.status ?? null,
      code,
      message: upstreamMessage(err.response?.data) ?? err.message,
      networkHint: code ? (NETWORK_HINTS[code] ?? null) : null,
      durationMs: elapsedMs(err.config),
      data: err.response?.data,
    }
  }
  return {
    status: null,
    code: null,
    message: err instanceof Error ? err.message : String(err),
    networkHint: null,
    durationMs: undefined,
    data: undefined,
  }
}
