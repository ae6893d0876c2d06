import { LogLevel } from '@nestjs/common'
import { registerAs } from '@nestjs/config'
import { plainToInstance } from 'class-transformer'
import { IsEnum, IsInt, IsOptional, IsString, IsUrl, Matches, Min, validateSync } from 'class-validator'
import { InvalidRowPolicyEnum } from '@common/enums/invalid-row-policy.enum'
import { DEFAULT_DATE_FORMATS } from '@utils/parse-date'

export interface AppConfig {
  port: number
  logLevels: LogLevel[]
  openai: {
    apiKey: string | null
    baseUrl: string
    model: string
    timeoutMs: number
  }
  facebook: {
    graphVersion: string
    appSecret: string | null
    purchaseActionType: string
  }
  pipeline: {
    invalidRowPolicy: InvalidRowPolicyEnum
    dateFormats: string[]
    reportCurrency: string
    highCpcThreshold: number
  }
  sessions: {
    ttlMinutes: number
  }
  uploads: {
    maxBytes: number
  }
}

const LOG_LEVELS: ReadonlyArray<LogLevel> = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose']

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function isRowPolicy(value: string): value is InvalidRowPolicyEnum {
  return Object.values(InvalidRowPolicyEnum).some((policy) => policy === value)
}

function int(value: string | undefined, fallback: number) {
  const n = Number(value)
  return value !== undefined && value.trim() !== '' && Number.isFinite(n) ? n : fallback
}

function nonEmpty(value: string | undefined) {
  const s = value?.trim()
  return s ? s : null
}

function list(value: string | undefined, separator: string) {
  return (value ?? '')
    .split(separator)
    .map((s) => s.trim())
    .filter(Boolean)
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevels = list(env.LOG_LEVELS, ',').filter(isLogLevel)
  const dateFormats = list(env.DATE_FORMATS, '|')
  const policy = env.INVALID_ROW_POLICY?.trim().toLowerCase() ?? ''

  return {
    port: int(env.PORT, 3001),
    logLevels: logLevels.length ? logLevels : ['error', 'warn', 'log'],
    openai: {
      apiKey: nonEmpty(env.OPENAI_API_KEY),
      baseUrl: (nonEmpty(env.OPENAI_BASE_URL) ?? 'https://api.openai.com/v1').replace(/\/+$/, ''),
      model: nonEmpty(env.OPENAI_MODEL) ?? 'gpt-4o-mini',
      timeoutMs: int(env.OPENAI_TIMEOUT_MS, 120_000),
    },
    facebook: {
      graphVersion: nonEmpty(env.FB_GRAPH_VERSION) ?? 'v19.0',
      appSecret: nonEmpty(env.FB_APP_SECRET),
      purchaseActionType: nonEmpty(env.FB_PURCHASE_ACTION_TYPE) ?? 'purchase',
    },
    pipeline: {
      invalidRowPolicy: isRowPolicy(policy) ? policy : InvalidRowPolicyEnum.DROP,
      dateFormats: dateFormats.length ? dateFormats : [...DEFAULT_DATE_FORMATS],
      reportCurrency: nonEmpty(env.REPORT_CURRENCY) ?? 'INR',
      highCpcThreshold: int(env.HIGH_CPC_THRESHOLD, 100),
    },
    sessions: {
      ttlMinutes: int(env.SESSION_TTL_MINUTES, 60),
    },
    uploads: {
      maxBytes: int(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
    },
  }
}

export default registerAs('app', () => loadAppConfig())

class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number

  @IsOptional()
  @IsUrl({ require_tld: false })
  OPENAI_BASE_URL?: string

  @IsOptional()
  @IsInt()
  @Min(1000)
  OPENAI_TIMEOUT_MS?: number

  @IsOptional()
  @Matches(/^v\d+\.\d+$/, { message: 'FB_GRAPH_VERSION must look like v19.0' })
  FB_GRAPH_VERSION?: string

  @IsOptional()
  @IsEnum(InvalidRowPolicyEnum)
  INVALID_ROW_POLICY?: InvalidRowPolicyEnum

  @IsOptional()
  @IsString()
  REPORT_CURRENCY?: string

  @IsOptional()
  @Min(0)
  HIGH_CPC_THRESHOLD?: number

  @IsOptional()
  @IsInt()
  @Min(1)
  SESSION_TTL_MINUTES?: number

  @IsOptional()
  @IsInt()
  @Min(1024)
  MAX_UPLOAD_BYTES?: number
}

/** `ConfigModule.forRoot({ validate })` hook: rejects malformed values at boot. */
export function validateEnv(config: Record<string, unknown>) {
  const validated = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true })
  const errors = validateSync(validated, { skipMissingProperties: false })
  if (errors.length > 0) {
    const details = errors.flatMap((e) => Object.values(e.constraints ?? {}))
    throw new Error(`Invalid environment: ${details.join('; ')}`)
  }
  return config
}
