import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common'
import { CanonicalField, RowIssue } from '@common/types/campaign-record.type'

export type SchemaViolation = {
  kind: 'empty_table' | 'missing_column' | 'empty_column'
  field?: CanonicalField
  column?: string
  message: string
}

/** Required columns missing or unusable; nothing from the table is kept. */
export class SchemaViolationError extends UnprocessableEntityException {
  constructor(public readonly violations: SchemaViolation[]) {
    super({
      statusCode: 422,
      error: 'schema_violation',
      message: `Schema violation: ${violations.map((v) => v.message).join('; ')}`,
      details: violations,
    })
  }

  get fields(): CanonicalField[] {
    return this.violations.flatMap((v) => (v.field ? [v.field] : []))
  }
}

export class TypeCoercionError extends UnprocessableEntityException {
  constructor(public readonly issues: RowIssue[]) {
    const preview = issues
      .slice(0, 5)
      .map((i) => `row ${i.row} "${i.column}" (${i.reason})`)
      .join(', ')
    super({
      statusCode: 422,
      error: 'type_coercion_failed',
      message: `${issues.length} value(s) could not be converted: ${preview}${issues.length > 5 ? ', …' : ''}`,
      details: issues,
    })
  }
}

export class FileReadError extends BadRequestException {
  constructor(
    message: string,
    public readonly fileName?: string,
  ) {
    super({
      statusCode: 400,
      error: 'file_read_error',
      message,
      details: { fileName: fileName ?? null },
    })
  }
}

export type UpstreamFailure = {
  status: number | null
  message: string
  traceId?: string
}

export class AdsApiError extends BadGatewayException {
  constructor(
    context: string,
    public readonly upstream: UpstreamFailure,
  ) {
    super({
      statusCode: 502,
      error: 'ads_api_error',
      message: `Meta Ads API ${context} failed${upstream.status ? ` (${upstream.status})` : ''}: ${upstream.message}`,
      details: upstream,
    })
  }
}

export class SessionNotFoundError extends NotFoundException {
  constructor(public readonly sessionId: string) {
    super({
      statusCode: 404,
      error: 'session_not_found',
      message: `Session ${sessionId} does not exist or has expired`,
      details: { sessionId },
    })
  }
}

export class NoPipelineRunError extends ConflictException {
  constructor(public readonly sessionId: string) {
    super({
      statusCode: 409,
      error: 'no_pipeline_run',
      message: `Session ${sessionId} has no completed run yet`,
      details: { sessionId },
    })
  }
}
