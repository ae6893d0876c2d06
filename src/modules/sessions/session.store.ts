import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { randomUUID } from 'node:crypto'
import { AppConfig } from '@config/app.config'
import { NoPipelineRunError, SessionNotFoundError } from '@common/exceptions/pipeline.exceptions'
import { PipelineRun } from '@common/types/pipeline.type'

export type SessionContext = {
  id: string
  createdAt: Date
  lastAccessedAt: Date
  lastRun: PipelineRun | null
}

/**
 * In-memory session contexts. Nothing is persisted; idle sessions are evicted
 * when they are next looked up or when a new session is created.
 */
@Injectable()
export class SessionStore {
  private readonly logger = new Logger(SessionStore.name)
  private readonly sessions = new Map<string, SessionContext>()

  constructor(private readonly configService: ConfigService) {}

  private get ttlMs() {
    return this.configService.getOrThrow<AppConfig>('app').sessions.ttlMinutes * 60_000
  }

  private isExpired(session: SessionContext, now: number) {
    return now - session.lastAccessedAt.getTime() > this.ttlMs
  }

  private evictExpired(now: number) {
    for (const session of this.sessions.values()) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(session.id)
        this.logger.log(`Session ${session.id} expired`)
      }
    }
  }

  create(): SessionContext {
    const now = new Date()
    this.evictExpired(now.getTime())
    const session: SessionContext = { id: randomUUID(), createdAt: now, lastAccessedAt: now, lastRun: null }
    this.sessions.set(session.id, session)
    this.logger.log(`Session ${session.id} created (${this.sessions.size} active)`)
    return session
  }

  get(id: string): SessionContext {
    const session = this.sessions.get(id)
    const now = Date.now()
    if (!session || this.isExpired(session, now)) {
      if (session) this.sessions.delete(id)
      throw new SessionNotFoundError(id)
    }
    session.lastAccessedAt = new Date(now)
    return session
  }

  /** Replaces the session's last run. */
  saveRun(id: string, run: PipelineRun): SessionContext {
    const session = this.get(id)
    session.lastRun = run
    return session
  }

  lastRun(id: string): PipelineRun {
    const { lastRun } = this.get(id)
    if (!lastRun) throw new NoPipelineRunError(id)
    return lastRun
  }

  destroy(id: string) {
    this.get(id)
    this.sessions.delete(id)
    this.logger.log(`Session ${id} closed`)
  }

  get size() {
    return this.sessions.size
  }
}
