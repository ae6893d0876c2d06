import { IQueryHandler, QueryHandler } from '@nestjs/cqrs'
import { SessionContext, SessionStore } from '@modules/sessions/session.store'
import { GetSessionQuery } from '../impl/get-session.query'

@QueryHandler(GetSessionQuery)
export class GetSessionQueryHandler implements IQueryHandler<GetSessionQuery> {
  constructor(private readonly store: SessionStore) {}

  async execute(query: GetSessionQuery): Promise<SessionContext> {
    return this.store.get(query.sessionId)
  }
}
