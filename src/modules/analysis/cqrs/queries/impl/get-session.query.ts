import { Query } from '@nestjs/cqrs'
import { SessionContext } from '@modules/sessions/session.store'

export class GetSessionQuery extends Query<SessionContext> {
  constructor(public readonly sessionId: string) {
    super()
  }
}
