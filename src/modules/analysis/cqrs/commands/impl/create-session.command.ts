import { Command } from '@nestjs/cqrs'
import { SessionContext } from '@modules/sessions/session.store'

export class CreateSessionCommand extends Command<SessionContext> {
  constructor() {
    super()
  }
}
