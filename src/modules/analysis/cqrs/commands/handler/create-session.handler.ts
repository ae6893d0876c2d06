import { CommandHandler, ICommandHandler } from '@nestjs/cqrs'
import { SessionContext, SessionStore } from '@modules/sessions/session.store'
import { CreateSessionCommand } from '../impl/create-session.command'

@CommandHandler(CreateSessionCommand)
export class CreateSessionCommandHandler implements ICommandHandler<CreateSessionCommand> {
  constructor(private readonly store: SessionStore) {}

  async execute(): Promise<SessionContext> {
    return this.store.create()
  }
}
