import { CommandHandler, ICommandHandler } from '@nestjs/cqrs'
import { SessionStore } from '@modules/sessions/session.store'
import { CloseSessionCommand } from '../impl/close-session.command'

@CommandHandler(CloseSessionCommand)
export class CloseSessionCommandHandler implements ICommandHandler<CloseSessionCommand> {
  constructor(private readonly store: SessionStore) {}

  async execute(command: CloseSessionCommand): Promise<void> {
    this.store.destroy(command.sessionId)
  }
}
