import { Command } from '@nestjs/cqrs'

export class CloseSessionCommand extends Command<void> {
  constructor(public readonly sessionId: string) {
    super()
  }
}
