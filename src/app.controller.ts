import { Controller, Get } from '@nestjs/common'
import { ConversationEngine } from './modules/conversation/conversation.engine'

@Controller('app')
export class AppController {
	constructor(private readonly engine: ConversationEngine) {}

	@Get('health')
	health() {
		return { status: 'ok', sessions: this.engine.sessionCount }
	}
}
