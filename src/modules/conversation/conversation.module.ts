import { Module } from '@nestjs/common'
import { BackendModule } from '../backend/backend.module'
import { ConversationEngine } from './conversation.engine'
import { conversationOptionsProvider } from './conversation.options'
import { SessionStore } from './session-store'
import { SessionSweepService } from './session-sweep.service'

@Module({
	imports: [BackendModule],
	providers: [SessionStore, ConversationEngine, SessionSweepService, conversationOptionsProvider],
	exports: [ConversationEngine]
})
export class ConversationModule {}
