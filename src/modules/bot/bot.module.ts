import { Module } from '@nestjs/common'
import { BackendModule } from '../backend/backend.module'
import { ConversationModule } from '../conversation/conversation.module'
import { BotService } from './bot.service'
import { ReportsService } from './reports.service'

@Module({
	imports: [BackendModule, ConversationModule],
	providers: [BotService, ReportsService]
})
export class BotModule {}
