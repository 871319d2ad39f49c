import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'
import { ScheduleModule } from '@nestjs/schedule'
import { validateEnv } from './config/env.schema'
import { BackendModule } from './modules/backend/backend.module'
import { BotModule } from './modules/bot/bot.module'
import { ConversationModule } from './modules/conversation/conversation.module'
import { AppController } from './app.controller'

@Module({
	imports: [
		ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
		ScheduleModule.forRoot(),
		BackendModule,
		ConversationModule,
		BotModule
	],
	controllers: [AppController]
})
export class AppModule {}
