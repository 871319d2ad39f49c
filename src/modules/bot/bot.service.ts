import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Bot } from 'grammy'
import { describeError } from '../backend/backend.errors'
import { ConversationEngine } from '../conversation/conversation.engine'
import { GENERIC_FAILURE } from '../conversation/elements/messages'
import { conversationCommands } from './commands/conversation.command'
import { reportCommands } from './commands/reports.command'
import { type BotContext, answerCallbackQueries, isBenignTelegramError } from './core/bot.middleware'
import { BOT_COMMANDS } from './elements/help'
import { ReportsService } from './reports.service'

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(BotService.name)
	private readonly bot: Bot<BotContext>

	constructor(
		private readonly config: ConfigService,
		private readonly engine: ConversationEngine,
		private readonly reports: ReportsService
	) {
		const token = this.config.getOrThrow<string>('BOT_TOKEN')
		this.bot = new Bot<BotContext>(token)
	}

	async onModuleInit() {
		this.bot.use(answerCallbackQueries)

		this.bot.catch(async err => {
			const message = describeError(err.error)
			if (isBenignTelegramError(message)) return
			this.logger.error(`Bot error on update ${err.ctx.update.update_id}: ${message}`, err.stack)
			if (!err.ctx.chat) return
			await err.ctx.reply(GENERIC_FAILURE).catch((error: unknown) => {
				this.logger.warn(`Could not report failure to chat ${err.ctx.chat?.id}: ${describeError(error)}`)
			})
		})

		reportCommands(this.bot, this.reports)
		conversationCommands(this.bot, this.engine)

		await this.bot.api.setMyCommands(BOT_COMMANDS).catch((error: unknown) => {
			this.logger.warn(`setMyCommands failed: ${describeError(error)}`)
		})

		void this.bot
			.start({
				onStart: info => this.logger.log(`Bot @${info.username} is polling for updates`)
			})
			.catch((error: unknown) => {
				this.logger.error(`Bot polling stopped: ${describeError(error)}`)
			})
	}

	async onModuleDestroy() {
		if (this.bot.isRunning()) await this.bot.stop()
	}
}
