import type { Bot } from 'grammy'
import { ENTRY_COMMANDS, type ConversationEngine } from '../../conversation/conversation.engine'
import type { TelegramUser } from '../../conversation/conversation.types'
import type { BotContext } from '../core/bot.middleware'
import { TelegramReplyChannel } from '../core/reply-channel'

const toTelegramUser = (from: { id: number; username?: string; first_name: string }): TelegramUser => ({
	id: from.id,
	username: from.username,
	firstName: from.first_name
})

/** Feeds entry commands, button presses and free text into the conversation engine. */
export const conversationCommands = (bot: Bot<BotContext>, engine: ConversationEngine) => {
	for (const command of ENTRY_COMMANDS) {
		bot.command(command, async ctx => {
			if (!ctx.from || !ctx.chat) return
			await engine.handle(
				{
					kind: 'command',
					command,
					args: ctx.match,
					chatId: ctx.chat.id,
					from: toTelegramUser(ctx.from)
				},
				new TelegramReplyChannel(ctx.api, ctx.chat.id)
			)
		})
	}

	bot.on('callback_query:data', async ctx => {
		const message = ctx.callbackQuery.message
		if (!message) return
		await engine.handle(
			{
				kind: 'button',
				payload: ctx.callbackQuery.data,
				messageId: message.message_id,
				chatId: message.chat.id,
				from: toTelegramUser(ctx.callbackQuery.from)
			},
			new TelegramReplyChannel(ctx.api, message.chat.id)
		)
	})

	bot.on('message:text', async ctx => {
		const { text } = ctx.message
		// unknown commands are not answers
		if (text.startsWith('/') || !ctx.from) return
		await engine.handle(
			{
				kind: 'text',
				text,
				chatId: ctx.chat.id,
				from: toTelegramUser(ctx.from)
			},
			new TelegramReplyChannel(ctx.api, ctx.chat.id)
		)
	})
}
