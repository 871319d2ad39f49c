import { Logger } from '@nestjs/common'
import { InlineKeyboard } from 'grammy'
import type { Api } from 'grammy'
import type { ChoiceKeyboard } from '../../../shared/keyboards/choice-keyboard'
import { describeError } from '../../backend/backend.errors'
import type {
	OutboundMessage,
	ReplyChannel,
	SentMessage
} from '../../conversation/conversation.types'

export function toInlineKeyboard(keyboard: ChoiceKeyboard): InlineKeyboard {
	return InlineKeyboard.from(
		keyboard.map(row => row.map(button => InlineKeyboard.text(button.label, button.payload)))
	)
}

const NOT_MODIFIED = 'message is not modified'

/** Delivers engine output to one Telegram chat as HTML. */
export class TelegramReplyChannel implements ReplyChannel {
	private readonly logger = new Logger(TelegramReplyChannel.name)

	constructor(
		private readonly api: Api,
		private readonly chatId: number
	) {}

	async send(message: OutboundMessage): Promise<SentMessage> {
		const sent = await this.api.sendMessage(this.chatId, message.text, {
			parse_mode: 'HTML',
			reply_markup: message.keyboard ? toInlineKeyboard(message.keyboard) : undefined
		})
		return { messageId: sent.message_id }
	}

	async edit(target: SentMessage, message: OutboundMessage): Promise<SentMessage> {
		try {
			await this.api.editMessageText(this.chatId, target.messageId, message.text, {
				parse_mode: 'HTML',
				reply_markup: message.keyboard ? toInlineKeyboard(message.keyboard) : undefined
			})
			return target
		} catch (error: unknown) {
			const reason = describeError(error)
			if (reason.includes(NOT_MODIFIED)) return target
			this.logger.debug(`Edit of ${target.messageId} failed, sending instead: ${reason}`)
			return this.send(message)
		}
	}
}
