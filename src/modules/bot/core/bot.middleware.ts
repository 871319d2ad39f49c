import { Logger } from '@nestjs/common'
import type { Context, MiddlewareFn } from 'grammy'
import { describeError } from '../../backend/backend.errors'

export type BotContext = Context

const logger = new Logger('BotMiddleware')

/** Answers callback queries before any backend work so the button spinner stops. */
export const answerCallbackQueries: MiddlewareFn<BotContext> = async (ctx, next) => {
	if (ctx.callbackQuery) {
		await ctx.answerCallbackQuery().catch((error: unknown) => {
			logger.debug(`answerCallbackQuery failed: ${describeError(error)}`)
		})
	}
	await next()
}

/** Errors grammy reports that only mean a message went stale or the network blinked. */
const BENIGN_ERRORS = [
	'message is not modified',
	'message to edit not found',
	"message can't be edited",
	'query is too old',
	'ECONNRESET',
	'ETIMEDOUT'
]

export const isBenignTelegramError = (message: string) =>
	BENIGN_ERRORS.some(fragment => message.includes(fragment))
