import { Logger } from '@nestjs/common'
import { LinkCodeInvalidError, describeError } from '../../backend/backend.errors'
import type { ResolvedUser } from '../../backend/backend.types'
import { parseCurrencyCode } from '../../../utils/currency'
import type {
	ConversationState,
	FlowContext,
	InputOf,
	LinkStateName,
	StateOf,
	StateTransitions,
	TelegramUser
} from '../conversation.types'
import { promptFor, promptWithNotice } from '../conversation.prompts'
import { endSession, reprompt } from '../transition-table'
import * as msg from '../elements/messages'

const logger = new Logger('LinkFlow')

/** /start [code]. Only an unlinked user with a code enters the flow. */
export async function startLink(
	ctx: FlowContext,
	from: TelegramUser,
	args: string
): Promise<ConversationState | null> {
	const telegramUserId = String(from.id)
	let user: ResolvedUser | null
	try {
		user = await ctx.gateway.resolve(telegramUserId)
	} catch (error: unknown) {
		logger.error(`Failed to resolve ${telegramUserId}: ${describeError(error)}`)
		await ctx.respond({ text: msg.GENERIC_FAILURE })
		return null
	}
	if (user) {
		await ctx.respond({ text: msg.ALREADY_LINKED })
		return null
	}

	const [linkCode] = args.trim().split(/\s+/)
	if (!linkCode) {
		await ctx.respond({ text: msg.LINK_WELCOME })
		return null
	}

	const state: ConversationState = {
		name: 'awaiting_link_currency',
		link: {
			linkCode,
			telegramUserId,
			username: from.username ?? '',
			firstName: from.firstName ?? ''
		}
	}
	await ctx.respond(promptFor(state, ctx.options))
	return state
}

async function onCurrencyPick(
	ctx: FlowContext,
	state: StateOf<'awaiting_link_currency'>,
	input: InputOf<'button'>
): Promise<ConversationState | null> {
	const { action } = input
	if (action.ns !== 'cur') return reprompt(ctx, state)

	if (action.kind === 'other') {
		const next: ConversationState = { name: 'awaiting_custom_currency', link: state.link }
		await ctx.respond(promptFor(next, ctx.options))
		return next
	}
	return completeLink(ctx, state, action.code)
}

async function onCustomCurrency(
	ctx: FlowContext,
	state: StateOf<'awaiting_custom_currency'>,
	input: InputOf<'text'>
): Promise<ConversationState | null> {
	const currency = parseCurrencyCode(input.text)
	if (!currency) {
		await ctx.respond({ text: msg.INVALID_CURRENCY_CODE })
		return state
	}
	return completeLink(ctx, state, currency)
}

async function completeLink(
	ctx: FlowContext,
	state: StateOf<'awaiting_link_currency'> | StateOf<'awaiting_custom_currency'>,
	currency: string
): Promise<ConversationState | null> {
	const { link } = state
	try {
		await ctx.gateway.completeLink({ ...link, defaultCurrency: currency })
	} catch (error: unknown) {
		if (error instanceof LinkCodeInvalidError) {
			logger.warn(`Link code rejected for ${link.telegramUserId}: ${describeError(error)}`)
			await ctx.respond({ text: msg.LINK_CODE_INVALID })
			return null
		}
		logger.error(`Failed to link ${link.telegramUserId}: ${describeError(error)}`)
		const retry: ConversationState = { name: 'awaiting_link_currency', link }
		await ctx.respond(promptWithNotice(msg.GENERIC_FAILURE, retry, ctx.options))
		return retry
	}
	logger.log(`Linked Telegram user ${link.telegramUserId} with currency ${currency}`)
	await ctx.respond({ text: msg.linkedText(currency) })
	return null
}

export const linkTransitions: { [K in LinkStateName]: StateTransitions<K> } = {
	awaiting_link_currency: {
		text: reprompt,
		button: onCurrencyPick,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_custom_currency: {
		text: onCustomCurrency,
		button: reprompt,
		cancel: endSession,
		timeout: endSession
	}
}
