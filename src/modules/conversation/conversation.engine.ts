import { Inject, Injectable, Logger } from '@nestjs/common'
import { BACKEND_GATEWAY, type BackendGateway } from '../backend/backend.types'
import { type CallbackAction, parseCallbackData } from '../../shared/callback-data'
import {
	CONVERSATION_OPTIONS,
	type ConversationOptions,
	type ConversationState,
	type FlowContext,
	type FlowFamily,
	type InboundEvent,
	type OutboundMessage,
	type ReplyChannel,
	type StateName,
	type TransitionInput,
	type TransitionTable
} from './conversation.types'
import * as msg from './elements/messages'
import { linkTransitions, startLink } from './flows/link.flow'
import { startTransaction, transactionTransitions } from './flows/transaction.flow'
import { type Session, SessionStore } from './session-store'
import { acceptsText, runTransition, validateTransitionTable } from './transition-table'

export const TRANSITIONS: TransitionTable = {
	...transactionTransitions,
	...linkTransitions
}

export const ENTRY_COMMANDS = ['start', 'expense', 'income', 'cancel'] as const

export type EntryCommand = (typeof ENTRY_COMMANDS)[number]

const SESSION_EXPIRED: Record<FlowFamily, string> = {
	transaction: msg.TRANSACTION_SESSION_EXPIRED,
	link: msg.LINK_SESSION_EXPIRED
}

const familyOf = (action: CallbackAction): FlowFamily =>
	action.ns === 'cur' ? 'link' : 'transaction'

/**
 * Routes inbound events to per-user sessions and runs them through the
 * transition table. Every event for one chat and user is handled in order.
 */
@Injectable()
export class ConversationEngine {
	private readonly logger = new Logger(ConversationEngine.name)
	private readonly table: TransitionTable = TRANSITIONS

	constructor(
		private readonly store: SessionStore,
		@Inject(BACKEND_GATEWAY) private readonly gateway: BackendGateway,
		@Inject(CONVERSATION_OPTIONS) private readonly options: ConversationOptions
	) {
		validateTransitionTable(this.table)
	}

	get sessionCount(): number {
		return this.store.size
	}

	handle(event: InboundEvent, channel: ReplyChannel): Promise<void> {
		const key = SessionStore.keyOf(event.chatId, event.from.id)
		return this.store.runExclusive(key, async () => {
			switch (event.kind) {
				case 'command':
					return this.onCommand(key, event, channel)
				case 'text':
					return this.onText(key, event.text, channel)
				case 'button':
					return this.onButton(key, event.payload, event.messageId, channel)
			}
		})
	}

	/** Runs the timeout transition for every idle session. Nothing is sent. */
	async expireIdleSessions(now = Date.now()): Promise<number> {
		const expired = this.store.expired(now)
		const results = await Promise.all(
			expired.map(session =>
				this.store.runExclusive(session.key, async () => {
					const current = this.store.peek(session.key, session.family)
					if (!current || current.revision !== session.revision) return false
					await this.expire(current)
					return true
				})
			)
		)
		return results.filter(Boolean).length
	}

	private async onCommand(
		key: string,
		event: Extract<InboundEvent, { kind: 'command' }>,
		channel: ReplyChannel
	): Promise<void> {
		switch (event.command) {
			case 'expense':
			case 'income': {
				this.store.delete(key, 'transaction')
				const ctx = this.context(channel)
				const next = await startTransaction(ctx.flow, event.command, event.from, event.args)
				this.persist(key, 'transaction', next, ctx.promptMessageId())
				return
			}
			case 'start': {
				this.store.delete(key, 'link')
				const ctx = this.context(channel)
				const next = await startLink(ctx.flow, event.from, event.args)
				this.persist(key, 'link', next, ctx.promptMessageId())
				return
			}
			case 'cancel':
				return this.cancelAll(key, channel)
			default:
				this.logger.debug(`Ignoring command /${event.command}`)
		}
	}

	private async onText(key: string, text: string, channel: ReplyChannel): Promise<void> {
		const sessions = await this.liveSessions(key)
		const target = sessions.find(s => acceptsText(s.state)) ?? sessions[0]
		if (!target) return
		await this.step(target, { category: 'text', text }, channel)
	}

	private async onButton(
		key: string,
		payload: string,
		messageId: number,
		channel: ReplyChannel
	): Promise<void> {
		const action = parseCallbackData(payload)
		if (!action) {
			this.logger.debug(`Ignoring unknown callback payload "${payload}"`)
			return
		}
		const family = familyOf(action)
		const session = await this.liveSession(key, family)
		const pressed = { messageId }

		if (action.ns === 'txn' && action.kind === 'cancel') {
			if (!session) return
			await this.cancel(session)
			await channel.edit(pressed, { text: msg.CANCELLED })
			return
		}
		if (!session) {
			await channel.edit(pressed, { text: SESSION_EXPIRED[family] })
			return
		}
		await this.step(session, { category: 'button', action, messageId }, channel, messageId)
	}

	private async cancelAll(key: string, channel: ReplyChannel): Promise<void> {
		const sessions = await this.liveSessions(key)
		if (!sessions.length) return
		for (const session of sessions) await this.cancel(session)

		const [latest] = sessions
		const ack: OutboundMessage = { text: msg.CANCELLED }
		if (latest.promptMessageId === undefined) await channel.send(ack)
		else await channel.edit({ messageId: latest.promptMessageId }, ack)
	}

	private async cancel(session: Session): Promise<void> {
		this.store.delete(session.key, session.family)
		await this.transition(session, { category: 'cancel' }, this.silentContext())
		this.logger.debug(`Cancelled ${session.family} session ${session.key}`)
	}

	private async expire(session: Session): Promise<void> {
		this.store.delete(session.key, session.family)
		await this.transition(session, { category: 'timeout' }, this.silentContext())
		this.logger.debug(`Evicted idle ${session.family} session ${session.key}`)
	}

	private async step(
		session: Session,
		input: TransitionInput,
		channel: ReplyChannel,
		editMessageId?: number
	): Promise<void> {
		const ctx = this.context(channel, editMessageId)
		const next = await this.transition(session, input, ctx.flow)
		this.persist(
			session.key,
			session.family,
			next,
			ctx.promptMessageId() ?? session.promptMessageId
		)
	}

	private transition(
		session: Session,
		input: TransitionInput,
		ctx: FlowContext
	): Promise<ConversationState | null> {
		return runTransition<StateName>(this.table, ctx, session.state.name, session.state, input)
	}

	private persist(
		key: string,
		family: FlowFamily,
		next: ConversationState | null,
		promptMessageId: number | undefined
	): void {
		if (!next) {
			this.store.delete(key, family)
			return
		}
		this.store.save({ key, family, state: next, promptMessageId }, this.ttl(family))
	}

	private ttl(family: FlowFamily): number {
		return family === 'link' ? this.options.linkTimeoutMs : this.options.transactionTimeoutMs
	}

	/** Live sessions of a key, most recent first; expired ones are evicted on the way. */
	private async liveSessions(key: string): Promise<Session[]> {
		const live: Session[] = []
		for (const session of this.store.list(key)) {
			if (this.store.isExpired(session)) await this.expire(session)
			else live.push(session)
		}
		return live
	}

	private async liveSession(key: string, family: FlowFamily): Promise<Session | null> {
		const session = this.store.peek(key, family)
		if (!session) return null
		if (!this.store.isExpired(session)) return session
		await this.expire(session)
		return null
	}

	/**
	 * Flow context whose responses edit the pressed message for button input and
	 * send a new message otherwise. Remembers the last prompt delivered.
	 */
	private context(channel: ReplyChannel, editMessageId?: number) {
		let promptMessageId: number | undefined
		const flow: FlowContext = {
			gateway: this.gateway,
			options: this.options,
			respond: async message => {
				const sent =
					editMessageId === undefined
						? await channel.send(message)
						: await channel.edit({ messageId: editMessageId }, message)
				promptMessageId = sent.messageId
			}
		}
		return { flow, promptMessageId: () => promptMessageId }
	}

	private silentContext(): FlowContext {
		return {
			gateway: this.gateway,
			options: this.options,
			respond: async message => {
				this.logger.warn(`Dropped a message from a closing session: ${message.text}`)
			}
		}
	}
}
