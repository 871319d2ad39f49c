import type {
	Account,
	BackendGateway,
	Category,
	TransactionKind
} from '../backend/backend.types'
import type { CallbackAction } from '../../shared/callback-data'
import type { ChoiceKeyboard } from '../../shared/keyboards/choice-keyboard'

export type FlowFamily = 'transaction' | 'link'

export interface SelectedAccount {
	id: string
	name: string
}

export interface SelectedCategory {
	id: string
	name: string
	icon: string
}

/** Working memory of an expense or income flow before the amount is known. */
export interface TransactionSetup {
	kind: TransactionKind
	authToken: string
	accounts: Account[]
	categories: Category[]
	account: SelectedAccount
	category: SelectedCategory | null
	currency: string
	defaultCurrency: string
}

export interface TransactionDraft extends TransactionSetup {
	amountMinor: number
	description: string
}

export interface LinkDraft {
	linkCode: string
	telegramUserId: string
	username: string
	firstName: string
}

export interface TransactionStatePayloads {
	awaiting_amount: { setup: TransactionSetup }
	awaiting_category: { draft: TransactionDraft; page: number }
	awaiting_account: { draft: TransactionDraft }
	confirm: { draft: TransactionDraft }
	awaiting_new_category_name: { draft: TransactionDraft }
	awaiting_new_category_parent: { draft: TransactionDraft; categoryName: string }
	awaiting_new_category_icon: {
		draft: TransactionDraft
		categoryName: string
		parentId: string | null
	}
	awaiting_new_account_name: { draft: TransactionDraft }
	awaiting_currency_choice: { draft: TransactionDraft }
	awaiting_new_currency_code: { draft: TransactionDraft }
}

export interface LinkStatePayloads {
	awaiting_link_currency: { link: LinkDraft }
	awaiting_custom_currency: { link: LinkDraft }
}

export interface StatePayloads extends TransactionStatePayloads, LinkStatePayloads {}

export type StateName = keyof StatePayloads
export type TransactionStateName = keyof TransactionStatePayloads
export type LinkStateName = keyof LinkStatePayloads

export type StateOf<K extends StateName> = { name: K } & StatePayloads[K]

export type ConversationState = { [K in StateName]: StateOf<K> }[StateName]

export type InputCategory = 'text' | 'button' | 'cancel' | 'timeout'

export type TransitionInput =
	| { category: 'text'; text: string }
	| { category: 'button'; action: CallbackAction; messageId: number }
	| { category: 'cancel' }
	| { category: 'timeout' }

export type InputOf<C extends InputCategory> = Extract<TransitionInput, { category: C }>

export interface TelegramUser {
	id: number
	username?: string
	firstName?: string
}

interface InboundBase {
	chatId: number
	from: TelegramUser
}

export type InboundEvent =
	| (InboundBase & { kind: 'command'; command: string; args: string })
	| (InboundBase & { kind: 'text'; text: string })
	| (InboundBase & { kind: 'button'; payload: string; messageId: number })

/** Messages are rendered as Telegram HTML; dynamic text must be escaped. */
export interface OutboundMessage {
	text: string
	keyboard?: ChoiceKeyboard
}

/** Handle of a delivered message, used to edit it in place later. */
export interface SentMessage {
	messageId: number
}

export interface ReplyChannel {
	send(message: OutboundMessage): Promise<SentMessage>
	/** Edits in place; falls back to sending when the message can no longer be edited. */
	edit(target: SentMessage, message: OutboundMessage): Promise<SentMessage>
}

export interface ConversationOptions {
	transactionTimeoutMs: number
	linkTimeoutMs: number
	defaultCurrency: string
}

export const CONVERSATION_OPTIONS = Symbol('CONVERSATION_OPTIONS')

export interface FlowContext {
	gateway: BackendGateway
	options: ConversationOptions
	/** Shows a prompt, editing the pressed message for button input. */
	respond(message: OutboundMessage): Promise<void>
}

export type Handler<K extends StateName, C extends InputCategory> = (
	ctx: FlowContext,
	state: StateOf<K>,
	input: InputOf<C>
) => Promise<ConversationState | null>

export type StateTransitions<K extends StateName> = {
	[C in InputCategory]: Handler<K, C>
}

export type TransitionTable = { [K in StateName]: StateTransitions<K> }
