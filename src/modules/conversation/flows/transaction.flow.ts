import { Logger } from '@nestjs/common'
import type {
	Account,
	Category,
	ResolvedUser,
	TransactionKind
} from '../../backend/backend.types'
import { describeError } from '../../backend/backend.errors'
import { paginateCategories, parentCandidates } from '../../../shared/keyboards/categories'
import { isEligibleAccount, pickDefaultAccount } from '../../../utils/accounts'
import { parseCurrencyCode, preferredCurrency } from '../../../utils/currency'
import { titleCase } from '../../../utils/format'
import type {
	ConversationState,
	FlowContext,
	InputOf,
	StateOf,
	StateTransitions,
	TelegramUser,
	TransactionDraft,
	TransactionSetup,
	TransactionStateName
} from '../conversation.types'
import { promptFor, promptWithNotice } from '../conversation.prompts'
import { endSession, reprompt } from '../transition-table'
import { extractAccountAndCategory, parseAmountAndDescription } from '../entity-matcher.util'
import * as msg from '../elements/messages'
import { txSuccessText } from '../elements/tx-confirm-msg'

const logger = new Logger('TransactionFlow')

const goTo = async (ctx: FlowContext, state: ConversationState) => {
	await ctx.respond(promptFor(state, ctx.options))
	return state
}

const stayWithNotice = async (ctx: FlowContext, notice: string, state: ConversationState) => {
	await ctx.respond(promptWithNotice(notice, state, ctx.options))
	return state
}

const toConfirm = (ctx: FlowContext, draft: TransactionDraft) =>
	goTo(ctx, { name: 'confirm', draft })

const selectAccount = (account: Pick<Account, 'id' | 'name'>) => ({
	id: account.id,
	name: account.name
})

const selectCategory = (category: Pick<Category, 'id' | 'name' | 'icon'>) => ({
	id: category.id,
	name: category.name,
	icon: category.icon
})

/**
 * /expense and /income. Resolves the user, loads accounts and categories, and
 * either asks for the amount or hands trailing text to the amount step.
 */
export async function startTransaction(
	ctx: FlowContext,
	kind: TransactionKind,
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
	if (!user) {
		await ctx.respond({ text: msg.NOT_LINKED })
		return null
	}
	ctx.gateway.recordActivity(telegramUserId)

	let accounts: Account[]
	try {
		accounts = await ctx.gateway.listAccounts(user.authToken)
	} catch (error: unknown) {
		logger.error(`Failed to load accounts for ${telegramUserId}: ${describeError(error)}`)
		await ctx.respond({ text: msg.GENERIC_FAILURE })
		return null
	}
	const account = pickDefaultAccount(accounts)
	if (!account) {
		await ctx.respond({ text: msg.NO_ELIGIBLE_ACCOUNT })
		return null
	}

	let categories: Category[] = []
	try {
		categories = await ctx.gateway.listCategories(user.authToken)
	} catch (error: unknown) {
		logger.warn(
			`Failed to load categories for ${telegramUserId}, continuing without: ${describeError(error)}`
		)
	}

	const currency = preferredCurrency(user.defaultCurrency, ctx.options.defaultCurrency)
	const setup: TransactionSetup = {
		kind,
		authToken: user.authToken,
		accounts: [...accounts],
		categories: [...categories],
		account: selectAccount(account),
		category: null,
		currency,
		defaultCurrency: currency
	}
	const state: StateOf<'awaiting_amount'> = { name: 'awaiting_amount', setup }

	if (args.trim()) return onAmountText(ctx, state, { category: 'text', text: args })
	return goTo(ctx, state)
}

async function onAmountText(
	ctx: FlowContext,
	state: StateOf<'awaiting_amount'>,
	input: InputOf<'text'>
): Promise<ConversationState> {
	const parsed = parseAmountAndDescription(input.text)
	if (!parsed || parsed.amountMinor <= 0) {
		await ctx.respond({ text: msg.INVALID_AMOUNT })
		return state
	}

	const { setup } = state
	const match = extractAccountAndCategory(parsed.description, setup.accounts, setup.categories)
	const draft: TransactionDraft = {
		...setup,
		account: match.account ? selectAccount(match.account) : setup.account,
		category: match.category ? selectCategory(match.category) : setup.category,
		amountMinor: parsed.amountMinor,
		description: match.description
	}

	if (match.category || !draft.categories.length) return toConfirm(ctx, draft)
	return goTo(ctx, { name: 'awaiting_category', draft, page: 0 })
}

async function onCategoryButton(
	ctx: FlowContext,
	state: StateOf<'awaiting_category'>,
	input: InputOf<'button'>
): Promise<ConversationState> {
	const { action } = input
	if (action.ns !== 'cat') return reprompt(ctx, state)
	const { draft } = state

	switch (action.kind) {
		case 'page':
			return goTo(ctx, {
				...state,
				page: paginateCategories(draft.categories, action.page).page
			})
		case 'new':
			return goTo(ctx, { name: 'awaiting_new_category_name', draft })
		case 'none':
			return toConfirm(ctx, { ...draft, category: null })
		case 'select': {
			const category = draft.categories.find(c => c.id === action.id)
			if (!category) return reprompt(ctx, state)
			return toConfirm(ctx, { ...draft, category: selectCategory(category) })
		}
	}
}

async function onAccountButton(
	ctx: FlowContext,
	state: StateOf<'awaiting_account'>,
	input: InputOf<'button'>
): Promise<ConversationState> {
	const { action } = input
	if (action.ns !== 'acc') return reprompt(ctx, state)
	const { draft } = state

	switch (action.kind) {
		case 'back':
			return toConfirm(ctx, draft)
		case 'new':
			return goTo(ctx, { name: 'awaiting_new_account_name', draft })
		case 'select': {
			const account = draft.accounts.find(a => a.id === action.id && isEligibleAccount(a))
			if (!account) return reprompt(ctx, state)
			return toConfirm(ctx, { ...draft, account: selectAccount(account) })
		}
	}
}

async function onConfirmButton(
	ctx: FlowContext,
	state: StateOf<'confirm'>,
	input: InputOf<'button'>
): Promise<ConversationState | null> {
	const { action } = input
	if (action.ns !== 'txn') return reprompt(ctx, state)
	const { draft } = state

	switch (action.kind) {
		case 'confirm':
			return commit(ctx, state)
		case 'chg_cat':
			return goTo(ctx, { name: 'awaiting_category', draft, page: 0 })
		case 'chg_acc':
			return goTo(ctx, { name: 'awaiting_account', draft })
		case 'chg_ccy':
			return goTo(ctx, { name: 'awaiting_currency_choice', draft })
		default:
			return reprompt(ctx, state)
	}
}

async function commit(
	ctx: FlowContext,
	state: StateOf<'confirm'>
): Promise<ConversationState | null> {
	const { draft } = state
	try {
		const created = await ctx.gateway.createTransaction(draft.authToken, {
			type: draft.kind,
			accountId: draft.account.id,
			amountMinorUnits: draft.amountMinor,
			description: draft.description || titleCase(draft.kind),
			...(draft.category ? { categoryId: draft.category.id } : {})
		})
		logger.log(`Recorded ${draft.kind} ${created.id ?? '(no id)'} on account ${draft.account.id}`)
	} catch (error: unknown) {
		logger.error(`Failed to record ${draft.kind}: ${describeError(error)}`)
		return stayWithNotice(ctx, msg.GENERIC_FAILURE, state)
	}
	// the transaction exists now; a lost confirmation must not reopen the flow
	try {
		await ctx.respond({ text: txSuccessText(draft) })
	} catch (error: unknown) {
		logger.warn(`Recorded ${draft.kind} but the confirmation was not delivered: ${describeError(error)}`)
	}
	return null
}

async function onNewCategoryName(
	ctx: FlowContext,
	state: StateOf<'awaiting_new_category_name'>,
	input: InputOf<'text'>
): Promise<ConversationState> {
	const categoryName = input.text.trim()
	if (!categoryName) {
		await ctx.respond({ text: msg.EMPTY_CATEGORY_NAME })
		return state
	}
	return goTo(ctx, { name: 'awaiting_new_category_parent', draft: state.draft, categoryName })
}

async function onNewCategoryParent(
	ctx: FlowContext,
	state: StateOf<'awaiting_new_category_parent'>,
	input: InputOf<'button'>
): Promise<ConversationState> {
	const { action } = input
	if (action.ns !== 'ncp') return reprompt(ctx, state)
	const { draft, categoryName } = state

	let parentId: string | null = null
	if (action.kind === 'select') {
		const parent = parentCandidates(draft.categories, draft.kind).find(c => c.id === action.id)
		if (!parent) return reprompt(ctx, state)
		parentId = parent.id
	}
	return goTo(ctx, { name: 'awaiting_new_category_icon', draft, categoryName, parentId })
}

/** An icon is the first two code points of the reply, enough for most emoji. */
const iconFrom = (text: string) => Array.from(text.trim()).slice(0, 2).join('').trim()

const onNewCategoryIconText = (
	ctx: FlowContext,
	state: StateOf<'awaiting_new_category_icon'>,
	input: InputOf<'text'>
) => createCategory(ctx, state, iconFrom(input.text))

async function onNewCategoryIconButton(
	ctx: FlowContext,
	state: StateOf<'awaiting_new_category_icon'>,
	input: InputOf<'button'>
): Promise<ConversationState> {
	if (input.action.ns !== 'nci') return reprompt(ctx, state)
	return createCategory(ctx, state, '')
}

async function createCategory(
	ctx: FlowContext,
	state: StateOf<'awaiting_new_category_icon'>,
	icon: string
): Promise<ConversationState> {
	const { draft, categoryName, parentId } = state
	let category: Category
	try {
		category = await ctx.gateway.createCategory(draft.authToken, {
			name: categoryName,
			type: draft.kind,
			...(icon ? { icon } : {}),
			...(parentId ? { parentId } : {})
		})
	} catch (error: unknown) {
		logger.error(`Failed to create category "${categoryName}": ${describeError(error)}`)
		return stayWithNotice(ctx, msg.GENERIC_FAILURE, state)
	}
	return toConfirm(ctx, {
		...draft,
		categories: [...draft.categories, category],
		category: selectCategory(category)
	})
}

async function onNewAccountName(
	ctx: FlowContext,
	state: StateOf<'awaiting_new_account_name'>,
	input: InputOf<'text'>
): Promise<ConversationState> {
	const name = input.text.trim()
	if (!name) {
		await ctx.respond({ text: msg.EMPTY_ACCOUNT_NAME })
		return state
	}
	const { draft } = state
	let account: Account
	try {
		account = await ctx.gateway.createCashAccount(draft.authToken, name, draft.currency)
	} catch (error: unknown) {
		logger.error(`Failed to create account "${name}": ${describeError(error)}`)
		return stayWithNotice(ctx, msg.GENERIC_FAILURE, state)
	}
	return toConfirm(ctx, {
		...draft,
		accounts: [...draft.accounts, account],
		account: selectAccount(account)
	})
}

async function onCurrencyButton(
	ctx: FlowContext,
	state: StateOf<'awaiting_currency_choice'>,
	input: InputOf<'button'>
): Promise<ConversationState> {
	const { action } = input
	if (action.ns !== 'ccy') return reprompt(ctx, state)
	const { draft } = state

	switch (action.kind) {
		case 'back':
			return toConfirm(ctx, draft)
		case 'other':
			return goTo(ctx, { name: 'awaiting_new_currency_code', draft })
		case 'select':
			return toConfirm(ctx, { ...draft, currency: action.code })
	}
}

async function onCurrencyCode(
	ctx: FlowContext,
	state: StateOf<'awaiting_new_currency_code'>,
	input: InputOf<'text'>
): Promise<ConversationState> {
	const currency = parseCurrencyCode(input.text)
	if (!currency) {
		await ctx.respond({ text: msg.INVALID_CURRENCY_CODE })
		return state
	}
	return toConfirm(ctx, { ...state.draft, currency })
}

export const transactionTransitions: { [K in TransactionStateName]: StateTransitions<K> } = {
	awaiting_amount: {
		text: onAmountText,
		button: reprompt,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_category: {
		text: reprompt,
		button: onCategoryButton,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_account: {
		text: reprompt,
		button: onAccountButton,
		cancel: endSession,
		timeout: endSession
	},
	confirm: {
		text: reprompt,
		button: onConfirmButton,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_new_category_name: {
		text: onNewCategoryName,
		button: reprompt,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_new_category_parent: {
		text: reprompt,
		button: onNewCategoryParent,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_new_category_icon: {
		text: onNewCategoryIconText,
		button: onNewCategoryIconButton,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_new_account_name: {
		text: onNewAccountName,
		button: reprompt,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_currency_choice: {
		text: reprompt,
		button: onCurrencyButton,
		cancel: endSession,
		timeout: endSession
	},
	awaiting_new_currency_code: {
		text: onCurrencyCode,
		button: reprompt,
		cancel: endSession,
		timeout: endSession
	}
}
