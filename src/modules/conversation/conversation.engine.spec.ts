import { Logger } from '@nestjs/common'
import { ConversationEngine } from './conversation.engine'
import type { ConversationOptions, InboundEvent, TelegramUser } from './conversation.types'
import * as msg from './elements/messages'
import { SessionStore } from './session-store'
import { FakeBackend, account } from './testing/fake-backend'
import { RecordingChannel } from './testing/recording-channel'

const options: ConversationOptions = {
	transactionTimeoutMs: 300_000,
	linkTimeoutMs: 120_000,
	defaultCurrency: 'MYR'
}

const CONFIRM_PAYLOADS = [
	['txn:chg_cat', 'txn:chg_acc'],
	['txn:chg_ccy'],
	['txn:confirm'],
	['txn:cancel']
]

const coffeeCard = [
	'<b>Expense: RM50.00</b>',
	'Coffee',
	'',
	'Category: 🍔 Food',
	'Account: Cash',
	'Currency: MYR'
].join('\n')

describe('ConversationEngine', () => {
	let now: number
	let backend: FakeBackend
	let store: SessionStore
	let engine: ConversationEngine
	let channel: RecordingChannel
	let user: TelegramUser

	beforeAll(() => {
		Logger.overrideLogger(false)
	})

	beforeEach(() => {
		now = 1_000_000
		jest.spyOn(Date, 'now').mockImplementation(() => now)
		backend = new FakeBackend()
		store = new SessionStore()
		engine = new ConversationEngine(store, backend, options)
		channel = new RecordingChannel()
		user = { id: 7, username: 'sam', firstName: 'Sam' }
	})

	afterEach(() => {
		jest.restoreAllMocks()
	})

	const base = () => ({ chatId: 1, from: user })
	const send = (event: InboundEvent) => engine.handle(event, channel)
	const command = (name: string, args = '') =>
		send({ ...base(), kind: 'command', command: name, args })
	const text = (value: string) => send({ ...base(), kind: 'text', text: value })
	const press = (payload: string, messageId = channel.last.messageId) =>
		send({ ...base(), kind: 'button', payload, messageId })
	const key = () => SessionStore.keyOf(1, user.id)
	const transaction = () => store.peek(key(), 'transaction')?.state
	const link = () => store.peek(key(), 'link')?.state

	describe('entry', () => {
		it('asks for a category after "/expense 50 Coffee"', async () => {
			await command('expense', '50 Coffee')

			expect(transaction()).toMatchObject({
				name: 'awaiting_category',
				page: 0,
				draft: {
					kind: 'expense',
					amountMinor: 5000,
					description: 'Coffee',
					account: { id: 'a1', name: 'Cash' },
					category: null,
					currency: 'MYR'
				}
			})
			expect(channel.last).toMatchObject({ op: 'send', messageId: 100 })
			expect(channel.lastText).toBe('<b>Expense: RM50.00</b>\nCoffee\n\nSelect a category:')
			expect(channel.lastPayloads).toEqual([
				['cat:c1', 'cat:c2'],
				['cat:new', 'cat:none']
			])
			expect(backend.callsTo('recordActivity')).toHaveLength(1)
		})

		it('takes a trailing account name from "/expense 50 Coffee Wallet"', async () => {
			await command('expense', '50 Coffee Wallet')

			expect(transaction()).toMatchObject({
				name: 'awaiting_category',
				draft: { amountMinor: 5000, description: 'Coffee', account: { id: 'a2', name: 'Wallet' } }
			})
		})

		it('goes straight to confirm when a category matches', async () => {
			await command('expense', '50 Coffee Food')

			expect(transaction()?.name).toBe('confirm')
			expect(channel.lastText).toBe(coffeeCard)
			expect(channel.lastPayloads).toEqual(CONFIRM_PAYLOADS)
		})

		it('shows the same confirm card on the quick and guided paths', async () => {
			await command('income', '12.5 Refund Food Wallet')
			const quick = channel.last.message

			await command('income')
			expect(channel.lastText).toBe(
				'How much was the income?\nType the amount, or amount and description (e.g. <code>50 Coffee</code>)'
			)
			await text('12.5 Refund Food Wallet')

			expect(channel.last.message).toEqual(quick)
			expect(quick.text).toBe(
				'<b>Income: RM12.50</b>\nRefund\n\nCategory: 🍔 Food\nAccount: Wallet\nCurrency: MYR'
			)
		})

		it('confirms directly and falls back to the kind as description without categories', async () => {
			backend.categories = []

			await command('expense', '5')

			expect(channel.lastText).toBe(
				'<b>Expense: RM5.00</b>\nExpense\n\nCategory: None\nAccount: Cash\nCurrency: MYR'
			)
			await press('txn:confirm')
			expect(backend.transactions).toEqual([
				{ type: 'expense', accountId: 'a1', amountMinorUnits: 500, description: 'Expense' }
			])
		})

		it('re-prompts for a bad amount without leaving the amount step', async () => {
			await command('expense')
			await text('Coffee')
			expect(channel.lastText).toBe(msg.INVALID_AMOUNT)
			await text('0')
			expect(channel.lastText).toBe(msg.INVALID_AMOUNT)

			expect(transaction()?.name).toBe('awaiting_amount')
		})

		it('defaults to the first active eligible account', async () => {
			backend.accounts = [
				account('s1', 'Stocks', { type: 'investment' }),
				account('old', 'Old', { isActive: false }),
				account('card', 'Card', { type: 'credit_card' })
			]

			await command('expense', '5 Tea')

			expect(transaction()).toMatchObject({ draft: { account: { id: 'card', name: 'Card' } } })
		})

		it('refuses users who are not linked', async () => {
			user = { id: 8 }

			await command('expense', '50 Coffee')

			expect(channel.lastText).toBe(msg.NOT_LINKED)
			expect(store.size).toBe(0)
			expect(backend.callsTo('listAccounts')).toHaveLength(0)
		})

		it('stops when there is no eligible account', async () => {
			backend.accounts = [account('s1', 'Stocks', { type: 'investment' })]

			await command('expense', '50 Coffee')

			expect(channel.lastText).toBe(msg.NO_ELIGIBLE_ACCOUNT)
			expect(store.size).toBe(0)
		})

		it('reports a generic failure when the backend is down', async () => {
			backend.failReads = true

			await command('expense', '50 Coffee')

			expect(channel.lastText).toBe(msg.GENERIC_FAILURE)
			expect(store.size).toBe(0)
		})

		it('replaces a running flow of the same family', async () => {
			await command('expense', '50 Coffee')
			await command('income', '20 Salary')

			expect(store.size).toBe(1)
			expect(transaction()).toMatchObject({ draft: { kind: 'income', amountMinor: 2000 } })
		})
	})

	describe('selection', () => {
		beforeEach(async () => {
			await command('expense', '50 Coffee')
		})

		it('edits the picker into the confirm card', async () => {
			await press('cat:c1', 100)

			expect(channel.last).toMatchObject({ op: 'edit', messageId: 100 })
			expect(channel.lastText).toBe(coffeeCard)
		})

		it('clamps a page past the end', async () => {
			await press('cat:page:5')

			expect(transaction()).toMatchObject({ name: 'awaiting_category', page: 0 })
		})

		it('records an uncategorized transaction after skip', async () => {
			await press('cat:none')
			await press('txn:confirm')

			expect(backend.transactions).toEqual([
				{ type: 'expense', accountId: 'a1', amountMinorUnits: 5000, description: 'Coffee' }
			])
		})

		it('changes the account from the confirm card', async () => {
			await press('cat:c1')
			await press('txn:chg_acc')
			expect(channel.lastText).toBe(msg.SELECT_ACCOUNT)
			expect(channel.lastPayloads).toEqual([
				['acc:a1', 'acc:a2'],
				['acc:new', 'acc:back']
			])

			await press('acc:a2')
			expect(transaction()).toMatchObject({ name: 'confirm', draft: { account: { id: 'a2' } } })
		})

		it('ignores an account that is not in the list', async () => {
			await press('cat:c1')
			await press('txn:chg_acc')
			await press('acc:missing')

			expect(transaction()?.name).toBe('awaiting_account')
			expect(channel.lastText).toBe(msg.SELECT_ACCOUNT)
		})

		it('returns to confirm unchanged on back', async () => {
			await press('cat:c1')
			await press('txn:chg_ccy')
			await press('ccy:back')

			expect(channel.lastText).toBe(coffeeCard)
		})

		it('re-prompts when text arrives where a button is expected', async () => {
			await text('hello')

			expect(channel.last.op).toBe('send')
			expect(channel.lastText).toBe('<b>Expense: RM50.00</b>\nCoffee\n\nSelect a category:')
			expect(transaction()?.name).toBe('awaiting_category')
		})
	})

	describe('currency', () => {
		beforeEach(async () => {
			await command('expense', '50 Coffee Food')
			await press('txn:chg_ccy')
		})

		it('offers the default currency and other', () => {
			expect(channel.lastText).toBe(msg.SELECT_CURRENCY)
			expect(channel.lastPayloads).toEqual([['ccy:MYR', 'ccy:other'], ['ccy:back']])
		})

		it('rejects "jp" and accepts "JPY"', async () => {
			await press('ccy:other')
			expect(channel.lastText).toBe(msg.CURRENCY_CODE)

			await text('jp')
			expect(channel.lastText).toBe(msg.INVALID_CURRENCY_CODE)
			expect(transaction()?.name).toBe('awaiting_new_currency_code')

			await text('JPY')
			expect(transaction()).toMatchObject({ name: 'confirm', draft: { currency: 'JPY' } })
			expect(channel.lastText).toBe(
				'<b>Expense: JPY 50.00</b>\nCoffee\n\nCategory: 🍔 Food\nAccount: Cash\nCurrency: JPY'
			)
		})

		it('stores a lowercase code uppercased', async () => {
			await press('ccy:other')
			await text(' usd ')

			expect(transaction()).toMatchObject({ draft: { currency: 'USD' } })
		})
	})

	describe('commit', () => {
		beforeEach(async () => {
			await command('expense', '50 Coffee Food')
		})

		it('creates the transaction once and ends the session', async () => {
			await press('txn:confirm')
			expect(channel.lastText).toBe(
				'<b>Expense Recorded</b>\n\nAmount: RM50.00\nDescription: Coffee\nCategory: 🍔 Food\nAccount: Cash'
			)
			expect(store.size).toBe(0)

			await press('txn:confirm')
			await press('txn:confirm')

			expect(channel.lastText).toBe(msg.TRANSACTION_SESSION_EXPIRED)
			expect(backend.transactions).toEqual([
				{
					type: 'expense',
					accountId: 'a1',
					amountMinorUnits: 5000,
					description: 'Coffee',
					categoryId: 'c1'
				}
			])
		})

		it('ends the session even when the confirmation cannot be delivered', async () => {
			channel.failNextEdit = true
			await press('txn:confirm')

			expect(store.size).toBe(0)

			await press('txn:confirm')

			expect(channel.lastText).toBe(msg.TRANSACTION_SESSION_EXPIRED)
			expect(backend.callsTo('createTransaction')).toHaveLength(1)
		})

		it('keeps the session for a retry when the backend fails', async () => {
			backend.failWrites = true
			await press('txn:confirm')

			expect(channel.lastText).toBe(`${msg.GENERIC_FAILURE}\n\n${coffeeCard}`)
			expect(channel.lastPayloads).toEqual(CONFIRM_PAYLOADS)
			expect(transaction()?.name).toBe('confirm')

			backend.failWrites = false
			await press('txn:confirm')

			expect(store.size).toBe(0)
			expect(backend.callsTo('createTransaction')).toHaveLength(2)
		})
	})

	describe('new category', () => {
		beforeEach(async () => {
			await command('expense', '50 Coffee')
			await press('cat:new')
		})

		it('creates a subcategory and keeps it in the picker', async () => {
			expect(channel.lastText).toBe(msg.NEW_CATEGORY_NAME)

			await text('  ')
			expect(channel.lastText).toBe(msg.EMPTY_CATEGORY_NAME)

			await text('Snacks')
			expect(channel.lastText).toBe(
				'Category: <b>Snacks</b>\n\nIs this a subcategory of an existing category?'
			)
			expect(channel.lastPayloads).toEqual([['ncp:c1', 'ncp:c2'], ['ncp:none']])

			await press('ncp:c1')
			expect(channel.lastText).toBe(msg.CATEGORY_ICON)
			expect(channel.lastPayloads).toEqual([['nci:skip']])

			await text('🍪')
			expect(backend.callsTo('createCategory')[0].args).toEqual([
				'test-token',
				{ name: 'Snacks', type: 'expense', icon: '🍪', parentId: 'c1' }
			])
			expect(transaction()).toMatchObject({
				name: 'confirm',
				draft: { category: { id: 'c-new-1', name: 'Snacks', icon: '🍪' } }
			})

			await press('txn:chg_cat')
			expect(channel.lastPayloads).toEqual([
				['cat:c1', 'cat:c-new-1', 'cat:c2'],
				['cat:new', 'cat:none']
			])
		})

		it('creates a top-level category without an icon', async () => {
			await text('Gifts')
			await press('ncp:none')
			await press('nci:skip')

			expect(backend.callsTo('createCategory')[0].args).toEqual([
				'test-token',
				{ name: 'Gifts', type: 'expense' }
			])
		})

		it('stays on the icon step when creation fails', async () => {
			await text('Gifts')
			await press('ncp:none')
			backend.failWrites = true
			await press('nci:skip')

			expect(channel.lastText).toBe(`${msg.GENERIC_FAILURE}\n\n${msg.CATEGORY_ICON}`)
			expect(transaction()).toMatchObject({
				name: 'awaiting_new_category_icon',
				categoryName: 'Gifts',
				parentId: null
			})
		})
	})

	describe('new account', () => {
		it('creates a cash account in the draft currency and selects it', async () => {
			await command('expense', '50 Coffee Food')
			await press('txn:chg_acc')
			await press('acc:new')
			expect(channel.lastText).toBe(msg.NEW_ACCOUNT_NAME)

			await text('Travel')

			expect(backend.callsTo('createCashAccount')[0].args).toEqual(['test-token', 'Travel', 'MYR'])
			expect(transaction()).toMatchObject({
				name: 'confirm',
				draft: { account: { id: 'a-new-1', name: 'Travel' } }
			})
			expect(channel.lastText).toContain('Account: Travel')
		})
	})

	describe('cancel and timeout', () => {
		it('cancels from the confirm card without calling the backend', async () => {
			await command('expense', '50 Coffee Food')
			const callsBefore = backend.calls.length

			await press('txn:cancel')

			expect(channel.last).toMatchObject({ op: 'edit', messageId: 100, message: { text: msg.CANCELLED } })
			expect(store.size).toBe(0)
			expect(backend.calls).toHaveLength(callsBefore)
		})

		it('cancels with /cancel once and then does nothing', async () => {
			await command('expense', '50 Coffee')
			await command('cancel')

			expect(channel.last).toMatchObject({ op: 'edit', messageId: 100, message: { text: msg.CANCELLED } })
			const opsAfterCancel = channel.ops.length

			await command('cancel')
			await press('txn:cancel', 100)

			expect(channel.ops).toHaveLength(opsAfterCancel)
			expect(store.size).toBe(0)
		})

		it('answers a stale button with session expired after the idle timeout', async () => {
			await command('expense', '50 Coffee')
			const callsBefore = backend.calls.length

			now += options.transactionTimeoutMs
			await press('cat:c1', 100)

			expect(channel.last).toMatchObject({
				op: 'edit',
				messageId: 100,
				message: { text: msg.TRANSACTION_SESSION_EXPIRED }
			})
			expect(backend.calls).toHaveLength(callsBefore)
			expect(store.size).toBe(0)
		})

		it('keeps an active session alive', async () => {
			await command('expense', '50 Coffee')
			now += options.transactionTimeoutMs - 1
			await press('cat:c1', 100)
			now += options.transactionTimeoutMs - 1

			expect(await engine.expireIdleSessions()).toBe(0)
			expect(transaction()?.name).toBe('confirm')
		})

		it('evicts idle sessions silently', async () => {
			await command('expense', '50 Coffee')
			const opsBefore = channel.ops.length

			now += options.transactionTimeoutMs
			expect(await engine.expireIdleSessions()).toBe(1)

			expect(store.size).toBe(0)
			expect(channel.ops).toHaveLength(opsBefore)
		})

		it('ignores free text and unknown buttons without a session', async () => {
			await text('50 Coffee')
			await press('home:open', 5)

			expect(channel.ops).toEqual([])
		})
	})

	describe('link', () => {
		beforeEach(() => {
			user = { id: 9, username: 'kim', firstName: 'Kim' }
		})

		it('explains linking when no code is given', async () => {
			await command('start')

			expect(channel.lastText).toBe(msg.LINK_WELCOME)
			expect(store.size).toBe(0)
		})

		it('tells a linked user they are already linked', async () => {
			user = { id: 7 }
			await command('start', 'LINK42')

			expect(channel.lastText).toBe(msg.ALREADY_LINKED)
			expect(store.size).toBe(0)
		})

		it('links with a custom currency', async () => {
			await command('start', 'LINK42')
			expect(channel.lastText).toBe(msg.CHOOSE_DEFAULT_CURRENCY)
			expect(channel.lastPayloads).toEqual([['cur:MYR', 'cur:other']])

			await press('cur:other')
			await text('eu')
			expect(channel.lastText).toBe(msg.INVALID_CURRENCY_CODE)
			await text('eur')

			expect(backend.callsTo('completeLink')[0].args).toEqual([
				{
					linkCode: 'LINK42',
					telegramUserId: '9',
					username: 'kim',
					firstName: 'Kim',
					defaultCurrency: 'EUR'
				}
			])
			expect(channel.lastText).toBe(msg.linkedText('EUR'))
			expect(store.size).toBe(0)
		})

		it('ends the flow on an invalid code', async () => {
			await command('start', 'NOPE')
			await press('cur:MYR')

			expect(channel.lastText).toBe(msg.LINK_CODE_INVALID)
			expect(store.size).toBe(0)
		})

		it('keeps the flow when the backend is unavailable', async () => {
			await command('start', 'LINK42')
			backend.failWrites = true
			await press('cur:MYR')

			expect(channel.lastText).toBe(`${msg.GENERIC_FAILURE}\n\n${msg.CHOOSE_DEFAULT_CURRENCY}`)
			expect(channel.lastPayloads).toEqual([['cur:MYR', 'cur:other']])
			expect(link()?.name).toBe('awaiting_link_currency')
		})

		it('answers a currency button with no flow with the link expiry text', async () => {
			await press('cur:MYR', 42)

			expect(channel.last).toMatchObject({
				op: 'edit',
				messageId: 42,
				message: { text: msg.LINK_SESSION_EXPIRED }
			})
		})

		it('runs beside a transaction flow', async () => {
			await command('start', 'LINK42')
			backend.users.set('9', { backendUserId: 'u9', authToken: 'test-token', defaultCurrency: null })
			await command('expense', '50 Coffee')

			expect(store.list(key()).map(s => s.family)).toEqual(['transaction', 'link'])

			await press('cur:MYR', 100)
			expect(channel.lastText).toBe(msg.linkedText('MYR'))
			expect(transaction()?.name).toBe('awaiting_category')
		})
	})
})
