import { Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { account, FakeBackend } from '../conversation/testing/fake-backend'
import { NOT_LINKED } from '../conversation/elements/messages'
import { ReportsService } from './reports.service'

describe('ReportsService', () => {
	let backend: FakeBackend
	let reports: ReportsService

	beforeAll(() => {
		Logger.overrideLogger(false)
	})

	beforeEach(() => {
		backend = new FakeBackend()
		reports = new ReportsService(backend, new ConfigService({ DEFAULT_CURRENCY: 'GBP' }))
	})

	it('asks unlinked users to link first', async () => {
		await expect(reports.balance('99')).resolves.toBe(NOT_LINKED)
		expect(backend.callsTo('recordActivity')).toEqual([])
	})

	it('records activity and renders under the user token', async () => {
		backend.accounts = [account('a1', 'Cash', { balance: 500 })]

		const text = await reports.balance('7')

		expect(text.endsWith('<b>Total:</b> RM5.00')).toBe(true)
		expect(backend.callsTo('recordActivity')).toEqual([{ method: 'recordActivity', args: ['7'] }])
		expect(backend.callsTo('listAccounts')).toEqual([{ method: 'listAccounts', args: ['test-token'] }])
	})

	it('turns backend failures into a fetch failure message', async () => {
		backend.failReads = true

		await expect(reports.categories('7')).resolves.toBe(
			'❌ Failed to fetch categories. Please try again later.'
		)
	})

	it('skips inactive budgets and degrades those without progress', async () => {
		backend.budgets = [
			{ id: 'b1', name: 'Food', amount: 10000, period: 'monthly', isActive: true },
			{ id: 'b2', name: 'Old', amount: 10000, period: 'weekly', isActive: false },
			{ id: 'b3', name: 'Fun', amount: 2000, period: 'monthly', isActive: true }
		]
		backend.progress.set('b1', { spent: 2500, remaining: 7500, percentage: 25 })

		const text = await reports.budgets('7')

		expect(text).toContain('✅ <b>Food</b> (monthly)\nBudget: RM100.00\nSpent: RM25.00 (25.0%)')
		expect(text.endsWith('📋 <b>Fun</b> (monthly)\nBudget: RM20.00')).toBe(true)
		expect(backend.callsTo('getBudgetProgress').map(call => call.args[1])).toEqual(['b1', 'b3'])
	})

	it('summarises the current month in the default currency', async () => {
		backend.summary = [{ month: '2026-10', income: 300000, expenses: 100000 }]

		const text = await reports.summary('7', new Date(Date.UTC(2026, 9, 1)))

		expect(text.split('\n')[0]).toBe('📈 <b>Monthly Summary - October 2026</b>')
		expect(text.split('\n').pop()).toBe('✅ Net: RM2,000.00')
		expect(backend.callsTo('getMonthlySummary')).toEqual([
			{ method: 'getMonthlySummary', args: ['test-token', 1] }
		])
	})

	it('uses the configured currency for users without one', async () => {
		backend.users.set('7', { backendUserId: 'u1', authToken: 'test-token', defaultCurrency: null })
		backend.budgets = [{ id: 'b1', name: 'Food', amount: 10000, period: 'monthly', isActive: true }]
		backend.progress.set('b1', { spent: 2500, remaining: 7500, percentage: 25 })
		backend.summary = [{ month: '2026-10', income: 300000, expenses: 100000 }]

		const budgets = await reports.budgets('7')
		const summary = await reports.summary('7', new Date(Date.UTC(2026, 9, 1)))

		expect(budgets.split('\n').slice(2)).toEqual([
			'✅ <b>Food</b> (monthly)',
			'Budget: £100.00',
			'Spent: £25.00 (25.0%)',
			'Remaining: £75.00'
		])
		expect(summary.split('\n').pop()).toBe('✅ Net: £2,000.00')
	})
})
