import type { Account } from '../../backend/backend.types'
import { escapeHtml, formatAccountType, formatCurrency } from '../../../utils/format'

export const NO_ACCOUNTS_TEXT =
	"You don't have any accounts yet.\nCreate accounts in the web app to get started!"

const DIVIDER = '━━━━━━━━━━━━━━━━'

/** Sums balances per currency, in the order currencies first appear. */
export function totalsByCurrency(accounts: readonly Account[]): Map<string, number> {
	const totals = new Map<string, number>()
	for (const account of accounts) {
		totals.set(account.currency, (totals.get(account.currency) ?? 0) + account.balance)
	}
	return totals
}

export function balanceText(accounts: readonly Account[]): string {
	const active = accounts.filter(account => account.isActive)
	if (!active.length) return NO_ACCOUNTS_TEXT

	const lines = ['💰 <b>Your Accounts</b>', '']
	for (const account of active) {
		lines.push(
			formatAccountType(account.type),
			`<b>${escapeHtml(account.name)}</b>`,
			`Balance: ${formatCurrency(account.balance, account.currency)}`,
			''
		)
	}
	lines.push(DIVIDER)

	const totals = totalsByCurrency(active)
	for (const [currency, total] of totals) {
		const label = totals.size === 1 ? 'Total' : `Total (${currency})`
		lines.push(`<b>${label}:</b> ${formatCurrency(total, currency)}`)
	}
	return lines.join('\n')
}

export function accountsListText(accounts: readonly Account[]): string {
	if (!accounts.length) return NO_ACCOUNTS_TEXT

	const blocks = accounts.map(account => {
		const lines = [
			`${account.isActive ? '✅' : '🔒'} ${formatAccountType(account.type)}`,
			`<b>${escapeHtml(account.name)}</b>`,
			`Balance: ${formatCurrency(account.balance, account.currency)}`
		]
		if (account.type === 'credit_card' && account.creditLimit) {
			lines.push(`Limit: ${formatCurrency(account.creditLimit, account.currency)}`)
		}
		return lines.join('\n')
	})
	return ['🏦 <b>Your Accounts</b>', '', blocks.join('\n\n')].join('\n')
}
