import type { MonthlySummary } from '../../backend/backend.types'
import { formatCurrency } from '../../../utils/format'

export const NO_SUMMARY_TEXT = 'No transaction data available for this month.'

export const monthLabel = (date: Date) =>
	date.toLocaleString('en-US', { month: 'long', year: 'numeric', timeZone: 'UTC' })

/** The first row is the current month. */
export function summaryText(
	months: readonly MonthlySummary[],
	currency: string,
	now: Date
): string {
	const [current] = months
	if (!current) return NO_SUMMARY_TEXT

	const net = current.income - current.expenses
	return [
		`📈 <b>Monthly Summary - ${monthLabel(now)}</b>`,
		'',
		`💰 Income: ${formatCurrency(current.income, currency)}`,
		`💸 Expenses: ${formatCurrency(current.expenses, currency)}`,
		'━━━━━━━━━━━━━━━━',
		`${net >= 0 ? '✅' : '⚠️'} Net: ${formatCurrency(net, currency)}`
	].join('\n')
}
