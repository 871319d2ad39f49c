import type { Budget, BudgetProgress } from '../../backend/backend.types'
import { escapeHtml, formatCurrency, formatPercentage } from '../../../utils/format'

export const NO_BUDGETS_TEXT =
	"You don't have any budgets yet.\nCreate budgets in the web app to track your spending!"

export interface BudgetEntry {
	budget: Budget
	/** Null when the progress call failed. */
	progress: BudgetProgress | null
}

export function budgetStatusEmoji(percentage: number): string {
	if (percentage < 80) return '✅'
	if (percentage < 100) return '⚠️'
	return '🚨'
}

function budgetBlock({ budget, progress }: BudgetEntry, currency: string): string {
	const title = `<b>${escapeHtml(budget.name)}</b> (${escapeHtml(budget.period)})`
	const amount = `Budget: ${formatCurrency(budget.amount, currency)}`
	if (!progress) return [`📋 ${title}`, amount].join('\n')

	return [
		`${budgetStatusEmoji(progress.percentage)} ${title}`,
		amount,
		`Spent: ${formatCurrency(progress.spent, currency)} (${formatPercentage(progress.percentage)})`,
		`Remaining: ${formatCurrency(progress.remaining, currency)}`
	].join('\n')
}

export function budgetsText(entries: readonly BudgetEntry[], currency: string): string {
	if (!entries.length) return NO_BUDGETS_TEXT
	const blocks = entries.map(entry => budgetBlock(entry, currency))
	return ['📊 <b>Your Budgets</b>', '', blocks.join('\n\n')].join('\n')
}
