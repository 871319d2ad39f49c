import { escapeHtml, formatCurrency, titleCase } from '../../../utils/format'
import type { TransactionDraft } from '../conversation.types'

function categoryDisplay(draft: TransactionDraft): string {
	if (!draft.category) return 'None'
	const { icon, name } = draft.category
	return escapeHtml(icon ? `${icon} ${name}` : name)
}

function descriptionOf(draft: TransactionDraft): string {
	return escapeHtml(draft.description || titleCase(draft.kind))
}

function headline(draft: TransactionDraft): string {
	return `<b>${titleCase(draft.kind)}: ${escapeHtml(formatCurrency(draft.amountMinor, draft.currency))}</b>`
}

export function txConfirmText(draft: TransactionDraft): string {
	return [
		headline(draft),
		descriptionOf(draft),
		'',
		`Category: ${categoryDisplay(draft)}`,
		`Account: ${escapeHtml(draft.account.name)}`,
		`Currency: ${draft.currency}`
	].join('\n')
}

export function txSuccessText(draft: TransactionDraft): string {
	return [
		`<b>${titleCase(draft.kind)} Recorded</b>`,
		'',
		`Amount: ${escapeHtml(formatCurrency(draft.amountMinor, draft.currency))}`,
		`Description: ${descriptionOf(draft)}`,
		`Category: ${categoryDisplay(draft)}`,
		`Account: ${escapeHtml(draft.account.name)}`
	].join('\n')
}

export function txCategoryPickerText(draft: TransactionDraft): string {
	return `${headline(draft)}\n${descriptionOf(draft)}\n\nSelect a category:`
}
