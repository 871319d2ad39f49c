import type { AccountType } from '../modules/backend/backend.types'

const CURRENCY_SYMBOLS: Record<string, string> = {
	USD: '$',
	EUR: '€',
	GBP: '£',
	INR: '₹',
	MYR: 'RM'
}

export function getCurrencySymbol(currency: string): string {
	return CURRENCY_SYMBOLS[currency.toUpperCase()] ?? `${currency} `
}

/** Minor units to a display string, e.g. 5000 MYR -> "RM50.00", 1234567 JPY -> "JPY 12,345.67". */
export function formatCurrency(minorUnits: number, currency: string): string {
	const major = minorUnits / 100
	const sign = major < 0 ? '-' : ''
	const value = Math.abs(major).toLocaleString('en-US', {
		minimumFractionDigits: 2,
		maximumFractionDigits: 2
	})
	return `${sign}${getCurrencySymbol(currency)}${value}`
}

export function formatAccountType(type: AccountType): string {
	switch (type) {
		case 'cash':
			return '💵 Cash'
		case 'credit_card':
			return '💳 Credit Card'
		case 'debt':
			return 'Debt'
		case 'investment':
			return '📈 Investment'
	}
}

export function formatPercentage(value: number): string {
	return `${value.toFixed(1)}%`
}

export function escapeHtml(text: string): string {
	return text
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
}

export function titleCase(word: string): string {
	return word ? word[0].toUpperCase() + word.slice(1) : word
}
