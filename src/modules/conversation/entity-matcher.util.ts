import type { Account, Category } from '../backend/backend.types'
import { eligibleAccounts } from '../../utils/accounts'

export interface ParsedAmount {
	amountMinor: number
	description: string
}

const LEADING_AMOUNT = /^(\d+(?:\.\d{1,2})?)(?![\d.])\s*(.*)$/s

/**
 * "50 Coffee" -> 5000 minor units and "Coffee". Returns null when the text does
 * not start with a number of at most two fraction digits.
 */
export function parseAmountAndDescription(text: string): ParsedAmount | null {
	const match = LEADING_AMOUNT.exec(text.trim())
	if (!match) return null
	const amountMinor = Math.round(Number(match[1]) * 100)
	if (!Number.isSafeInteger(amountMinor)) return null
	return { amountMinor, description: match[2].trim() }
}

export interface EntityMatch<A, C> {
	description: string
	account: A | null
	category: C | null
}

const sameName = (name: string, token: string) => name.toLowerCase() === token.toLowerCase()

/**
 * Consumes a trailing account name, then a trailing category name, from the
 * text. Only whole tokens match, case-insensitively.
 */
export function extractAccountAndCategory<
	A extends Pick<Account, 'name' | 'type'>,
	C extends Pick<Category, 'name'>
>(text: string, accounts: readonly A[], categories: readonly C[]): EntityMatch<A, C> {
	const tokens = text.split(/\s+/).filter(Boolean)

	const lastAccountToken = tokens[tokens.length - 1]
	const account =
		lastAccountToken === undefined
			? null
			: eligibleAccounts(accounts).find(a => sameName(a.name, lastAccountToken)) ?? null
	if (account) tokens.pop()

	const lastCategoryToken = tokens[tokens.length - 1]
	const category =
		lastCategoryToken === undefined
			? null
			: categories.find(c => sameName(c.name, lastCategoryToken)) ?? null
	if (category) tokens.pop()

	return { description: tokens.join(' '), account, category }
}
