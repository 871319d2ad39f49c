import type { Account, AccountType } from '../modules/backend/backend.types'

const TRANSACTION_ACCOUNT_TYPES: ReadonlySet<AccountType> = new Set<AccountType>([
	'cash',
	'credit_card',
	'debt'
])

/** Accounts a transaction can be booked against. Investment accounts never are. */
export function isEligibleAccount(account: Pick<Account, 'type'>): boolean {
	return TRANSACTION_ACCOUNT_TYPES.has(account.type)
}

export function eligibleAccounts<T extends Pick<Account, 'type'>>(accounts: readonly T[]): T[] {
	return accounts.filter(isEligibleAccount)
}

/** First active eligible account, else the first eligible one, else null. */
export function pickDefaultAccount<T extends Pick<Account, 'type' | 'isActive'>>(
	accounts: readonly T[]
): T | null {
	const eligible = eligibleAccounts(accounts)
	return eligible.find(a => a.isActive) ?? eligible[0] ?? null
}
