import type { Account } from '../../modules/backend/backend.types'
import { eligibleAccounts } from '../../utils/accounts'
import { type ChoiceKeyboard, choice, chunk } from './choice-keyboard'

const ACCOUNTS_PER_ROW = 2

export function accountKeyboard(accounts: readonly Account[]): ChoiceKeyboard {
	const rows: ChoiceKeyboard = chunk(eligibleAccounts(accounts), ACCOUNTS_PER_ROW).map(
		row => row.map(acc => choice(acc.name, { ns: 'acc', kind: 'select', id: acc.id }))
	)
	rows.push([
		choice('+ New', { ns: 'acc', kind: 'new' }),
		choice('Back', { ns: 'acc', kind: 'back' })
	])
	return rows
}
