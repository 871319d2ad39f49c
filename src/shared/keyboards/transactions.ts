import { type ChoiceKeyboard, choice } from './choice-keyboard'

export function confirmKeyboard(): ChoiceKeyboard {
	return [
		[
			choice('Change Category', { ns: 'txn', kind: 'chg_cat' }),
			choice('Change Account', { ns: 'txn', kind: 'chg_acc' })
		],
		[choice('Change Currency', { ns: 'txn', kind: 'chg_ccy' })],
		[choice('Confirm', { ns: 'txn', kind: 'confirm' })],
		[choice('Cancel', { ns: 'txn', kind: 'cancel' })]
	]
}
