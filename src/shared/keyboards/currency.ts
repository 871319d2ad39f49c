import { type ChoiceKeyboard, choice } from './choice-keyboard'

/** Currency picker shown from the confirm card. */
export function transactionCurrencyKeyboard(defaultCurrency: string): ChoiceKeyboard {
	return [
		[
			choice(`${defaultCurrency} (Default)`, {
				ns: 'ccy',
				kind: 'select',
				code: defaultCurrency
			}),
			choice('Other', { ns: 'ccy', kind: 'other' })
		],
		[choice('Back', { ns: 'ccy', kind: 'back' })]
	]
}

/** Default-currency picker of the account linking flow. */
export function linkCurrencyKeyboard(defaultCurrency: string): ChoiceKeyboard {
	return [
		[
			choice(`${defaultCurrency} (Default)`, {
				ns: 'cur',
				kind: 'select',
				code: defaultCurrency
			}),
			choice('Other', { ns: 'cur', kind: 'other' })
		]
	]
}
