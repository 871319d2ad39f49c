/**
 * Inline button payloads: `<namespace>:<value>`. Telegram caps callback data at
 * 64 bytes, so values are ids, page numbers, currency codes or fixed keywords.
 */
export type CallbackAction =
	| { ns: 'cat'; kind: 'select'; id: string }
	| { ns: 'cat'; kind: 'page'; page: number }
	| { ns: 'cat'; kind: 'new' }
	| { ns: 'cat'; kind: 'none' }
	| { ns: 'acc'; kind: 'select'; id: string }
	| { ns: 'acc'; kind: 'new' }
	| { ns: 'acc'; kind: 'back' }
	| { ns: 'ccy'; kind: 'select'; code: string }
	| { ns: 'ccy'; kind: 'other' }
	| { ns: 'ccy'; kind: 'back' }
	| { ns: 'cur'; kind: 'select'; code: string }
	| { ns: 'cur'; kind: 'other' }
	| { ns: 'ncp'; kind: 'select'; id: string }
	| { ns: 'ncp'; kind: 'none' }
	| { ns: 'nci'; kind: 'skip' }
	| { ns: 'txn'; kind: TxnCommand }

export const TXN_COMMANDS = ['confirm', 'cancel', 'chg_cat', 'chg_acc', 'chg_ccy'] as const

export type TxnCommand = (typeof TXN_COMMANDS)[number]

const CURRENCY_CODE = /^[A-Z]{3}$/
const PAGE = /^page:(\d+)$/

const isTxnCommand = (value: string): value is TxnCommand =>
	TXN_COMMANDS.some(command => command === value)

/** Returns null for anything outside the grammar. */
export function parseCallbackData(data: string): CallbackAction | null {
	const sep = data.indexOf(':')
	if (sep <= 0) return null
	const ns = data.slice(0, sep)
	const value = data.slice(sep + 1)
	if (!value) return null

	switch (ns) {
		case 'cat': {
			if (value === 'new') return { ns, kind: 'new' }
			if (value === 'none') return { ns, kind: 'none' }
			const page = PAGE.exec(value)
			if (page) return { ns, kind: 'page', page: Number(page[1]) }
			if (value.startsWith('page:')) return null
			return { ns, kind: 'select', id: value }
		}
		case 'acc':
			if (value === 'new') return { ns, kind: 'new' }
			if (value === 'back') return { ns, kind: 'back' }
			return { ns, kind: 'select', id: value }
		case 'ccy':
			if (value === 'other') return { ns, kind: 'other' }
			if (value === 'back') return { ns, kind: 'back' }
			return CURRENCY_CODE.test(value) ? { ns, kind: 'select', code: value } : null
		case 'cur':
			if (value === 'other') return { ns, kind: 'other' }
			return CURRENCY_CODE.test(value) ? { ns, kind: 'select', code: value } : null
		case 'ncp':
			if (value === 'none') return { ns, kind: 'none' }
			return { ns, kind: 'select', id: value }
		case 'nci':
			return value === 'skip' ? { ns, kind: 'skip' } : null
		case 'txn':
			return isTxnCommand(value) ? { ns, kind: value } : null
		default:
			return null
	}
}

export function formatCallbackData(action: CallbackAction): string {
	switch (action.kind) {
		case 'select':
			return `${action.ns}:${'code' in action ? action.code : action.id}`
		case 'page':
			return `${action.ns}:page:${action.page}`
		default:
			return `${action.ns}:${action.kind}`
	}
}
