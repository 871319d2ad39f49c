import { formatCallbackData, parseCallbackData } from './callback-data'

describe('callback-data', () => {
	it('parses category actions', () => {
		expect(parseCallbackData('cat:c-1')).toEqual({ ns: 'cat', kind: 'select', id: 'c-1' })
		expect(parseCallbackData('cat:page:2')).toEqual({ ns: 'cat', kind: 'page', page: 2 })
		expect(parseCallbackData('cat:new')).toEqual({ ns: 'cat', kind: 'new' })
		expect(parseCallbackData('cat:none')).toEqual({ ns: 'cat', kind: 'none' })
	})

	it('keeps colons inside ids', () => {
		expect(parseCallbackData('acc:legacy:7')).toEqual({
			ns: 'acc',
			kind: 'select',
			id: 'legacy:7'
		})
	})

	it('accepts only uppercase three-letter currency codes', () => {
		expect(parseCallbackData('ccy:JPY')).toEqual({ ns: 'ccy', kind: 'select', code: 'JPY' })
		expect(parseCallbackData('cur:MYR')).toEqual({ ns: 'cur', kind: 'select', code: 'MYR' })
		expect(parseCallbackData('ccy:jpy')).toBeNull()
		expect(parseCallbackData('cur:EURO')).toBeNull()
	})

	it('rejects payloads outside the grammar', () => {
		for (const data of [
			'',
			'cat',
			'cat:',
			':x',
			'cat:page:next',
			'nci:emoji',
			'txn:delete',
			'cur:back',
			'home:open'
		]) {
			expect(parseCallbackData(data)).toBeNull()
		}
	})

	it('formats every action back to the payload it was parsed from', () => {
		const payloads = [
			'cat:c-1',
			'cat:page:0',
			'cat:new',
			'cat:none',
			'acc:a-1',
			'acc:new',
			'acc:back',
			'ccy:USD',
			'ccy:other',
			'ccy:back',
			'cur:GBP',
			'cur:other',
			'ncp:c-2',
			'ncp:none',
			'nci:skip',
			'txn:confirm',
			'txn:cancel',
			'txn:chg_cat',
			'txn:chg_acc',
			'txn:chg_ccy'
		]
		for (const payload of payloads) {
			const action = parseCallbackData(payload)
			expect(action).not.toBeNull()
			if (action) expect(formatCallbackData(action)).toBe(payload)
		}
	})
})
