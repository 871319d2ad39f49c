const CURRENCY_CODE = /^[A-Za-z]{3}$/

/** "jpy " -> "JPY"; anything that is not exactly three letters -> null. */
export function parseCurrencyCode(input: string): string | null {
	const code = input.trim()
	return CURRENCY_CODE.test(code) ? code.toUpperCase() : null
}

/** The user's own currency when it is a valid code, otherwise the fallback. */
export function preferredCurrency(userCurrency: string | null, fallback: string): string {
	return (userCurrency && parseCurrencyCode(userCurrency)) || fallback
}
