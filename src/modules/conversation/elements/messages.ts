import type { TransactionKind } from '../../backend/backend.types'

export const CANCELLED = 'Cancelled.'
export const GENERIC_FAILURE = 'Something went wrong. Please try again.'
export const NOT_LINKED = 'Your Telegram account is not linked.\nUse /start to link your account.'
export const NO_ELIGIBLE_ACCOUNT =
	'No active accounts found. Please create an account in the web app first.'
export const TRANSACTION_SESSION_EXPIRED =
	'Session expired. Please start over with /expense or /income.'
export const LINK_SESSION_EXPIRED = 'Session expired. Please try /start again.'

export const amountPrompt = (kind: TransactionKind) =>
	`How much was the ${kind}?\nType the amount, or amount and description (e.g. <code>50 Coffee</code>)`
export const INVALID_AMOUNT = 'Please enter a valid amount (e.g. <code>50</code> or <code>50 Coffee</code>)'

export const SELECT_ACCOUNT = 'Select an account:'
export const SELECT_CURRENCY = 'Select a currency:'
export const NEW_CATEGORY_NAME = 'Type a name for the new category:'
export const EMPTY_CATEGORY_NAME = 'Please type a category name:'
export const NEW_ACCOUNT_NAME = 'Type a name for the new account:'
export const EMPTY_ACCOUNT_NAME = 'Please type an account name:'
export const CATEGORY_ICON = 'Send an emoji to use as the icon (e.g. ☕ 🍕 💰), or tap Skip:'
export const CURRENCY_CODE = 'Type your currency code (3 letters, e.g. JPY, CAD, AUD):'
export const INVALID_CURRENCY_CODE =
	'Please enter a valid 3-letter currency code (e.g. JPY, CAD, AUD):'

export const CHOOSE_DEFAULT_CURRENCY = 'Choose your default currency:'
export const ALREADY_LINKED =
	"You're already linked!\n\nUse /help to see available commands."
export const LINK_WELCOME = [
	'Welcome!',
	'',
	'To link your account:',
	'1. Go to Settings in the web app',
	"2. Click 'Link Telegram'",
	'3. Copy your link code',
	'4. Send: /start &lt;code&gt;',
	'',
	'Use /help to see what I can do.'
].join('\n')
export const LINK_CODE_INVALID =
	'Invalid or expired link code.\nPlease generate a new code from the web app.'
export const linkedText = (currency: string) =>
	`Your Telegram account is now linked!\nDefault currency: <b>${currency}</b>\n\nUse /help to see available commands.`
