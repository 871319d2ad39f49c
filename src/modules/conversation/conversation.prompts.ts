import { escapeHtml } from '../../utils/format'
import { accountKeyboard } from '../../shared/keyboards/accounts'
import {
	categoryKeyboard,
	newCategoryIconKeyboard,
	newCategoryParentKeyboard
} from '../../shared/keyboards/categories'
import { linkCurrencyKeyboard, transactionCurrencyKeyboard } from '../../shared/keyboards/currency'
import { confirmKeyboard } from '../../shared/keyboards/transactions'
import type { ConversationOptions, ConversationState, OutboundMessage } from './conversation.types'
import * as msg from './elements/messages'
import { txCategoryPickerText, txConfirmText } from './elements/tx-confirm-msg'

/** The message a state shows when it is entered or has to ask again. */
export function promptFor(state: ConversationState, options: ConversationOptions): OutboundMessage {
	switch (state.name) {
		case 'awaiting_amount':
			return { text: msg.amountPrompt(state.setup.kind) }
		case 'awaiting_category':
			return {
				text: txCategoryPickerText(state.draft),
				keyboard: categoryKeyboard(state.draft.categories, state.page)
			}
		case 'awaiting_account':
			return { text: msg.SELECT_ACCOUNT, keyboard: accountKeyboard(state.draft.accounts) }
		case 'confirm':
			return { text: txConfirmText(state.draft), keyboard: confirmKeyboard() }
		case 'awaiting_new_category_name':
			return { text: msg.NEW_CATEGORY_NAME }
		case 'awaiting_new_category_parent':
			return {
				text: `Category: <b>${escapeHtml(state.categoryName)}</b>\n\nIs this a subcategory of an existing category?`,
				keyboard: newCategoryParentKeyboard(state.draft.categories, state.draft.kind)
			}
		case 'awaiting_new_category_icon':
			return { text: msg.CATEGORY_ICON, keyboard: newCategoryIconKeyboard() }
		case 'awaiting_new_account_name':
			return { text: msg.NEW_ACCOUNT_NAME }
		case 'awaiting_currency_choice':
			return {
				text: msg.SELECT_CURRENCY,
				keyboard: transactionCurrencyKeyboard(state.draft.defaultCurrency)
			}
		case 'awaiting_new_currency_code':
		case 'awaiting_custom_currency':
			return { text: msg.CURRENCY_CODE }
		case 'awaiting_link_currency':
			return {
				text: msg.CHOOSE_DEFAULT_CURRENCY,
				keyboard: linkCurrencyKeyboard(options.defaultCurrency)
			}
	}
}

/** Same prompt with a line in front explaining why it is shown again. */
export function promptWithNotice(
	notice: string,
	state: ConversationState,
	options: ConversationOptions
): OutboundMessage {
	const prompt = promptFor(state, options)
	return { ...prompt, text: `${notice}\n\n${prompt.text}` }
}
