import { type CallbackAction, formatCallbackData } from '../callback-data'

export interface ChoiceButton {
	label: string
	payload: string
}

/** Rows of buttons, independent of the transport that renders them. */
export type ChoiceKeyboard = ChoiceButton[][]

export const choice = (label: string, action: CallbackAction): ChoiceButton => ({
	label,
	payload: formatCallbackData(action)
})

export function chunk<T>(items: readonly T[], size: number): T[][] {
	const rows: T[][] = []
	for (let i = 0; i < items.length; i += size) {
		rows.push(items.slice(i, i + size))
	}
	return rows
}
