import type {
	ConversationState,
	FlowContext,
	InputCategory,
	StateName,
	StateOf,
	StateTransitions,
	TransitionInput,
	TransitionTable
} from './conversation.types'
import { promptFor } from './conversation.prompts'

const STATE_FLAGS: Record<StateName, true> = {
	awaiting_amount: true,
	awaiting_category: true,
	awaiting_account: true,
	confirm: true,
	awaiting_new_category_name: true,
	awaiting_new_category_parent: true,
	awaiting_new_category_icon: true,
	awaiting_new_account_name: true,
	awaiting_currency_choice: true,
	awaiting_new_currency_code: true,
	awaiting_link_currency: true,
	awaiting_custom_currency: true
}

export const STATE_NAMES: readonly string[] = Object.keys(STATE_FLAGS)

export const INPUT_CATEGORIES: readonly InputCategory[] = ['text', 'button', 'cancel', 'timeout']

const TEXT_STATES: ReadonlySet<StateName> = new Set<StateName>([
	'awaiting_amount',
	'awaiting_new_category_name',
	'awaiting_new_category_icon',
	'awaiting_new_account_name',
	'awaiting_new_currency_code',
	'awaiting_custom_currency'
])

/** Whether free text is an answer in this state rather than a stray message. */
export function acceptsText(state: ConversationState): boolean {
	return TEXT_STATES.has(state.name)
}

/** Shared handler for input a state does not take: ask again, stay put. */
export async function reprompt(
	ctx: FlowContext,
	state: ConversationState
): Promise<ConversationState> {
	await ctx.respond(promptFor(state, ctx.options))
	return state
}

/** Shared cancel and timeout handler. The engine owns any acknowledgement. */
export async function endSession(): Promise<null> {
	return null
}

/**
 * Throws unless every state maps every input category to a handler and no
 * unknown state is present.
 */
export function validateTransitionTable(
	table: Record<string, Partial<Record<InputCategory, unknown>> | undefined>
): void {
	const problems: string[] = []
	for (const name of STATE_NAMES) {
		const transitions = table[name]
		if (!transitions) {
			problems.push(`${name}: no transitions`)
			continue
		}
		for (const category of INPUT_CATEGORIES) {
			if (typeof transitions[category] !== 'function') {
				problems.push(`${name}: no ${category} handler`)
			}
		}
	}
	for (const name of Object.keys(table)) {
		if (!STATE_NAMES.includes(name)) problems.push(`${name}: unknown state`)
	}
	if (problems.length) {
		throw new Error(`Invalid transition table: ${problems.join('; ')}`)
	}
}

/** Dispatches on the input category so each handler call is typed for its input. */
export function runTransition<K extends StateName>(
	table: TransitionTable,
	ctx: FlowContext,
	name: K,
	state: StateOf<K>,
	input: TransitionInput
): Promise<ConversationState | null> {
	const transitions: StateTransitions<K> = table[name]
	switch (input.category) {
		case 'text':
			return transitions.text(ctx, state, input)
		case 'button':
			return transitions.button(ctx, state, input)
		case 'cancel':
			return transitions.cancel(ctx, state, input)
		case 'timeout':
			return transitions.timeout(ctx, state, input)
	}
}
