import type { Category, CategoryType } from '../../backend/backend.types'
import { orderCategoriesHierarchically } from '../../../shared/keyboards/categories'
import { escapeHtml } from '../../../utils/format'

export const NO_CATEGORIES_TEXT =
	"You don't have any categories yet.\nCreate categories using /expense or /income, or in the web app!"

const SECTIONS: { type: CategoryType; title: string }[] = [
	{ type: 'expense', title: 'Expense' },
	{ type: 'income', title: 'Income' }
]

function categoryLine(category: Category, nested: boolean): string {
	const icon = category.icon ? `${escapeHtml(category.icon)} ` : ''
	const name = escapeHtml(category.name)
	const description = category.description
		? ` - <i>${escapeHtml(category.description)}</i>`
		: ''
	return nested ? `  ${icon}${name}${description}` : `${icon}<b>${name}</b>${description}`
}

/** Parents in bold with their children indented below; orphans come last. */
export function categoryTreeLines(categories: readonly Category[]): string[] {
	const ids = new Set(categories.map(category => category.id))
	return orderCategoriesHierarchically(categories).map(category =>
		categoryLine(category, category.parentId !== null && ids.has(category.parentId))
	)
}

export function categoriesText(categories: readonly Category[]): string {
	if (!categories.length) return NO_CATEGORIES_TEXT

	const sections = SECTIONS.flatMap(({ type, title }) => {
		const ofType = categories.filter(category => category.type === type)
		if (!ofType.length) return []
		return [[`<b>${title}</b>`, ...categoryTreeLines(ofType)].join('\n')]
	})
	return ['<b>Your Categories</b>', '', sections.join('\n\n')].join('\n')
}
