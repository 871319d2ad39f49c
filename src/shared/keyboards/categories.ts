import type { Category, CategoryType } from '../../modules/backend/backend.types'
import { type ChoiceKeyboard, choice, chunk } from './choice-keyboard'

export const CATEGORY_PAGE_SIZE = 9
const CATEGORIES_PER_ROW = 3

type TreeNode = Pick<Category, 'id' | 'parentId'>

/**
 * Top-level categories in fetch order, each followed by its children in fetch
 * order. Whatever is left (orphans, deeper nesting) follows at the end.
 */
export function orderCategoriesHierarchically<T extends TreeNode>(categories: readonly T[]): T[] {
	const ordered: T[] = []
	const emitted = new Set<string>()
	const emit = (category: T) => {
		if (emitted.has(category.id)) return
		emitted.add(category.id)
		ordered.push(category)
	}

	for (const parent of categories) {
		if (parent.parentId) continue
		emit(parent)
		for (const child of categories) {
			if (child.parentId === parent.id) emit(child)
		}
	}
	for (const category of categories) emit(category)

	return ordered
}

export interface CategoryPage<T> {
	items: T[]
	page: number
	hasPrev: boolean
	hasNext: boolean
}

export function paginateCategories<T extends TreeNode>(
	categories: readonly T[],
	page: number
): CategoryPage<T> {
	const ordered = orderCategoriesHierarchically(categories)
	const lastPage = Math.max(0, Math.ceil(ordered.length / CATEGORY_PAGE_SIZE) - 1)
	const current = Math.min(Math.max(0, Math.trunc(page)), lastPage)
	const start = current * CATEGORY_PAGE_SIZE
	return {
		items: ordered.slice(start, start + CATEGORY_PAGE_SIZE),
		page: current,
		hasPrev: current > 0,
		hasNext: start + CATEGORY_PAGE_SIZE < ordered.length
	}
}

export function categoryLabel(category: Pick<Category, 'name' | 'icon' | 'parentId'>): string {
	if (category.icon) return `${category.icon} ${category.name}`
	if (category.parentId) return `  ${category.name}`
	return category.name
}

export function categoryKeyboard(categories: readonly Category[], page: number): ChoiceKeyboard {
	const view = paginateCategories(categories, page)
	const rows: ChoiceKeyboard = chunk(view.items, CATEGORIES_PER_ROW).map(row =>
		row.map(c => choice(categoryLabel(c), { ns: 'cat', kind: 'select', id: c.id }))
	)

	const nav: ChoiceKeyboard[number] = []
	if (view.hasPrev) {
		nav.push(choice('< Prev', { ns: 'cat', kind: 'page', page: view.page - 1 }))
	}
	if (view.hasNext) {
		nav.push(choice('Next >', { ns: 'cat', kind: 'page', page: view.page + 1 }))
	}
	if (nav.length) rows.push(nav)

	rows.push([
		choice('+ New', { ns: 'cat', kind: 'new' }),
		choice('Skip', { ns: 'cat', kind: 'none' })
	])
	return rows
}

/** Parents offered for a new category: top-level ones of the same type. */
export function parentCandidates(categories: readonly Category[], type: CategoryType): Category[] {
	return categories.filter(c => !c.parentId && c.type === type)
}

export function newCategoryParentKeyboard(
	categories: readonly Category[],
	type: CategoryType
): ChoiceKeyboard {
	const rows: ChoiceKeyboard = chunk(parentCandidates(categories, type), 2).map(row =>
		row.map(c =>
			choice(c.icon ? `${c.icon} ${c.name}` : c.name, { ns: 'ncp', kind: 'select', id: c.id })
		)
	)
	rows.push([choice('Top-level (no parent)', { ns: 'ncp', kind: 'none' })])
	return rows
}

export function newCategoryIconKeyboard(): ChoiceKeyboard {
	return [[choice('Skip', { ns: 'nci', kind: 'skip' })]]
}
