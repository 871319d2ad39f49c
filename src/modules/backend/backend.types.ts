import type { Account } from './schemas/account.schema'
import type { Budget, BudgetProgress, MonthlySummary } from './schemas/budget.schema'
import type { Category, CategoryType } from './schemas/category.schema'
import type { CreatedTransaction, ResolvedUser } from './schemas/telegram.schema'

export type { Account, AccountType } from './schemas/account.schema'
export type { Budget, BudgetProgress, MonthlySummary } from './schemas/budget.schema'
export type { Category, CategoryType } from './schemas/category.schema'
export type { CreatedTransaction, ResolvedUser } from './schemas/telegram.schema'

export type TransactionKind = 'expense' | 'income'

export interface CompleteLinkParams {
	linkCode: string
	telegramUserId: string
	username: string
	firstName: string
	defaultCurrency: string
}

export interface NewCategory {
	name: string
	type: CategoryType
	icon?: string
	parentId?: string
}

export interface NewTransaction {
	type: TransactionKind
	accountId: string
	amountMinorUnits: number
	description: string
	categoryId?: string
}

/**
 * Capabilities the bot needs from the finance backend. Internal calls are keyed
 * by the Telegram user id; everything else runs under the user's auth token.
 */
export interface BackendGateway {
	resolve(telegramUserId: string): Promise<ResolvedUser | null>
	/** Fire-and-forget: never rejects, failures are only logged. */
	recordActivity(telegramUserId: string): void
	completeLink(params: CompleteLinkParams): Promise<void>
	listAccounts(authToken: string): Promise<Account[]>
	listCategories(authToken: string): Promise<Category[]>
	createCategory(authToken: string, category: NewCategory): Promise<Category>
	createCashAccount(authToken: string, name: string, currency?: string): Promise<Account>
	createTransaction(authToken: string, transaction: NewTransaction): Promise<CreatedTransaction>
	listBudgets(authToken: string): Promise<Budget[]>
	getBudgetProgress(authToken: string, budgetId: string): Promise<BudgetProgress>
	getMonthlySummary(authToken: string, months: number): Promise<MonthlySummary[]>
}

export const BACKEND_GATEWAY = Symbol('BACKEND_GATEWAY')
