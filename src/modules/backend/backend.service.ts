import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { z } from 'zod'
import {
	BackendRequestError,
	describeError,
	LinkCodeInvalidError,
	NotFoundError,
	UpstreamUnavailableError
} from './backend.errors'
import type {
	Account,
	BackendGateway,
	Budget,
	BudgetProgress,
	Category,
	CompleteLinkParams,
	CreatedTransaction,
	MonthlySummary,
	NewCategory,
	NewTransaction,
	ResolvedUser
} from './backend.types'
import { AccountListSchema, CreatedAccountSchema } from './schemas/account.schema'
import {
	BudgetListSchema,
	BudgetProgressSchema,
	MonthlySummaryListSchema
} from './schemas/budget.schema'
import { CategoryListSchema, CreatedCategorySchema } from './schemas/category.schema'
import {
	AnyBodySchema,
	CreatedTransactionSchema,
	ResolvedUserSchema
} from './schemas/telegram.schema'

type Principal = { kind: 'internal' } | { kind: 'user'; token: string }

interface RequestOptions {
	method?: 'GET' | 'POST'
	principal: Principal
	body?: Record<string, unknown>
	query?: Record<string, string | number>
	timeoutMs?: number
}

const INTERNAL: Principal = { kind: 'internal' }

const asUser = (token: string): Principal => ({ kind: 'user', token })

/** Statuses meaning the link code itself was refused: bad, unknown, already used or expired. */
const LINK_REJECTED_STATUSES: ReadonlySet<number> = new Set([400, 404, 409, 410])

@Injectable()
export class BackendService implements BackendGateway {
	private readonly logger = new Logger(BackendService.name)
	private readonly baseUrl: string
	private readonly internalSecret: string
	private readonly timeoutMs: number
	private readonly activityTimeoutMs: number

	constructor(config: ConfigService) {
		this.baseUrl = config.getOrThrow<string>('API_BASE_URL')
		this.internalSecret = config.getOrThrow<string>('BOT_INTERNAL_SECRET')
		this.timeoutMs = config.getOrThrow<number>('BACKEND_TIMEOUT_MS')
		this.activityTimeoutMs = config.getOrThrow<number>('ACTIVITY_TIMEOUT_MS')
	}

	async resolve(telegramUserId: string): Promise<ResolvedUser | null> {
		try {
			return await this.request(
				`/api/v1/internal/telegram/resolve/${encodeURIComponent(telegramUserId)}`,
				ResolvedUserSchema,
				{ principal: INTERNAL }
			)
		} catch (error: unknown) {
			if (error instanceof NotFoundError) return null
			throw error
		}
	}

	recordActivity(telegramUserId: string): void {
		void this.request(
			`/api/v1/internal/telegram/activity/${encodeURIComponent(telegramUserId)}`,
			AnyBodySchema,
			{ method: 'POST', principal: INTERNAL, timeoutMs: this.activityTimeoutMs }
		).catch((error: unknown) => {
			this.logger.warn(
				`Failed to record activity for ${telegramUserId}: ${describeError(error)}`
			)
		})
	}

	async completeLink(params: CompleteLinkParams): Promise<void> {
		const telegramUserId = Number(params.telegramUserId)
		try {
			await this.request('/api/v1/internal/telegram/complete-link', AnyBodySchema, {
				method: 'POST',
				principal: INTERNAL,
				body: {
					link_code: params.linkCode,
					telegram_user_id: Number.isSafeInteger(telegramUserId)
						? telegramUserId
						: params.telegramUserId,
					telegram_username: params.username,
					telegram_first_name: params.firstName,
					...(params.defaultCurrency ? { default_currency: params.defaultCurrency } : {})
				}
			})
		} catch (error: unknown) {
			if (
				error instanceof BackendRequestError &&
				error.status !== null &&
				LINK_REJECTED_STATUSES.has(error.status)
			) {
				throw new LinkCodeInvalidError(error.message, error.status)
			}
			throw error
		}
	}

	listAccounts(authToken: string): Promise<Account[]> {
		return this.request('/api/v1/accounts', AccountListSchema, {
			principal: asUser(authToken)
		})
	}

	listCategories(authToken: string): Promise<Category[]> {
		return this.request('/api/v1/categories', CategoryListSchema, {
			principal: asUser(authToken),
			query: { page_size: 100 }
		})
	}

	createCategory(authToken: string, category: NewCategory): Promise<Category> {
		return this.request('/api/v1/categories', CreatedCategorySchema, {
			method: 'POST',
			principal: asUser(authToken),
			body: {
				name: category.name,
				type: category.type,
				...(category.icon ? { icon: category.icon } : {}),
				...(category.parentId ? { parent_id: category.parentId } : {})
			}
		})
	}

	createCashAccount(
		authToken: string,
		name: string,
		currency?: string
	): Promise<Account> {
		return this.request('/api/v1/accounts/cash', CreatedAccountSchema, {
			method: 'POST',
			principal: asUser(authToken),
			body: { name, ...(currency ? { currency } : {}) }
		})
	}

	createTransaction(
		authToken: string,
		transaction: NewTransaction
	): Promise<CreatedTransaction> {
		return this.request('/api/v1/transactions', CreatedTransactionSchema, {
			method: 'POST',
			principal: asUser(authToken),
			body: {
				type: transaction.type,
				account_id: transaction.accountId,
				amount: transaction.amountMinorUnits,
				description: transaction.description,
				...(transaction.categoryId ? { category_id: transaction.categoryId } : {})
			}
		})
	}

	listBudgets(authToken: string): Promise<Budget[]> {
		return this.request('/api/v1/budgets', BudgetListSchema, {
			principal: asUser(authToken)
		})
	}

	getBudgetProgress(authToken: string, budgetId: string): Promise<BudgetProgress> {
		return this.request(
			`/api/v1/budgets/${encodeURIComponent(budgetId)}/progress`,
			BudgetProgressSchema,
			{ principal: asUser(authToken) }
		)
	}

	getMonthlySummary(authToken: string, months: number): Promise<MonthlySummary[]> {
		return this.request('/api/v1/transactions/monthly-summary', MonthlySummaryListSchema, {
			principal: asUser(authToken),
			query: { months }
		})
	}

	private async request<T extends z.ZodTypeAny>(
		path: string,
		schema: T,
		options: RequestOptions
	): Promise<z.output<T>> {
		const url = new URL(`${this.baseUrl}${path}`)
		for (const [key, value] of Object.entries(options.query ?? {})) {
			url.searchParams.set(key, String(value))
		}
		const headers: Record<string, string> = { Accept: 'application/json' }
		if (options.principal.kind === 'internal') {
			headers['X-Internal-Secret'] = this.internalSecret
		} else {
			headers.Authorization = `Bearer ${options.principal.token}`
		}
		if (options.body) headers['Content-Type'] = 'application/json'

		let res: Response
		try {
			res = await fetch(url, {
				method: options.method ?? 'GET',
				headers,
				body: options.body ? JSON.stringify(options.body) : undefined,
				signal: AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs)
			})
		} catch (error: unknown) {
			throw new UpstreamUnavailableError(
				`${options.method ?? 'GET'} ${url.pathname} failed: ${describeError(error)}`
			)
		}

		if (!res.ok) {
			const message = await readErrorMessage(res)
			if (res.status === 404) throw new NotFoundError(message, res.status)
			if (res.status >= 400 && res.status < 500) {
				throw new BackendRequestError(message, res.status)
			}
			throw new UpstreamUnavailableError(message, res.status)
		}

		const body: unknown = res.status === 204 ? {} : await res.json().catch(() => null)
		const parsed = schema.safeParse(body)
		if (!parsed.success) {
			throw new UpstreamUnavailableError(
				`Unexpected response from ${url.pathname}: ${parsed.error.issues
					.map(issue => `${issue.path.join('.') || '(root)'} ${issue.message}`)
					.join('; ')}`,
				res.status
			)
		}
		return parsed.data
	}
}

async function readErrorMessage(res: Response): Promise<string> {
	const text = await res.text().catch(() => '')
	try {
		const body: unknown = JSON.parse(text)
		if (body && typeof body === 'object' && 'error' in body) {
			return `HTTP ${res.status}: ${String(body.error)}`
		}
	} catch {
		// not JSON, fall through to the raw text
	}
	return `HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`
}
