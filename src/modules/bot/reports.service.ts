import { Inject, Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import {
	BACKEND_GATEWAY,
	type BackendGateway,
	type ResolvedUser
} from '../backend/backend.types'
import { describeError } from '../backend/backend.errors'
import { preferredCurrency } from '../../utils/currency'
import { NOT_LINKED } from '../conversation/elements/messages'
import { accountsListText, balanceText } from './elements/accounts'
import { type BudgetEntry, budgetsText } from './elements/budgets'
import { categoriesText } from './elements/categories'
import { summaryText } from './elements/summary'

/**
 * Read-only reports. Each resolves the sender first and always yields a
 * message to send, including for unlinked users and backend failures.
 */
@Injectable()
export class ReportsService {
	private readonly logger = new Logger(ReportsService.name)

	private readonly defaultCurrency: string

	constructor(
		@Inject(BACKEND_GATEWAY) private readonly gateway: BackendGateway,
		config: ConfigService
	) {
		this.defaultCurrency = config.getOrThrow<string>('DEFAULT_CURRENCY')
	}

	balance(telegramUserId: string): Promise<string> {
		return this.report(telegramUserId, 'accounts', async user =>
			balanceText(await this.gateway.listAccounts(user.authToken))
		)
	}

	accounts(telegramUserId: string): Promise<string> {
		return this.report(telegramUserId, 'accounts', async user =>
			accountsListText(await this.gateway.listAccounts(user.authToken))
		)
	}

	categories(telegramUserId: string): Promise<string> {
		return this.report(telegramUserId, 'categories', async user =>
			categoriesText(await this.gateway.listCategories(user.authToken))
		)
	}

	budgets(telegramUserId: string): Promise<string> {
		return this.report(telegramUserId, 'budgets', async user => {
			const budgets = await this.gateway.listBudgets(user.authToken)
			const entries = await Promise.all(
				budgets
					.filter(budget => budget.isActive)
					.map(async (budget): Promise<BudgetEntry> => {
						try {
							const progress = await this.gateway.getBudgetProgress(user.authToken, budget.id)
							return { budget, progress }
						} catch (error: unknown) {
							this.logger.warn(
								`Progress for budget ${budget.id} unavailable: ${describeError(error)}`
							)
							return { budget, progress: null }
						}
					})
			)
			return budgetsText(entries, this.currencyOf(user))
		})
	}

	summary(telegramUserId: string, now = new Date()): Promise<string> {
		return this.report(telegramUserId, 'summary', async user =>
			summaryText(
				await this.gateway.getMonthlySummary(user.authToken, 1),
				this.currencyOf(user),
				now
			)
		)
	}

	private currencyOf(user: ResolvedUser): string {
		return preferredCurrency(user.defaultCurrency, this.defaultCurrency)
	}

	private async report(
		telegramUserId: string,
		subject: string,
		render: (user: ResolvedUser) => Promise<string>
	): Promise<string> {
		try {
			const user = await this.gateway.resolve(telegramUserId)
			if (!user) return NOT_LINKED
			this.gateway.recordActivity(telegramUserId)
			return await render(user)
		} catch (error: unknown) {
			this.logger.error(`Failed to fetch ${subject}: ${describeError(error)}`)
			return `❌ Failed to fetch ${subject}. Please try again later.`
		}
	}
}
