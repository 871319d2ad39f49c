import { z } from 'zod'
import { IdSchema, MinorUnitsSchema, listEnvelope } from './common.schema'

export const BudgetSchema = z
	.object({
		id: IdSchema,
		name: z.string().nullish(),
		amount: MinorUnitsSchema,
		period: z.string().nullish(),
		is_active: z.boolean().nullish()
	})
	.transform(raw => ({
		id: raw.id,
		name: raw.name || 'Unnamed Budget',
		amount: raw.amount,
		period: raw.period || 'monthly',
		isActive: raw.is_active ?? true
	}))

export const BudgetListSchema = listEnvelope(BudgetSchema)

export const BudgetProgressSchema = z
	.object({
		progress: z
			.object({
				spent: MinorUnitsSchema,
				remaining: MinorUnitsSchema,
				percentage: z.number().finite().nullish()
			})
			.nullish()
	})
	.transform(body => ({
		spent: body.progress?.spent ?? 0,
		remaining: body.progress?.remaining ?? 0,
		percentage: body.progress?.percentage ?? 0
	}))

export const MonthlySummarySchema = z
	.object({
		month: z.string().nullish(),
		income: MinorUnitsSchema,
		expenses: MinorUnitsSchema
	})
	.transform(raw => ({
		month: raw.month ?? null,
		income: raw.income,
		expenses: raw.expenses
	}))

export const MonthlySummaryListSchema = listEnvelope(MonthlySummarySchema)

export type Budget = z.infer<typeof BudgetSchema>
export type BudgetProgress = z.infer<typeof BudgetProgressSchema>
export type MonthlySummary = z.infer<typeof MonthlySummarySchema>
