import { z } from 'zod'
import { IdSchema, MinorUnitsSchema, listEnvelope } from './common.schema'

export const AccountTypeSchema = z.enum(['cash', 'credit_card', 'debt', 'investment'])

export const AccountSchema = z
	.object({
		id: IdSchema,
		name: z.string(),
		// unknown types are treated as investment so they never become transaction targets
		type: AccountTypeSchema.catch('investment'),
		balance: MinorUnitsSchema,
		currency: z.string().nullish(),
		is_active: z.boolean().nullish(),
		credit_limit: MinorUnitsSchema.nullish()
	})
	.transform(raw => ({
		id: raw.id,
		name: raw.name,
		type: raw.type,
		balance: raw.balance,
		currency: raw.currency || 'USD',
		isActive: raw.is_active ?? true,
		creditLimit: raw.credit_limit || null
	}))

export const AccountListSchema = listEnvelope(AccountSchema)

export const CreatedAccountSchema = z
	.object({ account: AccountSchema })
	.transform(body => body.account)

export type AccountType = z.infer<typeof AccountTypeSchema>
export type Account = z.infer<typeof AccountSchema>
