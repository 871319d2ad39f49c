import { z } from 'zod'
import { IdSchema } from './common.schema'

export const ResolvedUserSchema = z
	.object({
		user_id: IdSchema,
		auth_token: z.string().min(1),
		default_currency: z.string().nullish()
	})
	.transform(raw => ({
		backendUserId: raw.user_id,
		authToken: raw.auth_token,
		defaultCurrency: raw.default_currency || null
	}))

export const CreatedTransactionSchema = z
	.object({
		transaction: z.object({ id: IdSchema }).passthrough().nullish(),
		id: IdSchema.nullish()
	})
	.transform(body => ({ id: body.transaction?.id ?? body.id ?? null }))

export const AnyBodySchema = z.unknown()

export type ResolvedUser = z.infer<typeof ResolvedUserSchema>
export type CreatedTransaction = z.infer<typeof CreatedTransactionSchema>
