import { z } from 'zod'
import { IdSchema, listEnvelope } from './common.schema'

export const CategoryTypeSchema = z.enum(['expense', 'income'])

export const CategorySchema = z
	.object({
		id: IdSchema,
		name: z.string(),
		type: CategoryTypeSchema,
		parent_id: IdSchema.nullish(),
		icon: z.string().nullish(),
		description: z.string().nullish()
	})
	.transform(raw => ({
		id: raw.id,
		name: raw.name,
		type: raw.type,
		parentId: raw.parent_id ?? null,
		icon: raw.icon ?? '',
		description: raw.description ?? ''
	}))

export const CategoryListSchema = listEnvelope(CategorySchema)

export const CreatedCategorySchema = z
	.object({ category: CategorySchema })
	.transform(body => body.category)

export type CategoryType = z.infer<typeof CategoryTypeSchema>
export type Category = z.infer<typeof CategorySchema>
