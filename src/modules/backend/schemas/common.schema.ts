import { z } from 'zod'

/** Backend ids are UUID strings; older endpoints still send integers. */
export const IdSchema = z.union([z.string().min(1), z.number()]).transform(String)

export const MinorUnitsSchema = z.preprocess(value => {
	if (value == null || value === '') return 0
	if (typeof value === 'string') return Number(value)
	return value
}, z.number().finite())

export const listEnvelope = <T extends z.ZodTypeAny>(item: T) =>
	z.object({ data: z.array(item).nullish() }).transform(body => body.data ?? [])
