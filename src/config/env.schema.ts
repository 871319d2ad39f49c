import { z } from 'zod'

const CurrencyCodeSchema = z
	.string()
	.trim()
	.regex(/^[A-Za-z]{3}$/, 'must be a 3-letter ISO 4217 code')
	.transform(code => code.toUpperCase())

export const EnvSchema = z.object({
	BOT_TOKEN: z.string().min(1),
	BOT_INTERNAL_SECRET: z.string().min(1),
	API_BASE_URL: z
		.string()
		.url()
		.default('http://api:8080')
		.transform(url => url.replace(/\/+$/, '')),
	PORT: z.coerce.number().int().positive().default(3000),
	DEFAULT_CURRENCY: CurrencyCodeSchema.default('MYR'),
	SESSION_TIMEOUT_TRANSACTION_SECONDS: z.coerce.number().int().positive().default(300),
	SESSION_TIMEOUT_LINK_SECONDS: z.coerce.number().int().positive().default(120),
	BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
	ACTIVITY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000)
})

export type Env = z.infer<typeof EnvSchema>

/** Used as `validate` for ConfigModule: the parsed object becomes the config. */
export function validateEnv(config: Record<string, unknown>): Env {
	const parsed = EnvSchema.safeParse(config)
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map(issue => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ')
		throw new Error(`Invalid environment: ${issues}`)
	}
	return parsed.data
}
