import type { FactoryProvider } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { CONVERSATION_OPTIONS, type ConversationOptions } from './conversation.types'

export const conversationOptionsProvider: FactoryProvider<ConversationOptions> = {
	provide: CONVERSATION_OPTIONS,
	inject: [ConfigService],
	useFactory: (config: ConfigService): ConversationOptions => ({
		transactionTimeoutMs: config.getOrThrow<number>('SESSION_TIMEOUT_TRANSACTION_SECONDS') * 1000,
		linkTimeoutMs: config.getOrThrow<number>('SESSION_TIMEOUT_LINK_SECONDS') * 1000,
		defaultCurrency: config.getOrThrow<string>('DEFAULT_CURRENCY')
	})
}
