import { Injectable, Logger } from '@nestjs/common'
import { Interval } from '@nestjs/schedule'
import { ConversationEngine } from './conversation.engine'

export const SESSION_SWEEP_INTERVAL_MS = 30_000

@Injectable()
export class SessionSweepService {
	private readonly logger = new Logger(SessionSweepService.name)

	constructor(private readonly engine: ConversationEngine) {}

	@Interval(SESSION_SWEEP_INTERVAL_MS)
	async sweep(): Promise<void> {
		try {
			const evicted = await this.engine.expireIdleSessions()
			if (evicted) this.logger.debug(`Evicted ${evicted} idle session(s)`)
		} catch (error: unknown) {
			this.logger.error('Session sweep failed', error instanceof Error ? error.stack : String(error))
		}
	}
}
