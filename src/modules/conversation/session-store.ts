import { Injectable } from '@nestjs/common'
import type { ConversationState, FlowFamily } from './conversation.types'

export interface Session {
	key: string
	family: FlowFamily
	state: ConversationState
	/** Last prompt sent for this session, edited in place by later steps. */
	promptMessageId?: number
	expiresAt: number
	/** Monotonic write order, most recent wins routing ties. */
	revision: number
}

export type SessionWrite = Pick<Session, 'key' | 'family' | 'state' | 'promptMessageId'>

/**
 * In-memory sessions keyed by chat and user, one per flow family. Work for one
 * key runs strictly in order through runExclusive; different keys never wait
 * on each other.
 */
@Injectable()
export class SessionStore {
	private readonly sessions = new Map<string, Map<FlowFamily, Session>>()
	private readonly queues = new Map<string, Promise<void>>()
	private revision = 0

	static keyOf(chatId: number, userId: number): string {
		return `${chatId}:${userId}`
	}

	runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.queues.get(key) ?? Promise.resolve()
		const run = previous.then(task)
		const tail = run.then(
			() => undefined,
			() => undefined
		)
		this.queues.set(key, tail)
		void tail.then(() => {
			if (this.queues.get(key) === tail) this.queues.delete(key)
		})
		return run
	}

	peek(key: string, family: FlowFamily): Session | null {
		return this.sessions.get(key)?.get(family) ?? null
	}

	/** Sessions of a key, most recently written first. */
	list(key: string): Session[] {
		const families = this.sessions.get(key)
		if (!families) return []
		return [...families.values()].sort((a, b) => b.revision - a.revision)
	}

	save(write: SessionWrite, ttlMs: number, now = Date.now()): Session {
		const session: Session = {
			...write,
			expiresAt: now + ttlMs,
			revision: ++this.revision
		}
		let families = this.sessions.get(write.key)
		if (!families) {
			families = new Map()
			this.sessions.set(write.key, families)
		}
		families.set(write.family, session)
		return session
	}

	delete(key: string, family: FlowFamily): boolean {
		const families = this.sessions.get(key)
		if (!families) return false
		const deleted = families.delete(family)
		if (!families.size) this.sessions.delete(key)
		return deleted
	}

	isExpired(session: Session, now = Date.now()): boolean {
		return session.expiresAt <= now
	}

	expired(now = Date.now()): Session[] {
		const result: Session[] = []
		for (const families of this.sessions.values()) {
			for (const session of families.values()) {
				if (this.isExpired(session, now)) result.push(session)
			}
		}
		return result
	}

	get size(): number {
		let count = 0
		for (const families of this.sessions.values()) count += families.size
		return count
	}
}
