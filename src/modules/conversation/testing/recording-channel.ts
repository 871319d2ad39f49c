import type { OutboundMessage, ReplyChannel, SentMessage } from '../conversation.types'

export type ChannelOp =
	| { op: 'send'; messageId: number; message: OutboundMessage }
	| { op: 'edit'; messageId: number; message: OutboundMessage }

/** Reply channel that keeps everything it was asked to deliver. */
export class RecordingChannel implements ReplyChannel {
	readonly ops: ChannelOp[] = []
	/** Makes the next edit throw, as Telegram does when delivery times out. */
	failNextEdit = false
	private nextMessageId = 100

	async send(message: OutboundMessage): Promise<SentMessage> {
		const messageId = this.nextMessageId++
		this.ops.push({ op: 'send', messageId, message })
		return { messageId }
	}

	async edit(target: SentMessage, message: OutboundMessage): Promise<SentMessage> {
		if (this.failNextEdit) {
			this.failNextEdit = false
			throw new Error('ETIMEDOUT')
		}
		this.ops.push({ op: 'edit', messageId: target.messageId, message })
		return target
	}

	get last(): ChannelOp {
		const op = this.ops[this.ops.length - 1]
		if (!op) throw new Error('nothing was delivered')
		return op
	}

	get lastText(): string {
		return this.last.message.text
	}

	/** Payloads of the last keyboard, row by row. */
	get lastPayloads(): string[][] {
		return (this.last.message.keyboard ?? []).map(row => row.map(b => b.payload))
	}
}
