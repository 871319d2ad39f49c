export class BackendError extends Error {
	constructor(
		message: string,
		readonly status: number | null = null
	) {
		super(message)
		this.name = new.target.name
	}
}

/** Network failure, timeout, 5xx, or a body that does not match the expected schema. */
export class UpstreamUnavailableError extends BackendError {}

/** The backend rejected the request (4xx). */
export class BackendRequestError extends BackendError {}

export class NotFoundError extends BackendRequestError {}

export class LinkCodeInvalidError extends BackendError {}

export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
