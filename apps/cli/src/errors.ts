export class CliUsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'CliUsageError'
	}
}

/**
 * A source file that could not be read. The run continues without it.
 */
export class SourceReadError extends Error {
	constructor(
		readonly fileId: string,
		cause?: unknown
	) {
		const detail = cause instanceof Error ? cause.message : String(cause)
		super(`Could not read ${fileId}: ${detail}`, { cause })
		this.name = 'SourceReadError'
	}
}

export const isCliUsageError = (error: unknown): error is CliUsageError =>
	error instanceof CliUsageError
