export class DocumentFinalizeError extends Error {
	constructor(cause?: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause)
		super(`Could not assemble the document: ${detail}`, { cause })
		this.name = 'DocumentFinalizeError'
	}
}

export const isDocumentFinalizeError = (
	error: unknown
): error is DocumentFinalizeError => error instanceof DocumentFinalizeError
