/**
 * Lexer Utility Functions
 */

import type { StyledSpan } from './types'

/**
 * Join span texts back into the text they were cut from
 */
export const joinSpans = (spans: readonly StyledSpan[]): string =>
	spans.map(span => span.text).join('')

/**
 * Merge neighbouring spans that share a category
 */
export const mergeAdjacentSpans = (spans: readonly StyledSpan[]): StyledSpan[] => {
	const merged: StyledSpan[] = []
	for (const span of spans) {
		const last = merged[merged.length - 1]
		if (last && last.category === span.category) {
			merged[merged.length - 1] = { ...last, text: last.text + span.text }
			continue
		}
		merged.push(span)
	}
	return merged
}
