/**
 * Line Highlighting
 *
 * A two-state machine (normal code / inside a block comment) that turns
 * one line into styled spans. Code between comment regions goes through
 * the tokenizer and classifier; comment and preprocessor regions become
 * single spans.
 */

import { classifyTokens } from './classifier'
import {
	BLOCK_COMMENT_CLOSE,
	BLOCK_COMMENT_OPEN,
	LINE_COMMENT,
	PREPROCESSOR_LINE,
} from './consts'
import { tokenizeLine } from './tokenizer'
import {
	Category,
	type LineHighlight,
	type RenderState,
	type StyledSpan,
	type Vocabulary,
} from './types'

const NORMAL: RenderState = Object.freeze({ inBlockComment: false })
const IN_BLOCK_COMMENT: RenderState = Object.freeze({ inBlockComment: true })

export const initialRenderState = (): RenderState => ({ inBlockComment: false })

const pushSpan = (spans: StyledSpan[], text: string, category: Category) => {
	if (text.length > 0) spans.push({ text, category })
}

const pushCode = (spans: StyledSpan[], text: string, vocabulary: Vocabulary) => {
	if (text.length === 0) return
	spans.push(...classifyTokens(tokenizeLine(text), vocabulary))
}

/**
 * Highlight text that starts outside any block comment.
 *
 * Repeated `/* ... *\/` regions are consumed in a loop; whatever follows
 * the last closed region gets the preprocessor and line comment checks.
 */
const highlightCode = (
	text: string,
	spans: StyledSpan[],
	vocabulary: Vocabulary
): RenderState => {
	let rest = text

	while (rest.length > 0) {
		const open = rest.indexOf(BLOCK_COMMENT_OPEN)
		if (open !== -1) {
			pushCode(spans, rest.slice(0, open), vocabulary)

			const close = rest.indexOf(BLOCK_COMMENT_CLOSE, open + BLOCK_COMMENT_OPEN.length)
			if (close === -1) {
				pushSpan(spans, rest.slice(open), Category.BlockComment)
				return IN_BLOCK_COMMENT
			}

			const end = close + BLOCK_COMMENT_CLOSE.length
			pushSpan(spans, rest.slice(open, end), Category.BlockComment)
			rest = rest.slice(end)
			continue
		}

		if (PREPROCESSOR_LINE.test(rest)) {
			pushSpan(spans, rest, Category.Preprocessor)
			return NORMAL
		}

		// No quote tracking: a `//` inside a string literal starts the comment.
		const lineComment = rest.indexOf(LINE_COMMENT)
		if (lineComment !== -1) {
			pushCode(spans, rest.slice(0, lineComment), vocabulary)
			pushSpan(spans, rest.slice(lineComment), Category.LineComment)
			return NORMAL
		}

		pushCode(spans, rest, vocabulary)
		return NORMAL
	}

	return NORMAL
}

/**
 * Highlight a single line given the state it starts in
 */
export const highlightLine = (
	line: string,
	state: RenderState,
	vocabulary: Vocabulary
): LineHighlight => {
	const spans: StyledSpan[] = []

	if (!state.inBlockComment) {
		return { spans, endState: highlightCode(line, spans, vocabulary) }
	}

	const close = line.indexOf(BLOCK_COMMENT_CLOSE)
	if (close === -1) {
		pushSpan(spans, line, Category.BlockComment)
		return { spans, endState: IN_BLOCK_COMMENT }
	}

	// Closing the carried comment always ends the line in code, even when
	// the tail opens another one.
	const end = close + BLOCK_COMMENT_CLOSE.length
	pushSpan(spans, line.slice(0, end), Category.BlockComment)
	highlightCode(line.slice(end), spans, vocabulary)
	return { spans, endState: NORMAL }
}

/**
 * State after a line, without building spans.
 *
 * Follows the same marker search as `highlightLine`: only block comment
 * markers move the state, preprocessor and line comment rules never do.
 */
export const advanceRenderState = (
	line: string,
	state: RenderState
): RenderState => {
	if (state.inBlockComment) {
		return line.includes(BLOCK_COMMENT_CLOSE) ? NORMAL : IN_BLOCK_COMMENT
	}

	let cursor = 0
	for (;;) {
		const open = line.indexOf(BLOCK_COMMENT_OPEN, cursor)
		if (open === -1) return NORMAL
		const close = line.indexOf(
			BLOCK_COMMENT_CLOSE,
			open + BLOCK_COMMENT_OPEN.length
		)
		if (close === -1) return IN_BLOCK_COMMENT
		cursor = close + BLOCK_COMMENT_CLOSE.length
	}
}

/**
 * Per-line marker check: a line with `/*` and no `*\/` opens a comment,
 * any other line with `*\/` closes it.
 */
export const advanceRenderStateHeuristic = (
	line: string,
	state: RenderState
): RenderState => {
	const hasOpen = line.includes(BLOCK_COMMENT_OPEN)
	const hasClose = line.includes(BLOCK_COMMENT_CLOSE)

	if (hasOpen && !hasClose) return IN_BLOCK_COMMENT
	if (hasClose) return NORMAL
	return state
}
