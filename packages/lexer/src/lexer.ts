/**
 * Unified Lexer Class
 *
 * Binds a vocabulary to the pure highlighting functions and threads
 * comment state through whole files and chunks.
 */

import { loggers } from '@codeprint/logger'
import { chunkLines, computeLineStates, splitLines } from './chunker'
import { DEFAULT_VOCABULARY } from './consts'
import { highlightLine, initialRenderState } from './highlighter'
import type {
	Chunk,
	ChunkOptions,
	LineHighlight,
	RenderState,
	StyledSpan,
	Vocabulary,
} from './types'

const log = loggers.lexer

/**
 * A highlighted line of a chunk, numbered from the start of the file
 */
export type HighlightedLine = {
	lineNumber: number
	spans: StyledSpan[]
}

export class Lexer {
	private readonly vocabulary: Vocabulary

	private constructor(vocabulary: Vocabulary) {
		this.vocabulary = vocabulary
	}

	/**
	 * Create a lexer with the given vocabulary
	 */
	static create(vocabulary: Vocabulary = DEFAULT_VOCABULARY): Lexer {
		return new Lexer(vocabulary)
	}

	static initialState(): RenderState {
		return initialRenderState()
	}

	static statesEqual(a: RenderState, b: RenderState): boolean {
		return a.inBlockComment === b.inBlockComment
	}

	highlightLine(
		line: string,
		state: RenderState = Lexer.initialState()
	): LineHighlight {
		return highlightLine(line, state, this.vocabulary)
	}

	/**
	 * Line-start states for entire content
	 */
	computeAllStates(content: string): RenderState[] {
		return computeLineStates(splitLines(content))
	}

	chunk(content: string, options?: ChunkOptions): Chunk[] {
		const lines = splitLines(content)
		const chunks = chunkLines(lines, options)
		log.debug(
			`Split ${lines.length} lines into ${chunks.length} chunk(s) using ${options?.stateStrategy ?? 'exact'} states`
		)
		return chunks
	}

	/**
	 * Highlight every line of a chunk, starting from its entry state
	 */
	highlightChunk(chunk: Chunk): HighlightedLine[] {
		const lines: HighlightedLine[] = []
		let state = chunk.entryState

		chunk.lines.forEach((line, offset) => {
			const result = this.highlightLine(line, state)
			lines.push({ lineNumber: chunk.startLine + offset, spans: result.spans })
			state = result.endState
		})

		return lines
	}
}
