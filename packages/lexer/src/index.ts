/**
 * @codeprint/lexer
 *
 * Line-oriented highlighting engine for C-family sources.
 */

// Main class export
export { Lexer, type HighlightedLine } from './lexer'

// Type exports
export {
	CATEGORIES,
	Category,
	TokenKind,
	type Chunk,
	type ChunkOptions,
	type LineHighlight,
	type RenderState,
	type StateStrategy,
	type StyledSpan,
	type Token,
	type Vocabulary,
} from './types'

export { DEFAULT_CHUNK_SIZE, DEFAULT_VOCABULARY } from './consts'

// Pure functions (for advanced use)
export { tokenizeLine } from './tokenizer'
export { classifyToken, classifyTokens } from './classifier'
export {
	advanceRenderState,
	advanceRenderStateHeuristic,
	highlightLine,
	initialRenderState,
} from './highlighter'
export {
	chunkContent,
	chunkLines,
	computeLineStates,
	splitLines,
} from './chunker'
export { joinSpans, mergeAdjacentSpans } from './utils'
