/**
 * Lexer Types
 */

/**
 * Syntactic shape of a token, decided by pattern matching alone
 */
export const TokenKind = {
	String: 'string',
	Number: 'number',
	Identifier: 'identifier',
	Operator: 'operator',
	Punctuation: 'punctuation',
	Whitespace: 'whitespace',
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/**
 * Tokenizer output
 */
export type Token = {
	text: string
	kind: TokenKind
}

/**
 * Semantic label used to pick a display color
 */
export const Category = {
	Keyword: 'keyword',
	Type: 'type',
	String: 'string',
	Number: 'number',
	Preprocessor: 'preprocessor',
	LineComment: 'line-comment',
	BlockComment: 'block-comment',
	FunctionCall: 'function-call',
	MemberAccess: 'member-access',
	NamespaceAccess: 'namespace-access',
	PointerOrRef: 'pointer-or-ref',
	Operator: 'operator',
	Punctuation: 'punctuation',
	Identifier: 'identifier',
	Whitespace: 'whitespace',
} as const

export type Category = (typeof Category)[keyof typeof Category]

export const CATEGORIES: readonly Category[] = Object.values(Category)

/**
 * A contiguous run of the original text tagged with one category
 */
export type StyledSpan = {
	text: string
	category: Category
}

/**
 * The only state carried from one line to the next
 */
export type RenderState = {
	readonly inBlockComment: boolean
}

/**
 * Result of highlighting a line
 */
export type LineHighlight = {
	spans: StyledSpan[]
	endState: RenderState
}

/**
 * A bounded slice of a file's lines, rendered as one block
 */
export type Chunk = {
	/** 1-based index of the first line */
	startLine: number
	lines: readonly string[]
	isFirst: boolean
	isLast: boolean
	entryState: RenderState
}

/**
 * How chunk entry states are derived from the preceding lines.
 *
 * `exact` runs the line state machine; `heuristic` only looks for
 * comment markers line by line.
 */
export type StateStrategy = 'exact' | 'heuristic'

export type ChunkOptions = {
	chunkSize?: number
	stateStrategy?: StateStrategy
}

/**
 * Fixed word lists consulted by the classifier
 */
export type Vocabulary = {
	keywords: ReadonlySet<string>
	types: ReadonlySet<string>
}
