/**
 * Token Classification
 *
 * Refines token shapes into categories using the token itself and its
 * literal neighbours in the stream. Neighbours are read by index, so a
 * whitespace token between two tokens keeps them from being adjacent.
 */

import {
	CALL_OPENER,
	IDENTIFIER,
	MEMBER_ACCESSORS,
	NAMESPACE_ACCESSOR,
	NUMERIC_LITERAL,
	OPERATORS,
	POINTER_OR_REF,
	PUNCTUATION,
} from './consts'
import {
	Category,
	TokenKind,
	type StyledSpan,
	type Token,
	type Vocabulary,
} from './types'

/**
 * Get the category of the token at `index`
 */
export const classifyToken = (
	tokens: readonly Token[],
	index: number,
	vocabulary: Vocabulary
): Category => {
	const token = tokens[index]
	if (!token) {
		throw new RangeError(
			`Token index ${index} is outside a stream of ${tokens.length} tokens.`
		)
	}

	const { text, kind } = token
	const prev = tokens[index - 1]?.text
	const next = tokens[index + 1]?.text
	const isIdentifier = IDENTIFIER.test(text)

	if (kind === TokenKind.String) return Category.String
	if (vocabulary.keywords.has(text)) return Category.Keyword
	if (vocabulary.types.has(text)) return Category.Type
	if (isIdentifier && next === CALL_OPENER) return Category.FunctionCall
	if (isIdentifier && prev !== undefined && MEMBER_ACCESSORS.has(prev)) {
		return Category.MemberAccess
	}
	if (isIdentifier && prev === NAMESPACE_ACCESSOR) {
		return Category.NamespaceAccess
	}
	if (POINTER_OR_REF.has(text)) return Category.PointerOrRef
	if (OPERATORS.has(text)) return Category.Operator
	if (NUMERIC_LITERAL.test(text)) return Category.Number
	if (PUNCTUATION.has(text)) return Category.Punctuation
	if (kind === TokenKind.Whitespace) return Category.Whitespace

	return Category.Identifier
}

/**
 * Classify every token of a stream into styled spans, one per token
 */
export const classifyTokens = (
	tokens: readonly Token[],
	vocabulary: Vocabulary
): StyledSpan[] =>
	tokens.map((token, index) => ({
		text: token.text,
		category: classifyToken(tokens, index, vocabulary),
	}))
