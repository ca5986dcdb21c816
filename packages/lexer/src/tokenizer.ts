/**
 * Core Tokenization Logic
 *
 * Pure functional tokenization of a single line.
 */

import { TOKEN_PATTERN_SOURCE } from './consts'
import { TokenKind, type Token } from './types'

const RULE_GROUPS = [
	'string',
	'hex',
	'number',
	'identifier',
	'operator',
	'punctuation',
	'whitespace',
] as const

type RuleGroup = (typeof RULE_GROUPS)[number]

const GROUP_KINDS: Record<RuleGroup, TokenKind> = {
	string: TokenKind.String,
	hex: TokenKind.Number,
	number: TokenKind.Number,
	identifier: TokenKind.Identifier,
	operator: TokenKind.Operator,
	punctuation: TokenKind.Punctuation,
	whitespace: TokenKind.Whitespace,
}

const kindOf = (groups: Record<string, string | undefined>): TokenKind => {
	for (const group of RULE_GROUPS) {
		if (groups[group] !== undefined) return GROUP_KINDS[group]
	}
	throw new Error('Token match did not come from any lexical rule.')
}

/**
 * Split a line into tokens.
 *
 * Characters that no rule matches are skipped, so the token texts only
 * reconstruct the line when every character is covered.
 */
export const tokenizeLine = (line: string): Token[] => {
	const pattern = new RegExp(TOKEN_PATTERN_SOURCE, 'g')
	const tokens: Token[] = []

	for (const match of line.matchAll(pattern)) {
		tokens.push({ text: match[0], kind: kindOf(match.groups ?? {}) })
	}

	return tokens
}
