/**
 * Lexer Constants
 */

import vocabulary from './vocabulary.json'
import type { Vocabulary } from './types'

export const DEFAULT_CHUNK_SIZE = 55

// Alternatives are tried in order at each position; the first one that
// matches wins, so a longer match further down the list never applies.
const TOKEN_RULES = [
	String.raw`(?<string>"[^"\\]*(?:\\.[^"\\]*)*"|'[^'\\]*(?:\\.[^'\\]*)*')`,
	String.raw`(?<hex>0x[0-9a-fA-F]+)`,
	String.raw`(?<number>[0-9]+\.?[0-9]*[fFlLuU]*)`,
	String.raw`(?<identifier>[A-Za-z_]\w*)`,
	String.raw`(?<operator>::|->|\+\+|--|<<|>>|<=|>=|==|!=|&&|\|\||[+\-*/%=<>!&|^~?:])`,
	String.raw`(?<punctuation>[()[\]{};,.#])`,
	String.raw`(?<whitespace>\s+)`,
]

export const TOKEN_PATTERN_SOURCE = TOKEN_RULES.join('|')

export const IDENTIFIER = /^[A-Za-z_]\w*$/
export const NUMERIC_LITERAL = /^(?:0x[0-9a-fA-F]+|\d+\.?\d*[fFlLuU]*)$/
export const PREPROCESSOR_LINE = /^\s*#/

export const POINTER_OR_REF = new Set(['*', '&', '->', '::'])

export const OPERATORS = new Set([
	'::',
	'->',
	'++',
	'--',
	'<<',
	'>>',
	'<=',
	'>=',
	'==',
	'!=',
	'&&',
	'||',
	'+',
	'-',
	'*',
	'/',
	'%',
	'=',
	'<',
	'>',
	'!',
	'&',
	'|',
	'^',
	'~',
	'?',
	':',
])

export const PUNCTUATION = new Set([
	'(',
	')',
	'[',
	']',
	'{',
	'}',
	';',
	',',
	'.',
	'#',
])

export const MEMBER_ACCESSORS = new Set(['.', '->'])
export const NAMESPACE_ACCESSOR = '::'
export const CALL_OPENER = '('

export const BLOCK_COMMENT_OPEN = '/*'
export const BLOCK_COMMENT_CLOSE = '*/'
export const LINE_COMMENT = '//'

export const DEFAULT_VOCABULARY: Vocabulary = {
	keywords: new Set(vocabulary.keywords),
	types: new Set(vocabulary.types),
}
