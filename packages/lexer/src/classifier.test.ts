import { describe, test, expect } from 'vitest'
import { classifyToken, classifyTokens } from './classifier'
import { DEFAULT_VOCABULARY } from './consts'
import { tokenizeLine } from './tokenizer'
import { Category, type StyledSpan } from './types'

const classify = (line: string): StyledSpan[] =>
	classifyTokens(tokenizeLine(line), DEFAULT_VOCABULARY)

const categoryOf = (line: string, text: string) =>
	classify(line).find((span) => span.text === text)?.category

describe('Classifier', () => {
	describe('Vocabulary', () => {
		test('should classify keywords before call detection', () => {
			expect(classify('if(')).toEqual([
				{ text: 'if', category: Category.Keyword },
				{ text: '(', category: Category.Punctuation },
			])
		})

		test('should classify types before namespace access', () => {
			expect(classify('std::string')).toEqual([
				{ text: 'std', category: Category.Identifier },
				{ text: '::', category: Category.PointerOrRef },
				{ text: 'string', category: Category.Type },
			])
		})

		test('should classify string and character literals', () => {
			expect(categoryOf('c = \'x\';', "'x'")).toBe(Category.String)
			expect(categoryOf('puts("hi")', '"hi"')).toBe(Category.String)
		})
	})

	describe('Adjacency', () => {
		test('should mark an identifier directly before ( as a call', () => {
			expect(classify('foo(')).toEqual([
				{ text: 'foo', category: Category.FunctionCall },
				{ text: '(', category: Category.Punctuation },
			])
		})

		test('should not mark a call across whitespace', () => {
			expect(categoryOf('foo (', 'foo')).toBe(Category.Identifier)
		})

		test('should mark member access after . and ->', () => {
			expect(classify('obj.member')).toEqual([
				{ text: 'obj', category: Category.Identifier },
				{ text: '.', category: Category.Punctuation },
				{ text: 'member', category: Category.MemberAccess },
			])
			expect(classify('node->next')).toEqual([
				{ text: 'node', category: Category.Identifier },
				{ text: '->', category: Category.PointerOrRef },
				{ text: 'next', category: Category.MemberAccess },
			])
		})

		test('should not mark member access across whitespace', () => {
			expect(categoryOf('obj. member', 'member')).toBe(Category.Identifier)
		})

		test('should prefer a call over member access', () => {
			expect(categoryOf('list.push(x)', 'push')).toBe(Category.FunctionCall)
		})

		test('should mark namespace access after ::', () => {
			expect(categoryOf('std::cout', 'cout')).toBe(Category.NamespaceAccess)
			expect(categoryOf('std:: cout', 'cout')).toBe(Category.Identifier)
		})
	})

	describe('Operators', () => {
		test('should distinguish pointers and references from operators', () => {
			expect(classify('int *p = &x;')).toEqual([
				{ text: 'int', category: Category.Type },
				{ text: ' ', category: Category.Whitespace },
				{ text: '*', category: Category.PointerOrRef },
				{ text: 'p', category: Category.Identifier },
				{ text: ' ', category: Category.Whitespace },
				{ text: '=', category: Category.Operator },
				{ text: ' ', category: Category.Whitespace },
				{ text: '&', category: Category.PointerOrRef },
				{ text: 'x', category: Category.Identifier },
				{ text: ';', category: Category.Punctuation },
			])
		})

		test('should classify the remaining operators', () => {
			expect(classify('a&&b').map((span) => span.category)).toEqual([
				Category.Identifier,
				Category.Operator,
				Category.Identifier,
			])
			expect(categoryOf('a ? b : c', ':')).toBe(Category.Operator)
			expect(categoryOf('i++', '++')).toBe(Category.Operator)
		})

		test('should classify numbers and punctuation', () => {
			expect(classify('return 42u;')).toEqual([
				{ text: 'return', category: Category.Keyword },
				{ text: ' ', category: Category.Whitespace },
				{ text: '42u', category: Category.Number },
				{ text: ';', category: Category.Punctuation },
			])
			expect(categoryOf('x[0xFF]', '0xFF')).toBe(Category.Number)
			expect(categoryOf('#', '#')).toBe(Category.Punctuation)
		})
	})

	test('should reject an index outside the stream', () => {
		expect(() => classifyToken(tokenizeLine('a'), 1, DEFAULT_VOCABULARY)).toThrow(
			RangeError
		)
	})
})
