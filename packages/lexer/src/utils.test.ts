import { describe, test, expect } from 'vitest'
import { Category } from './types'
import { joinSpans, mergeAdjacentSpans } from './utils'

describe('mergeAdjacentSpans', () => {
	test('should merge runs of the same category', () => {
		const spans = [
			{ text: '/', category: Category.Operator },
			{ text: '/', category: Category.Operator },
			{ text: ' ', category: Category.Whitespace },
			{ text: 'x', category: Category.Identifier },
		]

		expect(mergeAdjacentSpans(spans)).toEqual([
			{ text: '//', category: Category.Operator },
			{ text: ' ', category: Category.Whitespace },
			{ text: 'x', category: Category.Identifier },
		])
		expect(joinSpans(mergeAdjacentSpans(spans))).toBe(joinSpans(spans))
	})

	test('should not mutate its input', () => {
		const spans = [
			{ text: 'a', category: Category.Identifier },
			{ text: 'b', category: Category.Identifier },
		]
		mergeAdjacentSpans(spans)

		expect(spans[0]).toEqual({ text: 'a', category: Category.Identifier })
	})
})
