import { describe, it, expect } from 'vitest'
import { courierMetrics, createMonospaceMetrics } from './metrics'

describe('monospace metrics', () => {
	it('advances every glyph by the same width', () => {
		expect(courierMetrics('abc', 'regular', 10)).toBeCloseTo(18)
		expect(courierMetrics('abc', 'bold', 10)).toBeCloseTo(18)
		expect(courierMetrics('', 'italic', 10)).toBe(0)
	})

	it('counts code points rather than UTF-16 units', () => {
		expect(courierMetrics('𝒳', 'regular', 10)).toBeCloseTo(6)
	})

	it('takes a per-variant advance', () => {
		const metrics = createMonospaceMetrics({ bold: 0.5 })

		expect(metrics('ab', 'bold', 10)).toBe(10)
		expect(metrics('ab', 'regular', 10)).toBeCloseTo(12)
	})
})
