import type { FontVariant } from '@codeprint/theme'
import type { GlyphMetrics } from './surface'

// Courier and its bold/oblique cuts advance every glyph by 600/1000 em.
const COURIER_ADVANCE = 0.6

/**
 * Metrics for a fixed-pitch font, as an advance per glyph in ems
 */
export const createMonospaceMetrics = (
	advances: Partial<Record<FontVariant, number>> = {}
): GlyphMetrics => {
	return (text, variant, size) => {
		const advance = advances[variant] ?? COURIER_ADVANCE
		return Array.from(text).length * advance * size
	}
}

export const courierMetrics: GlyphMetrics = createMonospaceMetrics()
