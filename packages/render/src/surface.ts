import type { FontVariant } from '@codeprint/theme'

export type TextStyle = {
	color: string
	variant: FontVariant
	size: number
}

/**
 * Width of a run of text in points for a font variant and size
 */
export type GlyphMetrics = (text: string, variant: FontVariant, size: number) => number

/**
 * Drawing capabilities a backend has to offer. Coordinates are in points
 * from the top-left corner; text is positioned by its baseline.
 */
export type RenderingSurface = {
	fillRect(x: number, y: number, width: number, height: number, color: string): void
	strokeLine(
		x1: number,
		y1: number,
		x2: number,
		y2: number,
		color: string,
		lineWidth?: number
	): void
	drawText(x: number, y: number, text: string, style: TextStyle): void
	measureText(text: string, variant: FontVariant, size: number): number
}
