import type { FontVariant } from '@codeprint/theme'
import { courierMetrics } from './metrics'
import type { GlyphMetrics, RenderingSurface, TextStyle } from './surface'

const FONT_FAMILY = "'Courier New', Courier, monospace"

const XML_ESCAPES: Record<string, string> = {
	'&': '&amp;',
	'<': '&lt;',
	'>': '&gt;',
	'"': '&quot;',
	"'": '&#39;',
}

export const escapeXml = (text: string): string =>
	text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char)

const num = (value: number): string => String(Math.round(value * 100) / 100)

const fontAttributes = (variant: FontVariant): string => {
	switch (variant) {
		case 'bold':
			return ' font-weight="bold"'
		case 'italic':
			return ' font-style="italic"'
		case 'regular':
			return ''
	}
}

/**
 * Rendering surface that records drawing calls as SVG elements
 */
export class SvgSurface implements RenderingSurface {
	private readonly elements: string[] = []

	constructor(
		readonly width: number,
		readonly height: number,
		private readonly metrics: GlyphMetrics = courierMetrics
	) {}

	fillRect(x: number, y: number, width: number, height: number, color: string): void {
		this.elements.push(
			`<rect x="${num(x)}" y="${num(y)}" width="${num(width)}" height="${num(height)}" fill="${escapeXml(color)}"/>`
		)
	}

	strokeLine(
		x1: number,
		y1: number,
		x2: number,
		y2: number,
		color: string,
		lineWidth = 1
	): void {
		this.elements.push(
			`<line x1="${num(x1)}" y1="${num(y1)}" x2="${num(x2)}" y2="${num(y2)}" stroke="${escapeXml(color)}" stroke-width="${num(lineWidth)}"/>`
		)
	}

	drawText(x: number, y: number, text: string, style: TextStyle): void {
		this.elements.push(
			`<text x="${num(x)}" y="${num(y)}" fill="${escapeXml(style.color)}" font-size="${num(style.size)}"${fontAttributes(style.variant)}>${escapeXml(text)}</text>`
		)
	}

	measureText(text: string, variant: FontVariant, size: number): number {
		return this.metrics(text, variant, size)
	}

	get elementCount(): number {
		return this.elements.length
	}

	toSvg(): string {
		return [
			`<svg xmlns="http://www.w3.org/2000/svg" width="${num(this.width)}pt" height="${num(this.height)}pt" viewBox="0 0 ${num(this.width)} ${num(this.height)}" font-family="${escapeXml(FONT_FAMILY)}" xml:space="preserve">`,
			...this.elements,
			'</svg>',
		].join('\n')
	}
}

/**
 * Wrap rendered pages into a printable HTML document, one page per SVG
 */
export const composeHtml = (
	pages: readonly string[],
	options: { title: string; background: string }
): string =>
	[
		'<!DOCTYPE html>',
		'<html lang="en">',
		'<head>',
		'<meta charset="utf-8">',
		`<title>${escapeXml(options.title)}</title>`,
		'<style>',
		'@page { size: letter; margin: 0; }',
		`body { margin: 0; background: ${options.background}; }`,
		'svg { display: block; break-after: page; }',
		'</style>',
		'</head>',
		'<body>',
		...pages,
		'</body>',
		'</html>',
		'',
	].join('\n')
