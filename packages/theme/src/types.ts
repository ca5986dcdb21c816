export const PALETTE_KEYS = [
	'background',
	'page_background',
	'border',
	'line_number',
	'text',
	'text_dim',
	'comment',
	'keyword',
	'function',
	'string',
	'number',
	'preprocessor',
	'type',
	'variable',
	'property',
	'operator',
	'punctuation',
] as const

export type PaletteKey = (typeof PALETTE_KEYS)[number]

export type ThemePalette = Readonly<Record<PaletteKey, string>>

export type FontVariant = 'regular' | 'bold' | 'italic'

export type Theme = {
	readonly name: string
	readonly palette: ThemePalette
}

export type SpanStyle = {
	color: string
	variant: FontVariant
}
