import { Category } from '@codeprint/lexer'
import { loggers } from '@codeprint/logger'
import { UnknownThemeError } from './errors'
import { BUILTIN_THEMES } from './palettes'
import type { FontVariant, PaletteKey, SpanStyle, Theme } from './types'

const log = loggers.theme

const CATEGORY_COLORS: Record<Category, PaletteKey> = {
	[Category.Keyword]: 'keyword',
	[Category.Type]: 'type',
	[Category.String]: 'string',
	[Category.Number]: 'number',
	[Category.Preprocessor]: 'preprocessor',
	[Category.LineComment]: 'comment',
	[Category.BlockComment]: 'comment',
	[Category.FunctionCall]: 'function',
	[Category.MemberAccess]: 'property',
	[Category.NamespaceAccess]: 'type',
	[Category.PointerOrRef]: 'operator',
	[Category.Operator]: 'operator',
	[Category.Punctuation]: 'punctuation',
	[Category.Identifier]: 'variable',
	[Category.Whitespace]: 'variable',
}

const CATEGORY_VARIANTS: Partial<Record<Category, FontVariant>> = {
	[Category.Keyword]: 'bold',
	[Category.PointerOrRef]: 'bold',
	[Category.Preprocessor]: 'bold',
	[Category.LineComment]: 'italic',
	[Category.BlockComment]: 'italic',
}

export const listThemes = (
	themes: ReadonlyMap<string, Theme> = BUILTIN_THEMES
): string[] => Array.from(themes.keys())

/**
 * Look up a theme by name, ignoring case
 */
export const getTheme = (
	name: string,
	themes: ReadonlyMap<string, Theme> = BUILTIN_THEMES
): Theme => {
	const theme = themes.get(name.trim().toLowerCase())
	if (!theme) {
		throw new UnknownThemeError(name, listThemes(themes))
	}

	log.debug(`Using theme ${theme.name}`)
	return theme
}

export const categoryColor = (theme: Theme, category: Category): string =>
	theme.palette[CATEGORY_COLORS[category]]

export const categoryVariant = (category: Category): FontVariant =>
	CATEGORY_VARIANTS[category] ?? 'regular'

export const resolveSpanStyle = (theme: Theme, category: Category): SpanStyle => ({
	color: categoryColor(theme, category),
	variant: categoryVariant(category),
})
