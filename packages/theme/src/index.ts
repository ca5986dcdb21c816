/**
 * @codeprint/theme
 *
 * Built-in color palettes and category style resolution.
 */

export {
	PALETTE_KEYS,
	type FontVariant,
	type PaletteKey,
	type SpanStyle,
	type Theme,
	type ThemePalette,
} from './types'
export { BUILTIN_THEMES, DEFAULT_THEME_NAME, parsePalettes } from './palettes'
export {
	categoryColor,
	categoryVariant,
	getTheme,
	listThemes,
	resolveSpanStyle,
} from './resolve'
export { UnknownThemeError, isUnknownThemeError } from './errors'
