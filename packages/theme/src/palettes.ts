import { z } from 'zod'
import rawPalettes from './palettes.json'
import { PALETTE_KEYS, type PaletteKey, type Theme } from './types'

const hexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #rrggbb color')

const paletteShape = Object.fromEntries(
	PALETTE_KEYS.map((key) => [key, hexColor])
) as Record<PaletteKey, typeof hexColor>

const palettesSchema = z.record(z.string().min(1), z.strictObject(paletteShape))

/**
 * Validate a name → palette table. Every palette must define every key.
 */
export const parsePalettes = (raw: unknown): ReadonlyMap<string, Theme> => {
	const result = palettesSchema.safeParse(raw)
	if (!result.success) {
		throw new Error(z.prettifyError(result.error))
	}

	const themes = new Map<string, Theme>()
	for (const [name, palette] of Object.entries(result.data)) {
		themes.set(name, Object.freeze({ name, palette: Object.freeze(palette) }))
	}
	return themes
}

export const BUILTIN_THEMES = parsePalettes(rawPalettes)

export const DEFAULT_THEME_NAME = 'kanagawa-wave'
