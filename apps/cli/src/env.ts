import fs from 'node:fs'
import path from 'node:path'
import { parse as parseEnvFile } from 'dotenv'
import { z } from 'zod'
import { DEFAULT_CHUNK_SIZE } from '@codeprint/lexer'
import { DEFAULT_CODE_LAYOUT } from '@codeprint/render'
import { DEFAULT_THEME_NAME } from '@codeprint/theme'

type EnvRecord = Record<string, string | undefined>

const envFileNames = (mode: string) => [
	{ name: '.env', allowOverride: false },
	{ name: '.env.local', allowOverride: true },
	{ name: `.env.${mode}`, allowOverride: true },
	{ name: `.env.${mode}.local`, allowOverride: true },
]

/**
 * Merge the .env files of a directory into `target`. Variables that were
 * set before loading always win; later files win over earlier ones.
 * Returns the names of the files that were applied.
 */
export const loadEnvFiles = (dir: string, target: EnvRecord = process.env): string[] => {
	const originalKeys = new Set(Object.keys(target))
	const mode = target.NODE_ENV ?? 'development'
	const applied: string[] = []

	for (const { name, allowOverride } of envFileNames(mode)) {
		const filePath = path.join(dir, name)
		if (!fs.existsSync(filePath)) continue

		const parsed = parseEnvFile(fs.readFileSync(filePath))
		for (const [key, value] of Object.entries(parsed)) {
			if (!Object.prototype.hasOwnProperty.call(target, key)) {
				target[key] = value
				continue
			}
			if (allowOverride && !originalKeys.has(key)) {
				target[key] = value
			}
		}
		applied.push(name)
	}

	return applied
}

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
	CODEPRINT_THEME: z.string().trim().min(1).default(DEFAULT_THEME_NAME),
	CODEPRINT_CHUNK_SIZE: positiveInt.default(DEFAULT_CHUNK_SIZE),
	CODEPRINT_FONT_SIZE: z.coerce.number().positive().default(DEFAULT_CODE_LAYOUT.fontSize),
	CODEPRINT_LINE_HEIGHT: z.coerce
		.number()
		.positive()
		.default(DEFAULT_CODE_LAYOUT.lineHeight),
})

export type CliEnv = {
	theme: string
	chunkSize: number
	fontSize: number
	lineHeight: number
}

export const readCliEnv = (source: EnvRecord): CliEnv => {
	const result = envSchema.safeParse(source)
	if (!result.success) {
		throw new Error(z.prettifyError(result.error))
	}

	return {
		theme: result.data.CODEPRINT_THEME,
		chunkSize: result.data.CODEPRINT_CHUNK_SIZE,
		fontSize: result.data.CODEPRINT_FONT_SIZE,
		lineHeight: result.data.CODEPRINT_LINE_HEIGHT,
	}
}
