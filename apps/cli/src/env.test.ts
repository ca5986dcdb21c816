import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadEnvFiles, readCliEnv } from './env'

let dir: string

beforeEach(async () => {
	dir = await mkdtemp(path.join(tmpdir(), 'codeprint-env-'))
})

afterEach(async () => {
	await rm(dir, { recursive: true, force: true })
})

describe('loadEnvFiles', () => {
	it('layers files without touching variables that were already set', async () => {
		await writeFile(
			path.join(dir, '.env'),
			'CODEPRINT_THEME=catppuccin-mocha\nCODEPRINT_CHUNK_SIZE=40\n'
		)
		await writeFile(path.join(dir, '.env.local'), 'CODEPRINT_CHUNK_SIZE=30\n')
		await writeFile(path.join(dir, '.env.test'), 'CODEPRINT_FONT_SIZE=12\n')
		const target: Record<string, string | undefined> = {
			NODE_ENV: 'test',
			CODEPRINT_FONT_SIZE: '9',
		}

		const applied = loadEnvFiles(dir, target)

		expect(applied).toEqual(['.env', '.env.local', '.env.test'])
		expect(target).toEqual({
			NODE_ENV: 'test',
			CODEPRINT_FONT_SIZE: '9',
			CODEPRINT_THEME: 'catppuccin-mocha',
			CODEPRINT_CHUNK_SIZE: '30',
		})
	})

	it('does nothing without env files', () => {
		const target: Record<string, string | undefined> = {}

		expect(loadEnvFiles(dir, target)).toEqual([])
		expect(target).toEqual({})
	})
})

describe('readCliEnv', () => {
	it('falls back to defaults', () => {
		expect(readCliEnv({})).toEqual({
			theme: 'kanagawa-wave',
			chunkSize: 55,
			fontSize: 8,
			lineHeight: 11,
		})
	})

	it('coerces numbers', () => {
		expect(
			readCliEnv({ CODEPRINT_CHUNK_SIZE: '20', CODEPRINT_LINE_HEIGHT: '12.5' })
		).toMatchObject({ chunkSize: 20, lineHeight: 12.5 })
	})

	it('rejects invalid values', () => {
		expect(() => readCliEnv({ CODEPRINT_CHUNK_SIZE: '0' })).toThrow(
			/CODEPRINT_CHUNK_SIZE/
		)
		expect(() => readCliEnv({ CODEPRINT_FONT_SIZE: 'big' })).toThrow(
			/CODEPRINT_FONT_SIZE/
		)
	})
})
