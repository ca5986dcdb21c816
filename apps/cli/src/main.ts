/**
 * codeprint command line
 */

import { stat } from 'node:fs/promises'
import path from 'node:path'
import { loggers } from '@codeprint/logger'
import {
	DEFAULT_CODE_LAYOUT,
	isDocumentFinalizeError,
	maxChunkLines,
} from '@codeprint/render'
import { getTheme, isUnknownThemeError, listThemes } from '@codeprint/theme'
import { parseCliArgs, USAGE } from './args'
import { convert, defaultOutputPath, type ConvertResult } from './convert'
import { loadEnvFiles, readCliEnv } from './env'
import { CliUsageError, isCliUsageError } from './errors'

const log = loggers.cli

export type RunOptions = {
	cwd?: string
	env?: Record<string, string | undefined>
	print?: (line: string) => void
	date?: Date
	onConverted?: (result: ConvertResult) => void
}

const defaultPrint = (line: string) => {
	process.stdout.write(`${line}\n`)
}

const ensureFile = async (file: string) => {
	const info = await stat(file).catch(() => undefined)
	if (!info?.isFile()) {
		throw new CliUsageError(`Input file not found: ${file}`)
	}
}

/**
 * Run the command line and resolve to a process exit code
 */
export const run = async (
	argv: readonly string[],
	options: RunOptions = {}
): Promise<number> => {
	const cwd = options.cwd ?? process.cwd()
	const env = options.env ?? process.env
	const print = options.print ?? defaultPrint

	try {
		const args = parseCliArgs(argv)
		if (args.help) {
			print(USAGE)
			return 0
		}
		if (args.listThemes) {
			listThemes().forEach((name) => print(name))
			return 0
		}

		const applied = loadEnvFiles(cwd, env)
		if (applied.length > 0) log.debug(`Loaded ${applied.join(', ')}`)
		const config = readCliEnv(env)

		const theme = getTheme(args.theme ?? config.theme)

		const code = { fontSize: config.fontSize, lineHeight: config.lineHeight }
		const chunkSize = args.chunkSize ?? config.chunkSize
		const maxLines = maxChunkLines({ ...DEFAULT_CODE_LAYOUT, ...code })
		if (chunkSize > maxLines) {
			throw new CliUsageError(
				`Chunk size ${chunkSize} does not fit on a page: at a line height of ${code.lineHeight}pt the maximum is ${maxLines}.`
			)
		}

		const entryFile = path.resolve(cwd, args.file ?? '')
		await ensureFile(entryFile)

		const result = await convert({
			entryFile,
			project: args.project,
			theme,
			chunkSize,
			output: args.output
				? path.resolve(cwd, args.output)
				: defaultOutputPath(entryFile, cwd),
			title: args.title,
			name: args.name,
			course: args.course,
			code,
			date: options.date,
		})
		options.onConverted?.(result)
		return 0
	} catch (error) {
		if (isCliUsageError(error)) {
			log.error(error.message)
			print(USAGE)
		} else if (isUnknownThemeError(error) || isDocumentFinalizeError(error)) {
			log.error(error.message)
		} else {
			loggers.app.error(error)
		}
		return 1
	}
}
