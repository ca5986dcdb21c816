import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { Lexer } from '@codeprint/lexer'
import { loggers } from '@codeprint/logger'
import { SvgDocument, type CodeLayout, type DocumentBlock } from '@codeprint/render'
import type { Theme } from '@codeprint/theme'
import { findProjectFiles } from './discover'
import { SourceReadError } from './errors'

const log = loggers.cli

const utf8 = new TextDecoder('utf-8', { fatal: true })

const FILE_HEADER_GAP = 7.2
const FILE_TRAILING_GAP = 14.4

export type SourceFile = {
	/** Path relative to the entry file's directory, with forward slashes */
	id: string
	content: string
}

export type ConvertOptions = {
	entryFile: string
	project: boolean
	theme: Theme
	chunkSize: number
	output?: string
	title?: string
	name?: string
	course?: string
	code?: Partial<CodeLayout>
	date?: Date
}

export type ConvertResult = {
	outputPath: string
	files: string[]
	skipped: string[]
}

export const formatDate = (date: Date): string =>
	date.toLocaleDateString('en-US', { month: 'long', day: '2-digit', year: 'numeric' })

export const defaultOutputPath = (entryFile: string, dir = process.cwd()): string => {
	const base = path.basename(entryFile, path.extname(entryFile))
	return path.resolve(dir, `${base}_submission.html`)
}

const toFileId = (root: string, file: string) =>
	path.relative(root, file).split(path.sep).join('/')

/**
 * Read every file, turning failures into warnings
 */
export const readSources = async (
	root: string,
	files: readonly string[]
): Promise<{ sources: SourceFile[]; skipped: string[] }> => {
	const sources: SourceFile[] = []
	const skipped: string[] = []

	for (const file of files) {
		const id = toFileId(root, file)
		try {
			const raw = utf8.decode(await readFile(file))
			sources.push({ id, content: raw.replace(/\r\n?/g, '\n').replace(/\n$/, '') })
		} catch (error) {
			const failure = new SourceReadError(id, error)
			log.warn(failure.message)
			skipped.push(id)
		}
	}

	return { sources, skipped }
}

export const buildHeaderBlocks = (
	options: Pick<ConvertOptions, 'title' | 'name' | 'course'>,
	fileIds: readonly string[],
	date: Date
): DocumentBlock[] => {
	const blocks: DocumentBlock[] = []
	if (options.title) blocks.push({ kind: 'title', text: options.title })
	if (options.name) blocks.push({ kind: 'info', label: 'Student', text: options.name })
	if (options.course) blocks.push({ kind: 'info', label: 'Course', text: options.course })
	blocks.push({ kind: 'info', label: 'Date', text: formatDate(date) })
	blocks.push({ kind: 'info', label: 'Files', text: String(fileIds.length) })
	for (const id of fileIds) {
		blocks.push({ kind: 'info', text: `  ${id}` })
	}
	return blocks
}

export const buildFileBlocks = (
	source: SourceFile,
	lexer: Lexer,
	chunkSize: number
): DocumentBlock[] => [
	{ kind: 'page-break' },
	{ kind: 'file-header', path: source.id },
	{ kind: 'spacer', height: FILE_HEADER_GAP },
	...lexer
		.chunk(source.content, { chunkSize })
		.map((chunk): DocumentBlock => ({ kind: 'code', chunk })),
	{ kind: 'spacer', height: FILE_TRAILING_GAP },
]

/**
 * Discover, highlight and render a project into one document on disk
 */
export const convert = async (options: ConvertOptions): Promise<ConvertResult> => {
	const entry = path.resolve(options.entryFile)
	const root = path.dirname(entry)
	const files = options.project ? await findProjectFiles(entry) : [entry]

	const { sources, skipped } = await readSources(root, files)
	if (sources.length === 0) {
		throw new Error('None of the source files could be read.')
	}

	const lexer = Lexer.create()
	const document = new SvgDocument({
		theme: options.theme,
		title: options.title ?? path.basename(entry),
		lexer,
		code: options.code,
	})

	const fileIds = sources.map((source) => source.id)
	document.append(...buildHeaderBlocks(options, fileIds, options.date ?? new Date()))
	for (const source of sources) {
		document.append(...buildFileBlocks(source, lexer, options.chunkSize))
	}

	const html = document.finalize()
	const outputPath = path.resolve(options.output ?? defaultOutputPath(entry))
	await mkdir(path.dirname(outputPath), { recursive: true })
	await writeFile(outputPath, html, 'utf8')

	log.success(`Wrote ${outputPath} (${sources.length} file(s))`)
	return { outputPath, files: fileIds, skipped }
}
