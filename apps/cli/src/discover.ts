import { readdir } from 'node:fs/promises'
import path from 'node:path'
import { loggers } from '@codeprint/logger'

const log = loggers.cli

const HEADER_EXTENSIONS = new Set(['.h', '.hpp', '.hxx', '.h++'])
const SOURCE_EXTENSIONS = new Set([
	'.cpp',
	'.cc',
	'.cxx',
	'.c++',
	'.c',
	...HEADER_EXTENSIONS,
])
const SKIPPED_DIRECTORIES = new Set(['build', 'bin', 'obj', 'Debug', 'Release'])

export const isHeaderFile = (file: string) =>
	HEADER_EXTENSIONS.has(path.extname(file).toLowerCase())

export const isSourceFile = (file: string) =>
	SOURCE_EXTENSIONS.has(path.extname(file).toLowerCase())

const walk = async (dir: string, found: string[]): Promise<void> => {
	const entries = await readdir(dir, { withFileTypes: true })
	for (const entry of entries) {
		const fullPath = path.join(dir, entry.name)
		if (entry.isDirectory()) {
			if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) continue
			await walk(fullPath, found)
		} else if (entry.isFile() && isSourceFile(entry.name)) {
			found.push(fullPath)
		}
	}
}

/**
 * Headers first, then sources, each group by path
 */
export const compareProjectFiles = (a: string, b: string): number => {
	const rank = Number(!isHeaderFile(a)) - Number(!isHeaderFile(b))
	if (rank !== 0) return rank
	return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Every C or C++ file under the entry file's directory. Falls back to the
 * entry file alone when nothing matches.
 */
export const findProjectFiles = async (entryFile: string): Promise<string[]> => {
	const root = path.dirname(path.resolve(entryFile))
	const found: string[] = []
	await walk(root, found)

	if (found.length === 0) {
		log.debug(`No project files under ${root}, using ${entryFile} only`)
		return [path.resolve(entryFile)]
	}

	log.debug(`Found ${found.length} project file(s) under ${root}`)
	return found.sort(compareProjectFiles)
}
