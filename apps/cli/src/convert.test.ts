import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Lexer } from '@codeprint/lexer'
import { setLogForwarder, type LogForwarderEntry } from '@codeprint/logger'
import { getTheme } from '@codeprint/theme'
import {
	buildFileBlocks,
	buildHeaderBlocks,
	convert,
	defaultOutputPath,
	formatDate,
	readSources,
} from './convert'

let dir: string

const write = async (relative: string, content: string) => {
	const file = path.join(dir, relative)
	await mkdir(path.dirname(file), { recursive: true })
	await writeFile(file, content)
}

beforeEach(async () => {
	dir = await mkdtemp(path.join(tmpdir(), 'codeprint-convert-'))
})

afterEach(async () => {
	setLogForwarder(undefined)
	await rm(dir, { recursive: true, force: true })
})

describe('header blocks', () => {
	it('lists the details and every file', () => {
		expect(
			buildHeaderBlocks(
				{ title: 'Lab 3', name: 'Ada', course: 'CS 101' },
				['util.h', 'main.cpp'],
				new Date(2026, 0, 5)
			)
		).toEqual([
			{ kind: 'title', text: 'Lab 3' },
			{ kind: 'info', label: 'Student', text: 'Ada' },
			{ kind: 'info', label: 'Course', text: 'CS 101' },
			{ kind: 'info', label: 'Date', text: 'January 05, 2026' },
			{ kind: 'info', label: 'Files', text: '2' },
			{ kind: 'info', text: '  util.h' },
			{ kind: 'info', text: '  main.cpp' },
		])
	})

	it('formats dates with a padded day', () => {
		expect(formatDate(new Date(2026, 9, 19))).toBe('October 19, 2026')
	})
})

describe('buildFileBlocks', () => {
	it('starts a page, then the header and one block per chunk', () => {
		const content = Array.from({ length: 60 }, (_, i) => `int v${i};`).join('\n')

		const blocks = buildFileBlocks({ id: 'main.cpp', content }, Lexer.create(), 55)

		expect(blocks.map((block) => block.kind)).toEqual([
			'page-break',
			'file-header',
			'spacer',
			'code',
			'code',
			'spacer',
		])
		expect(
			blocks.flatMap((block) =>
				block.kind === 'code' ? [[block.chunk.startLine, block.chunk.lines.length]] : []
			)
		).toEqual([
			[1, 55],
			[56, 5],
		])
	})
})

describe('readSources', () => {
	it('warns about unreadable files and keeps going', async () => {
		await write('main.cpp', 'int main() {}\r\nreturn 0;\n')
		const entries: LogForwarderEntry[] = []
		setLogForwarder((entry) => entries.push(entry))

		const result = await readSources(dir, [
			path.join(dir, 'missing.cpp'),
			path.join(dir, 'main.cpp'),
		])

		expect(result.sources).toEqual([
			{ id: 'main.cpp', content: 'int main() {}\nreturn 0;' },
		])
		expect(result.skipped).toEqual(['missing.cpp'])
		expect(entries).toHaveLength(1)
		expect(entries[0]).toMatchObject({ tag: 'cli', level: 'warn' })
		expect(String(entries[0]!.args[0])).toMatch(/^Could not read missing\.cpp: /)
	})

	it('skips files that are not valid UTF-8', async () => {
		await writeFile(path.join(dir, 'latin1.cpp'), Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]))
		await write('main.cpp', 'int x;')
		const entries: LogForwarderEntry[] = []
		setLogForwarder((entry) => entries.push(entry))

		const result = await readSources(dir, [
			path.join(dir, 'latin1.cpp'),
			path.join(dir, 'main.cpp'),
		])

		expect(result.sources.map((source) => source.id)).toEqual(['main.cpp'])
		expect(result.skipped).toEqual(['latin1.cpp'])
		expect(entries).toHaveLength(1)
		expect(String(entries[0]!.args[0])).toMatch(/^Could not read latin1\.cpp: /)
	})
})

describe('convert', () => {
	it('writes one page for the header and one per file', async () => {
		await write('main.cpp', '#include "util.h"\nint main() { return twice(2); }\n')
		await write('util.h', 'int twice(int x) { return x * 2; }\n')
		await write('build/generated.cpp', 'int ignored;\n')
		const output = path.join(dir, 'out', 'listing.html')

		const result = await convert({
			entryFile: path.join(dir, 'main.cpp'),
			project: true,
			theme: getTheme('catppuccin-mocha'),
			chunkSize: 55,
			output,
			title: 'Lab 3',
			date: new Date(2026, 9, 19),
		})

		const html = await readFile(output, 'utf8')
		expect(result).toEqual({ outputPath: output, files: ['util.h', 'main.cpp'], skipped: [] })
		expect(html.match(/<svg /g)).toHaveLength(3)
		expect(html).toContain('<title>Lab 3</title>')
		expect(html).toContain('>October 19, 2026</text>')
		expect(html.indexOf('>File: util.h</text>')).toBeLessThan(
			html.indexOf('>File: main.cpp</text>')
		)
		expect(html).not.toContain('generated.cpp')
	})

	it('converts only the entry file without project discovery', async () => {
		await write('main.cpp', 'int main() {}\n')
		await write('other.cpp', 'int other;\n')

		const result = await convert({
			entryFile: path.join(dir, 'main.cpp'),
			project: false,
			theme: getTheme('kanagawa-wave'),
			chunkSize: 55,
			output: defaultOutputPath('main.cpp', dir),
		})

		expect(result.files).toEqual(['main.cpp'])
		expect(result.outputPath).toBe(path.join(dir, 'main_submission.html'))
	})
})
