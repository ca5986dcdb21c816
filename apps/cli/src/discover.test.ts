import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { compareProjectFiles, findProjectFiles, isHeaderFile } from './discover'

let dir: string

const touch = async (relative: string) => {
	const file = path.join(dir, relative)
	await mkdir(path.dirname(file), { recursive: true })
	await writeFile(file, '')
}

beforeEach(async () => {
	dir = await mkdtemp(path.join(tmpdir(), 'codeprint-discover-'))
})

afterEach(async () => {
	await rm(dir, { recursive: true, force: true })
})

describe('findProjectFiles', () => {
	it('lists headers first and skips build output and hidden directories', async () => {
		await Promise.all(
			[
				'main.cpp',
				'util.h',
				'src/a.cc',
				'include/z.hpp',
				'notes.txt',
				'build/gen.cpp',
				'Debug/obj.c',
				'.git/hook.c',
			].map(touch)
		)

		expect(await findProjectFiles(path.join(dir, 'main.cpp'))).toEqual([
			path.join(dir, 'include/z.hpp'),
			path.join(dir, 'util.h'),
			path.join(dir, 'main.cpp'),
			path.join(dir, 'src/a.cc'),
		])
	})

	it('falls back to the given file', async () => {
		await touch('script.ino')

		expect(await findProjectFiles(path.join(dir, 'script.ino'))).toEqual([
			path.join(dir, 'script.ino'),
		])
	})
})

describe('compareProjectFiles', () => {
	it('orders headers before sources', () => {
		expect(['b.cpp', 'a.c', 'c.HPP', 'a.h'].sort(compareProjectFiles)).toEqual([
			'a.h',
			'c.HPP',
			'a.c',
			'b.cpp',
		])
		expect(isHeaderFile('x.h++')).toBe(true)
		expect(isHeaderFile('x.c++')).toBe(false)
	})
})
