/**
 * File Chunking
 *
 * Splits a file into fixed-size line ranges. Every chunk carries the
 * comment state active at its first line, so chunks can be highlighted
 * independently of one another.
 */

import { DEFAULT_CHUNK_SIZE } from './consts'
import {
	advanceRenderState,
	advanceRenderStateHeuristic,
	initialRenderState,
} from './highlighter'
import type { Chunk, ChunkOptions, RenderState, StateStrategy } from './types'

type StateTransition = (line: string, state: RenderState) => RenderState

const TRANSITIONS: Record<StateStrategy, StateTransition> = {
	exact: advanceRenderState,
	heuristic: advanceRenderStateHeuristic,
}

/**
 * Split file content into lines. A trailing newline yields a final empty line.
 */
export const splitLines = (content: string): string[] => content.split('\n')

/**
 * Compute the entry state of every line in one forward pass
 */
export const computeLineStates = (
	lines: readonly string[],
	stateStrategy: StateStrategy = 'exact'
): RenderState[] => {
	const transition = TRANSITIONS[stateStrategy]
	const states: RenderState[] = []

	let state = initialRenderState()
	for (const line of lines) {
		states.push(state)
		state = transition(line, state)
	}

	return states
}

const assertChunkSize = (chunkSize: number) => {
	if (!Number.isInteger(chunkSize) || chunkSize < 1) {
		throw new RangeError(
			`Chunk size must be a positive integer, received ${chunkSize}.`
		)
	}
}

/**
 * Partition lines into chunks of at most `chunkSize` lines
 */
export const chunkLines = (
	lines: readonly string[],
	options: ChunkOptions = {}
): Chunk[] => {
	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
	assertChunkSize(chunkSize)

	const states = computeLineStates(lines, options.stateStrategy)
	const chunkCount = Math.ceil(lines.length / chunkSize)
	const chunks: Chunk[] = []

	for (let index = 0; index < chunkCount; index++) {
		const start = index * chunkSize
		const end = Math.min(start + chunkSize, lines.length)

		chunks.push({
			startLine: start + 1,
			lines: lines.slice(start, end),
			isFirst: index === 0,
			isLast: index === chunkCount - 1,
			entryState: states[start] ?? initialRenderState(),
		})
	}

	return chunks
}

/**
 * Chunk raw file content
 */
export const chunkContent = (content: string, options?: ChunkOptions): Chunk[] =>
	chunkLines(splitLines(content), options)
