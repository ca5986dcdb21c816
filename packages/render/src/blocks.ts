/**
 * Document Blocks
 *
 * Everything a document is made of, measured and drawn at a given origin.
 * A code block depends only on its chunk, the theme and the layout, so
 * chunks of one file can be drawn in any order.
 */

import { Category, mergeAdjacentSpans, type Chunk, type Lexer } from '@codeprint/lexer'
import { resolveSpanStyle, type Theme } from '@codeprint/theme'
import type { RenderingSurface } from './surface'

export type DocumentBlock =
	| { kind: 'title'; text: string }
	| { kind: 'info'; label?: string; text: string }
	| { kind: 'spacer'; height: number }
	| { kind: 'file-header'; path: string }
	| { kind: 'code'; chunk: Chunk }
	| { kind: 'page-break' }

export type CodeLayout = {
	/** Block width in points */
	width: number
	lineHeight: number
	fontSize: number
	lineNumberX: number
	codeX: number
	/** Padding at the top of a file and the bottom of its last chunk */
	edgePadding: number
	/** Padding where one chunk of a file meets the next */
	joinPadding: number
}

export const DEFAULT_CODE_LAYOUT: CodeLayout = {
	width: 468,
	lineHeight: 11,
	fontSize: 8,
	lineNumberX: 5,
	codeX: 35,
	edgePadding: 10,
	joinPadding: 5,
}

export type BlockContext = {
	theme: Theme
	lexer: Lexer
	code: CodeLayout
	/** Width of the page area between the margins */
	contentWidth: number
}

const TITLE = { size: 18, spaceAfter: 12 }
const INFO = { size: 10, spaceAfter: 6 }
const FILE_HEADER = { size: 12, spaceBefore: 15, spaceAfter: 8, padding: 5 }
const LEADING = 1.2

const chunkPadding = (chunk: Chunk, code: CodeLayout) => ({
	top: chunk.isFirst ? code.edgePadding : code.joinPadding,
	bottom: chunk.isLast ? code.edgePadding : code.joinPadding,
})

export const measureCodeBlock = (chunk: Chunk, code: CodeLayout): number => {
	const padding = chunkPadding(chunk, code)
	return chunk.lines.length * code.lineHeight + padding.top + padding.bottom
}

/**
 * Draw one chunk: background, side borders, the top border on a file's
 * first chunk, the bottom border on its last, then numbered lines.
 */
export const drawCodeBlock = (
	surface: RenderingSurface,
	chunk: Chunk,
	x: number,
	y: number,
	context: BlockContext
): void => {
	const { theme, lexer, code } = context
	const { palette } = theme
	const padding = chunkPadding(chunk, code)
	const height = measureCodeBlock(chunk, code)
	const right = x + code.width
	const bottom = y + height

	surface.fillRect(x, y, code.width, height, palette.background)
	surface.strokeLine(x, y, x, bottom, palette.border)
	surface.strokeLine(right, y, right, bottom, palette.border)
	if (chunk.isFirst) surface.strokeLine(x, y, right, y, palette.border)
	if (chunk.isLast) surface.strokeLine(x, bottom, right, bottom, palette.border)

	lexer.highlightChunk(chunk).forEach((line, index) => {
		const baseline = y + padding.top + index * code.lineHeight + code.fontSize

		surface.drawText(
			x + code.lineNumberX,
			baseline,
			String(line.lineNumber).padStart(3),
			{ color: palette.line_number, variant: 'regular', size: code.fontSize - 1 }
		)

		let pen = x + code.codeX
		for (const span of mergeAdjacentSpans(line.spans)) {
			const style = resolveSpanStyle(theme, span.category)
			if (span.category !== Category.Whitespace) {
				surface.drawText(pen, baseline, span.text, { ...style, size: code.fontSize })
			}
			pen += surface.measureText(span.text, style.variant, code.fontSize)
		}
	})
}

const fileHeaderHeight = () =>
	FILE_HEADER.size * LEADING + FILE_HEADER.padding * 2

export const measureBlock = (block: DocumentBlock, context: BlockContext): number => {
	switch (block.kind) {
		case 'title':
			return TITLE.size * LEADING + TITLE.spaceAfter
		case 'info':
			return INFO.size * LEADING + INFO.spaceAfter
		case 'spacer':
			return block.height
		case 'file-header':
			return FILE_HEADER.spaceBefore + fileHeaderHeight() + FILE_HEADER.spaceAfter
		case 'code':
			return measureCodeBlock(block.chunk, context.code)
		case 'page-break':
			return 0
	}
}

export const drawBlock = (
	surface: RenderingSurface,
	block: DocumentBlock,
	x: number,
	y: number,
	context: BlockContext
): void => {
	const { palette } = context.theme

	switch (block.kind) {
		case 'title': {
			const width = surface.measureText(block.text, 'bold', TITLE.size)
			const left = x + Math.max(0, (context.contentWidth - width) / 2)
			surface.drawText(left, y + TITLE.size, block.text, {
				color: palette.text,
				variant: 'bold',
				size: TITLE.size,
			})
			return
		}
		case 'info': {
			const baseline = y + INFO.size
			let pen = x
			if (block.label) {
				const label = `${block.label}: `
				surface.drawText(pen, baseline, label, {
					color: palette.text_dim,
					variant: 'bold',
					size: INFO.size,
				})
				pen += surface.measureText(label, 'bold', INFO.size)
			}
			surface.drawText(pen, baseline, block.text, {
				color: palette.text_dim,
				variant: 'regular',
				size: INFO.size,
			})
			return
		}
		case 'file-header': {
			const top = y + FILE_HEADER.spaceBefore
			const height = fileHeaderHeight()
			surface.fillRect(x, top, context.contentWidth, height, palette.background)
			surface.strokeLine(x, top, x + context.contentWidth, top, palette.border)
			surface.strokeLine(
				x,
				top + height,
				x + context.contentWidth,
				top + height,
				palette.border
			)
			surface.strokeLine(x, top, x, top + height, palette.border)
			surface.strokeLine(
				x + context.contentWidth,
				top,
				x + context.contentWidth,
				top + height,
				palette.border
			)
			surface.drawText(
				x + FILE_HEADER.padding,
				top + FILE_HEADER.padding + FILE_HEADER.size,
				`File: ${block.path}`,
				{ color: palette.function, variant: 'bold', size: FILE_HEADER.size }
			)
			return
		}
		case 'code':
			drawCodeBlock(surface, block.chunk, x, y, context)
			return
		case 'spacer':
		case 'page-break':
			return
	}
}
