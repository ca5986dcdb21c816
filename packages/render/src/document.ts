/**
 * Document Assembly
 *
 * Lays blocks out on fixed-size pages and draws each page onto its own
 * surface. Blocks are never split: one that does not fit in the space
 * left moves to the next page.
 */

import { Lexer } from '@codeprint/lexer'
import { loggers } from '@codeprint/logger'
import type { Theme } from '@codeprint/theme'
import {
	DEFAULT_CODE_LAYOUT,
	drawBlock,
	measureBlock,
	type BlockContext,
	type CodeLayout,
	type DocumentBlock,
} from './blocks'
import { DocumentFinalizeError } from './errors'
import { courierMetrics } from './metrics'
import type { GlyphMetrics } from './surface'
import { composeHtml, SvgSurface } from './svg'

const log = loggers.render

export type PageGeometry = {
	width: number
	height: number
	margin: number
}

/** US Letter with 0.75in margins */
export const LETTER: PageGeometry = { width: 612, height: 792, margin: 54 }

export type Placement = {
	block: DocumentBlock
	y: number
	height: number
}

export type PageLayout = {
	placements: Placement[]
}

/**
 * Accepts blocks in reading order and produces the finished document
 */
export type DocumentSink = {
	append(...blocks: DocumentBlock[]): void
	finalize(): string
}

const describeBlock = (block: DocumentBlock): string => {
	switch (block.kind) {
		case 'code':
			return `code lines ${block.chunk.startLine}-${block.chunk.startLine + block.chunk.lines.length - 1}`
		case 'file-header':
			return `header for ${block.path}`
		default:
			return block.kind
	}
}

/**
 * Most lines a single-chunk file can hold on one page. Longer chunks
 * cannot be placed, since blocks never split.
 */
export const maxChunkLines = (
	code: CodeLayout = DEFAULT_CODE_LAYOUT,
	geometry: PageGeometry = LETTER
): number => {
	const available = geometry.height - geometry.margin * 2
	return Math.floor((available - code.edgePadding * 2) / code.lineHeight)
}

/**
 * Assign every block a page and a vertical offset
 */
export const layoutPages = (
	blocks: readonly DocumentBlock[],
	context: BlockContext,
	geometry: PageGeometry = LETTER
): PageLayout[] => {
	const available = geometry.height - geometry.margin * 2
	const pages: PageLayout[] = [{ placements: [] }]
	let cursor = 0

	const current = (): PageLayout => {
		const page = pages[pages.length - 1]
		if (!page) throw new Error('Page list is empty.')
		return page
	}
	const startPage = () => {
		pages.push({ placements: [] })
		cursor = 0
	}

	for (const block of blocks) {
		if (block.kind === 'page-break') {
			if (current().placements.length > 0) startPage()
			continue
		}

		// Spacing is meaningless at the top of a page.
		if (block.kind === 'spacer' && cursor === 0) continue

		const height = measureBlock(block, context)
		if (height > available) {
			throw new Error(
				`${describeBlock(block)} needs ${height}pt but a page holds ${available}pt.`
			)
		}

		if (cursor + height > available && current().placements.length > 0) {
			startPage()
		}

		current().placements.push({ block, y: geometry.margin + cursor, height })
		cursor += height
	}

	return pages
}

export type SvgDocumentOptions = {
	theme: Theme
	title?: string
	lexer?: Lexer
	code?: Partial<CodeLayout>
	geometry?: PageGeometry
	metrics?: GlyphMetrics
}

/**
 * Document sink producing an HTML file with one SVG per page
 */
export class SvgDocument implements DocumentSink {
	private readonly blocks: DocumentBlock[] = []
	private readonly context: BlockContext
	private readonly geometry: PageGeometry
	private readonly metrics: GlyphMetrics
	private readonly title: string

	constructor(options: SvgDocumentOptions) {
		this.geometry = options.geometry ?? LETTER
		this.metrics = options.metrics ?? courierMetrics
		this.title = options.title ?? 'Source listing'
		this.context = {
			theme: options.theme,
			lexer: options.lexer ?? Lexer.create(),
			code: { ...DEFAULT_CODE_LAYOUT, ...options.code },
			contentWidth: this.geometry.width - this.geometry.margin * 2,
		}
	}

	append(...blocks: DocumentBlock[]): void {
		this.blocks.push(...blocks)
	}

	get blockCount(): number {
		return this.blocks.length
	}

	/**
	 * Render every page. Any failure discards the whole output.
	 */
	finalize(): string {
		try {
			const pages = layoutPages(this.blocks, this.context, this.geometry).map(
				(page) => this.renderPage(page)
			)
			log.debug(`Rendered ${pages.length} page(s) from ${this.blocks.length} blocks`)

			return composeHtml(pages, {
				title: this.title,
				background: this.context.theme.palette.page_background,
			})
		} catch (error) {
			throw new DocumentFinalizeError(error)
		}
	}

	private renderPage(page: PageLayout): string {
		const { width, height, margin } = this.geometry
		const surface = new SvgSurface(width, height, this.metrics)

		surface.fillRect(0, 0, width, height, this.context.theme.palette.page_background)
		for (const placement of page.placements) {
			drawBlock(surface, placement.block, margin, placement.y, this.context)
		}

		return surface.toSvg()
	}
}
