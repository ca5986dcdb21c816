/**
 * @codeprint/render
 *
 * Drawing of highlighted chunks and page assembly behind a surface interface.
 */

export type { GlyphMetrics, RenderingSurface, TextStyle } from './surface'
export { courierMetrics, createMonospaceMetrics } from './metrics'
export {
	DEFAULT_CODE_LAYOUT,
	drawBlock,
	drawCodeBlock,
	measureBlock,
	measureCodeBlock,
	type BlockContext,
	type CodeLayout,
	type DocumentBlock,
} from './blocks'
export {
	LETTER,
	SvgDocument,
	layoutPages,
	maxChunkLines,
	type DocumentSink,
	type PageGeometry,
	type PageLayout,
	type Placement,
	type SvgDocumentOptions,
} from './document'
export { SvgSurface, composeHtml, escapeXml } from './svg'
export { DocumentFinalizeError, isDocumentFinalizeError } from './errors'
