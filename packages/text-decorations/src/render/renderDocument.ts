import { loggers } from '@glyphline/logger'

import type { DecorationManager } from '../decorationManager'
import { TextAnnotations } from '../format/annotations'
import { formatText } from '../format/formatText'
import { lineStartCharIdx } from '../format/position'
import type { TextFormat } from '../format/textFormat'
import type { LinePos, Style } from '../types'
import type { ScreenTextRenderer } from './textRenderer'

const log = loggers.renderer.withTag('frame')

export type RenderDocumentOptions = {
	text: string
	renderer: ScreenTextRenderer
	decorations: DecorationManager
	format: TextFormat
	annotations?: TextAnnotations
	textStyle?: Style
	/** Document line shown in the top row */
	firstLine?: number
}

export type RenderDocumentResult = {
	/** Visual lines that received text */
	visualLines: number
	/** Char index of the last grapheme drawn */
	lastCharIdx: number | undefined
}

/**
 * Draws one frame of `text` and drives every decoration through it.
 */
export const renderDocument = (
	options: RenderDocumentOptions
): RenderDocumentResult => {
	const { text, renderer, decorations, format } = options
	const annotations = options.annotations ?? TextAnnotations.empty()
	const textStyle = options.textStyle ?? {}
	const firstLine = Math.max(0, options.firstLine ?? 0)
	const startCharIdx = lineStartCharIdx(text, firstLine)

	decorations.prepareForRendering(startCharIdx)

	let linePos: LinePos | undefined
	let visualLines = 0
	let lastCharIdx: number | undefined

	const graphemes = formatText(text, format, annotations, {
		charIdx: startCharIdx,
		docLine: firstLine,
	})

	for (const grapheme of graphemes) {
		const visualLine = grapheme.visualPos.row
		if (visualLine >= renderer.viewport.height) break

		if (!linePos || linePos.visualLine !== visualLine) {
			if (linePos) decorations.renderVirtualLines(renderer, linePos)
			linePos = {
				docLine: grapheme.docLine,
				visualLine,
				firstVisualLine: linePos?.docLine !== grapheme.docLine,
				startCharIdx: grapheme.charIdx,
			}
			visualLines++
			decorations.decorateLine(renderer, linePos)
		}

		decorations.decorateGrapheme(renderer, grapheme)
		renderer.drawText(grapheme, textStyle, visualLine)
		lastCharIdx = grapheme.charIdx
	}

	if (linePos) decorations.renderVirtualLines(renderer, linePos)

	log.debug('frame rendered', { firstLine, visualLines, lastCharIdx })
	return { visualLines, lastCharIdx }
}
