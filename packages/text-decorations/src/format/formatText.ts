import { loggers } from '@glyphline/logger'

import type { FormattedGrapheme } from '../types'
import { TextAnnotations } from './annotations'
import { graphemeWidth } from './charWidth'
import { DEFAULT_TAB_WIDTH, type TextFormat } from './textFormat'

const log = loggers.formatter.withTag('wrap')

export type FormatStart = {
	charIdx: number
	docLine: number
}

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' })

const isLineBreak = (segment: string) => segment === '\n' || segment === '\r\n'

const normalizeTabWidth = (tabWidth: number) =>
	Number.isFinite(tabWidth) && tabWidth > 0 ? Math.floor(tabWidth) : DEFAULT_TAB_WIDTH

const getTabAdvance = (col: number, tabWidth: number) => {
	const remainder = col % tabWidth
	return remainder === 0 ? tabWidth : tabWidth - remainder
}

function* generateGraphemes(
	text: string,
	format: TextFormat,
	annotations: TextAnnotations,
	start: FormatStart
): Generator<FormattedGrapheme, void, undefined> {
	const tabWidth = normalizeTabWidth(format.tabWidth)
	let viewportWidth = format.viewportWidth
	if (format.softWrap && !(viewportWidth >= 1)) {
		log.warn('soft wrap needs a positive viewport width', { viewportWidth })
		viewportWidth = 1
	}

	let row = 0
	let col = 0
	let docLine = start.docLine

	const place = (width: number) => {
		if (format.softWrap && col > 0 && col + width > viewportWidth) {
			row += 1
			col = 0
		}
	}

	for (const { segment, index } of segmenter.segment(text.slice(start.charIdx))) {
		const charIdx = start.charIdx + index

		if (annotations.concealedEnd(charIdx) !== undefined) {
			if (isLineBreak(segment)) docLine += 1
			continue
		}

		if (isLineBreak(segment)) {
			place(1)
			yield {
				raw: ' ',
				width: 1,
				charIdx,
				docLine,
				visualPos: { row, col },
				source: 'newline',
			}
			row += 1 + annotations.virtualRowsAfter(docLine)
			col = 0
			docLine += 1
			continue
		}

		if (segment === '\t') {
			let width = getTabAdvance(col, tabWidth)
			place(width)
			width = getTabAdvance(col, tabWidth)
			if (format.softWrap) width = Math.min(width, viewportWidth - col)
			yield {
				raw: '\t',
				width,
				charIdx,
				docLine,
				visualPos: { row, col },
				source: 'document',
			}
			col += width
			continue
		}

		const overlay = annotations.overlayAt(charIdx)
		const raw = overlay ?? segment
		const width = graphemeWidth(raw)
		place(width)
		yield {
			raw,
			width,
			charIdx,
			docLine,
			visualPos: { row, col },
			source: overlay === undefined ? 'document' : 'overlay',
		}
		col += width
	}

	if (annotations.concealedEnd(text.length) !== undefined) return
	place(1)
	yield {
		raw: ' ',
		width: 1,
		charIdx: text.length,
		docLine,
		visualPos: { row, col },
		source: 'eof',
	}
}

/**
 * Lays `text` out as positioned graphemes, starting at `start.charIdx`.
 * Char indices stay absolute into `text`; rows count from the start.
 *
 * The result is lazy and restartable: each iteration formats from scratch.
 */
export const formatText = (
	text: string,
	format: TextFormat,
	annotations: TextAnnotations = TextAnnotations.empty(),
	start: FormatStart = { charIdx: 0, docLine: 0 }
): Iterable<FormattedGrapheme> => ({
	[Symbol.iterator]: () => generateGraphemes(text, format, annotations, start),
})

/**
 * Number of visual rows `text` occupies. The trailing eof cell is not
 * counted, so a line that exactly fills the width stays on one row.
 */
export const countVisualRows = (text: string, format: TextFormat): number => {
	let rows = 0
	for (const grapheme of formatText(text, format)) {
		if (grapheme.source === 'eof') continue
		rows = Math.max(rows, grapheme.visualPos.row + 1)
	}
	return Math.max(rows, 1)
}
