import type { Decoration } from '../decoration'
import type { LineAnnotation } from '../format/annotations'
import { countVisualRows, formatText } from '../format/formatText'
import { coordsAtPos, lineEndCharIdx } from '../format/position'
import { DEFAULT_TAB_WIDTH, type TextFormat } from '../format/textFormat'
import type { TextRenderer } from '../render/textRenderer'
import type { Anchor, FormattedGrapheme, LinePos, Style } from '../types'

export type InlineSuggestionOptions = {
	style: Style
	/** Document the suggestion is shown in */
	docText: string
	/** Suggested text; its first line continues the line it is anchored to */
	text: string
	/** Document char index the suggestion is anchored at */
	charIdx: number
	/** Width the suggestion re-flows against, independent of the document */
	viewWidth: number
	tabWidth?: number
}

/**
 * Ghost text for a completion. The first suggestion line is painted over the
 * anchored line from the anchor column on, the remaining lines go into
 * virtual rows below it.
 */
export class InlineSuggestionDecoration implements Decoration {
	readonly row: number
	readonly col: number

	private readonly style: Style
	private readonly format: TextFormat
	private readonly firstLineFormat: TextFormat
	private readonly firstLine: string
	private readonly trailingLines: string[]
	private readonly lineEnd: number

	private currentVisualLine: number | undefined
	private tracking = false
	private awaitingLineEnd = false
	private rowCounts: number[] | undefined

	constructor(options: InlineSuggestionOptions) {
		const coords = coordsAtPos(options.docText, options.charIdx)
		this.row = coords.row
		this.col = coords.col
		this.style = options.style
		this.format = {
			viewportWidth: options.viewWidth,
			tabWidth: options.tabWidth ?? DEFAULT_TAB_WIDTH,
			softWrap: true,
		}
		// first line stays on the anchored row, overflow is clipped by the renderer
		this.firstLineFormat = { ...this.format, softWrap: false }
		const [firstLine = '', ...trailingLines] = options.text.split('\n')
		this.firstLine = firstLine
		this.trailingLines = trailingLines
		this.lineEnd = lineEndCharIdx(options.docText, this.row)
	}

	/**
	 * Rows the trailing lines take up once re-flowed. The first line never
	 * adds rows.
	 */
	get virtualRowCount(): number {
		return this.countRows().reduce((sum, rows) => sum + rows, 0)
	}

	/**
	 * What the host has to reserve in the formatter for the trailing lines.
	 */
	lineAnnotation(): LineAnnotation {
		return { docLine: this.row, rows: this.virtualRowCount }
	}

	// The anchored line's end tells us which visual line the virtual rows go
	// under when the line soft-wraps.
	resetPos(pos: number): Anchor {
		this.currentVisualLine = undefined
		this.awaitingLineEnd = false
		this.tracking = pos <= this.lineEnd
		return this.tracking ? this.lineEnd : undefined
	}

	// A folded line end leaves the rows under the visual line that shows the fold.
	skipConcealedAnchor(): Anchor {
		this.tracking = false
		this.awaitingLineEnd = false
		return undefined
	}

	decorateGrapheme(): Anchor {
		this.awaitingLineEnd = false
		return undefined
	}

	decorateLine(renderer: TextRenderer, pos: LinePos) {
		this.currentVisualLine = pos.visualLine
		if (pos.docLine !== this.row || !pos.firstVisualLine) return
		if (this.tracking) this.awaitingLineEnd = true

		for (const grapheme of formatText(this.firstLine, this.firstLineFormat)) {
			if (grapheme.charIdx < this.col) continue
			this.draw(renderer, grapheme, pos.visualLine)
		}
	}

	renderVirtLines(renderer: TextRenderer, pos: LinePos, virtOffset: number): number {
		if (pos.docLine !== this.row) return 0
		if (this.awaitingLineEnd) return 0
		if (
			this.currentVisualLine !== undefined &&
			this.currentVisualLine !== pos.visualLine
		) {
			return 0
		}

		const rowCounts = this.countRows()
		let consumed = 0
		this.trailingLines.forEach((line, idx) => {
			const firstRow = pos.visualLine + virtOffset + consumed
			for (const grapheme of formatText(line, this.format)) {
				this.draw(renderer, grapheme, firstRow + grapheme.visualPos.row)
			}
			consumed += rowCounts[idx] ?? 1
		})
		return consumed
	}

	private countRows(): number[] {
		if (!this.rowCounts) {
			this.rowCounts = this.trailingLines.map((line) =>
				countVisualRows(line, this.format)
			)
		}
		return this.rowCounts
	}

	private draw(renderer: TextRenderer, grapheme: FormattedGrapheme, row: number) {
		if (grapheme.source === 'eof') return
		renderer.drawDecorationGrapheme(grapheme, this.style, row, grapheme.visualPos.col)
	}
}
