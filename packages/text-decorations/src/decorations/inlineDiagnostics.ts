import type { Decoration } from '../decoration'
import type { LineAnnotation } from '../format/annotations'
import { formatText } from '../format/formatText'
import { coordsAtPos, lineEndCharIdx } from '../format/position'
import { DEFAULT_TEXT_FORMAT } from '../format/textFormat'
import type { TextRenderer } from '../render/textRenderer'
import type { Anchor, FormattedGrapheme, LinePos, Style } from '../types'

export const DIAGNOSTIC_SEVERITIES = ['error', 'warning', 'info', 'hint'] as const

export type DiagnosticSeverity = (typeof DIAGNOSTIC_SEVERITIES)[number]

export type Diagnostic = {
	charIdx: number
	message: string
	severity: DiagnosticSeverity
}

export const DEFAULT_DIAGNOSTIC_STYLES: Record<DiagnosticSeverity, Style> = {
	error: { fg: '#ef4444' },
	warning: { fg: '#f59e0b' },
	info: { fg: '#3b82f6' },
	hint: { fg: '#9ca3af' },
}

export type InlineDiagnosticsOptions = {
	styles?: Partial<Record<DiagnosticSeverity, Style>>
	/** Least severe diagnostic that is shown */
	minSeverity?: DiagnosticSeverity
	connector?: string
}

export const isDiagnosticSeverity = (value: string): value is DiagnosticSeverity =>
	DIAGNOSTIC_SEVERITIES.some((severity) => severity === value)

const severityRank = (severity: DiagnosticSeverity) =>
	DIAGNOSTIC_SEVERITIES.indexOf(severity)

type LocatedDiagnostic = Diagnostic & {
	docLine: number
	/** Char index of the grapheme that ends the diagnostic's line */
	lineEnd: number
}

type PendingDiagnostic = {
	diagnostic: Diagnostic
	/** Visual document column the connector is drawn at */
	col: number
}

/**
 * Shows diagnostic messages in the virtual rows under the last visual line
 * of the document line that holds the diagnosed char.
 */
export class InlineDiagnosticsDecoration implements Decoration {
	private readonly diagnostics: LocatedDiagnostic[]
	private readonly styles: Record<DiagnosticSeverity, Style>
	private readonly connector: string
	private next = 0
	private pending: PendingDiagnostic[] = []
	/** Set while pending diagnostics wait for their line end */
	private pendingLineEnd: number | undefined
	private lineEnded = false

	constructor(
		docText: string,
		diagnostics: Diagnostic[],
		options: InlineDiagnosticsOptions = {}
	) {
		const threshold = severityRank(options.minSeverity ?? 'hint')
		this.diagnostics = diagnostics
			.filter((diagnostic) => severityRank(diagnostic.severity) <= threshold)
			.sort((a, b) => a.charIdx - b.charIdx)
			.map((diagnostic) => {
				const { row } = coordsAtPos(docText, diagnostic.charIdx)
				return { ...diagnostic, docLine: row, lineEnd: lineEndCharIdx(docText, row) }
			})
		this.styles = { ...DEFAULT_DIAGNOSTIC_STYLES, ...options.styles }
		this.connector = options.connector ?? '└'
	}

	get count(): number {
		return this.diagnostics.length
	}

	/**
	 * Rows to reserve per document line, one per diagnostic.
	 */
	lineAnnotations(): LineAnnotation[] {
		const rows = new Map<number, number>()
		for (const { docLine } of this.diagnostics) {
			rows.set(docLine, (rows.get(docLine) ?? 0) + 1)
		}
		return Array.from(rows, ([docLine, count]) => ({ docLine, rows: count }))
	}

	private anchor(): Anchor {
		const next = this.diagnostics[this.next]?.charIdx
		if (this.pendingLineEnd === undefined) return next
		if (next === undefined) return this.pendingLineEnd
		return Math.min(next, this.pendingLineEnd)
	}

	private endLine() {
		this.pendingLineEnd = undefined
		this.lineEnded = true
	}

	private clearPending() {
		this.pending = []
		this.pendingLineEnd = undefined
		this.lineEnded = false
	}

	resetPos(pos: number): Anchor {
		this.clearPending()
		this.next = this.diagnostics.findIndex((diagnostic) => diagnostic.charIdx >= pos)
		if (this.next === -1) this.next = this.diagnostics.length
		return this.anchor()
	}

	// A folded line end leaves the rows under the visual line that shows the fold.
	skipConcealedAnchor(concealEndCharIdx: number): Anchor {
		if (this.pendingLineEnd !== undefined && this.pendingLineEnd < concealEndCharIdx) {
			this.endLine()
		}
		let diagnostic = this.diagnostics[this.next]
		while (diagnostic && diagnostic.charIdx < concealEndCharIdx) {
			this.next++
			diagnostic = this.diagnostics[this.next]
		}
		return this.anchor()
	}

	decorateGrapheme(renderer: TextRenderer, grapheme: FormattedGrapheme): Anchor {
		const visible = renderer.columnInBounds(grapheme.visualPos.col)
		const col = visible ? grapheme.visualPos.col : renderer.colOffset
		let diagnostic = this.diagnostics[this.next]
		while (diagnostic && diagnostic.charIdx === grapheme.charIdx) {
			this.pending.push({ diagnostic, col })
			this.pendingLineEnd = diagnostic.lineEnd
			this.lineEnded = false
			this.next++
			diagnostic = this.diagnostics[this.next]
		}
		if (this.pendingLineEnd !== undefined && grapheme.charIdx >= this.pendingLineEnd) {
			this.endLine()
		}
		return this.anchor()
	}

	decorateLine(_renderer: TextRenderer, pos: LinePos) {
		// wrapped rows of the same document line keep what was recorded so far
		if (pos.firstVisualLine) this.clearPending()
	}

	renderVirtLines(renderer: TextRenderer, pos: LinePos, virtOffset: number): number {
		if (!this.lineEnded) return 0
		const pending = this.pending
		this.clearPending()
		pending.forEach(({ diagnostic, col }, idx) => {
			const row = pos.visualLine + virtOffset + idx
			const style = this.styles[diagnostic.severity]
			const line = `${this.connector} ${diagnostic.message.split('\n')[0] ?? ''}`
			const format = { ...DEFAULT_TEXT_FORMAT, softWrap: false }
			for (const grapheme of formatText(line, format)) {
				if (grapheme.source === 'eof') continue
				renderer.drawDecorationGrapheme(
					grapheme,
					style,
					row,
					col + grapheme.visualPos.col
				)
			}
		})
		return pending.length
	}
}
