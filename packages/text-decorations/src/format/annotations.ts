export type ConcealedSpan = {
	/** First elided char index */
	start: number
	/** One past the last elided char index */
	end: number
}

export type LineAnnotation = {
	docLine: number
	rows: number
}

/**
 * Everything the formatter composites on top of the raw text: replacement
 * glyphs, rows reserved for virtual lines, and elided (folded) spans.
 */
export class TextAnnotations {
	private readonly overlays = new Map<number, string>()
	private readonly reservedRows = new Map<number, number>()
	private concealed: ConcealedSpan[] = []

	static empty(): TextAnnotations {
		return new TextAnnotations()
	}

	get isEmpty(): boolean {
		return (
			this.overlays.size === 0 &&
			this.reservedRows.size === 0 &&
			this.concealed.length === 0
		)
	}

	addOverlay(charIdx: number, text: string): this {
		this.overlays.set(charIdx, text)
		return this
	}

	addLineAnnotation({ docLine, rows }: LineAnnotation): this {
		if (rows <= 0) return this
		this.reservedRows.set(docLine, (this.reservedRows.get(docLine) ?? 0) + rows)
		return this
	}

	conceal(start: number, end: number): this {
		if (end <= start) return this
		const spans = [...this.concealed, { start, end }].sort(
			(a, b) => a.start - b.start
		)
		const merged: ConcealedSpan[] = []
		for (const span of spans) {
			const last = merged[merged.length - 1]
			if (last && span.start <= last.end) {
				last.end = Math.max(last.end, span.end)
			} else {
				merged.push({ ...span })
			}
		}
		this.concealed = merged
		return this
	}

	overlayAt(charIdx: number): string | undefined {
		return this.overlays.get(charIdx)
	}

	virtualRowsAfter(docLine: number): number {
		return this.reservedRows.get(docLine) ?? 0
	}

	/**
	 * End of the concealed span covering `charIdx`, if any.
	 */
	concealedEnd(charIdx: number): number | undefined {
		for (const span of this.concealed) {
			if (charIdx < span.start) return undefined
			if (charIdx < span.end) return span.end
		}
		return undefined
	}
}
