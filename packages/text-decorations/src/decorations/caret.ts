import type { CaretCache } from '../caretCache'
import type { Decoration } from '../decoration'
import type { TextRenderer } from '../render/textRenderer'
import type { Anchor, FormattedGrapheme } from '../types'

/**
 * Cursor drawing happens elsewhere; this only records where the primary
 * cursor landed on screen.
 */
export class CaretDecoration implements Decoration {
	constructor(
		private readonly cache: CaretCache,
		readonly primaryCursor: number
	) {}

	resetPos(pos: number): Anchor {
		return pos <= this.primaryCursor ? this.primaryCursor : undefined
	}

	decorateGrapheme(renderer: TextRenderer, grapheme: FormattedGrapheme): Anchor {
		const { row, col } = grapheme.visualPos
		if (renderer.columnInBounds(col)) {
			this.cache.set({ row, col: col - renderer.colOffset })
		}
		return undefined
	}
}
