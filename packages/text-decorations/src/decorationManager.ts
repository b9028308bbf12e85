import { loggers } from '@glyphline/logger'

import {
	resetAnchor,
	skipConcealedAnchor,
	type Decoration,
} from './decoration'
import type { TextRenderer } from './render/textRenderer'
import type { Anchor, FormattedGrapheme, LinePos } from './types'
import { createAssert } from './utils/assert'

const log = loggers.decorations.withTag('manager')
const assert = createAssert(log)

type DecorationEntry = {
	decoration: Decoration
	anchor: Anchor
}

/**
 * Dispatches the events of one render pass to every registered decoration,
 * in registration order. That order also decides how virtual rows stack.
 */
export class DecorationManager {
	private readonly entries: DecorationEntry[] = []
	private lastCharIdx: number | undefined

	get size(): number {
		return this.entries.length
	}

	addDecoration(decoration: Decoration) {
		this.entries.push({ decoration, anchor: 0 })
	}

	/**
	 * Must run once per frame before the first visual line.
	 */
	prepareForRendering(firstVisibleChar: number) {
		this.lastCharIdx = undefined
		for (const entry of this.entries) {
			entry.anchor = resetAnchor(entry.decoration, firstVisibleChar)
		}
	}

	decorateGrapheme(renderer: TextRenderer, grapheme: FormattedGrapheme) {
		assert(
			this.lastCharIdx === undefined || grapheme.charIdx >= this.lastCharIdx,
			'graphemes must arrive in char index order',
			{ previous: this.lastCharIdx, charIdx: grapheme.charIdx }
		)
		this.lastCharIdx = grapheme.charIdx

		for (const entry of this.entries) {
			this.dispatchGrapheme(entry, renderer, grapheme)
		}
	}

	private dispatchGrapheme(
		entry: DecorationEntry,
		renderer: TextRenderer,
		grapheme: FormattedGrapheme
	) {
		const { charIdx } = grapheme
		while (entry.anchor !== undefined) {
			const anchor = entry.anchor
			if (anchor < charIdx) {
				// the anchor was concealed, or this is the first grapheme of the pass
				const next = skipConcealedAnchor(entry.decoration, charIdx)
				if (
					!assert(
						next === undefined || next > anchor,
						'skipConcealedAnchor must move the anchor forward',
						{ anchor, next, charIdx }
					)
				) {
					entry.anchor = undefined
					return
				}
				entry.anchor = next
			} else if (anchor === charIdx) {
				const next = entry.decoration.decorateGrapheme?.(renderer, grapheme)
				assert(
					next === undefined || next >= charIdx,
					'decorateGrapheme returned an anchor behind the current grapheme',
					{ charIdx, next }
				)
				entry.anchor = next
			} else {
				return
			}
		}
	}

	decorateLine(renderer: TextRenderer, pos: LinePos) {
		for (const { decoration } of this.entries) {
			decoration.decorateLine?.(renderer, pos)
		}
	}

	renderVirtualLines(renderer: TextRenderer, pos: LinePos) {
		// row 0 is the text line itself
		let virtOffset = 1
		for (const { decoration } of this.entries) {
			if (pos.visualLine + virtOffset >= renderer.viewport.height) break
			const rows = decoration.renderVirtLines?.(renderer, pos, virtOffset) ?? 0
			virtOffset += Math.max(0, rows)
		}
	}
}
