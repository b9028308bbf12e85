import type { TextRenderer } from './render/textRenderer'
import type { Anchor, FormattedGrapheme, LinePos } from './types'

/**
 * Anything drawn in relation to the rendered text: cursors, ghost text,
 * diagnostics. Translating char positions to screen positions is expensive,
 * so decorations ride along the single pass that draws the text and are told
 * where things ended up.
 *
 * Every hook is optional. A decoration without `resetPos` never receives
 * `decorateGrapheme`.
 *
 * Virtual rows below a line have to be reserved up front with a line
 * annotation (see `TextAnnotations.addLineAnnotation`); this interface only
 * fills them.
 */
export interface Decoration {
	/**
	 * Called before a visual line's text is drawn. Text overwrites anything
	 * drawn here, so only backgrounds or markers in empty cells are visible.
	 */
	decorateLine?(renderer: TextRenderer, pos: LinePos): void

	/**
	 * Called after a visual line's text is drawn. `virtOffset` is the first
	 * row below `pos.visualLine` that is still free; the decoration may draw
	 * in `pos.visualLine + virtOffset` up to (not including) the returned
	 * number of rows past it.
	 */
	renderVirtLines?(renderer: TextRenderer, pos: LinePos, virtOffset: number): number

	/**
	 * Called once per frame with the first visible char index. Returns the
	 * first char index this decoration wants to see.
	 */
	resetPos?(pos: number): Anchor

	/**
	 * The anchor was elided (folded or concealed) before a grapheme was drawn
	 * for it. `concealEndCharIdx` is the first char index drawn after the gap.
	 * Defaults to `resetPos(concealEndCharIdx)`.
	 */
	skipConcealedAnchor?(concealEndCharIdx: number): Anchor

	/**
	 * Called before the grapheme at the current anchor is drawn. Returns the
	 * next anchor.
	 */
	decorateGrapheme?(renderer: TextRenderer, grapheme: FormattedGrapheme): Anchor
}

export type LineDecorationFn = (renderer: TextRenderer, pos: LinePos) => void

/**
 * A decoration that only paints per visual line.
 */
export const lineDecoration = (decorateLine: LineDecorationFn): Decoration => ({
	decorateLine,
})

export const resetAnchor = (decoration: Decoration, pos: number): Anchor =>
	decoration.resetPos?.(pos)

export const skipConcealedAnchor = (
	decoration: Decoration,
	concealEndCharIdx: number
): Anchor =>
	decoration.skipConcealedAnchor
		? decoration.skipConcealedAnchor(concealEndCharIdx)
		: resetAnchor(decoration, concealEndCharIdx)
