/**
 * The next document char index a decoration wants to see, or `undefined`
 * once it has nothing left to do in the current render pass.
 */
export type Anchor = number | undefined

export type Position = {
	row: number
	col: number
}

export type Viewport = {
	x: number
	y: number
	width: number
	height: number
}

export type Style = {
	fg?: string
	bg?: string
	bold?: boolean
	italic?: boolean
	underline?: boolean
}

export type LinePos = {
	/** Document line this visual line belongs to */
	docLine: number
	/** Row inside the viewport */
	visualLine: number
	/** False for the continuation rows of a soft-wrapped line */
	firstVisualLine: boolean
	/** Char index of the first grapheme drawn on this visual line */
	startCharIdx: number
}

export type Grapheme = {
	raw: string
	width: number
}

export type GraphemeSource = 'document' | 'overlay' | 'newline' | 'eof'

export type FormattedGrapheme = Grapheme & {
	charIdx: number
	docLine: number
	visualPos: Position
	source: GraphemeSource
}
