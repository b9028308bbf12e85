import { loggers } from '@glyphline/logger'

import type { Grapheme, GraphemeSource, Style, Viewport } from '../types'
import { ScreenBuffer } from './screenBuffer'

const log = loggers.renderer.withTag('text')

/**
 * Drawing surface handed to decorations. Columns are visual document
 * columns (before horizontal scrolling); rows are viewport rows.
 */
export interface TextRenderer {
	readonly viewport: Viewport
	/** Horizontal scroll, in columns */
	readonly colOffset: number
	columnInBounds(col: number): boolean
	drawDecorationGrapheme(
		grapheme: Grapheme,
		style: Style,
		row: number,
		col: number
	): boolean
}

export type DrawableGrapheme = Grapheme & { source?: GraphemeSource }

export type ScreenTextRendererOptions = {
	viewport?: Viewport
	colOffset?: number
}

export class ScreenTextRenderer implements TextRenderer {
	readonly viewport: Viewport
	readonly colOffset: number

	constructor(
		readonly surface: ScreenBuffer,
		options: ScreenTextRendererOptions = {}
	) {
		this.viewport = options.viewport ?? {
			x: 0,
			y: 0,
			width: surface.width,
			height: surface.height,
		}
		this.colOffset = Math.max(0, options.colOffset ?? 0)
	}

	columnInBounds(col: number): boolean {
		return col >= this.colOffset && col < this.colOffset + this.viewport.width
	}

	drawDecorationGrapheme(
		grapheme: DrawableGrapheme,
		style: Style,
		row: number,
		col: number
	): boolean {
		return this.draw(grapheme, style, row, col)
	}

	/**
	 * Draws a document grapheme at its own visual column.
	 */
	drawText(
		grapheme: DrawableGrapheme & { visualPos: { col: number } },
		style: Style,
		row: number
	): boolean {
		return this.draw(grapheme, style, row, grapheme.visualPos.col)
	}

	private draw(
		grapheme: DrawableGrapheme,
		style: Style,
		row: number,
		col: number
	): boolean {
		if (row < 0 || row >= this.viewport.height) return false
		const width = Math.max(grapheme.width, 1)
		if (!this.columnInBounds(col) || !this.columnInBounds(col + width - 1)) {
			return false
		}

		const x = this.viewport.x + col - this.colOffset
		const y = this.viewport.y + row

		// Line ends take the style but keep whatever ghost text sits there.
		if (grapheme.source === 'newline' || grapheme.source === 'eof') {
			return this.surface.setStyle(x, y, style)
		}

		if (grapheme.raw === '\t') {
			for (let i = 0; i < width; i++) {
				this.surface.setSymbol(x + i, y, ' ', style)
			}
			return true
		}

		if (grapheme.width === 0) {
			log.debug('skipping zero-width grapheme', { raw: grapheme.raw, row, col })
			return false
		}

		this.surface.setSymbol(x, y, grapheme.raw, style)
		for (let i = 1; i < width; i++) {
			this.surface.setContinuation(x + i, y, style)
		}
		return true
	}
}
