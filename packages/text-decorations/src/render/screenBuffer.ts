import type { Style } from '../types'

export type Cell = {
	symbol: string
	style: Style
	/** Right half of a double-width grapheme drawn in the cell before */
	continuation: boolean
}

const blankCell = (): Cell => ({ symbol: ' ', style: {}, continuation: false })

/**
 * Copies the defined keys of `patch` over `base`.
 */
export const patchStyle = (base: Style, patch: Style): Style => {
	const result: Style = { ...base }
	if (patch.fg !== undefined) result.fg = patch.fg
	if (patch.bg !== undefined) result.bg = patch.bg
	if (patch.bold !== undefined) result.bold = patch.bold
	if (patch.italic !== undefined) result.italic = patch.italic
	if (patch.underline !== undefined) result.underline = patch.underline
	return result
}

export class ScreenBuffer {
	private readonly cells: Cell[]

	constructor(
		readonly width: number,
		readonly height: number
	) {
		this.cells = Array.from({ length: width * height }, blankCell)
	}

	private index(x: number, y: number): number | undefined {
		if (x < 0 || y < 0 || x >= this.width || y >= this.height) return undefined
		return y * this.width + x
	}

	getCell(x: number, y: number): Cell | undefined {
		const index = this.index(x, y)
		return index === undefined ? undefined : this.cells[index]
	}

	setSymbol(x: number, y: number, symbol: string, style: Style): boolean {
		const cell = this.getCell(x, y)
		if (!cell) return false
		cell.symbol = symbol
		cell.style = patchStyle(cell.style, style)
		cell.continuation = false
		return true
	}

	setContinuation(x: number, y: number, style: Style): boolean {
		const cell = this.getCell(x, y)
		if (!cell) return false
		cell.symbol = ''
		cell.style = patchStyle(cell.style, style)
		cell.continuation = true
		return true
	}

	setStyle(x: number, y: number, style: Style): boolean {
		const cell = this.getCell(x, y)
		if (!cell) return false
		cell.style = patchStyle(cell.style, style)
		return true
	}

	rowText(y: number): string {
		if (y < 0 || y >= this.height) return ''
		let text = ''
		for (let x = 0; x < this.width; x++) {
			const cell = this.cells[y * this.width + x]
			if (cell && !cell.continuation) text += cell.symbol
		}
		return text
	}

	lines(): string[] {
		return Array.from({ length: this.height }, (_, y) => this.rowText(y))
	}

	clear() {
		for (let i = 0; i < this.cells.length; i++) {
			this.cells[i] = blankCell()
		}
	}
}
