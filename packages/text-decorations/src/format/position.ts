import type { Position } from '../types'

/**
 * Row and column (in UTF-16 code units) of `charIdx`. Indices past the end
 * clamp to the end of the text.
 */
export const coordsAtPos = (text: string, charIdx: number): Position => {
	const target = Math.max(0, Math.min(charIdx, text.length))
	let row = 0
	let lineStart = 0
	for (let i = 0; i < target; i++) {
		if (text[i] === '\n') {
			row++
			lineStart = i + 1
		}
	}
	return { row, col: target - lineStart }
}

export const lineStartCharIdx = (text: string, line: number): number => {
	if (line <= 0) return 0
	let row = 0
	for (let i = 0; i < text.length; i++) {
		if (text[i] === '\n') {
			row++
			if (row === line) return i + 1
		}
	}
	return text.length
}

/**
 * Char index of the line break that ends `line`, or the end of the text for
 * the last line.
 */
export const lineEndCharIdx = (text: string, line: number): number => {
	const start = lineStartCharIdx(text, line)
	const end = text.indexOf('\n', start)
	if (end === -1) return text.length
	return end > start && text[end - 1] === '\r' ? end - 1 : end
}
