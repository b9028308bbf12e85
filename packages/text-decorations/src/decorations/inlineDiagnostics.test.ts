import { describe, expect, it } from 'vitest'
import { ScreenBuffer } from '../render/screenBuffer'
import { ScreenTextRenderer } from '../render/textRenderer'
import type { FormattedGrapheme, LinePos } from '../types'
import {
	InlineDiagnosticsDecoration,
	isDiagnosticSeverity,
	type Diagnostic,
} from './inlineDiagnostics'

const grapheme = (charIdx: number, col: number): FormattedGrapheme => ({
	raw: 'x',
	width: 1,
	charIdx,
	docLine: 0,
	visualPos: { row: 0, col },
	source: 'document',
})

const POS: LinePos = { docLine: 0, visualLine: 0, firstVisualLine: true, startCharIdx: 0 }

// line 0 ends at char 9
const DOC = 'let x = 1\nfoo'

const DIAGNOSTICS: Diagnostic[] = [
	{ charIdx: 6, message: 'unused', severity: 'hint' },
	{ charIdx: 2, message: 'bad type', severity: 'error' },
	{ charIdx: 4, message: 'shadowed', severity: 'warning' },
]

describe('InlineDiagnosticsDecoration', () => {
	it('anchors on diagnostics in char order', () => {
		const diagnostics = new InlineDiagnosticsDecoration(DOC, DIAGNOSTICS)
		expect(diagnostics.resetPos(0)).toBe(2)
		expect(diagnostics.resetPos(3)).toBe(4)
		expect(diagnostics.resetPos(7)).toBeUndefined()
	})

	it('filters by minimum severity', () => {
		const diagnostics = new InlineDiagnosticsDecoration(DOC, DIAGNOSTICS, {
			minSeverity: 'warning',
		})
		expect(diagnostics.count).toBe(2)
		expect(diagnostics.resetPos(5)).toBeUndefined()
	})

	it('drops diagnostics inside a concealed span', () => {
		const diagnostics = new InlineDiagnosticsDecoration(DOC, DIAGNOSTICS)
		diagnostics.resetPos(0)
		expect(diagnostics.skipConcealedAnchor(5)).toBe(6)
		expect(diagnostics.skipConcealedAnchor(7)).toBeUndefined()
	})

	it('draws recorded diagnostics below the line once its end is reached', () => {
		const buffer = new ScreenBuffer(20, 4)
		const renderer = new ScreenTextRenderer(buffer)
		const diagnostics = new InlineDiagnosticsDecoration(DOC, [
			{ charIdx: 4, message: 'shadowed', severity: 'warning' },
			{ charIdx: 2, message: 'bad type', severity: 'error' },
		])

		diagnostics.resetPos(0)
		diagnostics.decorateLine(renderer, POS)
		expect(diagnostics.decorateGrapheme(renderer, grapheme(2, 2))).toBe(4)
		expect(diagnostics.decorateGrapheme(renderer, grapheme(4, 4))).toBe(9)
		expect(diagnostics.renderVirtLines(renderer, POS, 1)).toBe(0)

		expect(diagnostics.decorateGrapheme(renderer, grapheme(9, 9))).toBeUndefined()
		expect(diagnostics.renderVirtLines(renderer, POS, 1)).toBe(2)
		expect(buffer.rowText(1).trimEnd()).toBe('  └ bad type')
		expect(buffer.rowText(2).trimEnd()).toBe('    └ shadowed')
		expect(buffer.getCell(2, 1)?.style).toEqual({ fg: '#ef4444' })
		expect(buffer.getCell(4, 2)?.style).toEqual({ fg: '#f59e0b' })

		expect(diagnostics.renderVirtLines(renderer, POS, 1)).toBe(0)
	})

	it('keeps diagnostics across the wrapped rows of their line', () => {
		const buffer = new ScreenBuffer(20, 4)
		const renderer = new ScreenTextRenderer(buffer)
		const diagnostics = new InlineDiagnosticsDecoration(DOC, [
			{ charIdx: 2, message: 'bad type', severity: 'error' },
		])
		const wrapped: LinePos = { ...POS, visualLine: 1, firstVisualLine: false }

		diagnostics.resetPos(0)
		diagnostics.decorateLine(renderer, POS)
		diagnostics.decorateGrapheme(renderer, grapheme(2, 2))
		expect(diagnostics.renderVirtLines(renderer, POS, 1)).toBe(0)

		diagnostics.decorateLine(renderer, wrapped)
		diagnostics.decorateGrapheme(renderer, grapheme(9, 1))
		expect(diagnostics.renderVirtLines(renderer, wrapped, 1)).toBe(1)
		expect(buffer.rowText(2).trimEnd()).toBe('  └ bad type')
	})

	it('pins diagnostics scrolled out of view to the left edge', () => {
		const buffer = new ScreenBuffer(20, 3)
		const renderer = new ScreenTextRenderer(buffer, { colOffset: 10 })
		const diagnostics = new InlineDiagnosticsDecoration(DOC, [
			{ charIdx: 2, message: 'oops', severity: 'info' },
		])

		diagnostics.resetPos(0)
		diagnostics.decorateGrapheme(renderer, grapheme(2, 2))
		diagnostics.decorateGrapheme(renderer, grapheme(9, 9))
		diagnostics.renderVirtLines(renderer, POS, 1)
		expect(buffer.rowText(1).trimEnd()).toBe('└ oops')
	})

	it('forgets diagnostics once a new document line starts', () => {
		const renderer = new ScreenTextRenderer(new ScreenBuffer(20, 3))
		const diagnostics = new InlineDiagnosticsDecoration(DOC, DIAGNOSTICS)

		diagnostics.resetPos(0)
		diagnostics.decorateGrapheme(renderer, grapheme(2, 2))
		diagnostics.decorateGrapheme(renderer, grapheme(9, 9))
		diagnostics.decorateLine(renderer, { ...POS, docLine: 1, visualLine: 1 })
		expect(diagnostics.renderVirtLines(renderer, POS, 1)).toBe(0)
	})

	it('reserves one row per diagnostic on its document line', () => {
		const diagnostics = new InlineDiagnosticsDecoration('abc\nde', [
			{ charIdx: 0, message: 'a', severity: 'error' },
			{ charIdx: 5, message: 'b', severity: 'error' },
			{ charIdx: 1, message: 'c', severity: 'hint' },
		])
		expect(diagnostics.lineAnnotations()).toEqual([
			{ docLine: 0, rows: 2 },
			{ docLine: 1, rows: 1 },
		])
	})
})

describe('isDiagnosticSeverity', () => {
	it('recognises the four severities', () => {
		expect(isDiagnosticSeverity('warning')).toBe(true)
		expect(isDiagnosticSeverity('fatal')).toBe(false)
	})
})
