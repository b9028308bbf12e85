import * as fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { lineDecoration, type Decoration } from './decoration'
import { DecorationManager } from './decorationManager'
import { ScreenBuffer } from './render/screenBuffer'
import { ScreenTextRenderer } from './render/textRenderer'
import type { Anchor, FormattedGrapheme, LinePos } from './types'

const grapheme = (charIdx: number, col = charIdx): FormattedGrapheme => ({
	raw: 'x',
	width: 1,
	charIdx,
	docLine: 0,
	visualPos: { row: 0, col },
	source: 'document',
})

const linePos = (visualLine: number): LinePos => ({
	docLine: visualLine,
	visualLine,
	firstVisualLine: true,
	startCharIdx: 0,
})

const createRenderer = (height = 10) =>
	new ScreenTextRenderer(new ScreenBuffer(20, height))

type Call = ['decorate' | 'skip' | 'reset', number]

/**
 * Wants to see every char index in `targets` (sorted, distinct).
 */
const targetDecoration = (targets: number[], withSkip = true) => {
	const calls: Call[] = []
	const firstAtOrAfter = (pos: number): Anchor => targets.find((t) => t >= pos)
	const decoration: Decoration = {
		resetPos(pos) {
			calls.push(['reset', pos])
			return firstAtOrAfter(pos)
		},
		decorateGrapheme(_renderer, g) {
			calls.push(['decorate', g.charIdx])
			return firstAtOrAfter(g.charIdx + 1)
		},
	}
	if (withSkip) {
		decoration.skipConcealedAnchor = (end) => {
			calls.push(['skip', end])
			return firstAtOrAfter(end)
		}
	}
	return { decoration, calls }
}

describe('DecorationManager', () => {
	it('starts every registered decoration at anchor 0 until prepared', () => {
		const manager = new DecorationManager()
		const { decoration, calls } = targetDecoration([0, 3])
		manager.addDecoration(decoration)
		expect(manager.size).toBe(1)

		manager.decorateGrapheme(createRenderer(), grapheme(0))
		expect(calls).toEqual([['decorate', 0]])
	})

	it('fires the grapheme hook only on anchored char indices', () => {
		const manager = new DecorationManager()
		const { decoration, calls } = targetDecoration([2, 5])
		manager.addDecoration(decoration)
		const renderer = createRenderer()

		manager.prepareForRendering(0)
		for (let i = 0; i <= 6; i++) manager.decorateGrapheme(renderer, grapheme(i))

		expect(calls).toEqual([
			['reset', 0],
			['decorate', 2],
			['decorate', 5],
		])
	})

	it('skips anchors whose graphemes were concealed', () => {
		const manager = new DecorationManager()
		const { decoration, calls } = targetDecoration([2, 5])
		manager.addDecoration(decoration)
		const renderer = createRenderer()

		manager.prepareForRendering(0)
		for (const idx of [0, 1, 4, 5, 6]) {
			manager.decorateGrapheme(renderer, grapheme(idx))
		}

		expect(calls).toEqual([
			['reset', 0],
			['skip', 4],
			['decorate', 5],
		])
	})

	it('falls back to resetPos when a decoration has no skip hook', () => {
		const manager = new DecorationManager()
		const { decoration, calls } = targetDecoration([2, 5], false)
		manager.addDecoration(decoration)
		const renderer = createRenderer()

		manager.prepareForRendering(0)
		for (const idx of [0, 4, 5]) manager.decorateGrapheme(renderer, grapheme(idx))

		expect(calls).toEqual([
			['reset', 0],
			['reset', 4],
			['decorate', 5],
		])
	})

	it('never triggers on anchors before the first visible char', () => {
		const manager = new DecorationManager()
		const { decoration, calls } = targetDecoration([1, 8])
		manager.addDecoration(decoration)
		const renderer = createRenderer()

		manager.prepareForRendering(5)
		for (let i = 5; i <= 9; i++) manager.decorateGrapheme(renderer, grapheme(i))

		expect(calls).toEqual([
			['reset', 5],
			['decorate', 8],
		])
	})

	it('deactivates a decoration whose skip does not move forward', () => {
		const manager = new DecorationManager()
		let skips = 0
		manager.addDecoration({
			resetPos: () => 1,
			skipConcealedAnchor: () => {
				skips++
				return 1
			},
			decorateGrapheme: () => {
				throw new Error('must not be reached')
			},
		})
		const renderer = createRenderer()

		manager.prepareForRendering(0)
		manager.decorateGrapheme(renderer, grapheme(3))
		manager.decorateGrapheme(renderer, grapheme(4))

		expect(skips).toBe(1)
	})

	it('leaves decorations without a grapheme hook alone', () => {
		const manager = new DecorationManager()
		const lines: number[] = []
		manager.addDecoration(lineDecoration((_renderer, pos) => lines.push(pos.visualLine)))
		manager.addDecoration({})
		const renderer = createRenderer()

		manager.prepareForRendering(0)
		manager.decorateLine(renderer, linePos(0))
		manager.decorateGrapheme(renderer, grapheme(0))
		manager.renderVirtualLines(renderer, linePos(0))
		manager.decorateLine(renderer, linePos(1))

		expect(lines).toEqual([0, 1])
	})

	it('calls line hooks in registration order', () => {
		const manager = new DecorationManager()
		const order: string[] = []
		manager.addDecoration(lineDecoration(() => order.push('a')))
		manager.addDecoration(lineDecoration(() => order.push('b')))

		manager.decorateLine(createRenderer(), linePos(0))
		expect(order).toEqual(['a', 'b'])
	})

	it('stacks virtual rows in registration order', () => {
		const manager = new DecorationManager()
		const offsets: Array<[string, number]> = []
		const claim = (name: string, rows: number): Decoration => ({
			renderVirtLines(_renderer, _pos, virtOffset) {
				offsets.push([name, virtOffset])
				return rows
			},
		})
		manager.addDecoration(claim('a', 2))
		manager.addDecoration(claim('b', 1))
		manager.addDecoration(claim('c', 0))

		manager.renderVirtualLines(createRenderer(10), linePos(0))
		expect(offsets).toEqual([
			['a', 1],
			['b', 3],
			['c', 4],
		])
	})

	it('stops handing out virtual rows at the bottom of the viewport', () => {
		const manager = new DecorationManager()
		const called: string[] = []
		manager.addDecoration({
			renderVirtLines: () => {
				called.push('a')
				return 2
			},
		})
		manager.addDecoration({
			renderVirtLines: () => {
				called.push('b')
				return 1
			},
		})

		manager.renderVirtualLines(createRenderer(4), linePos(1))
		expect(called).toEqual(['a'])

		called.length = 0
		manager.renderVirtualLines(createRenderer(4), linePos(3))
		expect(called).toEqual([])
	})
})

describe('DecorationManager properties', () => {
	const sortedDistinct = (max: number) =>
		fc
			.uniqueArray(fc.integer({ min: 0, max }), { maxLength: 30 })
			.map((values) => values.sort((a, b) => a - b))

	it('fires exactly on the anchors that appear in the stream', () => {
		fc.assert(
			fc.property(
				sortedDistinct(60),
				fc.array(fc.integer({ min: 0, max: 60 }), { maxLength: 80 }),
				(targets, rawStream) => {
					const stream = [...rawStream].sort((a, b) => a - b)
					const manager = new DecorationManager()
					const { decoration, calls } = targetDecoration(targets)
					manager.addDecoration(decoration)
					const renderer = createRenderer()

					manager.prepareForRendering(0)
					for (const idx of stream) {
						manager.decorateGrapheme(renderer, grapheme(idx, idx % 20))
					}

					const seen = new Set(stream)
					const decorated = calls
						.filter(([kind]) => kind === 'decorate')
						.map(([, idx]) => idx)
					expect(decorated).toEqual(targets.filter((t) => seen.has(t)))

					for (const [kind, idx] of calls) {
						if (kind === 'skip') expect(seen.has(idx)).toBe(true)
					}
				}
			),
			{ numRuns: 200 }
		)
	})

	it('keeps virtual rows inside the viewport', () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 1, max: 30 }),
				fc.integer({ min: 0, max: 29 }),
				fc.array(fc.integer({ min: 0, max: 5 }), { maxLength: 10 }),
				(height, visualLine, requests) => {
					const manager = new DecorationManager()
					const ranges: Array<[number, number]> = []
					for (const rows of requests) {
						manager.addDecoration({
							renderVirtLines(_renderer, pos, virtOffset) {
								ranges.push([virtOffset, rows])
								expect(pos.visualLine + virtOffset).toBeLessThan(height)
								return rows
							},
						})
					}

					manager.renderVirtualLines(createRenderer(height), linePos(visualLine))

					let expectedOffset = 1
					for (const [offset, rows] of ranges) {
						expect(offset).toBe(expectedOffset)
						expectedOffset += rows
					}
				}
			),
			{ numRuns: 200 }
		)
	})
})
