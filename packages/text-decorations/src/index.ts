export type {
	Anchor,
	FormattedGrapheme,
	Grapheme,
	GraphemeSource,
	LinePos,
	Position,
	Style,
	Viewport,
} from './types'

export {
	lineDecoration,
	type Decoration,
	type LineDecorationFn,
} from './decoration'
export { DecorationManager } from './decorationManager'
export { CaretCache } from './caretCache'
export * from './decorations'

export {
	TextAnnotations,
	type ConcealedSpan,
	type LineAnnotation,
} from './format/annotations'
export { formatText, countVisualRows, type FormatStart } from './format/formatText'
export {
	coordsAtPos,
	lineEndCharIdx,
	lineStartCharIdx,
} from './format/position'
export {
	DEFAULT_TEXT_FORMAT,
	loadRenderSettings,
	textFormatFromSettings,
	type RenderSettings,
	type TextFormat,
} from './format/textFormat'
export { codePointWidth, graphemeWidth } from './format/charWidth'

export { ScreenBuffer, patchStyle, type Cell } from './render/screenBuffer'
export {
	ScreenTextRenderer,
	type TextRenderer,
	type ScreenTextRendererOptions,
} from './render/textRenderer'
export {
	renderDocument,
	type RenderDocumentOptions,
	type RenderDocumentResult,
} from './render/renderDocument'
