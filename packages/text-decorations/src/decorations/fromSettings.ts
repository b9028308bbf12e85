import { loggers } from '@glyphline/logger'

import type { CaretCache } from '../caretCache'
import { DecorationManager } from '../decorationManager'
import { TextAnnotations } from '../format/annotations'
import type { RenderSettings } from '../format/textFormat'
import { CaretDecoration } from './caret'
import {
	InlineDiagnosticsDecoration,
	isDiagnosticSeverity,
	type Diagnostic,
	type DiagnosticSeverity,
} from './inlineDiagnostics'
import { InlineSuggestionDecoration } from './inlineSuggestion'

const log = loggers.decorations.withTag('settings')

export type DecorationSources = {
	docText: string
	caret?: { cache: CaretCache; charIdx: number }
	suggestion?: { text: string; charIdx: number }
	diagnostics?: Diagnostic[]
}

export type BuiltDecorations = {
	manager: DecorationManager
	/** Rows the suggestion and diagnostics need reserved in the formatter */
	annotations: TextAnnotations
	caret: CaretDecoration | undefined
	suggestion: InlineSuggestionDecoration | undefined
	diagnostics: InlineDiagnosticsDecoration | undefined
}

const minSeverityOf = (value: string): DiagnosticSeverity => {
	if (isDiagnosticSeverity(value)) return value
	log.warn('unknown diagnostic severity, showing every diagnostic', { value })
	return 'hint'
}

/**
 * Registers the built-in decorations configured by `settings` for one
 * document, in the order caret, suggestion, diagnostics. Suggestion rows
 * therefore stack above diagnostic rows.
 */
export const createDecorations = (
	settings: RenderSettings,
	sources: DecorationSources
): BuiltDecorations => {
	const manager = new DecorationManager()
	const annotations = TextAnnotations.empty()

	const caret = sources.caret
		? new CaretDecoration(sources.caret.cache, sources.caret.charIdx)
		: undefined
	if (caret) manager.addDecoration(caret)

	const suggestion = sources.suggestion
		? new InlineSuggestionDecoration({
				style: settings.suggestionStyle,
				docText: sources.docText,
				text: sources.suggestion.text,
				charIdx: sources.suggestion.charIdx,
				viewWidth: settings.format.viewportWidth,
				tabWidth: settings.format.tabWidth,
			})
		: undefined
	if (suggestion) {
		manager.addDecoration(suggestion)
		annotations.addLineAnnotation(suggestion.lineAnnotation())
	}

	let diagnostics: InlineDiagnosticsDecoration | undefined
	if (sources.diagnostics && settings.diagnostics.enabled) {
		diagnostics = new InlineDiagnosticsDecoration(sources.docText, sources.diagnostics, {
			minSeverity: minSeverityOf(settings.diagnostics.minSeverity),
		})
		manager.addDecoration(diagnostics)
		for (const annotation of diagnostics.lineAnnotations()) {
			annotations.addLineAnnotation(annotation)
		}
	} else if (sources.diagnostics) {
		log.debug('diagnostics disabled', { count: sources.diagnostics.length })
	}

	return { manager, annotations, caret, suggestion, diagnostics }
}
