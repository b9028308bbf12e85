export { CaretDecoration } from './caret'
export {
	InlineSuggestionDecoration,
	type InlineSuggestionOptions,
} from './inlineSuggestion'
export {
	InlineDiagnosticsDecoration,
	DEFAULT_DIAGNOSTIC_STYLES,
	DIAGNOSTIC_SEVERITIES,
	isDiagnosticSeverity,
	type Diagnostic,
	type DiagnosticSeverity,
	type InlineDiagnosticsOptions,
} from './inlineDiagnostics'
export {
	createDecorations,
	type BuiltDecorations,
	type DecorationSources,
} from './fromSettings'
