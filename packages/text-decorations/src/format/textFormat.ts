import { loggers } from '@glyphline/logger'
import { RENDER_SCHEMA, resolveSettings } from '@glyphline/settings'

import type { Style } from '../types'

const log = loggers.settings.withTag('textFormat')

export type TextFormat = {
	viewportWidth: number
	tabWidth: number
	softWrap: boolean
}

export const DEFAULT_TAB_WIDTH = 4

export const DEFAULT_TEXT_FORMAT: TextFormat = {
	viewportWidth: 80,
	tabWidth: DEFAULT_TAB_WIDTH,
	softWrap: false,
}

export type RenderSettings = {
	format: TextFormat
	suggestionStyle: Style
	diagnostics: {
		enabled: boolean
		minSeverity: string
	}
}

const numberSetting = (
	values: Record<string, unknown>,
	key: string,
	fallback: number
) => {
	const value = values[key]
	return typeof value === 'number' ? value : fallback
}

const booleanSetting = (
	values: Record<string, unknown>,
	key: string,
	fallback: boolean
) => {
	const value = values[key]
	return typeof value === 'boolean' ? value : fallback
}

const stringSetting = (
	values: Record<string, unknown>,
	key: string,
	fallback: string
) => {
	const value = values[key]
	return typeof value === 'string' ? value : fallback
}

/**
 * Resolves the `render.*` settings (defaults plus user overrides) into the
 * values the formatter and the built-in decorations consume.
 */
export const loadRenderSettings = (
	overrides: Record<string, unknown> = {}
): RenderSettings => {
	const values = resolveSettings([RENDER_SCHEMA], overrides)
	const settings: RenderSettings = {
		format: {
			viewportWidth: numberSetting(
				values,
				'render.text.viewportWidth',
				DEFAULT_TEXT_FORMAT.viewportWidth
			),
			tabWidth: numberSetting(
				values,
				'render.text.tabWidth',
				DEFAULT_TEXT_FORMAT.tabWidth
			),
			softWrap: booleanSetting(
				values,
				'render.text.softWrap',
				DEFAULT_TEXT_FORMAT.softWrap
			),
		},
		suggestionStyle: {
			fg: stringSetting(values, 'render.inlineSuggestion.foreground', '#6b7280'),
			italic: booleanSetting(values, 'render.inlineSuggestion.italic', true),
		},
		diagnostics: {
			enabled: booleanSetting(values, 'render.diagnostics.enabled', true),
			minSeverity: stringSetting(values, 'render.diagnostics.minSeverity', 'hint'),
		},
	}
	log.debug('resolved render settings', settings)
	return settings
}

export const textFormatFromSettings = (
	overrides: Record<string, unknown> = {}
): TextFormat => loadRenderSettings(overrides).format
