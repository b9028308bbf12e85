export type LoggerDefinition = {
	scopes: readonly string[]
	description: string
}

export const LOGGER_DEFINITIONS = {
	decorations: {
		scopes: ['decorations'],
		description: 'Decoration manager and built-in decorations',
	},
	formatter: {
		scopes: ['formatter'],
		description: 'Grapheme formatting and soft wrap',
	},
	renderer: {
		scopes: ['renderer'],
		description: 'Screen buffer drawing and the frame loop',
	},
	settings: {
		scopes: ['settings'],
		description: 'Render settings resolution',
	},
} as const satisfies Record<string, LoggerDefinition>

export type LoggerName = keyof typeof LOGGER_DEFINITIONS
