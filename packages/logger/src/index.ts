import {
	consola,
	createConsola,
	LogLevels,
	type ConsolaInstance,
	type ConsolaReporter,
	type LogType,
} from 'consola'

import {
	LOGGER_DEFINITIONS,
	type LoggerDefinition,
	type LoggerName,
} from './utils/loggerDefinitions'
import { buildTag } from './utils/tags'
import { isLoggerEnabled } from './utils/toggles'

export type Logger = ConsolaInstance

const LEVEL_ENV = 'GLYPHLINE_LOG_LEVEL'

const isLogType = (value: string): value is LogType =>
	Object.prototype.hasOwnProperty.call(LogLevels, value)

export const resolveLogLevel = (raw: string | undefined): number => {
	if (!raw) return LogLevels.info
	const numeric = Number(raw)
	if (Number.isInteger(numeric)) return numeric
	const name = raw.trim().toLowerCase()
	return isLogType(name) ? LogLevels[name] : LogLevels.info
}

const downstream = consola.options.reporters

// Drops records whose tag (or an ancestor) is toggled off before handing
// them to consola's own reporters.
const toggleReporter: ConsolaReporter = {
	log(logObj, ctx) {
		if (!isLoggerEnabled(logObj.tag)) return
		for (const reporter of downstream) {
			reporter.log(logObj, ctx)
		}
	},
}

const createLogger = (definition: LoggerDefinition): Logger =>
	createConsola({
		level: resolveLogLevel(process.env[LEVEL_ENV]),
		reporters: [toggleReporter],
		defaults: { tag: buildTag(definition.scopes) },
	})

export const loggers: Readonly<Record<LoggerName, Logger>> = {
	decorations: createLogger(LOGGER_DEFINITIONS.decorations),
	formatter: createLogger(LOGGER_DEFINITIONS.formatter),
	renderer: createLogger(LOGGER_DEFINITIONS.renderer),
	settings: createLogger(LOGGER_DEFINITIONS.settings),
}

export { LOGGER_DEFINITIONS, buildTag }
export type { LoggerDefinition, LoggerName }
export { tagAncestry } from './utils/tags'
export {
	setLoggerEnabled,
	isLoggerEnabled,
	clearLoggerToggles,
} from './utils/toggles'
