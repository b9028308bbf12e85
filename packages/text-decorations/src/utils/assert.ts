import type { Logger } from '@glyphline/logger'

export type Assert = (
	condition: boolean,
	message: string,
	details?: Record<string, unknown>
) => boolean

/**
 * Invariant checks for host programming errors. A failed check is logged and
 * reported to the caller, rendering carries on.
 */
export const createAssert =
	(log: Logger): Assert =>
	(condition, message, details) => {
		if (condition) return true
		log.warn(message, details)
		return false
	}
