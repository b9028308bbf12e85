import { tagAncestry } from './tags'

const toggles = new Map<string, boolean>()

/**
 * Enables or disables a tag and, unless they carry their own toggle,
 * every tag below it.
 */
export const setLoggerEnabled = (tag: string, enabled: boolean) => {
	toggles.set(tag, enabled)
}

export const clearLoggerToggles = () => {
	toggles.clear()
}

export const isLoggerEnabled = (tag: string | undefined): boolean => {
	if (!tag) return true
	for (const candidate of tagAncestry(tag)) {
		const toggle = toggles.get(candidate)
		if (toggle !== undefined) return toggle
	}
	return true
}
