export const TAG_SEPARATOR = ':'

export const buildTag = (scopes: readonly string[]) =>
	scopes
		.map((scope) => scope.trim())
		.filter((scope) => scope.length > 0)
		.join(TAG_SEPARATOR)

/**
 * Every prefix of a tag, most specific first.
 * `decorations:manager` -> [`decorations:manager`, `decorations`]
 */
export const tagAncestry = (tag: string): string[] => {
	const parts = tag.split(TAG_SEPARATOR)
	const result: string[] = []
	for (let i = parts.length; i > 0; i--) {
		result.push(parts.slice(0, i).join(TAG_SEPARATOR))
	}
	return result
}
