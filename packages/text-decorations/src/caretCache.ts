import type { Position } from './types'

/**
 * Single-slot output for the on-screen position of the primary cursor.
 * Filled during the text pass, read by whatever draws the cursor afterwards.
 */
export class CaretCache {
	private position: Position | undefined

	get(): Position | undefined {
		return this.position
	}

	set(position: Position | undefined) {
		this.position = position
	}

	clear() {
		this.position = undefined
	}
}
