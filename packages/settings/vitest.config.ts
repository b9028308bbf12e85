import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'settings',
		environment: 'node',
		include: ['src/**/*.test.ts'],
		server: {
			deps: {
				inline: ['@glyphline/logger', 'zod'],
			},
		},
	},
})
