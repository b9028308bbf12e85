import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'text-decorations',
		environment: 'node',
		include: ['src/**/*.test.ts'],
		server: {
			deps: {
				inline: ['@glyphline/logger', '@glyphline/settings', 'zod'],
			},
		},
	},
})
