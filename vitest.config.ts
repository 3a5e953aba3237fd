import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		includeSource: ['src/**/*.ts'],
		exclude: ['node_modules', 'dist'],
		env: {
			NODE_ENV: 'test',
			SKIP_ENV_FILES: 'true',
		},
	},
	define: {
		'import.meta.vitest': 'undefined',
	},
})
