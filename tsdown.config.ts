import { defineConfig } from 'tsdown'

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	clean: true,
	define: {
		'import.meta.vitest': 'undefined',
	},
})
