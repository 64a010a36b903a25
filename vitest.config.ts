// biome-ignore lint/correctness/noUndeclaredDependencies: vitest is hoisted from root workspace
import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: [
			// One project per workspace package: {package} (e.g., schemas, edge)
			'packages/*/vitest.config.ts',
		],
	},
})
