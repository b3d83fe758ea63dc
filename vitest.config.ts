import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.{ts,tsx}'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		setupFiles: ['source/test-setup.ts'],
		// Store tests open LanceDB and the supervisor tests fork real workers
		// (loaded through tsx), which takes a few seconds each
		testTimeout: 60_000,
		hookTimeout: 60_000,
		// Lock and worker tests share temp directories per file; keep files sequential
		pool: 'forks',
		fileParallelism: false,
	},
});
