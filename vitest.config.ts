import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['packages/*/src/**/*.test.ts'],
		// Engine and supervisor tests bind loopback sockets and spawn node
		testTimeout: 20_000,
		hookTimeout: 20_000,
	},
});
