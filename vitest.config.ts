import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// describe / it / expect available without imports
		globals: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
});
