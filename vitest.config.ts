import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// describe, it, expect and vi are also available without imports
		globals: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
});
