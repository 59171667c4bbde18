import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts', 'src/cli.ts'],
	format: ['esm'],
	// Workspace packages publish TypeScript sources, so they go into the bundle
	noExternal: [/^testwire-/],
	splitting: true,
	sourcemap: true,
	clean: true,
	treeshake: true,
	outDir: 'dist',
	target: 'node20',
});
