// ============================================================================
// testwire - Configuration
// Zero config by default. A testwire.config.json (or .js / .mjs) in the
// working directory names the workers and default settings; command-line
// flags override it.
// ============================================================================

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve, sep } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError, toError } from 'testwire-protocol';
import { type TestAssembly, type UserSettings, isThreadMultiplier } from 'testwire-runner';
import { z } from 'zod';

/** Config files looked for in the working directory, first found wins */
export const CONFIG_FILES = ['testwire.config.json', 'testwire.config.js', 'testwire.config.mjs'] as const;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const traitMap = z.record(z.array(z.string()));

const workerSchema = z.union([
	z.string().min(1),
	z
		.object({
			executablePath: z.string().min(1),
			args: z.array(z.string()).optional(),
			workingDirectory: z.string().optional(),
			env: z.record(z.string()).optional(),
			targetFramework: z.string().optional(),
			configFilename: z.string().optional(),
		})
		.strict(),
]);

const maxThreadsSchema = z.union([
	z.literal('default'),
	z.literal('unlimited'),
	z.number().int().positive(),
	z.string().refine(isThreadMultiplier, { message: "Expected a CPU multiplier such as '0.5x'" }),
]);

export const configSchema = z
	.object({
		/** Worker executables, as paths or full launch descriptions */
		workers: z.array(workerSchema).optional(),
		/** Transport workers connect back over (default: 'ws') */
		transport: z.enum(['ws', 'tcp', 'pipe']).optional(),
		/** How long to wait for a worker to connect, in ms (default: 30000) */
		timeout: z.number().int().positive().optional(),
		/** How long a worker has to finish a find or run, in ms (default: 600000) */
		runTimeout: z.number().int().positive().optional(),
		/** How long a worker has to exit after the run, in ms (default: 5000) */
		shutdownGrace: z.number().int().nonnegative().optional(),
		/** Trace every frame (default: false) */
		debug: z.boolean().optional(),
		filters: z
			.object({
				includedClasses: z.array(z.string()),
				excludedClasses: z.array(z.string()),
				includedMethods: z.array(z.string()),
				excludedMethods: z.array(z.string()),
				includedNamespaces: z.array(z.string()),
				excludedNamespaces: z.array(z.string()),
				includedTraits: traitMap,
				excludedTraits: traitMap,
			})
			.partial()
			.strict()
			.optional(),
		parallel: z.enum(['none', 'collections', 'assemblies', 'all']).optional(),
		maxParallelThreads: maxThreadsSchema.optional(),
		preEnumerateTheories: z.boolean().optional(),
		culture: z.string().optional(),
		diagnosticMessages: z.boolean().optional(),
		internalDiagnosticMessages: z.boolean().optional(),
		stopOnFail: z.boolean().optional(),
		failSkips: z.boolean().optional(),
	})
	.strict();

/** Everything a config file may set */
export type TestwireConfig = z.infer<typeof configSchema>;

/** A config file's contents, with where it came from */
export interface LoadedConfig {
	path: string;
	config: TestwireConfig;
}

/**
 * Define your testwire config with full type safety.
 * Optional: it only helps your editor.
 *
 * ```js
 * // testwire.config.mjs
 * import { defineConfig } from 'testwire';
 *
 * export default defineConfig({
 *   workers: ['./bin/unit-tests'],
 *   parallel: 'all',
 * });
 * ```
 */
export function defineConfig(config: TestwireConfig): TestwireConfig {
	return config;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Find and load the config file in a directory.
 *
 * @returns undefined when there is no config file
 * @throws ConfigError when the file cannot be read or does not validate
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<LoadedConfig | undefined> {
	for (const name of CONFIG_FILES) {
		const path = resolve(cwd, name);
		if (!existsSync(path)) continue;

		const raw = await readConfigFile(path);
		return { path, config: validateConfig(raw, name) };
	}
	return undefined;
}

async function readConfigFile(path: string): Promise<unknown> {
	try {
		if (path.endsWith('.json')) {
			return JSON.parse(await readFile(path, 'utf-8'));
		}
		const mod: unknown = await import(pathToFileURL(path).href);
		return typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : mod;
	} catch (err) {
		const error = toError(err);
		throw new ConfigError(`Could not load ${path}: ${error.message}`, { cause: error });
	}
}

/** Validate parsed config contents */
export function validateConfig(raw: unknown, source = 'config'): TestwireConfig {
	const result = configSchema.safeParse(raw);
	if (result.success) return result.data;

	const problems = result.error.issues.map((issue) => {
		const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `  ${where}: ${issue.message}`;
	});
	throw new ConfigError(`Invalid ${source}:\n${problems.join('\n')}`, {
		hint: 'See `testwire --help` for the available settings.',
	});
}

// ---------------------------------------------------------------------------
// Shaping for the runner
// ---------------------------------------------------------------------------

/** Resolve a worker path against `base`; a bare command name is left for a PATH lookup */
export function resolveExecutable(base: string, executable: string): string {
	const hasDirectory = isAbsolute(executable) || executable.includes('/') || executable.includes(sep);
	return hasDirectory ? resolve(base, executable) : executable;
}

/** Worker entries as launch descriptions, with paths resolved against the config file */
export function configuredWorkers(loaded: LoadedConfig): TestAssembly[] {
	const base = dirname(loaded.path);
	return (loaded.config.workers ?? []).map((worker) => {
		if (typeof worker === 'string') return { executablePath: resolveExecutable(base, worker) };
		return {
			...worker,
			executablePath: resolveExecutable(base, worker.executablePath),
			workingDirectory: worker.workingDirectory ? resolve(base, worker.workingDirectory) : undefined,
		};
	});
}

/** The runner settings a config sets */
export function configuredSettings(config: TestwireConfig): UserSettings {
	const settings: UserSettings = {};
	if (config.filters) settings.filters = config.filters;
	if (config.parallel !== undefined) settings.parallel = config.parallel;
	if (config.maxParallelThreads !== undefined) settings.maxParallelThreads = config.maxParallelThreads;
	if (config.preEnumerateTheories !== undefined) settings.preEnumerateTheories = config.preEnumerateTheories;
	if (config.culture !== undefined) settings.culture = config.culture;
	if (config.diagnosticMessages !== undefined) settings.diagnosticMessages = config.diagnosticMessages;
	if (config.internalDiagnosticMessages !== undefined) {
		settings.internalDiagnosticMessages = config.internalDiagnosticMessages;
	}
	if (config.stopOnFail !== undefined) settings.stopOnFail = config.stopOnFail;
	if (config.failSkips !== undefined) settings.failSkips = config.failSkips;
	return settings;
}
