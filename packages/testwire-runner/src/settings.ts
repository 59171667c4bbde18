// ============================================================================
// testwire Runner - Settings
// What a caller asks for, resolved into the options carried by find and
// find-and-run requests. Sensible defaults; override only what you need.
// ============================================================================

import { cpus } from 'node:os';
import { ConfigError, type ExecutionOptions, type FindOptions, type TestFilters } from 'testwire-protocol';

/** Which levels of the worker may run tests in parallel */
export type ParallelMode = 'none' | 'collections' | 'assemblies' | 'all';

/**
 * Upper bound on the worker's parallel threads.
 *
 * - `'default'`:   let the worker decide
 * - `'unlimited'`: no bound
 * - a number:      exactly that many threads
 * - `'<n>x'`:      a multiple of this machine's CPU count, e.g. `'0.5x'`
 */
export type MaxThreads = 'default' | 'unlimited' | number | `${number}x`;

export interface SettingsFilters {
	includedClasses: string[];
	excludedClasses: string[];
	includedMethods: string[];
	excludedMethods: string[];
	includedNamespaces: string[];
	excludedNamespaces: string[];
	/** Trait name -> accepted values; a test matching any pair is included */
	includedTraits: Record<string, string[]>;
	/** Trait name -> rejected values; a test matching any pair is excluded */
	excludedTraits: Record<string, string[]>;
}

/** Full settings with all options */
export interface RunnerSettings {
	filters: SettingsFilters;
	/** Parallelism the worker may use (default: 'none') */
	parallel: ParallelMode;
	/** (default: 'default') */
	maxParallelThreads: MaxThreads;
	/** Expand data-driven tests into one case per data row during discovery */
	preEnumerateTheories: boolean;
	/** 'default' keeps the worker's culture, 'invariant' selects the invariant one */
	culture: string;
	/** Forward the worker's diagnostic messages */
	diagnosticMessages: boolean;
	/** Forward the worker's internal diagnostic messages */
	internalDiagnosticMessages: boolean;
	/** Stop the run after the first failing test */
	stopOnFail: boolean;
	/** Report skipped tests as failures */
	failSkips: boolean;
}

/** Callers provide partial settings; filters may be partial too */
export type UserSettings = Partial<Omit<RunnerSettings, 'filters'>> & {
	filters?: Partial<SettingsFilters>;
};

/** Wire-level options for both request kinds */
export interface ResolvedSettings {
	options: FindOptions;
	filters: TestFilters;
	execution: ExecutionOptions;
}

function emptyFilters(): SettingsFilters {
	return {
		includedClasses: [],
		excludedClasses: [],
		includedMethods: [],
		excludedMethods: [],
		includedNamespaces: [],
		excludedNamespaces: [],
		includedTraits: {},
		excludedTraits: {},
	};
}

const DEFAULTS: Omit<RunnerSettings, 'filters'> = {
	parallel: 'none',
	maxParallelThreads: 'default',
	preEnumerateTheories: false,
	culture: 'default',
	diagnosticMessages: false,
	internalDiagnosticMessages: false,
	stopOnFail: false,
	failSkips: false,
};

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Merge user settings with defaults and shape them into request options.
 *
 * ```ts
 * const { options, filters, execution } = resolveSettings({
 *   parallel: 'all',
 *   maxParallelThreads: '2x',
 *   filters: { includedTraits: { category: ['fast'] } },
 * });
 * ```
 *
 * @throws ConfigError for a thread count or culture that cannot be used
 */
export function resolveSettings(user: UserSettings = {}): ResolvedSettings {
	const filters = user.filters ?? {};
	const empty = emptyFilters();
	// Field by field: a key present but undefined keeps its default
	const settings: RunnerSettings = {
		parallel: user.parallel ?? DEFAULTS.parallel,
		maxParallelThreads: user.maxParallelThreads ?? DEFAULTS.maxParallelThreads,
		preEnumerateTheories: user.preEnumerateTheories ?? DEFAULTS.preEnumerateTheories,
		culture: user.culture ?? DEFAULTS.culture,
		diagnosticMessages: user.diagnosticMessages ?? DEFAULTS.diagnosticMessages,
		internalDiagnosticMessages: user.internalDiagnosticMessages ?? DEFAULTS.internalDiagnosticMessages,
		stopOnFail: user.stopOnFail ?? DEFAULTS.stopOnFail,
		failSkips: user.failSkips ?? DEFAULTS.failSkips,
		filters: {
			includedClasses: filters.includedClasses ?? empty.includedClasses,
			excludedClasses: filters.excludedClasses ?? empty.excludedClasses,
			includedMethods: filters.includedMethods ?? empty.includedMethods,
			excludedMethods: filters.excludedMethods ?? empty.excludedMethods,
			includedNamespaces: filters.includedNamespaces ?? empty.includedNamespaces,
			excludedNamespaces: filters.excludedNamespaces ?? empty.excludedNamespaces,
			includedTraits: filters.includedTraits ?? empty.includedTraits,
			excludedTraits: filters.excludedTraits ?? empty.excludedTraits,
		},
	};
	const parallel = parallelFlags(settings.parallel);

	return {
		options: {
			preEnumerateTheories: settings.preEnumerateTheories,
			culture: resolveCulture(settings.culture),
			diagnosticMessages: settings.diagnosticMessages,
			internalDiagnosticMessages: settings.internalDiagnosticMessages,
		},
		filters: {
			includedClasses: [...settings.filters.includedClasses],
			excludedClasses: [...settings.filters.excludedClasses],
			includedMethods: [...settings.filters.includedMethods],
			excludedMethods: [...settings.filters.excludedMethods],
			includedNamespaces: [...settings.filters.includedNamespaces],
			excludedNamespaces: [...settings.filters.excludedNamespaces],
			includedTraits: copyTraits(settings.filters.includedTraits),
			excludedTraits: copyTraits(settings.filters.excludedTraits),
		},
		execution: {
			parallelizeAssembly: parallel.assembly,
			parallelizeTestCollections: parallel.collections,
			maxParallelThreads: resolveMaxThreads(settings.maxParallelThreads),
			stopOnFail: settings.stopOnFail,
			failSkips: settings.failSkips,
		},
	};
}

function copyTraits(traits: Record<string, string[]>): Record<string, string[]> {
	return Object.fromEntries(Object.entries(traits).map(([name, values]) => [name, [...values]]));
}

/** 'default' -> null (worker's culture), 'invariant' -> '' */
function resolveCulture(culture: string): string | null {
	if (culture === 'default') return null;
	if (culture === 'invariant') return '';
	if (culture.trim() === '') {
		throw new ConfigError('Culture name must not be empty', {
			hint: "Use 'default', 'invariant', or a culture name such as 'en-US'.",
		});
	}
	return culture;
}

function parallelFlags(mode: ParallelMode): { assembly: boolean; collections: boolean } {
	switch (mode) {
		case 'all':
			return { assembly: true, collections: true };
		case 'assemblies':
			return { assembly: true, collections: false };
		case 'collections':
			return { assembly: false, collections: true };
		case 'none':
			return { assembly: false, collections: false };
	}
}

/** null = worker default, -1 = unlimited, else a positive thread count */
function resolveMaxThreads(value: MaxThreads): number | null {
	if (typeof value === 'number') {
		if (!Number.isInteger(value) || value < 1) throw maxThreadsError(String(value));
		return value;
	}
	return parseMaxThreads(value);
}

// ---------------------------------------------------------------------------
// Parsers for command-line and config-file text
// ---------------------------------------------------------------------------

const MULTIPLIER = /^(\d+(?:\.\d+)?|\.\d+)x$/;

/** Whether text is a CPU multiplier such as '2x' or '0.5x' */
export function isThreadMultiplier(text: string): text is `${number}x` {
	return MULTIPLIER.test(text);
}

function maxThreadsError(text: string): ConfigError {
	return new ConfigError(`Invalid max threads value '${text}'`, {
		hint: "Use 'default', 'unlimited', a positive number, or a CPU multiplier such as '0.5x'.",
	});
}

/**
 * Parse a max-threads value.
 *
 * `'default'` and `'0'` give null, `'unlimited'` gives -1, `'<n>x'` gives
 * n times the CPU count (at least 1), and a positive integer is taken as is.
 */
export function parseMaxThreads(text: string, cpuCount: number = cpus().length): number | null {
	const value = text.trim();
	if (value === 'default' || value === '0') return null;
	if (value === 'unlimited') return -1;

	const multiplier = MULTIPLIER.exec(value);
	if (multiplier) {
		const factor = Number(multiplier[1]);
		if (factor <= 0) throw maxThreadsError(text);
		return Math.max(1, Math.floor(factor * cpuCount));
	}

	if (/^\d+$/.test(value)) {
		const count = Number(value);
		if (count > 0) return count;
	}
	throw maxThreadsError(text);
}

const PARALLEL_MODES: readonly ParallelMode[] = ['none', 'collections', 'assemblies', 'all'];

function isParallelMode(value: string): value is ParallelMode {
	return PARALLEL_MODES.some((mode) => mode === value);
}

/** Parse a parallel mode, case-insensitively */
export function parseParallel(text: string): ParallelMode {
	const value = text.trim().toLowerCase();
	if (isParallelMode(value)) return value;
	throw new ConfigError(`Invalid parallel mode '${text}'`, {
		hint: `Use one of: ${PARALLEL_MODES.join(', ')}.`,
	});
}

/** Parse a `name=value` trait filter */
export function parseTrait(text: string): { name: string; value: string } {
	const separator = text.indexOf('=');
	const name = separator === -1 ? '' : text.slice(0, separator).trim();
	const value = separator === -1 ? '' : text.slice(separator + 1).trim();

	if (!name || !value || value.includes('=')) {
		throw new ConfigError(`Invalid trait filter '${text}'`, {
			hint: 'Traits are written as name=value, e.g. --trait category=fast',
		});
	}
	return { name, value };
}

/** Add one trait value to a trait map, ignoring duplicates */
export function addTrait(traits: Record<string, string[]>, name: string, value: string): void {
	const values = traits[name] ?? [];
	if (!values.includes(value)) values.push(value);
	traits[name] = values;
}
