// ============================================================================
// testwire - Command-Line Options
// Turns argv into a command, the workers to drive, and the overrides to
// apply on top of the config file.
// ============================================================================

import type { TransportKind } from 'testwire-engine';
import { ConfigError } from 'testwire-protocol';
import {
	type MaxThreads,
	type SettingsFilters,
	type UserSettings,
	addTrait,
	isThreadMultiplier,
	parseMaxThreads,
	parseParallel,
	parseTrait,
} from 'testwire-runner';

export type Command = 'find' | 'run';

export interface CliFlags {
	/** Filter and execution overrides, merged over the config file */
	settings: UserSettings;
	transport?: TransportKind;
	/** How long a worker has to connect, in ms */
	timeout?: number;
	/** How long a worker has to finish a find or run, in ms */
	runTimeout?: number;
	debug?: boolean;
	noColor?: boolean;
}

export type CliInvocation =
	| { kind: 'help' }
	| { kind: 'version' }
	| { kind: Command; workers: string[]; flags: CliFlags };

const TRANSPORTS: readonly TransportKind[] = ['ws', 'tcp', 'pipe'];

function isTransport(value: string): value is TransportKind {
	return TRANSPORTS.some((transport) => transport === value);
}

/**
 * Parse the arguments after the program name.
 *
 * @throws ConfigError for an unknown command or flag, or a flag without its value
 */
export function parseCliArgs(args: readonly string[]): CliInvocation {
	if (args.length === 0 || args.includes('--help') || args.includes('-h')) return { kind: 'help' };
	if (args.includes('--version') || args.includes('-v')) return { kind: 'version' };

	const [command, ...rest] = args;
	if (command !== 'find' && command !== 'run') {
		throw new ConfigError(`Unknown command: ${command}`, { hint: 'Run "testwire --help" for usage information.' });
	}

	const workers: string[] = [];
	const flags: CliFlags = { settings: {} };
	const filters: SettingsFilters = {
		includedClasses: [],
		excludedClasses: [],
		includedMethods: [],
		excludedMethods: [],
		includedNamespaces: [],
		excludedNamespaces: [],
		includedTraits: {},
		excludedTraits: {},
	};
	const settings = flags.settings;

	for (let i = 0; i < rest.length; i++) {
		const arg = rest[i];
		if (arg === undefined) continue;
		if (!arg.startsWith('-')) {
			workers.push(arg);
			continue;
		}

		const flag = arg.toLowerCase();
		const value = (): string => {
			const next = rest[i + 1];
			if (next === undefined || next.startsWith('-')) throw new ConfigError(`Missing value for ${arg}`);
			i++;
			return next;
		};

		switch (flag) {
			case '--class':
				filters.includedClasses.push(value());
				break;
			case '--noclass':
				filters.excludedClasses.push(value());
				break;
			case '--method':
				filters.includedMethods.push(value());
				break;
			case '--nomethod':
				filters.excludedMethods.push(value());
				break;
			case '--namespace':
				filters.includedNamespaces.push(value());
				break;
			case '--nonamespace':
				filters.excludedNamespaces.push(value());
				break;
			case '--trait': {
				const { name, value: traitValue } = parseTrait(value());
				addTrait(filters.includedTraits, name, traitValue);
				break;
			}
			case '--notrait': {
				const { name, value: traitValue } = parseTrait(value());
				addTrait(filters.excludedTraits, name, traitValue);
				break;
			}
			case '--parallel':
				settings.parallel = parseParallel(value());
				break;
			case '--maxthreads':
				settings.maxParallelThreads = maxThreadsFromText(value());
				break;
			case '--preenumeratetheories':
				settings.preEnumerateTheories = true;
				break;
			case '--culture':
				settings.culture = value();
				break;
			case '--diagnostics':
				settings.diagnosticMessages = true;
				break;
			case '--internaldiagnostics':
				settings.internalDiagnosticMessages = true;
				break;
			case '--stoponfail':
				settings.stopOnFail = true;
				break;
			case '--failskips':
				settings.failSkips = true;
				break;
			case '--transport': {
				const transport = value();
				if (!isTransport(transport)) {
					throw new ConfigError(`Invalid transport '${transport}'`, { hint: `Use one of: ${TRANSPORTS.join(', ')}.` });
				}
				flags.transport = transport;
				break;
			}
			case '--timeout':
				flags.timeout = parseMillis('timeout', value());
				break;
			case '--runtimeout':
				flags.runTimeout = parseMillis('run timeout', value());
				break;
			case '--debug':
				flags.debug = true;
				break;
			case '--nocolor':
				flags.noColor = true;
				break;
			default:
				throw new ConfigError(`Unknown option: ${arg}`, { hint: 'Run "testwire --help" for usage information.' });
		}
	}

	const anyFilter = Object.values(filters).some((entry) =>
		Array.isArray(entry) ? entry.length > 0 : Object.keys(entry).length > 0,
	);
	if (anyFilter) settings.filters = filters;

	return { kind: command, workers, flags };
}

/** Validate max-threads text and keep it in the form settings take */
function maxThreadsFromText(text: string): MaxThreads {
	const resolved = parseMaxThreads(text);
	const trimmed = text.trim();
	if (resolved === null) return 'default';
	if (resolved === -1) return 'unlimited';
	if (isThreadMultiplier(trimmed)) return trimmed;
	return resolved;
}

/**
 * Lay command-line settings over config-file settings.
 * Filter lists given on both are combined; everything else is replaced.
 */
export function mergeSettings(base: UserSettings, overrides: UserSettings): UserSettings {
	const merged: UserSettings = { ...base, ...overrides };
	if (base.filters || overrides.filters) {
		const from = base.filters ?? {};
		const to = overrides.filters ?? {};
		merged.filters = {
			includedClasses: [...(from.includedClasses ?? []), ...(to.includedClasses ?? [])],
			excludedClasses: [...(from.excludedClasses ?? []), ...(to.excludedClasses ?? [])],
			includedMethods: [...(from.includedMethods ?? []), ...(to.includedMethods ?? [])],
			excludedMethods: [...(from.excludedMethods ?? []), ...(to.excludedMethods ?? [])],
			includedNamespaces: [...(from.includedNamespaces ?? []), ...(to.includedNamespaces ?? [])],
			excludedNamespaces: [...(from.excludedNamespaces ?? []), ...(to.excludedNamespaces ?? [])],
			includedTraits: mergeTraits(from.includedTraits ?? {}, to.includedTraits ?? {}),
			excludedTraits: mergeTraits(from.excludedTraits ?? {}, to.excludedTraits ?? {}),
		};
	}
	return merged;
}

function mergeTraits(
	base: Record<string, string[]>,
	extra: Record<string, string[]>,
): Record<string, string[]> {
	const merged: Record<string, string[]> = {};
	for (const traits of [base, extra]) {
		for (const [name, values] of Object.entries(traits)) {
			for (const value of values) addTrait(merged, name, value);
		}
	}
	return merged;
}

function parseMillis(what: string, text: string): number {
	const millis = Number(text);
	if (!Number.isInteger(millis) || millis <= 0) {
		throw new ConfigError(`Invalid ${what} '${text}': expected a positive number of milliseconds`);
	}
	return millis;
}
