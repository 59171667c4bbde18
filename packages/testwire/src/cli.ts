#!/usr/bin/env node
// ============================================================================
// testwire - CLI
// The command-line interface for discovering and running tests in
// out-of-process workers.
//
// testwire find ./bin/unit-tests            # List the tests a worker has
// testwire run ./bin/unit-tests             # Run them
// testwire run ./bin/a ./bin/b --parallel all
// testwire --help                           # Show help
// ============================================================================

import { TestwireError, toError } from 'testwire-protocol';
import type { TestAssembly } from 'testwire-runner';
import { type CliFlags, type Command, mergeSettings, parseCliArgs } from './cli-options.js';
import { type TestwireConfig, configuredSettings, configuredWorkers, loadConfig, resolveExecutable } from './config.js';
import { ConsoleReporter } from './reporter.js';
import { runSession } from './session.js';

const VERSION = '0.1.0';

async function main(): Promise<number> {
	const invocation = parseCliArgs(process.argv.slice(2));

	switch (invocation.kind) {
		case 'help':
			printHelp();
			return 0;
		case 'version':
			console.log(`testwire v${VERSION}`);
			return 0;
		default:
			return runCommand(invocation.kind, invocation.workers, invocation.flags);
	}
}

// ---------------------------------------------------------------------------
// find / run
// ---------------------------------------------------------------------------

async function runCommand(command: Command, workerPaths: string[], flags: CliFlags): Promise<number> {
	const loaded = await loadConfig();
	const config: TestwireConfig = loaded?.config ?? {};

	// Workers named on the command line replace the configured ones
	const workers: TestAssembly[] =
		workerPaths.length > 0
			? workerPaths.map((path) => ({ executablePath: resolveExecutable(process.cwd(), path) }))
			: loaded
				? configuredWorkers(loaded)
				: [];
	if (workers.length === 0) {
		throw new TestwireError('No workers to run', {
			hint: 'Name worker executables on the command line or list them under "workers" in testwire.config.json.',
		});
	}

	const settings = mergeSettings(configuredSettings(config), flags.settings);
	const reporter = new ConsoleReporter({ color: !flags.noColor && !process.env.NO_COLOR && process.stdout.isTTY });

	const { exitCode } = await runSession({
		command,
		workers,
		settings,
		reporter,
		controller: {
			transport: flags.transport ?? config.transport,
			readyTimeoutMs: flags.timeout ?? config.timeout,
			handshakeTimeoutMs: flags.timeout ?? config.timeout,
			debug: flags.debug ?? config.debug,
			workerDiagnostics: settings.diagnosticMessages,
			internalDiagnostics: settings.internalDiagnosticMessages,
		},
		operationTimeoutMs: flags.runTimeout ?? config.runTimeout,
		shutdownGraceMs: config.shutdownGrace,
	});
	return exitCode;
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

function printHelp() {
	console.log(`
  testwire v${VERSION} -- out-of-process test runner

  Usage:
    testwire find [workers...] [options]
    testwire run [workers...] [options]

  Commands:
    find          Discover the tests each worker has
    run           Discover and run tests

  Filters (repeatable):
    --class <name>            Only tests in this class
    --noclass <name>          Leave out tests in this class
    --method <name>           Only this test method
    --nomethod <name>         Leave out this test method
    --namespace <name>        Only tests in this namespace
    --nonamespace <name>      Leave out tests in this namespace
    --trait <name=value>      Only tests with this trait
    --notrait <name=value>    Leave out tests with this trait

  Execution:
    --parallel <mode>         none, collections, assemblies or all (default: none)
    --maxthreads <n>          default, unlimited, a number, or a CPU multiplier like 0.5x
    --preenumeratetheories    Expand data-driven tests during discovery
    --culture <name>          default, invariant, or a culture name
    --stoponfail              Stop a worker's run after its first failure
    --failskips               Treat skipped tests as failures

  Runner:
    --transport <kind>        ws, tcp or pipe (default: ws)
    --timeout <ms>            How long a worker has to connect (default: 30000)
    --runtimeout <ms>         How long a worker has to finish (default: 600000)
    --diagnostics             Show the workers' diagnostic messages
    --internaldiagnostics     Show the workers' internal diagnostic messages
    --debug                   Trace every frame sent and received
    --nocolor                 Plain output
    -h, --help                Show this help message
    -v, --version             Show version

  Workers default to the "workers" list in testwire.config.json
  (or testwire.config.js / testwire.config.mjs).

  Examples:
    testwire find ./bin/unit-tests
    testwire run ./bin/unit-tests --trait category=fast
    testwire run ./bin/api-tests ./bin/db-tests --parallel assemblies
    testwire run --class Checkout --stoponfail --transport tcp
`);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err: unknown) => {
		console.error(`Error: ${toError(err).message}`);
		process.exitCode = 1;
	});
