import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, dirname } from 'node:path';
import { SpawnError } from 'testwire-protocol';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ProcessSupervisor, type WorkerHandle } from './supervisor.js';

const supervisor = new ProcessSupervisor();
const running: WorkerHandle[] = [];

afterEach(() => {
	for (const handle of running.splice(0)) supervisor.kill(handle);
});

/** Launch node with an inline script; connection args land after `--` */
async function launch(script: string, connectionArgs: string[] = ['--tcp', '4000'], workingDirectory?: string) {
	const handle = await supervisor.spawn({
		executablePath: process.execPath,
		args: ['-e', script, '--'],
		connectionArgs,
		workingDirectory,
	});
	running.push(handle);
	return handle;
}

function exited(handle: WorkerHandle): Promise<WorkerHandle> {
	return new Promise((resolve) => supervisor.onExit(handle, resolve));
}

describe('ProcessSupervisor', () => {
	it('should refuse a missing executable', async () => {
		const error = await supervisor
			.spawn({ executablePath: '/nonexistent/worker', connectionArgs: ['--tcp', '4000'] })
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(SpawnError);
		expect(error).toMatchObject({ executablePath: '/nonexistent/worker' });
		expect(String(error)).toContain("Could not launch worker '/nonexistent/worker': executable not found");
	});

	it('should launch an executable named without a directory from PATH', async () => {
		const handle = await supervisor.spawn({
			executablePath: basename(process.execPath),
			args: ['-e', 'process.stdout.write(process.cwd())', '--'],
			connectionArgs: [],
			env: { ...process.env, PATH: dirname(process.execPath) },
		});
		running.push(handle);

		await vi.waitFor(() => expect(handle.stdout).not.toBe(''));
		expect(realpathSync(handle.stdout)).toBe(realpathSync(process.cwd()));
	});

	it('should refuse a bare command name that is not on PATH', async () => {
		await expect(
			supervisor.spawn({
				executablePath: 'testwire-no-such-worker',
				connectionArgs: [],
				env: { ...process.env, PATH: dirname(process.execPath) },
			}),
		).rejects.toThrow("Could not launch worker 'testwire-no-such-worker': executable not found");
	});

	it('should report an OS refusal as SpawnError', async () => {
		// The executable exists but the working directory does not
		await expect(
			supervisor.spawn({
				executablePath: process.execPath,
				connectionArgs: [],
				workingDirectory: '/nonexistent/dir',
			}),
		).rejects.toBeInstanceOf(SpawnError);
	});

	it('should record the process id, connection parameter and exit code', async () => {
		const handle = await launch('process.exit(3)');

		expect(handle.processId).toBeGreaterThan(0);
		expect(handle.connectionParam).toBe('--tcp 4000');
		await exited(handle);
		expect(handle.hasExited).toBe(true);
		expect(handle.exitCode).toBe(3);
		expect(handle.signal).toBeNull();
	});

	it('should pass the connection arguments to the worker', async () => {
		const handle = await launch('process.stdout.write(process.argv.slice(-2).join(" "))', ['--pipe', '/tmp/x.sock']);

		await vi.waitFor(() => expect(handle.stdout).toBe('--pipe /tmp/x.sock'));
	});

	it('should keep what the worker writes to stderr', async () => {
		const handle = await launch('process.stderr.write("boom"); setInterval(() => {}, 1000)');

		await vi.waitFor(() => expect(handle.stderr).toBe('boom'));
	});

	it('should default the working directory to the executable directory', async () => {
		const handle = await launch('process.stdout.write(process.cwd())');

		await vi.waitFor(() => expect(handle.stdout).not.toBe(''));
		expect(realpathSync(handle.stdout)).toBe(realpathSync(dirname(process.execPath)));
	});

	it('should honour an explicit working directory', async () => {
		const handle = await launch('process.stdout.write(process.cwd())', [], tmpdir());

		await vi.waitFor(() => expect(handle.stdout).not.toBe(''));
		expect(realpathSync(handle.stdout)).toBe(realpathSync(tmpdir()));
	});

	it('should stop a worker that honours the termination signal', async () => {
		const handle = await launch('process.stdout.write("ready"); setInterval(() => {}, 1000)');
		await vi.waitFor(() => expect(handle.stdout).toBe('ready'));

		await expect(supervisor.shutdown(handle, 5000)).resolves.toBe('exited');
		expect(handle.hasExited).toBe(true);
	});

	it('should not signal a worker that has already exited', async () => {
		const handle = await launch('process.exit(0)');
		await exited(handle);

		await expect(supervisor.shutdown(handle, 100)).resolves.toBe('exited');
		expect(handle.signal).toBeNull();
	});

	it('should report a timeout without killing a worker that ignores the signal', async () => {
		const handle = await launch(
			'process.on("SIGTERM", () => {}); process.stdout.write("ready"); setInterval(() => {}, 1000)',
		);
		await vi.waitFor(() => expect(handle.stdout).toBe('ready'));

		// Windows has no catchable SIGTERM: the signal always ends the process
		if (process.platform === 'win32') {
			await expect(supervisor.shutdown(handle, 5000)).resolves.toBe('exited');
			return;
		}

		await expect(supervisor.shutdown(handle, 200)).resolves.toBe('timed-out');
		expect(handle.hasExited).toBe(false);

		// Escalation is the caller's decision
		supervisor.kill(handle);
		await exited(handle);
		expect(handle.signal).toBe('SIGKILL');
	});

	it('should reject handles it did not launch', () => {
		const foreign: WorkerHandle = {
			processId: 1,
			connectionParam: '',
			startedAt: 0,
			hasExited: false,
			exitCode: undefined,
			signal: null,
			stdout: '',
			stderr: '',
		};
		expect(() => supervisor.kill(foreign)).toThrow('Worker 1 was not launched by this supervisor');
	});
});
