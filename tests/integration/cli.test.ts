import process from 'node:process';
import {expect, test} from 'vitest';
import {createCommandRunner} from '../../src/core/command.js';

const runner = createCommandRunner();

const runCli = async (entry: string, args: string[]) =>
	runner.run(process.execPath, ['--import', 'tsx', entry, ...args], {
		cwd: process.cwd(),
		timeoutMs: 25_000,
	});

test('cli --version prints the package version', async () => {
	const result = await runCli('src/cli.ts', ['--version']);

	expect(result.ok).toBe(true);
	expect(result.stdout.trim()).toBe('1.0.0');
});

test('cli --help prints usage', async () => {
	const result = await runCli('src/cli.ts', ['--help']);

	expect(result.ok).toBe(true);
	expect(result.stdout).toContain('$ playwright-prune [options]');
});

test('cli rejects an unknown option', async () => {
	const result = await runCli('src/cli.ts', ['--bogus']);

	expect(result.exitCode).toBe(1);
	expect(result.stderr).toContain('Unknown option: --bogus');
});

test('installer rejects an unknown option', async () => {
	const result = await runCli('src/install-cli.ts', ['--browser', 'chromium']);

	expect(result.exitCode).toBe(1);
	expect(result.stderr).toContain('Unknown options: --browser, chromium');
});

test('trace finder --version prints the package version', async () => {
	const result = await runCli('src/traces-cli.ts', ['--version']);

	expect(result.ok).toBe(true);
	expect(result.stdout.trim()).toBe('1.0.0');
});
