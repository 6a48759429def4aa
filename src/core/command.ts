import {execFile, spawn} from 'node:child_process';
import {constants} from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import type {Environment} from './config.js';
import type {CommandOptions, CommandResult, CommandRunner} from './types.js';

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_BUFFER_BYTES = 32 * 1024 * 1024;

export const toErrorMessage = (error: unknown): string =>
	String(error instanceof Error ? error.message : error);

const isExecutableFile = async (candidatePath: string): Promise<boolean> => {
	try {
		const stat = await fs.stat(candidatePath);
		if (!stat.isFile()) return false;
		await fs.access(candidatePath, constants.X_OK);
		return true;
	} catch {
		return false;
	}
};

export const findExecutable = async (
	command: string,
	searchPath: string | undefined,
): Promise<string | null> => {
	if (command.includes('/')) {
		return (await isExecutableFile(command)) ? path.resolve(command) : null;
	}

	for (const directory of (searchPath ?? '').split(path.delimiter)) {
		if (!directory) continue;
		const candidatePath = path.join(directory, command);
		// eslint-disable-next-line no-await-in-loop
		if (await isExecutableFile(candidatePath)) return candidatePath;
	}

	return null;
};

const runCaptured = async (
	command: string,
	args: readonly string[],
	options: CommandOptions,
	env: Environment,
): Promise<CommandResult> =>
	new Promise(resolve => {
		execFile(
			command,
			[...args],
			{
				cwd: options.cwd,
				env,
				encoding: 'utf8',
				maxBuffer: MAX_BUFFER_BYTES,
				timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			},
			(error, stdout, stderr) => {
				if (!error) {
					resolve({ok: true, exitCode: 0, stdout, stderr});
					return;
				}

				resolve({
					ok: false,
					exitCode: typeof error.code === 'number' ? error.code : null,
					stdout,
					stderr,
					error: toErrorMessage(error),
				});
			},
		);
	});

const runInherited = async (
	command: string,
	args: readonly string[],
	options: CommandOptions,
	env: Environment,
): Promise<CommandResult> =>
	new Promise(resolve => {
		const child = spawn(command, [...args], {
			cwd: options.cwd,
			env,
			stdio: 'inherit',
		});

		child.once('error', error => {
			resolve({
				ok: false,
				exitCode: null,
				stdout: '',
				stderr: '',
				error: toErrorMessage(error),
			});
		});
		child.once('close', code => {
			resolve({
				ok: code === 0,
				exitCode: code,
				stdout: '',
				stderr: '',
				...(code === 0 ? {} : {error: `${command} exited with code ${code}`}),
			});
		});
	});

export const createCommandRunner = (
	env: Environment = process.env,
): CommandRunner => ({
	run: async (command, args, options = {}) =>
		options.inheritOutput
			? runInherited(command, args, options, env)
			: runCaptured(command, args, options, env),
	hasExecutable: async command =>
		(await findExecutable(command, env.PATH)) !== null,
});

// `npx --no` fails instead of fetching a package that is not installed.
export const npxArgs = (...args: string[]): string[] => ['--no', ...args];

export const formatCommand = (
	command: string,
	args: readonly string[],
): string => [command, ...args].join(' ');
