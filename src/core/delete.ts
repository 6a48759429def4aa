import fs from 'node:fs/promises';
import path from 'node:path';
import {formatCommand, npxArgs, toErrorMessage} from './command.js';
import {TOOLKIT_NAME} from './config.js';
import {PACKAGE_MANAGER_COMMANDS} from './locator.js';
import {pathExists} from './scanner.js';
import type {
	CommandRunner,
	DeleteResult,
	PackageCandidate,
	PathCandidate,
} from './types.js';

export const OFFICIAL_UNINSTALL_COMMAND = {
	command: 'npx',
	args: npxArgs(TOOLKIT_NAME, 'uninstall', '--all'),
};

const hasToolkitCli = async (
	runner: CommandRunner,
	workingDirectory: string,
): Promise<boolean> =>
	(await runner.hasExecutable(TOOLKIT_NAME)) ||
	pathExists(path.join(workingDirectory, 'node_modules', '.bin', TOOLKIT_NAME));

export const deleteItem = async (
	item: Pick<PathCandidate, 'path'>,
): Promise<DeleteResult> => {
	try {
		await fs.rm(item.path, {recursive: true, force: true});
		return {path: item.path, ok: true};
	} catch (error) {
		return {path: item.path, ok: false, error: toErrorMessage(error)};
	}
};

export const uninstallCommand = (
	candidate: Pick<PackageCandidate, 'packageManager' | 'packageName'>,
): {command: string; args: string[]} => ({
	command: candidate.packageManager,
	args: PACKAGE_MANAGER_COMMANDS[candidate.packageManager].uninstall(
		candidate.packageName,
	),
});

export const describeUninstall = (
	candidate: Pick<PackageCandidate, 'packageManager' | 'packageName'>,
): string => {
	const {command, args} = uninstallCommand(candidate);
	return formatCommand(command, args);
};

export const uninstallPackage = async (
	candidate: Pick<PackageCandidate, 'packageManager' | 'packageName'>,
	runner: CommandRunner,
): Promise<DeleteResult> => {
	const {command, args} = uninstallCommand(candidate);
	const result = await runner.run(command, args);
	const label = formatCommand(command, args);
	if (result.ok) return {path: label, ok: true};

	return {
		path: label,
		ok: false,
		error: result.stderr.trim() || result.error || 'uninstall failed',
	};
};

export const canRunOfficialUninstall = async (
	runner: CommandRunner,
	workingDirectory: string,
): Promise<boolean> =>
	(await runner.hasExecutable(OFFICIAL_UNINSTALL_COMMAND.command)) &&
	hasToolkitCli(runner, workingDirectory);

export const runOfficialUninstall = async (
	runner: CommandRunner,
	workingDirectory: string,
): Promise<DeleteResult | null> => {
	if (!(await canRunOfficialUninstall(runner, workingDirectory))) return null;

	const label = formatCommand(
		OFFICIAL_UNINSTALL_COMMAND.command,
		OFFICIAL_UNINSTALL_COMMAND.args,
	);
	const result = await runner.run(
		OFFICIAL_UNINSTALL_COMMAND.command,
		OFFICIAL_UNINSTALL_COMMAND.args,
		{cwd: workingDirectory},
	);
	if (result.ok) return {path: label, ok: true};

	return {path: label, ok: false, error: result.error ?? 'uninstall failed'};
};
