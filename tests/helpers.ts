import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {formatCommand} from '../src/core/command.js';
import {resolveSystemLayout, type Environment} from '../src/core/config.js';
import type {
	CommandOptions,
	CommandResult,
	CommandRunner,
	Prompter,
	Reporter,
	SystemLayout,
} from '../src/core/types.js';

export const HOME = 'Users/tester';

export const makeTemporaryRoot = async (): Promise<string> =>
	fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'pw-prune-')));

export const writeBytes = async (
	filePath: string,
	size: number,
	mode?: number,
): Promise<void> => {
	await fs.mkdir(path.dirname(filePath), {recursive: true});
	await fs.writeFile(filePath, Buffer.alloc(size, 1));
	if (mode !== undefined) await fs.chmod(filePath, mode);
};

export const exists = async (targetPath: string): Promise<boolean> => {
	try {
		await fs.lstat(targetPath);
		return true;
	} catch {
		return false;
	}
};

export const createTestLayout = (
	root: string,
	env: Environment = {},
): SystemLayout =>
	resolveSystemLayout({
		env,
		rootDirectory: root,
		homeDirectory: path.join(root, HOME),
		workingDirectory: path.join(root, 'work'),
	});

type ReporterLevel = keyof Reporter;

export interface RecordedLine {
	level: ReporterLevel;
	message: string;
	title?: string;
}

export type RecordingReporter = Reporter & {
	lines: RecordedLine[];
	messagesAt: (level: ReporterLevel) => string[];
};

export const createRecordingReporter = (): RecordingReporter => {
	const lines: RecordedLine[] = [];
	const record =
		(level: ReporterLevel) =>
		(message: string): void => {
			lines.push({level, message});
		};

	return {
		lines,
		messagesAt: level =>
			lines.filter(line => line.level === level).map(line => line.message),
		info: record('info'),
		success: record('success'),
		step: record('step'),
		warn: record('warn'),
		error: record('error'),
		message: record('message'),
		note(message, title) {
			lines.push({level: 'note', message, title});
		},
	};
};

export interface RecordedCall {
	command: string;
	args: string[];
	options: CommandOptions;
}

export type FakeRunner = CommandRunner & {
	calls: RecordedCall[];
	commandLines: () => string[];
};

/**
 * In-process stand-in for external commands. Commands not listed in
 * `executables` fail like a missing binary; listed commands without a
 * scripted response succeed with empty output.
 */
export const createFakeRunner = ({
	executables = [],
	responses = {},
}: {
	executables?: string[];
	responses?: Record<string, Partial<CommandResult>>;
} = {}): FakeRunner => {
	const calls: RecordedCall[] = [];
	return {
		calls,
		commandLines: () => calls.map(call => formatCommand(call.command, call.args)),
		async hasExecutable(command) {
			return executables.includes(command);
		},
		async run(command, args, options = {}) {
			calls.push({command, args: [...args], options});
			if (!executables.includes(command)) {
				return {
					ok: false,
					exitCode: null,
					stdout: '',
					stderr: '',
					error: `spawn ${command} ENOENT`,
				};
			}

			const response = responses[formatCommand(command, args)] ?? {};
			const ok = response.ok ?? true;
			return {
				ok,
				exitCode: response.exitCode ?? (ok ? 0 : 1),
				stdout: response.stdout ?? '',
				stderr: response.stderr ?? '',
				...(response.error === undefined ? {} : {error: response.error}),
			};
		},
	};
};

export type ScriptedPrompter = Prompter & {asked: string[]};

export const createScriptedPrompter = ({
	texts = [],
	confirms = [],
	selects = [],
}: {
	texts?: Array<string | null>;
	confirms?: boolean[];
	selects?: Array<string | null>;
} = {}): ScriptedPrompter => {
	const asked: string[] = [];
	const pendingTexts = [...texts];
	const pendingConfirms = [...confirms];
	const pendingSelects = [...selects];

	return {
		asked,
		async text(message) {
			asked.push(message);
			return pendingTexts.shift() ?? null;
		},
		async confirm(message) {
			asked.push(message);
			return pendingConfirms.shift() ?? false;
		},
		async select(message) {
			asked.push(message);
			return pendingSelects.shift() ?? null;
		},
	};
};

export const instantCountdown =
	(completes = true) =>
	async (): Promise<boolean> =>
		completes;
