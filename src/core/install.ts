import fs from 'node:fs/promises';
import path from 'node:path';
import {runCleanup, type Countdown} from './cleanup.js';
import {formatCommand, npxArgs} from './command.js';
import {TOOLKIT_NAME, TOOLKIT_PACKAGES, matchesToolkitPackage} from './config.js';
import {human} from './format.js';
import {directoryExists, pathExists, sizeOf} from './scanner.js';
import {BROWSER_NAMES, reportVerification, verifyInstallation} from './verify.js';
import type {
	BrowserName,
	CommandRunner,
	Prompter,
	Reporter,
	SelectOption,
	SystemLayout,
} from './types.js';

export const MINIMUM_NODE_VERSION = '16.0.0';
export const MINIMUM_NPM_VERSION = '7.0.0';
export const DEFAULT_BROWSERS: readonly BrowserName[] = ['chromium'];

export type BrowserSelection =
	| {kind: 'prompt'}
	| {kind: 'list'; browsers: BrowserName[]};

export type BrowserListResult =
	| {ok: true; selection: BrowserSelection; unknown: string[]}
	| {ok: false; error: string; unknown: string[]};

export type InstallTarget =
	| {scope: 'global'}
	| {scope: 'local'; directory: string};

export interface InstallOptions {
	local: boolean;
	projectDirectory?: string;
	browsers: BrowserSelection;
	checkOnly: boolean;
	skipCleanup: boolean;
}

export interface InstallContext {
	layout: SystemLayout;
	runner: CommandRunner;
	reporter: Reporter;
	prompter: Prompter;
	countdown: Countdown;
}

export interface PrerequisiteReport {
	ok: boolean;
	nodeVersion: string | null;
	npmVersion: string | null;
}

export interface ExistingInstallation {
	found: boolean;
	browserCache: {path: string; sizeBytes: number} | null;
	globalPackage: boolean;
	projectDependency: boolean;
}

type BrowserPreset = 'chromium' | 'chromium-firefox' | 'chromium-webkit' | 'all';

const BROWSER_PRESETS: Record<BrowserPreset, BrowserName[]> = {
	chromium: ['chromium'],
	'chromium-firefox': ['chromium', 'firefox'],
	'chromium-webkit': ['chromium', 'webkit'],
	all: [...BROWSER_NAMES],
};

const BROWSER_PRESET_OPTIONS: Array<SelectOption & {value: BrowserPreset}> = [
	{value: 'chromium', label: 'Chromium only', hint: 'Fastest'},
	{value: 'chromium-firefox', label: 'Chromium + Firefox'},
	{value: 'chromium-webkit', label: 'Chromium + WebKit'},
	{value: 'all', label: 'All browsers'},
];

const QUICK_START = [
	'npx playwright test             Run the test suite',
	'npx playwright test --ui        Open the UI mode runner',
	'npx playwright codegen <url>    Record a new test',
	'npx playwright show-report      Open the last HTML report',
].join('\n');

const isBrowserName = (value: string): value is BrowserName =>
	BROWSER_NAMES.some(browser => browser === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export const parseVersion = (output: string): string | null =>
	/\d+(?:\.\d+)*/.exec(output)?.[0] ?? null;

/** Dotted numeric comparison; missing parts count as 0. */
export const compareVersions = (left: string, right: string): number => {
	const leftParts = left.split('.').map(part => Number.parseInt(part, 10) || 0);
	const rightParts = right.split('.').map(part => Number.parseInt(part, 10) || 0);
	const length = Math.max(leftParts.length, rightParts.length);
	for (let index = 0; index < length; index++) {
		const difference = (leftParts[index] ?? 0) - (rightParts[index] ?? 0);
		if (difference !== 0) return difference > 0 ? 1 : -1;
	}
	return 0;
};

export const parseBrowserList = (
	value: string | undefined,
): BrowserListResult => {
	if (value === undefined) {
		return {
			ok: true,
			selection: {kind: 'list', browsers: [...DEFAULT_BROWSERS]},
			unknown: [],
		};
	}

	const normalized = value.trim().toLowerCase();
	if (normalized === 'prompt') {
		return {ok: true, selection: {kind: 'prompt'}, unknown: []};
	}
	if (normalized === 'all') {
		return {
			ok: true,
			selection: {kind: 'list', browsers: [...BROWSER_NAMES]},
			unknown: [],
		};
	}

	const browsers: BrowserName[] = [];
	const unknown: string[] = [];
	for (const token of normalized.split(/[\s,]+/)) {
		if (!token) continue;
		if (!isBrowserName(token)) {
			unknown.push(token);
			continue;
		}
		if (!browsers.includes(token)) browsers.push(token);
	}

	if (browsers.length === 0) {
		return {
			ok: false,
			error: `No valid browsers in "${value}". Expected: ${BROWSER_NAMES.join(', ')}, all or prompt.`,
			unknown,
		};
	}

	return {ok: true, selection: {kind: 'list', browsers}, unknown};
};

export const parseProjectDirectory = (
	value: string | undefined,
): {ok: true; directory: string | undefined} | {ok: false; error: string} => {
	if (value === undefined) return {ok: true, directory: undefined};
	const directory = value.trim();
	return directory
		? {ok: true, directory}
		: {ok: false, error: '--project needs a directory.'};
};

export const resolveInstallTarget = (
	options: Pick<InstallOptions, 'local' | 'projectDirectory'>,
	workingDirectory: string,
): InstallTarget => {
	if (options.projectDirectory) {
		return {
			scope: 'local',
			directory: path.resolve(workingDirectory, options.projectDirectory),
		};
	}
	return options.local
		? {scope: 'local', directory: workingDirectory}
		: {scope: 'global'};
};

const checkMinimumVersion = async (
	runner: CommandRunner,
	reporter: Reporter,
	command: string,
	minimum: string,
): Promise<string | null> => {
	if (!(await runner.hasExecutable(command))) {
		reporter.error(`${command} not found on PATH (${minimum} or later is required).`);
		return null;
	}

	const result = await runner.run(command, ['--version']);
	const version = result.ok ? parseVersion(result.stdout) : null;
	if (!version) {
		reporter.error(`Could not read the ${command} version.`);
		return null;
	}
	if (compareVersions(version, minimum) < 0) {
		reporter.error(`${command} ${version} is too old; ${minimum} or later is required.`);
		return null;
	}

	reporter.success(`${command} ${version}`);
	return version;
};

export const checkPrerequisites = async (
	runner: CommandRunner,
	reporter: Reporter,
): Promise<PrerequisiteReport> => {
	const nodeVersion = await checkMinimumVersion(
		runner,
		reporter,
		'node',
		MINIMUM_NODE_VERSION,
	);
	const npmVersion = await checkMinimumVersion(
		runner,
		reporter,
		'npm',
		MINIMUM_NPM_VERSION,
	);

	const xcode = await runner.run('xcode-select', ['-p']);
	if (xcode.ok) {
		reporter.success('Xcode Command Line Tools');
	} else {
		reporter.warn(
			'Xcode Command Line Tools not found. Some browsers may need them (xcode-select --install).',
		);
	}

	return {ok: nodeVersion !== null && npmVersion !== null, nodeVersion, npmVersion};
};

const readManifestDependsOnToolkit = async (
	directory: string,
): Promise<boolean> => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(
			await fs.readFile(path.join(directory, 'package.json'), 'utf8'),
		);
	} catch {
		return false;
	}
	if (!isRecord(parsed)) return false;

	for (const key of ['dependencies', 'devDependencies']) {
		const dependencies = parsed[key];
		if (isRecord(dependencies) && Object.keys(dependencies).some(matchesToolkitPackage)) {
			return true;
		}
	}
	return false;
};

export const detectExistingInstallation = async (
	layout: Pick<SystemLayout, 'browsersPath'>,
	runner: CommandRunner,
	projectDirectory: string,
): Promise<ExistingInstallation> => {
	const browserCache = (await directoryExists(layout.browsersPath))
		? {path: layout.browsersPath, sizeBytes: await sizeOf(layout.browsersPath)}
		: null;

	const globalList = await runner.run('npm', ['list', '-g', '--depth=0']);
	const globalPackage = globalList.stdout.toLowerCase().includes(TOOLKIT_NAME);
	const projectDependency = await readManifestDependsOnToolkit(projectDirectory);

	return {
		found: browserCache !== null || globalPackage || projectDependency,
		browserCache,
		globalPackage,
		projectDependency,
	};
};

const reportExistingInstallation = (
	existing: ExistingInstallation,
	reporter: Reporter,
): void => {
	if (!existing.found) {
		reporter.info('No existing Playwright installation found.');
		return;
	}

	const lines: string[] = [];
	if (existing.browserCache) {
		lines.push(
			`Browser cache: ${existing.browserCache.path} (${human(existing.browserCache.sizeBytes)})`,
		);
	}
	if (existing.globalPackage) lines.push('Global npm package installed');
	if (existing.projectDependency) lines.push('Listed in package.json');
	reporter.note(lines.join('\n'), 'Existing installation');
};

const runStep = async (
	context: Pick<InstallContext, 'runner' | 'reporter'>,
	command: string,
	args: readonly string[],
	cwd?: string,
): Promise<boolean> => {
	const label = formatCommand(command, args);
	context.reporter.step(label);
	const result = await context.runner.run(command, args, {
		cwd,
		inheritOutput: true,
	});
	if (!result.ok) {
		context.reporter.error(`${label} failed${result.error ? `: ${result.error}` : ''}`);
	}
	return result.ok;
};

export const browserInstallArgs = (browsers: readonly BrowserName[]): string[] => {
	const installsAll = BROWSER_NAMES.every(browser => browsers.includes(browser));
	return [
		'playwright',
		'install',
		'--with-deps',
		...(installsAll ? [] : browsers),
	];
};

export const installToolkit = async (
	target: InstallTarget,
	context: Pick<InstallContext, 'runner' | 'reporter'>,
): Promise<boolean> => {
	if (target.scope === 'global') {
		return runStep(context, 'npm', ['install', '-g', ...TOOLKIT_PACKAGES]);
	}

	if (!(await pathExists(path.join(target.directory, 'package.json')))) {
		const initialized = await runStep(context, 'npm', ['init', '-y'], target.directory);
		if (!initialized) return false;
	}

	return runStep(
		context,
		'npm',
		['install', '-D', ...TOOLKIT_PACKAGES],
		target.directory,
	);
};

const resolveBrowsers = async (
	selection: BrowserSelection,
	prompter: Prompter,
): Promise<BrowserName[] | null> => {
	if (selection.kind === 'list') return selection.browsers;

	const answer = await prompter.select(
		'Which browsers should be installed?',
		BROWSER_PRESET_OPTIONS,
		'chromium',
	);
	const preset = BROWSER_PRESET_OPTIONS.find(option => option.value === answer);
	return preset ? BROWSER_PRESETS[preset.value] : null;
};

const offerCleanup = async (
	context: InstallContext,
): Promise<void> => {
	const accepted = await context.prompter.confirm(
		'Remove the existing installation before reinstalling?',
	);
	if (!accepted) {
		context.reporter.info('Keeping the existing installation.');
		return;
	}

	await runCleanup({...context, dryRun: false});
};

export const runInstall = async (
	options: InstallOptions,
	context: InstallContext,
): Promise<number> => {
	const {reporter, runner, layout} = context;
	const target = resolveInstallTarget(options, layout.workingDirectory);
	const workingDirectory =
		target.scope === 'local' ? target.directory : layout.workingDirectory;

	reporter.step('Checking prerequisites');
	if (target.scope === 'local' && !(await directoryExists(target.directory))) {
		reporter.error(`Project directory does not exist: ${target.directory}`);
		return 1;
	}

	const prerequisites = await checkPrerequisites(runner, reporter);
	if (!prerequisites.ok) {
		reporter.error('Prerequisites not met.');
		return 1;
	}

	const existing = await detectExistingInstallation(layout, runner, workingDirectory);
	reportExistingInstallation(existing, reporter);

	if (options.checkOnly) {
		reporter.success('Prerequisite check passed.');
		return 0;
	}

	if (existing.found && !options.skipCleanup) {
		await offerCleanup(context);
	}

	const browsers = await resolveBrowsers(options.browsers, context.prompter);
	if (!browsers) {
		reporter.info('Installation cancelled.');
		return 0;
	}

	reporter.step(
		target.scope === 'global'
			? 'Installing Playwright globally'
			: `Installing Playwright in ${target.directory}`,
	);
	if (!(await installToolkit(target, context))) return 1;

	reporter.step(`Installing browsers: ${browsers.join(', ')}`);
	if (!(await runStep(context, 'npx', browserInstallArgs(browsers), workingDirectory))) {
		return 1;
	}

	reporter.step('Verifying installation');
	const verification = await verifyInstallation({
		layout,
		runner,
		browsers,
		cwd: workingDirectory,
	});
	reportVerification(verification, reporter);
	if (!verification.ok) {
		reporter.error('Verification failed: Playwright is not invokable.');
		return 1;
	}

	const listing = await runner.run('npx', npxArgs('playwright', 'install', '--list'), {
		cwd: workingDirectory,
	});
	if (listing.ok && listing.stdout.trim()) {
		reporter.note(listing.stdout.trim(), 'Installed browsers');
	}

	reporter.note(QUICK_START, 'Quick start');
	return 0;
};
