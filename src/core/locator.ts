import fs from 'node:fs/promises';
import type {Dirent} from 'node:fs';
import path from 'node:path';
import {normalizeAbsolutePath} from './classifier.js';
import {
	GLOBAL_PACKAGE_DIRECTORIES,
	TOOLKIT_NAME,
	homePath,
	matchesToolkitPackage,
	systemPath,
} from './config.js';
import {
	DEFAULT_RESULT_CAP,
	searchByName,
	type EntryKind,
} from './scanner.js';
import type {
	Candidate,
	CommandRunner,
	PackageCandidate,
	PackageManager,
	PathCandidate,
	SystemLayout,
} from './types.js';

export interface KnownLocation {
	path: string;
	description: string;
}

export interface SearchRoot {
	root: string;
	description: string;
	patterns: readonly string[];
	maxDepth: number;
	entryKind: EntryKind;
	maxResults: number;
}

export interface PackageManagerCommands {
	list: readonly string[];
	uninstall: (packageName: string) => string[];
	parse: (stdout: string) => string[];
}

export interface DiscoveryResult {
	candidates: Candidate[];
	skippedSources: string[];
	truncatedRoots: string[];
}

export const SYMLINK_LOCATIONS: ReadonlyArray<
	[base: 'home' | 'root', relativePath: string]
> = [
	['root', '/usr/local/bin/playwright'],
	['root', '/opt/homebrew/bin/playwright'],
	['home', '.yarn/bin/playwright'],
	['home', 'Library/pnpm/playwright'],
];

const TOOLKIT_PATTERNS = [TOOLKIT_NAME] as const;
const SYSTEM_TEMP_PATTERNS = ['org.webkit.playwright', 'ms-playwright'] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const parseJson = (content: string): unknown => {
	try {
		return JSON.parse(content);
	} catch {
		return undefined;
	}
};

const listDependencyNames = (value: unknown): string[] => {
	if (!isRecord(value)) return [];
	const names: string[] = [];
	for (const key of ['dependencies', 'devDependencies']) {
		const dependencies = value[key];
		if (isRecord(dependencies)) names.push(...Object.keys(dependencies));
	}
	return names;
};

const uniqueToolkitPackages = (names: Iterable<string>): string[] => {
	const unique = new Set<string>();
	for (const name of names) {
		if (matchesToolkitPackage(name)) unique.add(name.trim());
	}
	return [...unique].sort((left, right) => left.localeCompare(right));
};

export const parseNpmGlobalList = (stdout: string): string[] =>
	uniqueToolkitPackages(listDependencyNames(parseJson(stdout)));

export const parsePnpmGlobalList = (stdout: string): string[] => {
	const parsed = parseJson(stdout);
	const projects = Array.isArray(parsed) ? parsed : [parsed];
	return uniqueToolkitPackages(projects.flatMap(listDependencyNames));
};

const YARN_PACKAGE_LINE = /^info "((?:@[^/"]+\/)?[^@"]+)@[^"]*"/;

export const parseYarnGlobalList = (stdout: string): string[] => {
	const names: string[] = [];
	for (const line of stdout.split(/\r?\n/)) {
		const match = YARN_PACKAGE_LINE.exec(line.trim());
		if (match?.[1]) names.push(match[1]);
	}
	return uniqueToolkitPackages(names);
};

export const PACKAGE_MANAGER_COMMANDS: Record<
	PackageManager,
	PackageManagerCommands
> = {
	npm: {
		list: ['list', '-g', '--depth=0', '--json'],
		uninstall: packageName => ['uninstall', '-g', packageName],
		parse: parseNpmGlobalList,
	},
	yarn: {
		list: ['global', 'list'],
		uninstall: packageName => ['global', 'remove', packageName],
		parse: parseYarnGlobalList,
	},
	pnpm: {
		list: ['list', '-g', '--depth=0', '--json'],
		uninstall: packageName => ['remove', '-g', packageName],
		parse: parsePnpmGlobalList,
	},
};

export const PACKAGE_MANAGERS: readonly PackageManager[] = [
	'npm',
	'yarn',
	'pnpm',
];

const listDirectoryEntries = async (directory: string): Promise<Dirent[]> => {
	try {
		return await fs.readdir(directory, {withFileTypes: true});
	} catch {
		return [];
	}
};

export const listNvmModuleDirectories = async (
	layout: Pick<SystemLayout, 'nvmDirectory'>,
): Promise<Array<{version: string; directory: string}>> => {
	const versionsDirectory = path.join(layout.nvmDirectory, 'versions', 'node');
	const entries = await listDirectoryEntries(versionsDirectory);
	return entries
		.filter(entry => entry.isDirectory())
		.map(entry => ({
			version: entry.name,
			directory: path.join(versionsDirectory, entry.name, 'lib', 'node_modules'),
		}))
		.sort((left, right) => left.version.localeCompare(right.version));
};

const globalPackageLocations = (
	modulesDirectory: string,
	description: string,
): KnownLocation[] =>
	GLOBAL_PACKAGE_DIRECTORIES.map(packageDirectory => ({
		path: path.join(modulesDirectory, packageDirectory),
		description: `${description}: ${packageDirectory}`,
	}));

export const buildKnownLocations = async (
	layout: SystemLayout,
): Promise<KnownLocation[]> => {
	const locations: KnownLocation[] = [
		{
			path: layout.browsersPath,
			description: layout.hasCustomBrowsersPath
				? 'Browser cache (PLAYWRIGHT_BROWSERS_PATH)'
				: 'Browser cache',
		},
		{
			path: path.join(
				layout.workingDirectory,
				'node_modules',
				'playwright-core',
				'.local-browsers',
			),
			description: 'Hermetic browsers (node_modules)',
		},
		{
			path: homePath(layout, 'Library/Caches/ms-playwright-go'),
			description: 'Playwright Go browser cache',
		},
		{
			path: homePath(layout, 'Library/Caches/org.webkit.Playwright'),
			description: 'WebKit Playwright cache',
		},
		{
			path: homePath(layout, 'Library/Preferences/org.webkit.Playwright.plist'),
			description: 'WebKit Playwright preferences',
		},
		{
			path: homePath(layout, 'Library/WebKit/org.webkit.Playwright'),
			description: 'WebKit Playwright data',
		},
		...globalPackageLocations(
			systemPath(layout, '/usr/local/lib/node_modules'),
			'npm global package',
		),
		...globalPackageLocations(
			systemPath(layout, '/opt/homebrew/lib/node_modules'),
			'Homebrew global package',
		),
		...globalPackageLocations(
			homePath(layout, '.config/yarn/global/node_modules'),
			'yarn global package',
		),
		...globalPackageLocations(
			homePath(layout, 'Library/pnpm/global/5/node_modules'),
			'pnpm global package',
		),
	];

	for (const nvmVersion of await listNvmModuleDirectories(layout)) {
		locations.push(
			...globalPackageLocations(
				nvmVersion.directory,
				`nvm Node ${nvmVersion.version} global package`,
			),
		);
	}

	return locations;
};

export const buildSymlinkLocations = (
	layout: Pick<SystemLayout, 'homeDirectory' | 'rootDirectory'>,
): string[] =>
	SYMLINK_LOCATIONS.map(([base, location]) =>
		base === 'home' ? homePath(layout, location) : systemPath(layout, location),
	);

export const probeKnownLocations = async (
	locations: readonly KnownLocation[],
): Promise<PathCandidate[]> => {
	const candidates: PathCandidate[] = [];
	for (const location of locations) {
		try {
			// eslint-disable-next-line no-await-in-loop
			const stat = await fs.lstat(location.path);
			candidates.push({
				kind: 'path',
				path: location.path,
				discoverySource: 'known-location',
				description: location.description,
				isDirectory: stat.isDirectory(),
			});
		} catch {}
	}

	return candidates;
};

const readSymlinkTarget = async (linkPath: string): Promise<string> => {
	try {
		return await fs.readlink(linkPath);
	} catch {
		return '';
	}
};

export const probeSymlink = async (
	linkPath: string,
): Promise<PathCandidate | null> => {
	let stat;
	try {
		stat = await fs.lstat(linkPath);
	} catch {
		return null;
	}

	const base = {
		kind: 'path',
		path: linkPath,
		discoverySource: 'symlink-probe',
		isDirectory: false,
	} as const;

	if (stat.isSymbolicLink()) {
		const target = await readSymlinkTarget(linkPath);
		const targetExists = await fs
			.stat(linkPath)
			.then(() => true)
			.catch(() => false);
		if (!targetExists) {
			return {...base, description: 'Broken symlink'};
		}
		if (target.toLowerCase().includes(TOOLKIT_NAME)) {
			return {...base, description: `Active symlink -> ${target}`};
		}
		return null;
	}

	if (stat.isFile()) {
		return {...base, description: 'playwright binary'};
	}

	return null;
};

export const probeSymlinks = async (
	linkPaths: readonly string[],
): Promise<PathCandidate[]> => {
	const candidates: PathCandidate[] = [];
	for (const linkPath of linkPaths) {
		// eslint-disable-next-line no-await-in-loop
		const candidate = await probeSymlink(linkPath);
		if (candidate) candidates.push(candidate);
	}
	return candidates;
};

const resolveCommandDirectory = async (
	runner: CommandRunner,
	command: string,
	args: readonly string[],
	fallback: string,
): Promise<string> => {
	const result = await runner.run(command, args);
	const reported = result.ok ? result.stdout.trim().split(/\r?\n/)[0] : '';
	return normalizeAbsolutePath(reported) ?? fallback;
};

const searchRoot = (
	root: string,
	description: string,
	options: Partial<Omit<SearchRoot, 'root' | 'description'>> = {},
): SearchRoot => ({
	root,
	description,
	patterns: options.patterns ?? TOOLKIT_PATTERNS,
	maxDepth: options.maxDepth ?? 8,
	entryKind: options.entryKind ?? 'directory',
	maxResults: options.maxResults ?? DEFAULT_RESULT_CAP,
});

export const buildSearchRoots = async (
	layout: SystemLayout,
	runner: CommandRunner,
	available: ReadonlySet<PackageManager>,
): Promise<SearchRoot[]> => {
	const roots: SearchRoot[] = [];

	if (available.has('npm')) {
		const npmCache = await resolveCommandDirectory(
			runner,
			'npm',
			['config', 'get', 'cache'],
			homePath(layout, '.npm'),
		);
		roots.push(searchRoot(npmCache, 'npm cache', {maxDepth: 4}));
	}

	if (available.has('yarn')) {
		const yarnCache = await resolveCommandDirectory(
			runner,
			'yarn',
			['cache', 'dir'],
			homePath(layout, 'Library/Caches/Yarn'),
		);
		roots.push(searchRoot(yarnCache, 'yarn cache', {maxDepth: 4}));
	}

	if (available.has('pnpm')) {
		const pnpmStore = await resolveCommandDirectory(
			runner,
			'pnpm',
			['store', 'path'],
			homePath(layout, 'Library/pnpm/store'),
		);
		roots.push(searchRoot(pnpmStore, 'pnpm store', {maxDepth: 4}));
	}

	roots.push(
		searchRoot(layout.temporaryDirectory, 'temp file', {
			maxDepth: 2,
			entryKind: 'any',
		}),
		searchRoot(homePath(layout, '.npm/_npx'), 'npx cache'),
		searchRoot(homePath(layout, '.bun/install/cache'), 'bun cache', {
			maxDepth: 2,
		}),
		searchRoot(homePath(layout, '.claude'), 'Claude Code plugin cache', {
			entryKind: 'any',
		}),
		searchRoot(systemPath(layout, '/private/var/folders'), 'system temp cache', {
			patterns: SYSTEM_TEMP_PATTERNS,
			maxDepth: 5,
			entryKind: 'any',
		}),
		searchRoot(homePath(layout, 'Library/pnpm/store/v10/index'), 'pnpm metadata', {
			entryKind: 'any',
		}),
	);

	return roots;
};

export const searchRoots = async (
	roots: readonly SearchRoot[],
): Promise<{candidates: PathCandidate[]; truncatedRoots: string[]}> => {
	const candidates: PathCandidate[] = [];
	const truncatedRoots: string[] = [];

	for (const root of roots) {
		// eslint-disable-next-line no-await-in-loop
		const result = await searchByName(root.root, {
			patterns: root.patterns,
			maxDepth: root.maxDepth,
			maxResults: root.maxResults,
			entryKind: root.entryKind,
		});
		if (result.truncated) truncatedRoots.push(result.root);

		for (const match of result.matches) {
			// eslint-disable-next-line no-await-in-loop
			const isDirectory = await fs
				.lstat(match)
				.then(stat => stat.isDirectory())
				.catch(() => false);
			candidates.push({
				kind: 'path',
				path: match,
				discoverySource: 'pattern-search',
				description: root.description,
				isDirectory,
			});
		}
	}

	return {candidates, truncatedRoots};
};

export const detectPackageManagers = async (
	runner: CommandRunner,
): Promise<Set<PackageManager>> => {
	const available = new Set<PackageManager>();
	for (const packageManager of PACKAGE_MANAGERS) {
		// eslint-disable-next-line no-await-in-loop
		if (await runner.hasExecutable(packageManager)) {
			available.add(packageManager);
		}
	}
	return available;
};

export const queryPackageManagers = async (
	runner: CommandRunner,
	available: ReadonlySet<PackageManager>,
): Promise<PackageCandidate[]> => {
	const candidates: PackageCandidate[] = [];
	for (const packageManager of PACKAGE_MANAGERS) {
		if (!available.has(packageManager)) continue;

		const commands = PACKAGE_MANAGER_COMMANDS[packageManager];
		// eslint-disable-next-line no-await-in-loop
		const result = await runner.run(packageManager, commands.list);
		for (const packageName of commands.parse(result.stdout)) {
			candidates.push({
				kind: 'package',
				discoverySource: 'package-manager-query',
				packageManager,
				packageName,
				description: `${packageManager} global package`,
			});
		}
	}

	return candidates;
};

export const candidateKey = (candidate: Candidate): string =>
	candidate.kind === 'package'
		? `package:${candidate.packageManager}:${candidate.packageName}`
		: `path:${normalizeAbsolutePath(candidate.path) ?? candidate.path}`;

export const dedupeCandidates = (
	candidates: readonly Candidate[],
): Candidate[] => {
	const unique = new Map<string, Candidate>();
	for (const candidate of candidates) {
		const key = candidateKey(candidate);
		if (!unique.has(key)) unique.set(key, candidate);
	}
	return [...unique.values()];
};

export const discoverCandidates = async (
	layout: SystemLayout,
	runner: CommandRunner,
): Promise<DiscoveryResult> => {
	const available = await detectPackageManagers(runner);
	const skippedSources = PACKAGE_MANAGERS.filter(
		packageManager => !available.has(packageManager),
	).map(packageManager => `${packageManager} (not installed)`);

	const known = await probeKnownLocations(await buildKnownLocations(layout));
	const packages = await queryPackageManagers(runner, available);
	const searched = await searchRoots(
		await buildSearchRoots(layout, runner, available),
	);
	const symlinks = await probeSymlinks(buildSymlinkLocations(layout));

	return {
		candidates: dedupeCandidates([
			...known,
			...packages,
			...searched.candidates,
			...symlinks,
		]),
		skippedSources,
		truncatedRoots: searched.truncatedRoots,
	};
};
