import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import {normalizeAbsolutePath} from './classifier.js';
import type {SystemLayout} from './types.js';

export const TOOLKIT_NAME = 'playwright';
export const TOOLKIT_PACKAGES = ['playwright', '@playwright/test'] as const;
export const GLOBAL_PACKAGE_DIRECTORIES = [
	'playwright',
	'playwright-core',
	'@playwright',
] as const;
export const SUPPORTED_PLATFORM: NodeJS.Platform = 'darwin';

export const DEFAULT_BROWSER_CACHE = 'Library/Caches/ms-playwright';
export const DEFAULT_TEMPORARY_DIRECTORY = '/tmp';
export const DEFAULT_NVM_DIRECTORY = '.nvm';

export const BROWSERS_PATH_ENV = 'PLAYWRIGHT_BROWSERS_PATH';
export const NVM_DIR_ENV = 'NVM_DIR';
export const TMPDIR_ENV = 'TMPDIR';
export const PROTECTED_PATHS_ENV = 'PLAYWRIGHT_PRUNE_PROTECTED_PATHS';

// `0` asks for browsers inside node_modules rather than a shared cache.
const HERMETIC_BROWSERS_PATH = '0';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface LayoutOptions {
	env?: Environment;
	homeDirectory?: string;
	rootDirectory?: string;
	workingDirectory?: string;
}

const readEnvironmentValue = (
	env: Environment,
	name: string,
): string | undefined => {
	const value = env[name]?.trim();
	return value ? value : undefined;
};

const expandHome = (value: string, homeDirectory: string): string => {
	if (value === '~') return homeDirectory;
	if (value.startsWith('~/')) return path.join(homeDirectory, value.slice(2));
	return value;
};

const resolveDirectoryOverride = (
	value: string | undefined,
	homeDirectory: string,
	fallback: string,
): string => {
	if (!value) return fallback;
	return normalizeAbsolutePath(expandHome(value, homeDirectory)) ?? fallback;
};

export const parseProtectedPaths = (
	value: string | undefined,
	homeDirectory: string,
): string[] => {
	if (!value) return [];

	const unique = new Set<string>();
	for (const entry of value.split(path.delimiter)) {
		const trimmed = entry.trim();
		if (!trimmed) continue;
		const normalized = normalizeAbsolutePath(expandHome(trimmed, homeDirectory));
		if (normalized) unique.add(normalized);
	}

	return [...unique];
};

export const resolveSystemLayout = ({
	env = process.env,
	homeDirectory = os.homedir(),
	rootDirectory = '/',
	workingDirectory = process.cwd(),
}: LayoutOptions = {}): SystemLayout => {
	const home = normalizeAbsolutePath(homeDirectory) ?? homeDirectory;
	const root = normalizeAbsolutePath(rootDirectory) ?? '/';

	const browsersOverride = readEnvironmentValue(env, BROWSERS_PATH_ENV);
	const defaultBrowsersPath = path.join(home, DEFAULT_BROWSER_CACHE);
	const browsersPath =
		browsersOverride && browsersOverride !== HERMETIC_BROWSERS_PATH
			? resolveDirectoryOverride(browsersOverride, home, defaultBrowsersPath)
			: defaultBrowsersPath;

	return {
		rootDirectory: root,
		homeDirectory: home,
		workingDirectory: path.resolve(workingDirectory),
		temporaryDirectory: resolveDirectoryOverride(
			readEnvironmentValue(env, TMPDIR_ENV),
			home,
			path.join(root, DEFAULT_TEMPORARY_DIRECTORY),
		),
		browsersPath,
		hasCustomBrowsersPath: browsersPath !== defaultBrowsersPath,
		nvmDirectory: resolveDirectoryOverride(
			readEnvironmentValue(env, NVM_DIR_ENV),
			home,
			path.join(home, DEFAULT_NVM_DIRECTORY),
		),
		extraProtectedPaths: parseProtectedPaths(
			readEnvironmentValue(env, PROTECTED_PATHS_ENV),
			home,
		),
	};
};

/** Joins an absolute system location (e.g. `/usr/local/bin`) onto the layout root. */
export const systemPath = (
	layout: Pick<SystemLayout, 'rootDirectory'>,
	absolutePath: string,
): string => path.join(layout.rootDirectory, absolutePath);

export const homePath = (
	layout: Pick<SystemLayout, 'homeDirectory'>,
	relativePath: string,
): string => path.join(layout.homeDirectory, relativePath);

export const isSupportedPlatform = (platform: NodeJS.Platform): boolean =>
	platform === SUPPORTED_PLATFORM;

export const matchesToolkitPackage = (packageName: string): boolean => {
	const normalized = packageName.trim().toLowerCase();
	return (
		normalized.startsWith(TOOLKIT_NAME) ||
		normalized.startsWith(`@${TOOLKIT_NAME}/`)
	);
};
