import {constants} from 'node:fs';
import fs from 'node:fs/promises';
import {npxArgs} from './command.js';
import {directoryExists, searchByName, type EntryKind} from './scanner.js';
import type {BrowserName, CommandRunner, Reporter, SystemLayout} from './types.js';

export const BROWSER_NAMES: readonly BrowserName[] = [
	'chromium',
	'firefox',
	'webkit',
];

interface BrowserArtifact {
	names: readonly string[];
	entryKind: EntryKind;
}

export const BROWSER_ARTIFACTS: Record<BrowserName, BrowserArtifact> = {
	chromium: {
		names: ['chrome', 'Chromium', 'Google Chrome for Testing'],
		entryKind: 'file',
	},
	firefox: {names: ['firefox', 'Nightly'], entryKind: 'file'},
	webkit: {names: ['Playwright.app'], entryKind: 'directory'},
};

const ARTIFACT_SEARCH_DEPTH = 8;

export interface VerificationCheck {
	name: string;
	ok: boolean;
	required: boolean;
	detail: string;
}

export interface VerificationResult {
	ok: boolean;
	version: string | null;
	checks: VerificationCheck[];
}

export interface VerifyOptions {
	layout: Pick<SystemLayout, 'browsersPath'>;
	runner: CommandRunner;
	browsers: readonly BrowserName[];
	cwd?: string;
}

const isExecutable = async (filePath: string): Promise<boolean> => {
	try {
		await fs.access(filePath, constants.X_OK);
		return true;
	} catch {
		return false;
	}
};

export const findBrowserArtifact = async (
	browsersPath: string,
	browser: BrowserName,
): Promise<string | null> => {
	const artifact = BROWSER_ARTIFACTS[browser];
	const result = await searchByName(browsersPath, {
		patterns: artifact.names,
		matchMode: 'exact',
		entryKind: artifact.entryKind,
		maxDepth: ARTIFACT_SEARCH_DEPTH,
		maxResults: 10,
	});

	for (const match of result.matches) {
		if (artifact.entryKind === 'directory') return match;
		// eslint-disable-next-line no-await-in-loop
		if (await isExecutable(match)) return match;
	}

	return null;
};

export const readToolkitVersion = async (
	runner: CommandRunner,
	cwd?: string,
): Promise<string | null> => {
	const result = await runner.run('npx', npxArgs('playwright', '--version'), {cwd});
	const version = result.ok ? result.stdout.trim() : '';
	return version ? version : null;
};

export const verifyInstallation = async ({
	layout,
	runner,
	browsers,
	cwd,
}: VerifyOptions): Promise<VerificationResult> => {
	const checks: VerificationCheck[] = [];

	const version = await readToolkitVersion(runner, cwd);
	checks.push({
		name: 'playwright CLI',
		ok: version !== null,
		required: true,
		detail: version ?? 'npx --no playwright --version did not report a version',
	});

	const cachePresent = await directoryExists(layout.browsersPath);
	checks.push({
		name: 'browser cache',
		ok: cachePresent,
		required: false,
		detail: cachePresent
			? layout.browsersPath
			: `${layout.browsersPath} does not exist`,
	});

	for (const browser of browsers) {
		const artifact = cachePresent
			? // eslint-disable-next-line no-await-in-loop
				await findBrowserArtifact(layout.browsersPath, browser)
			: null;
		checks.push({
			name: browser,
			ok: artifact !== null,
			required: false,
			detail: artifact ?? `no ${BROWSER_ARTIFACTS[browser].names.join(' / ')} found`,
		});
	}

	return {
		ok: checks.every(check => check.ok || !check.required),
		version,
		checks,
	};
};

export const reportVerification = (
	result: VerificationResult,
	reporter: Reporter,
): void => {
	for (const check of result.checks) {
		if (check.ok) {
			reporter.success(`${check.name}: ${check.detail}`);
		} else if (check.required) {
			reporter.error(`${check.name}: ${check.detail}`);
		} else {
			reporter.warn(`${check.name}: ${check.detail}`);
		}
	}
};
