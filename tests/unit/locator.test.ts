import fs from 'node:fs/promises';
import path from 'node:path';
import {expect, test} from 'vitest';
import {
	buildKnownLocations,
	dedupeCandidates,
	discoverCandidates,
	parseNpmGlobalList,
	parsePnpmGlobalList,
	parseYarnGlobalList,
	probeKnownLocations,
	probeSymlink,
	queryPackageManagers,
} from '../../src/core/locator.js';
import type {PathCandidate} from '../../src/core/types.js';
import {
	HOME,
	createFakeRunner,
	createTestLayout,
	makeTemporaryRoot,
	writeBytes,
} from '../helpers.js';

const sortedNames = (names: string[]): string[] => [...names].sort();

test('parseNpmGlobalList keeps toolkit packages only', () => {
	const stdout = JSON.stringify({
		name: 'lib',
		dependencies: {
			playwright: {version: '1.40.0'},
			'@playwright/test': {version: '1.40.0'},
			typescript: {version: '5.3.0'},
		},
	});

	expect(sortedNames(parseNpmGlobalList(stdout))).toEqual([
		'@playwright/test',
		'playwright',
	]);
	expect(parseNpmGlobalList('npm ERR! broken')).toEqual([]);
	expect(parseNpmGlobalList('{}')).toEqual([]);
});

test('parseYarnGlobalList reads package names from info lines', () => {
	const stdout = [
		'yarn global v1.22.19',
		'info "playwright@1.40.0" has binaries:',
		'   - playwright',
		'info "@playwright/test@1.40.0" has binaries:',
		'info "typescript@5.3.0" has binaries:',
		'Done in 0.12s.',
	].join('\n');

	expect(sortedNames(parseYarnGlobalList(stdout))).toEqual([
		'@playwright/test',
		'playwright',
	]);
});

test('parsePnpmGlobalList reads dependencies and devDependencies', () => {
	const stdout = JSON.stringify([
		{
			path: '/Users/tester/Library/pnpm/global/5',
			dependencies: {'playwright-core': {version: '1.40.0'}},
			devDependencies: {'@playwright/test': {version: '1.40.0'}, vitest: {}},
		},
	]);

	expect(sortedNames(parsePnpmGlobalList(stdout))).toEqual([
		'@playwright/test',
		'playwright-core',
	]);
});

test('queryPackageManagers asks only the managers that exist', async () => {
	const runner = createFakeRunner({
		executables: ['pnpm'],
		responses: {
			'pnpm list -g --depth=0 --json': {
				stdout: JSON.stringify([{dependencies: {playwright: {}}}]),
			},
		},
	});

	const candidates = await queryPackageManagers(runner, new Set(['pnpm']));

	expect(candidates).toEqual([
		{
			kind: 'package',
			discoverySource: 'package-manager-query',
			packageManager: 'pnpm',
			packageName: 'playwright',
			description: 'pnpm global package',
		},
	]);
	expect(runner.commandLines()).toEqual(['pnpm list -g --depth=0 --json']);
});

test('probeSymlink classifies broken, matching and unrelated links', async () => {
	const root = await makeTemporaryRoot();
	const toolkitTarget = path.join(root, 'lib/playwright/cli.js');
	const otherTarget = path.join(root, 'lib/other/cli.js');
	await writeBytes(toolkitTarget, 1);
	await writeBytes(otherTarget, 1);
	await fs.mkdir(path.join(root, 'bin'));
	await fs.symlink(path.join(root, 'gone/cli.js'), path.join(root, 'bin/broken'));
	await fs.symlink(toolkitTarget, path.join(root, 'bin/active'));
	await fs.symlink(otherTarget, path.join(root, 'bin/other'));
	await writeBytes(path.join(root, 'bin/plain'), 4);
	await fs.mkdir(path.join(root, 'bin/folder'));

	expect(await probeSymlink(path.join(root, 'bin/broken'))).toEqual({
		kind: 'path',
		path: path.join(root, 'bin/broken'),
		discoverySource: 'symlink-probe',
		isDirectory: false,
		description: 'Broken symlink',
	});
	expect((await probeSymlink(path.join(root, 'bin/active')))?.description).toBe(
		`Active symlink -> ${toolkitTarget}`,
	);
	expect(await probeSymlink(path.join(root, 'bin/other'))).toBeNull();
	expect((await probeSymlink(path.join(root, 'bin/plain')))?.description).toBe(
		'playwright binary',
	);
	expect(await probeSymlink(path.join(root, 'bin/folder'))).toBeNull();
	expect(await probeSymlink(path.join(root, 'bin/missing'))).toBeNull();
});

test('probeKnownLocations keeps existing paths only', async () => {
	const root = await makeTemporaryRoot();
	await fs.mkdir(path.join(root, 'cache'));
	await writeBytes(path.join(root, 'prefs.plist'), 3);

	const candidates = await probeKnownLocations([
		{path: path.join(root, 'cache'), description: 'cache'},
		{path: path.join(root, 'prefs.plist'), description: 'prefs'},
		{path: path.join(root, 'missing'), description: 'missing'},
	]);

	expect(candidates.map(candidate => [candidate.description, candidate.isDirectory])).toEqual([
		['cache', true],
		['prefs', false],
	]);
});

test('buildKnownLocations includes every nvm runtime version', async () => {
	const root = await makeTemporaryRoot();
	const layout = createTestLayout(root);
	await fs.mkdir(path.join(layout.nvmDirectory, 'versions/node/v20.11.1'), {
		recursive: true,
	});

	const locations = await buildKnownLocations(layout);

	expect(locations).toContainEqual({
		path: path.join(
			layout.nvmDirectory,
			'versions/node/v20.11.1/lib/node_modules/@playwright',
		),
		description: 'nvm Node v20.11.1 global package: @playwright',
	});
	expect(locations[0]).toEqual({
		path: path.join(root, HOME, 'Library/Caches/ms-playwright'),
		description: 'Browser cache',
	});
});

test('dedupeCandidates merges paths that normalize to the same location', () => {
	const first: PathCandidate = {
		kind: 'path',
		path: '/a/b',
		isDirectory: true,
		discoverySource: 'known-location',
		description: 'first',
	};
	const second: PathCandidate = {...first, path: '/a//b/', description: 'second'};

	expect(dedupeCandidates([first, second])).toEqual([first]);
});

test('discoverCandidates skips package managers that are not installed', async () => {
	const root = await makeTemporaryRoot();
	const layout = createTestLayout(root);
	await writeBytes(path.join(layout.browsersPath, 'chromium-1091/chrome'), 10);

	const runner = createFakeRunner();
	const discovery = await discoverCandidates(layout, runner);

	expect(discovery.skippedSources).toEqual([
		'npm (not installed)',
		'yarn (not installed)',
		'pnpm (not installed)',
	]);
	expect(runner.calls).toEqual([]);
	expect(discovery.candidates).toEqual([
		{
			kind: 'path',
			path: layout.browsersPath,
			discoverySource: 'known-location',
			description: 'Browser cache',
			isDirectory: true,
		},
	]);
});

test('discoverCandidates merges cache search and package queries', async () => {
	const root = await makeTemporaryRoot();
	const layout = createTestLayout(root);
	const npmCache = path.join(root, 'npm-cache');
	await fs.mkdir(path.join(npmCache, '_npx/4f2a/node_modules/playwright'), {
		recursive: true,
	});
	await writeBytes(path.join(root, 'usr/local/bin/playwright'), 5);

	const runner = createFakeRunner({
		executables: ['npm'],
		responses: {
			'npm config get cache': {stdout: `${npmCache}\n`},
			'npm list -g --depth=0 --json': {
				stdout: JSON.stringify({dependencies: {playwright: {}}}),
			},
		},
	});

	const discovery = await discoverCandidates(layout, runner);

	expect(discovery.skippedSources).toEqual([
		'yarn (not installed)',
		'pnpm (not installed)',
	]);
	expect(discovery.candidates).toEqual([
		{
			kind: 'package',
			discoverySource: 'package-manager-query',
			packageManager: 'npm',
			packageName: 'playwright',
			description: 'npm global package',
		},
		{
			kind: 'path',
			path: path.join(npmCache, '_npx/4f2a/node_modules/playwright'),
			discoverySource: 'pattern-search',
			description: 'npm cache',
			isDirectory: true,
		},
		{
			kind: 'path',
			path: path.join(root, 'usr/local/bin/playwright'),
			discoverySource: 'symlink-probe',
			description: 'playwright binary',
			isDirectory: false,
		},
	]);
});
