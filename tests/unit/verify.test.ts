import fs from 'node:fs/promises';
import path from 'node:path';
import {expect, test} from 'vitest';
import {
	findBrowserArtifact,
	reportVerification,
	verifyInstallation,
} from '../../src/core/verify.js';
import {
	createFakeRunner,
	createRecordingReporter,
	makeTemporaryRoot,
	writeBytes,
} from '../helpers.js';

test('findBrowserArtifact requires an executable file', async () => {
	const root = await makeTemporaryRoot();
	const executable = path.join(root, 'chromium-1091/chrome-linux/chrome');
	await writeBytes(path.join(root, 'chromium-1090/chrome-linux/chrome'), 4, 0o644);
	await writeBytes(executable, 4, 0o755);

	expect(await findBrowserArtifact(root, 'chromium')).toBe(executable);
});

test('findBrowserArtifact ignores a non-executable match', async () => {
	const root = await makeTemporaryRoot();
	await writeBytes(path.join(root, 'chromium-1091/chrome-linux/chrome'), 4, 0o644);

	expect(await findBrowserArtifact(root, 'chromium')).toBeNull();
});

test('findBrowserArtifact finds the WebKit bundle and the Firefox Nightly binary', async () => {
	const root = await makeTemporaryRoot();
	const bundle = path.join(root, 'webkit-1944/Playwright.app');
	const nightly = path.join(root, 'firefox-1429/firefox/Nightly.app/Contents/MacOS/Nightly');
	await fs.mkdir(path.join(bundle, 'Contents'), {recursive: true});
	await writeBytes(nightly, 4, 0o755);

	expect(await findBrowserArtifact(root, 'webkit')).toBe(bundle);
	expect(await findBrowserArtifact(root, 'firefox')).toBe(nightly);
});

test('a missing browser only warns while a missing CLI fails', async () => {
	const root = await makeTemporaryRoot();
	await fs.mkdir(path.join(root, 'ms-playwright'));
	const runner = createFakeRunner({
		executables: ['npx'],
		responses: {'npx --no playwright --version': {stdout: 'Version 1.40.0\n'}},
	});

	const passing = await verifyInstallation({
		layout: {browsersPath: path.join(root, 'ms-playwright')},
		runner,
		browsers: ['webkit'],
		cwd: root,
	});

	expect(passing.ok).toBe(true);
	expect(passing.version).toBe('Version 1.40.0');
	expect(passing.checks).toEqual([
		{name: 'playwright CLI', ok: true, required: true, detail: 'Version 1.40.0'},
		{
			name: 'browser cache',
			ok: true,
			required: false,
			detail: path.join(root, 'ms-playwright'),
		},
		{name: 'webkit', ok: false, required: false, detail: 'no Playwright.app found'},
	]);
	expect(runner.calls[0]?.args).toEqual(['--no', 'playwright', '--version']);
	expect(runner.calls[0]?.options).toEqual({cwd: root});

	const failing = await verifyInstallation({
		layout: {browsersPath: path.join(root, 'missing')},
		runner: createFakeRunner(),
		browsers: ['chromium'],
	});

	expect(failing.ok).toBe(false);
	expect(failing.version).toBeNull();
	expect(failing.checks.map(check => check.ok)).toEqual([false, false, false]);
});

test('reportVerification maps checks to reporter levels', () => {
	const reporter = createRecordingReporter();

	reportVerification(
		{
			ok: false,
			version: null,
			checks: [
				{name: 'playwright CLI', ok: false, required: true, detail: 'missing'},
				{name: 'browser cache', ok: true, required: false, detail: '/cache'},
				{name: 'firefox', ok: false, required: false, detail: 'not found'},
			],
		},
		reporter,
	);

	expect(reporter.lines).toEqual([
		{level: 'error', message: 'playwright CLI: missing'},
		{level: 'success', message: 'browser cache: /cache'},
		{level: 'warn', message: 'firefox: not found'},
	]);
});
