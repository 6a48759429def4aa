import fs from 'node:fs/promises';
import path from 'node:path';
import {
	PROTECTION_CONCERNS,
	PROTECTION_CONCERN_LABELS,
	buildProtectedRules,
} from './classifier.js';
import {runConfirmationGate} from './confirm.js';
import {human, pluralize} from './format.js';
import {discoverCandidates, type DiscoveryResult} from './locator.js';
import {executePass, type PlanContext} from './planner.js';
import {sizeOf} from './scanner.js';
import type {
	CommandRunner,
	PassResult,
	Prompter,
	ProtectedRule,
	Reporter,
	RunSummary,
	SystemLayout,
} from './types.js';

export type CleanupStatus = 'clean' | 'previewed' | 'aborted' | 'completed';

export type Countdown = () => Promise<boolean>;

export interface CleanupOptions {
	dryRun: boolean;
	layout: SystemLayout;
	runner: CommandRunner;
	reporter: Reporter;
	prompter: Prompter;
	countdown: Countdown;
}

export interface CleanupResult {
	status: CleanupStatus;
	discovery: DiscoveryResult;
	preview: PassResult;
	commit: PassResult | null;
}

export const describeProtectedRules = (
	rules: readonly ProtectedRule[],
): string =>
	PROTECTION_CONCERNS.map(concern => {
		const prefixes = rules
			.filter(rule => rule.concern === concern)
			.map(rule => `  ${rule.prefix}`);
		return [`${PROTECTION_CONCERN_LABELS[concern]}:`, ...prefixes].join('\n');
	}).join('\n');

export const describeSummary = (summary: RunSummary): string =>
	[
		`Items found: ${summary.itemsFound}`,
		`Items removed: ${summary.itemsRemoved}`,
		`Total size: ${human(summary.totalSizeBytes)}`,
	].join('\n');

export const listBrowserCache = async (
	browsersPath: string,
): Promise<Array<{name: string; sizeBytes: number}>> => {
	let names: string[];
	try {
		const entries = await fs.readdir(browsersPath, {withFileTypes: true});
		names = entries
			.filter(entry => entry.isDirectory())
			.map(entry => entry.name)
			.sort((left, right) => left.localeCompare(right));
	} catch {
		return [];
	}

	const browsers: Array<{name: string; sizeBytes: number}> = [];
	for (const name of names) {
		// eslint-disable-next-line no-await-in-loop
		browsers.push({name, sizeBytes: await sizeOf(path.join(browsersPath, name))});
	}
	return browsers;
};

const reportBrowserCache = async (
	layout: SystemLayout,
	reporter: Reporter,
): Promise<void> => {
	const browsers = await listBrowserCache(layout.browsersPath);
	if (browsers.length === 0) return;

	reporter.note(
		browsers
			.map(browser => `${browser.name} (${human(browser.sizeBytes)})`)
			.join('\n'),
		`Installed browsers in ${layout.browsersPath}`,
	);
};

const reportDiscovery = (
	discovery: DiscoveryResult,
	reporter: Reporter,
): void => {
	for (const source of discovery.skippedSources) {
		reporter.info(`Skipping ${source}`);
	}
	for (const root of discovery.truncatedRoots) {
		reporter.warn(`Result cap reached under ${root}; the listing may be incomplete.`);
	}
};

export const runCleanup = async ({
	dryRun,
	layout,
	runner,
	reporter,
	prompter,
	countdown,
}: CleanupOptions): Promise<CleanupResult> => {
	const rules = buildProtectedRules(layout);
	reporter.note(describeProtectedRules(rules), 'Protected paths (never removed)');
	reporter.info(
		layout.hasCustomBrowsersPath
			? `Browser cache: ${layout.browsersPath} (PLAYWRIGHT_BROWSERS_PATH)`
			: `Browser cache: ${layout.browsersPath}`,
	);
	await reportBrowserCache(layout, reporter);

	const discovery = await discoverCandidates(layout, runner);
	reportDiscovery(discovery, reporter);

	const context: PlanContext = {
		rules,
		runner,
		reporter,
		workingDirectory: layout.workingDirectory,
	};
	reporter.step(dryRun ? 'Dry run: nothing will be removed' : 'Scanning');
	const preview = await executePass(discovery.candidates, 'dry-run', context);

	if (preview.summary.itemsFound === 0) {
		reporter.success('No Playwright artifacts found.');
		return {status: 'clean', discovery, preview, commit: null};
	}

	reporter.note(
		`${pluralize(preview.summary.itemsFound, 'item')} found (${human(preview.summary.totalSizeBytes)})`,
		'Summary',
	);

	if (dryRun) {
		reporter.info('Dry run complete. Run without --dry-run to remove these items.');
		return {status: 'previewed', discovery, preview, commit: null};
	}

	if (!(await runConfirmationGate(prompter, reporter, preview.summary))) {
		return {status: 'aborted', discovery, preview, commit: null};
	}

	if (!(await countdown())) {
		reporter.info('Cancelled. Nothing was removed.');
		return {status: 'aborted', discovery, preview, commit: null};
	}

	reporter.step('Removing');
	const commit = await executePass(discovery.candidates, 'commit', context);
	reporter.note(describeSummary(commit.summary), 'Cleanup complete');
	reporter.info(
		'Next: run playwright-traces to look for leftovers, then playwright-reinstall for a fresh install.',
	);

	return {status: 'completed', discovery, preview, commit};
};
