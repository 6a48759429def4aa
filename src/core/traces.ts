import fs from 'node:fs/promises';
import path from 'node:path';
import {buildProtectedRules, isExcluded} from './classifier.js';
import {homePath, systemPath} from './config.js';
import {formatCompactTimestamp, formatDuration, formatTimestamp, pluralize} from './format.js';
import {
	buildKnownLocations,
	buildSymlinkLocations,
	type KnownLocation,
} from './locator.js';
import {pathExists, searchByName} from './scanner.js';
import type {Reporter, SystemLayout} from './types.js';

export const TRACE_PATTERNS = ['playwright', 'ms-playwright', '@playwright'] as const;
export const TRACE_SEARCH_DEPTH = 12;
export const TRACE_RESULT_CAP = 500;
export const REPORT_PREFIX = 'playwright-traces';

const HIDDEN_PREFIX = '/System/Volumes/Data/';

const SEPARATOR = '='.repeat(72);

export interface TraceScan {
	startedAt: Date;
	finishedAt: Date;
	durationMs: number;
	searchRoot: string;
	patterns: readonly string[];
	prunePaths: string[];
	knownLocations: KnownLocation[];
	paths: string[];
	truncated: boolean;
}

export interface TraceScanOptions {
	layout: SystemLayout;
	clock?: () => Date;
}

export const buildTracePrunePaths = (layout: SystemLayout): string[] => [
	homePath(layout, '.Trash'),
	systemPath(layout, '/System/Volumes/Data'),
	systemPath(layout, '/System'),
	systemPath(layout, '/private/var/db'),
	systemPath(layout, '/private/var/folders/zz'),
];

export const buildTraceLocations = async (
	layout: SystemLayout,
): Promise<KnownLocation[]> => [
	...(await buildKnownLocations(layout)),
	...buildSymlinkLocations(layout).map(linkPath => ({
		path: linkPath,
		description: 'playwright binary',
	})),
	{path: homePath(layout, '.npm/_npx'), description: 'npx cache'},
	{path: homePath(layout, '.bun/install/cache'), description: 'bun cache'},
];

const isReportFile = (candidatePath: string): boolean => {
	const name = path.basename(candidatePath);
	return name.startsWith(`${REPORT_PREFIX}-`) && name.endsWith('.txt');
};

/** Drops the firmlinked data-volume mirror of paths listed elsewhere. */
const isHiddenPath = (layout: SystemLayout, candidatePath: string): boolean =>
	candidatePath.startsWith(systemPath(layout, HIDDEN_PREFIX));

export const scanTraces = async ({
	layout,
	clock = () => new Date(),
}: TraceScanOptions): Promise<TraceScan> => {
	const startedAt = clock();
	const rules = buildProtectedRules(layout);
	const prunePaths = buildTracePrunePaths(layout);
	const knownLocations = await buildTraceLocations(layout);
	const found = new Set<string>();

	for (const location of knownLocations) {
		// eslint-disable-next-line no-await-in-loop
		if (await pathExists(location.path)) found.add(location.path);
	}

	const searchRoot = layout.rootDirectory;
	const search = await searchByName(searchRoot, {
		patterns: TRACE_PATTERNS,
		maxDepth: TRACE_SEARCH_DEPTH,
		maxResults: TRACE_RESULT_CAP,
		entryKind: 'any',
		prunePaths,
		protectedRules: rules,
	});
	for (const match of search.matches) found.add(match);

	const paths = [...found]
		.filter(candidatePath => !isExcluded(candidatePath, rules))
		.filter(candidatePath => !isHiddenPath(layout, candidatePath))
		.filter(candidatePath => !isReportFile(candidatePath))
		.sort((left, right) => left.localeCompare(right));

	const finishedAt = clock();
	return {
		startedAt,
		finishedAt,
		durationMs: finishedAt.getTime() - startedAt.getTime(),
		searchRoot,
		patterns: TRACE_PATTERNS,
		prunePaths,
		knownLocations,
		paths,
		truncated: search.truncated,
	};
};

export const reportFileName = (date: Date): string =>
	`${REPORT_PREFIX}-${formatCompactTimestamp(date)}.txt`;

export const renderTraceReport = (
	scan: TraceScan,
	layout: SystemLayout,
): string => {
	const rules = buildProtectedRules(layout);
	const lines = [
		SEPARATOR,
		'Playwright trace report',
		SEPARATOR,
		`Scan started: ${formatTimestamp(scan.startedAt)}`,
		`Duration: ${formatDuration(scan.durationMs)}`,
		`Results: ${scan.paths.length}${scan.truncated ? ` (stopped at ${TRACE_RESULT_CAP} matches)` : ''}`,
		'',
		'SCOPE',
		'Playwright for Node.js artifacts only. Installs belonging to other',
		'languages, editor extensions and project directories are excluded.',
		`Note: ${layout.browsersPath} is shared with the Python, Java and .NET`,
		'bindings. Removing it affects those installs as well.',
		'',
		'SEARCH CONFIGURATION',
		`Root: ${scan.searchRoot}`,
		`Patterns: ${scan.patterns.join(', ')}`,
		`Maximum depth: ${TRACE_SEARCH_DEPTH}`,
		'Excluded directories:',
		...scan.prunePaths.map(prunePath => `  ${prunePath}`),
		...rules.map(rule => `  ${rule.prefix} (${rule.concern})`),
		'Known locations:',
		...scan.knownLocations.map(
			location => `  ${location.path} - ${location.description}`,
		),
		'',
		'RESULTS',
		...(scan.paths.length > 0 ? scan.paths : ['(none)']),
		'',
		SEPARATOR,
		'End of report',
		SEPARATOR,
	];

	return `${lines.join('\n')}\n`;
};

export const writeTraceReport = async (
	scan: TraceScan,
	layout: SystemLayout,
	directory: string,
): Promise<string> => {
	const reportPath = path.join(directory, reportFileName(scan.startedAt));
	await fs.writeFile(reportPath, renderTraceReport(scan, layout), 'utf8');
	return reportPath;
};

export interface TraceFinderOptions {
	layout: SystemLayout;
	reporter: Reporter;
	clock?: () => Date;
}

export interface TraceFinderResult {
	scan: TraceScan;
	reportPath: string;
}

export const runTraceFinder = async ({
	layout,
	reporter,
	clock,
}: TraceFinderOptions): Promise<TraceFinderResult> => {
	reporter.info(`Patterns: ${TRACE_PATTERNS.join(', ')} (depth ${TRACE_SEARCH_DEPTH})`);
	reporter.step(`Scanning ${layout.rootDirectory}`);
	const scan = await scanTraces({layout, clock});

	if (scan.paths.length === 0) {
		reporter.success('No Playwright traces found.');
	} else {
		reporter.note(scan.paths.join('\n'), `Found ${pluralize(scan.paths.length, 'trace')}`);
	}
	if (scan.truncated) {
		reporter.warn(`Stopped at ${TRACE_RESULT_CAP} matches; the listing is incomplete.`);
	}

	const reportPath = await writeTraceReport(scan, layout, layout.workingDirectory);
	reporter.success(`Report written to ${reportPath}`);
	return {scan, reportPath};
};
