import {
	containsProtectedPath,
	isExcluded,
	normalizeAbsolutePath,
} from './classifier.js';
import {
	OFFICIAL_UNINSTALL_COMMAND,
	canRunOfficialUninstall,
	deleteItem,
	describeUninstall,
	runOfficialUninstall,
	uninstallPackage,
} from './delete.js';
import {formatCommand} from './command.js';
import {human} from './format.js';
import {pathExists, sizeOf} from './scanner.js';
import type {
	Candidate,
	CommandRunner,
	ExecutionMode,
	Outcome,
	PassResult,
	PathCandidate,
	ProtectedRule,
	Reporter,
	RunSummary,
	ScanResult,
} from './types.js';

export interface PlanContext {
	rules: readonly ProtectedRule[];
	runner: CommandRunner;
	reporter: Reporter;
	workingDirectory: string;
}

export const createRunSummary = (): RunSummary => ({
	itemsFound: 0,
	itemsRemoved: 0,
	totalSizeBytes: 0,
});

// A candidate holding a protected subtree is as untouchable as one inside it.
const isShielded = (
	candidatePath: string,
	rules: readonly ProtectedRule[],
): boolean =>
	isExcluded(candidatePath, rules) || containsProtectedPath(candidatePath, rules);

export const scanCandidate = async (
	candidate: PathCandidate,
	rules: readonly ProtectedRule[],
): Promise<ScanResult> => {
	if (isShielded(candidate.path, rules)) {
		return {candidate, included: false, sizeBytes: null};
	}

	return {candidate, included: true, sizeBytes: await sizeOf(candidate.path)};
};

const isNestedUnder = (childPath: string, parentPath: string): boolean =>
	childPath !== parentPath &&
	childPath.startsWith(parentPath === '/' ? '/' : `${parentPath}/`);

export const collapseNestedCandidates = (
	candidates: readonly Candidate[],
	rules: readonly ProtectedRule[],
): Candidate[] => {
	const includedPaths: string[] = [];
	for (const candidate of candidates) {
		if (candidate.kind !== 'path' || isShielded(candidate.path, rules)) continue;
		const normalized = normalizeAbsolutePath(candidate.path);
		if (normalized) includedPaths.push(normalized);
	}

	return candidates.filter(candidate => {
		if (candidate.kind !== 'path' || isShielded(candidate.path, rules)) {
			return true;
		}
		const normalized = normalizeAbsolutePath(candidate.path);
		if (!normalized) return true;
		return !includedPaths.some(parentPath => isNestedUnder(normalized, parentPath));
	});
};

export const formatOutcome = (outcome: Outcome): string => {
	const {candidate} = outcome;
	const target =
		candidate.kind === 'path' ? candidate.path : describeUninstall(candidate);

	switch (outcome.status) {
		case 'skipped': {
			return `Skipped (protected): ${target}`;
		}
		case 'would-remove': {
			return candidate.kind === 'path'
				? `Would remove: ${target} (${human(outcome.sizeBytes)}) - ${candidate.description}`
				: `Would run: ${target} - ${candidate.description}`;
		}
		case 'removed': {
			return candidate.kind === 'path'
				? `Removed: ${target} (${human(outcome.sizeBytes)}) - ${candidate.description}`
				: `Ran: ${target} - ${candidate.description}`;
		}
		case 'failed': {
			return candidate.kind === 'path'
				? `Failed to remove: ${target} - ${outcome.error}`
				: `Failed: ${target} - ${outcome.error} (treated as already absent)`;
		}
		case 'absent': {
			return `Already absent: ${target}`;
		}
	}
};

const reportOutcome = (reporter: Reporter, outcome: Outcome): void => {
	const line = formatOutcome(outcome);
	switch (outcome.status) {
		case 'removed': {
			reporter.success(line);
			break;
		}
		case 'failed': {
			reporter.warn(line);
			break;
		}
		case 'would-remove': {
			reporter.message(line);
			break;
		}
		default: {
			reporter.info(line);
		}
	}
};

const applyPathCandidate = async (
	candidate: PathCandidate,
	mode: ExecutionMode,
	context: PlanContext,
	summary: RunSummary,
): Promise<Outcome> => {
	const scan = await scanCandidate(candidate, context.rules);
	if (!scan.included) return {status: 'skipped', candidate};

	const sizeBytes = scan.sizeBytes ?? 0;
	if (mode === 'dry-run') {
		summary.itemsFound++;
		summary.totalSizeBytes += sizeBytes;
		return {status: 'would-remove', candidate, sizeBytes};
	}

	if (!(await pathExists(candidate.path))) {
		return {status: 'absent', candidate};
	}

	summary.itemsFound++;
	const result = await deleteItem(candidate);
	if (!result.ok) {
		return {status: 'failed', candidate, sizeBytes, error: result.error};
	}

	summary.itemsRemoved++;
	summary.totalSizeBytes += sizeBytes;
	return {status: 'removed', candidate, sizeBytes};
};

export const applyCandidate = async (
	candidate: Candidate,
	mode: ExecutionMode,
	context: PlanContext,
	summary: RunSummary,
): Promise<Outcome> => {
	let outcome: Outcome;
	if (candidate.kind === 'path') {
		outcome = await applyPathCandidate(candidate, mode, context, summary);
	} else if (mode === 'dry-run') {
		summary.itemsFound++;
		outcome = {status: 'would-remove', candidate, sizeBytes: 0};
	} else {
		summary.itemsFound++;
		const result = await uninstallPackage(candidate, context.runner);
		if (result.ok) {
			summary.itemsRemoved++;
			outcome = {status: 'removed', candidate, sizeBytes: 0};
		} else {
			outcome = {status: 'failed', candidate, sizeBytes: 0, error: result.error};
		}
	}

	reportOutcome(context.reporter, outcome);
	return outcome;
};

const runOfficialUninstallStep = async (
	mode: ExecutionMode,
	context: PlanContext,
): Promise<void> => {
	const label = formatCommand(
		OFFICIAL_UNINSTALL_COMMAND.command,
		OFFICIAL_UNINSTALL_COMMAND.args,
	);
	if (mode === 'dry-run') {
		if (await canRunOfficialUninstall(context.runner, context.workingDirectory)) {
			context.reporter.message(`Would run: ${label}`);
		}
		return;
	}

	const result = await runOfficialUninstall(context.runner, context.workingDirectory);
	if (!result) return;
	if (result.ok) {
		context.reporter.success(`Ran: ${label}`);
		return;
	}
	context.reporter.warn(`${label} failed: ${result.error}. Continuing.`);
};

// The official uninstall runs before any path is touched.
export const executePass = async (
	candidates: readonly Candidate[],
	mode: ExecutionMode,
	context: PlanContext,
): Promise<PassResult> => {
	const summary = createRunSummary();
	const outcomes: Outcome[] = [];

	await runOfficialUninstallStep(mode, context);

	for (const candidate of collapseNestedCandidates(candidates, context.rules)) {
		// eslint-disable-next-line no-await-in-loop
		outcomes.push(await applyCandidate(candidate, mode, context, summary));
	}

	return {mode, summary, outcomes};
};
