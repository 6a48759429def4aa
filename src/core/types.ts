export type DiscoverySource =
	| 'known-location'
	| 'pattern-search'
	| 'package-manager-query'
	| 'symlink-probe';
export type ExecutionMode = 'dry-run' | 'commit';
export type PackageManager = 'npm' | 'yarn' | 'pnpm';
export type ProtectionConcern =
	| 'user-content'
	| 'other-runtime'
	| 'embedded-copy'
	| 'unrelated-cache';
export type BrowserName = 'chromium' | 'firefox' | 'webkit';

export interface SystemLayout {
	rootDirectory: string;
	homeDirectory: string;
	workingDirectory: string;
	temporaryDirectory: string;
	browsersPath: string;
	hasCustomBrowsersPath: boolean;
	nvmDirectory: string;
	extraProtectedPaths: string[];
}

export interface ProtectedRule {
	prefix: string;
	concern: ProtectionConcern;
}

interface CandidateBase {
	discoverySource: DiscoverySource;
	description: string;
}

export interface PathCandidate extends CandidateBase {
	kind: 'path';
	path: string;
	isDirectory: boolean;
}

export interface PackageCandidate extends CandidateBase {
	kind: 'package';
	discoverySource: 'package-manager-query';
	packageManager: PackageManager;
	packageName: string;
}

export type Candidate = PathCandidate | PackageCandidate;

export interface ScanResult {
	candidate: PathCandidate;
	included: boolean;
	sizeBytes: number | null;
}

export interface RunSummary {
	itemsFound: number;
	itemsRemoved: number;
	totalSizeBytes: number;
}

export type Outcome =
	| {status: 'skipped'; candidate: Candidate}
	| {status: 'would-remove'; candidate: Candidate; sizeBytes: number}
	| {status: 'removed'; candidate: Candidate; sizeBytes: number}
	| {status: 'failed'; candidate: Candidate; sizeBytes: number; error: string}
	| {status: 'absent'; candidate: Candidate};

export interface PassResult {
	mode: ExecutionMode;
	summary: RunSummary;
	outcomes: Outcome[];
}

export interface DeleteSuccessResult {
	path: string;
	ok: true;
}

export interface DeleteFailureResult {
	path: string;
	ok: false;
	error: string;
}

export type DeleteResult = DeleteSuccessResult | DeleteFailureResult;

export interface CommandResult {
	ok: boolean;
	exitCode: number | null;
	stdout: string;
	stderr: string;
	error?: string;
}

export interface CommandOptions {
	cwd?: string;
	inheritOutput?: boolean;
	timeoutMs?: number;
}

export interface CommandRunner {
	run: (
		command: string,
		args: readonly string[],
		options?: CommandOptions,
	) => Promise<CommandResult>;
	hasExecutable: (command: string) => Promise<boolean>;
}

export interface Reporter {
	info: (message: string) => void;
	success: (message: string) => void;
	step: (message: string) => void;
	warn: (message: string) => void;
	error: (message: string) => void;
	message: (message: string) => void;
	note: (message: string, title?: string) => void;
}

export interface SelectOption {
	value: string;
	label: string;
	hint?: string;
}

export interface Prompter {
	text: (message: string) => Promise<string | null>;
	confirm: (message: string) => Promise<boolean>;
	select: (
		message: string,
		options: readonly SelectOption[],
		initialValue: string,
	) => Promise<string | null>;
}
