import process from 'node:process';
import {
	cancel,
	confirm,
	intro,
	isCancel,
	log,
	note,
	outro,
	select,
	spinner,
	text,
} from '@clack/prompts';
import {runCleanup, type CleanupStatus, type Countdown} from './core/cleanup.js';
import {createCommandRunner} from './core/command.js';
import {COUNTDOWN_SECONDS, runCountdown} from './core/confirm.js';
import {resolveSystemLayout} from './core/config.js';
import {pluralize} from './core/format.js';
import {runInstall, type InstallOptions} from './core/install.js';
import {runTraceFinder} from './core/traces.js';
import type {Prompter, Reporter, SystemLayout} from './core/types.js';

export const createTerminalReporter = (): Reporter => ({
	info(message) {
		log.info(message);
	},
	success(message) {
		log.success(message);
	},
	step(message) {
		log.step(message);
	},
	warn(message) {
		log.warn(message);
	},
	error(message) {
		log.error(message);
	},
	message(message) {
		log.message(message);
	},
	note(message, title) {
		note(message, title);
	},
});

export const createTerminalPrompter = (): Prompter => ({
	async text(message) {
		const answer = await text({message});
		return isCancel(answer) ? null : answer;
	},
	async confirm(message) {
		const answer = await confirm({message, initialValue: false});
		return isCancel(answer) ? false : answer;
	},
	async select(message, options, initialValue) {
		const answer = await select({message, options: [...options], initialValue});
		return isCancel(answer) ? null : answer;
	},
});

const countdownMessage = (remaining: number): string =>
	`Removing in ${remaining}s. Press Ctrl+C to cancel.`;

export const createTerminalCountdown =
	(seconds = COUNTDOWN_SECONDS): Countdown =>
	async () => {
		const controller = new AbortController();
		const abort = (): void => {
			controller.abort();
		};
		process.once('SIGINT', abort);

		const indicator = spinner();
		indicator.start(countdownMessage(seconds));
		try {
			const completed = await runCountdown({
				seconds,
				signal: controller.signal,
				onTick(remaining) {
					indicator.message(countdownMessage(remaining));
				},
			});
			indicator.stop(completed ? 'Starting removal' : 'Cancelled', completed ? 0 : 1);
			return completed;
		} finally {
			process.removeListener('SIGINT', abort);
		}
	};

const createTerminalContext = (layout: SystemLayout) => ({
	layout,
	runner: createCommandRunner(),
	reporter: createTerminalReporter(),
	prompter: createTerminalPrompter(),
	countdown: createTerminalCountdown(),
});

const CLEANUP_OUTROS: Record<CleanupStatus, string> = {
	clean: 'Nothing to clean up.',
	previewed: 'Dry run complete. No changes were made.',
	aborted: 'No changes were made.',
	completed: 'Cleanup finished.',
};

export const runCleanupSession = async ({
	dryRun,
}: {
	dryRun: boolean;
}): Promise<number> => {
	intro(dryRun ? 'playwright-prune (dry run)' : 'playwright-prune');
	const result = await runCleanup({
		...createTerminalContext(resolveSystemLayout()),
		dryRun,
	});

	if (result.status === 'aborted') {
		cancel(CLEANUP_OUTROS.aborted);
	} else {
		outro(CLEANUP_OUTROS[result.status]);
	}
	return 0;
};

export const runInstallSession = async (
	options: InstallOptions,
): Promise<number> => {
	intro(options.checkOnly ? 'playwright-reinstall (check)' : 'playwright-reinstall');
	const exitCode = await runInstall(
		options,
		createTerminalContext(resolveSystemLayout()),
	);

	if (exitCode === 0) {
		outro(options.checkOnly ? 'Check complete.' : 'Installation finished.');
	} else {
		cancel('Installation did not complete.');
	}
	return exitCode;
};

export const runTraceSession = async (): Promise<number> => {
	intro('playwright-traces');
	const {scan} = await runTraceFinder({
		layout: resolveSystemLayout(),
		reporter: createTerminalReporter(),
	});
	outro(`${pluralize(scan.paths.length, 'result')}.`);
	return 0;
};
