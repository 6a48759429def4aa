import {setTimeout as delay} from 'node:timers/promises';
import {human, pluralize} from './format.js';
import type {Prompter, Reporter, RunSummary} from './types.js';

export const CONFIRMATION_PHRASES = ['YES', 'DELETE PLAYWRIGHT'] as const;
export const COUNTDOWN_SECONDS = 5;

export type Sleep = (milliseconds: number, signal?: AbortSignal) => Promise<void>;

export interface CountdownOptions {
	seconds?: number;
	sleep?: Sleep;
	signal?: AbortSignal;
	onTick?: (remainingSeconds: number) => void;
}

export const defaultSleep: Sleep = async (milliseconds, signal) => {
	await delay(milliseconds, undefined, {signal});
};

export const runConfirmationGate = async (
	prompter: Prompter,
	reporter: Reporter,
	summary: RunSummary,
): Promise<boolean> => {
	reporter.warn(
		`This permanently removes ${pluralize(summary.itemsFound, 'item')} (${human(summary.totalSizeBytes)}).`,
	);

	const [first, second] = CONFIRMATION_PHRASES;
	const steps = [
		{phrase: first, message: `Type ${first} to continue`},
		{phrase: second, message: `Type ${second} to confirm removal`},
	];

	for (const step of steps) {
		// eslint-disable-next-line no-await-in-loop
		const answer = await prompter.text(step.message);
		if (answer !== step.phrase) {
			reporter.info('Aborted. Nothing was removed.');
			return false;
		}
	}

	return true;
};

export const runCountdown = async ({
	seconds = COUNTDOWN_SECONDS,
	sleep = defaultSleep,
	signal,
	onTick,
}: CountdownOptions = {}): Promise<boolean> => {
	for (let remaining = seconds; remaining > 0; remaining--) {
		if (signal?.aborted) return false;
		onTick?.(remaining);
		try {
			// eslint-disable-next-line no-await-in-loop
			await sleep(1000, signal);
		} catch (error) {
			if (signal?.aborted) return false;
			throw error;
		}
	}

	return !signal?.aborted;
};
