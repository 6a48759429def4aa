import {expect, test} from 'vitest';
import {
	CONFIRMATION_PHRASES,
	runConfirmationGate,
	runCountdown,
} from '../../src/core/confirm.js';
import {createRecordingReporter, createScriptedPrompter} from '../helpers.js';

const summary = {itemsFound: 3, itemsRemoved: 0, totalSizeBytes: 2048};

test('the gate passes only when both phrases are typed exactly', async () => {
	const prompter = createScriptedPrompter({texts: [...CONFIRMATION_PHRASES]});
	const reporter = createRecordingReporter();

	expect(await runConfirmationGate(prompter, reporter, summary)).toBe(true);
	expect(prompter.asked).toEqual([
		'Type YES to continue',
		'Type DELETE PLAYWRIGHT to confirm removal',
	]);
	expect(reporter.messagesAt('warn')).toEqual([
		'This permanently removes 3 items (2.0 KB).',
	]);
});

test.each([
	[['yes']],
	[[' YES']],
	[['YES', 'delete playwright']],
	[['YES', 'DELETE PLAYWRIGHT ']],
	[[null]],
])('the gate rejects %j', async texts => {
	const prompter = createScriptedPrompter({texts});
	const reporter = createRecordingReporter();

	expect(await runConfirmationGate(prompter, reporter, summary)).toBe(false);
	expect(reporter.messagesAt('info')).toEqual(['Aborted. Nothing was removed.']);
});

test('the gate stops asking after the first mismatch', async () => {
	const prompter = createScriptedPrompter({texts: ['no', 'DELETE PLAYWRIGHT']});

	await runConfirmationGate(prompter, createRecordingReporter(), summary);

	expect(prompter.asked).toHaveLength(1);
});

test('runCountdown ticks down once per second', async () => {
	const ticks: number[] = [];
	const sleeps: number[] = [];

	const completed = await runCountdown({
		seconds: 3,
		async sleep(milliseconds) {
			sleeps.push(milliseconds);
		},
		onTick(remaining) {
			ticks.push(remaining);
		},
	});

	expect(completed).toBe(true);
	expect(ticks).toEqual([3, 2, 1]);
	expect(sleeps).toEqual([1000, 1000, 1000]);
});

test('runCountdown stops when the signal aborts between ticks', async () => {
	const controller = new AbortController();
	const ticks: number[] = [];
	let calls = 0;

	const completed = await runCountdown({
		seconds: 3,
		signal: controller.signal,
		async sleep() {
			calls++;
			if (calls === 2) controller.abort();
		},
		onTick(remaining) {
			ticks.push(remaining);
		},
	});

	expect(completed).toBe(false);
	expect(ticks).toEqual([3, 2]);
});

test('runCountdown returns false when interrupted during a real sleep', async () => {
	const controller = new AbortController();
	setTimeout(() => {
		controller.abort();
	}, 10);

	expect(await runCountdown({seconds: 5, signal: controller.signal})).toBe(false);
});

test('runCountdown returns false for an already aborted signal', async () => {
	const controller = new AbortController();
	controller.abort();
	const ticks: number[] = [];

	const completed = await runCountdown({
		signal: controller.signal,
		onTick(remaining) {
			ticks.push(remaining);
		},
	});

	expect(completed).toBe(false);
	expect(ticks).toEqual([]);
});

test('runCountdown propagates unexpected sleep failures', async () => {
	await expect(
		runCountdown({
			seconds: 1,
			async sleep() {
				throw new Error('timer broke');
			},
		}),
	).rejects.toThrow('timer broke');
});
