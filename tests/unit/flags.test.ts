import {expect, test} from 'vitest';
import {
	checkInvocation,
	findUnknownFlags,
	formatUnknownFlags,
} from '../../src/core/flags.js';

const KNOWN = ['local', 'project', 'browsers', 'help'];
const VALUE_FLAGS = ['project', 'browsers'];

test('known flags and their values are accepted', () => {
	expect(
		findUnknownFlags(
			['--local', '--project', 'e2e', '--browsers=chromium,webkit'],
			KNOWN,
			VALUE_FLAGS,
		),
	).toEqual([]);
});

test('negated boolean flags are accepted', () => {
	expect(findUnknownFlags(['--no-local'], KNOWN)).toEqual([]);
});

test('unknown flags, short flags and positionals are reported', () => {
	expect(
		findUnknownFlags(['--bogus', '-h', 'extra', '--', '--no-bogus=1'], KNOWN, VALUE_FLAGS),
	).toEqual(['--bogus', '-h', 'extra', '--', '--no-bogus=1']);
});

test('formatUnknownFlags pluralizes', () => {
	expect(formatUnknownFlags(['--bogus'])).toBe('Unknown option: --bogus');
	expect(formatUnknownFlags(['--a', '-b'])).toBe('Unknown options: --a, -b');
});

test('checkInvocation refuses platforms other than macOS', () => {
	expect(
		checkInvocation({
			tool: 'playwright-prune',
			argv: ['--dry-run'],
			knownFlags: ['dry-run'],
			platform: 'linux',
		}),
	).toBe('playwright-prune only supports macOS (detected linux).');
	expect(
		checkInvocation({
			tool: 'playwright-reinstall',
			argv: ['--project', 'e2e'],
			knownFlags: KNOWN,
			valueFlags: VALUE_FLAGS,
			platform: 'win32',
		}),
	).toBe('playwright-reinstall only supports macOS (detected win32).');
});

test('checkInvocation accepts macOS and tools without a platform check', () => {
	expect(
		checkInvocation({
			tool: 'playwright-prune',
			argv: [],
			knownFlags: ['dry-run'],
			platform: 'darwin',
		}),
	).toBeNull();
	expect(
		checkInvocation({tool: 'playwright-traces', argv: [], knownFlags: ['help']}),
	).toBeNull();
});

test('checkInvocation reports unknown flags before the platform', () => {
	expect(
		checkInvocation({
			tool: 'playwright-prune',
			argv: ['--force'],
			knownFlags: ['dry-run'],
			platform: 'linux',
		}),
	).toBe('Unknown option: --force\nRun playwright-prune --help for usage.');
});
