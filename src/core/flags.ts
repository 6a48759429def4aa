import {isSupportedPlatform} from './config.js';

/**
 * Lists argv tokens that are not one of `knownFlags` (kebab-case names
 * without dashes). Positional arguments and short flags count as unknown.
 * The token after a `valueFlags` entry given as `--name value` is skipped.
 */
export const findUnknownFlags = (
	argv: readonly string[],
	knownFlags: readonly string[],
	valueFlags: readonly string[] = [],
): string[] => {
	const unknown: string[] = [];
	for (let index = 0; index < argv.length; index++) {
		const token = argv[index] ?? '';
		if (!token.startsWith('--') || token === '--') {
			unknown.push(token);
			continue;
		}

		const [rawName = ''] = token.slice(2).split('=', 1);
		const name =
			rawName.startsWith('no-') && knownFlags.includes(rawName.slice(3))
				? rawName.slice(3)
				: rawName;
		if (!knownFlags.includes(name)) {
			unknown.push(token);
			continue;
		}

		if (valueFlags.includes(name) && !token.includes('=')) index++;
	}

	return unknown;
};

export const formatUnknownFlags = (unknown: readonly string[]): string =>
	`Unknown option${unknown.length === 1 ? '' : 's'}: ${unknown.join(', ')}`;

export interface InvocationCheck {
	tool: string;
	argv: readonly string[];
	knownFlags: readonly string[];
	valueFlags?: readonly string[];
	platform?: NodeJS.Platform;
}

/** The message to print before exiting with code 1, or null to proceed. */
export const checkInvocation = ({
	tool,
	argv,
	knownFlags,
	valueFlags,
	platform,
}: InvocationCheck): string | null => {
	const unknownFlags = findUnknownFlags(argv, knownFlags, valueFlags);
	if (unknownFlags.length > 0) {
		return `${formatUnknownFlags(unknownFlags)}\nRun ${tool} --help for usage.`;
	}

	if (platform !== undefined && !isSupportedPlatform(platform)) {
		return `${tool} only supports macOS (detected ${platform}).`;
	}

	return null;
};
