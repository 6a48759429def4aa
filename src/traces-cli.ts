#!/usr/bin/env node

import process from 'node:process';
import meow from 'meow';
import {checkInvocation} from './core/flags.js';
import {runTraceSession} from './index.js';

meow(
	`
	Usage
	  $ playwright-traces

	Description
	  Read-only scan of the whole filesystem for Playwright leftovers.
	  Prints the matches and writes playwright-traces-<timestamp>.txt
	  into the current directory. Nothing is removed.

	Options
	  --help        Show this help
	  --version     Show the version
	`,
	{
		importMeta: import.meta,
	},
);

const KNOWN_FLAGS = ['help', 'version'];

const main = async (): Promise<void> => {
	const problem = checkInvocation({
		tool: 'playwright-traces',
		argv: process.argv.slice(2),
		knownFlags: KNOWN_FLAGS,
	});
	if (problem) {
		process.stderr.write(`${problem}\n`);
		process.exitCode = 1;
		return;
	}

	process.exitCode = await runTraceSession();
};

await main();
