#!/usr/bin/env node

import process from 'node:process';
import meow from 'meow';
import {checkInvocation} from './core/flags.js';
import {runCleanupSession} from './index.js';

const cli = meow(
	`
	Usage
	  $ playwright-prune [options]

	Description
	  Find and remove Playwright for Node.js browser caches, global packages,
	  package-manager cache entries and leftover binaries. Installs used by
	  other languages, editor extensions and project folders are never touched.

	  Without options every item is listed first, then removed after typing
	  YES and DELETE PLAYWRIGHT and a short countdown.

	Options
	  --dry-run     List what would be removed, remove nothing
	  --help        Show this help
	  --version     Show the version

	Environment
	  PLAYWRIGHT_BROWSERS_PATH          Browser cache location
	  NVM_DIR                           nvm installation root
	  TMPDIR                            Temporary directory
	  PLAYWRIGHT_PRUNE_PROTECTED_PATHS  Extra protected paths (colon separated)

	Examples
	  $ playwright-prune --dry-run
	  $ playwright-prune
	`,
	{
		importMeta: import.meta,
		flags: {
			dryRun: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

const KNOWN_FLAGS = ['dry-run', 'help', 'version'];

const main = async (): Promise<void> => {
	const problem = checkInvocation({
		tool: 'playwright-prune',
		argv: process.argv.slice(2),
		knownFlags: KNOWN_FLAGS,
		platform: process.platform,
	});
	if (problem) {
		process.stderr.write(`${problem}\n`);
		process.exitCode = 1;
		return;
	}

	process.exitCode = await runCleanupSession({dryRun: cli.flags.dryRun});
};

await main();
