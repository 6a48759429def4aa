#!/usr/bin/env node

import process from 'node:process';
import meow from 'meow';
import {checkInvocation} from './core/flags.js';
import {parseBrowserList, parseProjectDirectory} from './core/install.js';
import {runInstallSession} from './index.js';

const cli = meow(
	`
	Usage
	  $ playwright-reinstall [options]

	Description
	  Check prerequisites, offer to remove an existing Playwright installation,
	  then install Playwright and its browsers and verify the result.

	Options
	  --local             Install into the current directory instead of globally
	  --project=<dir>     Install into <dir> (implies --local)
	  --browsers=<list>   chromium, firefox, webkit (comma separated), all or prompt
	                      Default: chromium
	  --check             Only check prerequisites and existing installs
	  --skip-cleanup      Do not offer to remove an existing installation
	  --help              Show this help
	  --version           Show the version

	Examples
	  $ playwright-reinstall
	  $ playwright-reinstall --browsers=all
	  $ playwright-reinstall --project=./e2e --browsers=chromium,webkit
	  $ playwright-reinstall --check
	`,
	{
		importMeta: import.meta,
		flags: {
			local: {
				type: 'boolean',
				default: false,
			},
			project: {
				type: 'string',
			},
			browsers: {
				type: 'string',
			},
			check: {
				type: 'boolean',
				default: false,
			},
			skipCleanup: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

const KNOWN_FLAGS = [
	'local',
	'project',
	'browsers',
	'check',
	'skip-cleanup',
	'help',
	'version',
];
const VALUE_FLAGS = ['project', 'browsers'];

const fail = (message: string): void => {
	process.stderr.write(`${message}\n`);
	process.exitCode = 1;
};

const main = async (): Promise<void> => {
	const problem = checkInvocation({
		tool: 'playwright-reinstall',
		argv: process.argv.slice(2),
		knownFlags: KNOWN_FLAGS,
		valueFlags: VALUE_FLAGS,
		platform: process.platform,
	});
	if (problem) {
		fail(problem);
		return;
	}

	const project = parseProjectDirectory(cli.flags.project);
	if (!project.ok) {
		fail(project.error);
		return;
	}

	const browsers = parseBrowserList(cli.flags.browsers);
	for (const name of browsers.unknown) {
		process.stderr.write(`Ignoring unknown browser: ${name}\n`);
	}
	if (!browsers.ok) {
		fail(browsers.error);
		return;
	}

	process.exitCode = await runInstallSession({
		local: cli.flags.local || project.directory !== undefined,
		projectDirectory: project.directory,
		browsers: browsers.selection,
		checkOnly: cli.flags.check,
		skipCleanup: cli.flags.skipCleanup,
	});
};

await main();
