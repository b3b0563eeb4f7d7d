#!/usr/bin/env node

import { readFileSync } from 'node:fs';

import { runAction } from './actions.js';
import { parseCliArgs, reportOutcome, usage } from './cliArgs.js';
import { resolveBuildContext } from './config/context.js';
import { loadOptionalConfig } from './dx/config.js';
import { logError } from './dx/logger.js';
import { doctorReport, isHealthy } from './doctor.js';
import { errorMessage } from './errors.js';

function readVersion(): string {
	const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
	if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
		return raw.version;
	}
	return 'unknown';
}

async function main(): Promise<number> {
	const args = parseCliArgs(process.argv.slice(2));

	switch (args.kind) {
		case 'help':
			usage();
			return 0;
		case 'version':
			console.log(readVersion());
			return 0;
		case 'error':
			logError(args.message);
			usage();
			return 1;
		case 'doctor': {
			const root = args.root ?? process.cwd();
			const cfg = await loadOptionalConfig(root);
			const lines = doctorReport(resolveBuildContext(root, cfg), { compiler: cfg?.compiler, archiver: cfg?.archiver });
			console.log(lines.join('\n'));
			return isHealthy(lines) ? 0 : 1;
		}
		case 'action': {
			const outcome = await runAction(args.action, { profile: args.profile, clean: args.clean, projectRoot: args.root });
			return reportOutcome(outcome);
		}
	}
}

main().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		logError(`[forgekit] ${errorMessage(err)}`);
		if (err instanceof Error && err.stack) logError(err.stack);
		process.exitCode = 1;
	},
);
