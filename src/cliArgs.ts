import { ACTIONS, isAction, type Action, type ActionOutcome } from './actions.js';
import { PROFILE_NAMES } from './config/profiles.js';
import { logError, logProgress } from './dx/logger.js';
import { formatTestResults } from './testing/runTests.js';

export type CliArgs =
	| { kind: 'help' }
	| { kind: 'version' }
	| { kind: 'doctor'; root?: string }
	| { kind: 'action'; action: Action; profile?: string; clean: boolean; root?: string }
	| { kind: 'error'; message: string };

export function usage() {
	console.log(`forgekit

Usage:
	forgekit <${ACTIONS.join('|')}> [--config <${PROFILE_NAMES.join('|')}>] [--clean] [--root <dir>]
	forgekit doctor [--root <dir>]

Examples:
	forgekit all --config release
	forgekit tests --clean
	forgekit run-tests

Notes:
	- --config defaults to the project's defaultProfile, then debug
	- --clean wipes build/, bin/ and lib/ before the action
	- Exit code 1 on any compile/archive/link failure or failing test
`);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
	let command: string | undefined;
	let profile: string | undefined;
	let root: string | undefined;
	let clean = false;

	for (let i = 0; i < argv.length; i++) {
		const a = argv[i];
		if (a === '-h' || a === '--help') return { kind: 'help' };
		if (a === '-v' || a === '--version') return { kind: 'version' };
		if (a === '--clean') {
			clean = true;
		} else if (a === '--config' || a === '--root') {
			const value = argv[i + 1];
			if (value === undefined || value.startsWith('--')) return { kind: 'error', message: `Missing value for ${a}` };
			if (a === '--config') profile = value;
			else root = value;
			i++;
		} else if (a.startsWith('--config=')) {
			profile = a.slice('--config='.length);
		} else if (a.startsWith('-')) {
			return { kind: 'error', message: `Unknown option: ${a}` };
		} else if (command === undefined) {
			command = a;
		} else {
			return { kind: 'error', message: `Unexpected argument: ${a}` };
		}
	}

	if (command === undefined) return { kind: 'help' };
	if (command === 'doctor') return { kind: 'doctor', root };
	if (!isAction(command)) return { kind: 'error', message: `Unknown command: ${command}` };
	return { kind: 'action', action: command, profile, clean, root };
}

/** Closing line(s) and exit code for an outcome. */
export function reportOutcome(outcome: ActionOutcome): number {
	const run = outcome.artifacts.testRun;
	if (run && run.results.length) logProgress(`\n${formatTestResults(run.results)}`);
	if (run && !run.results.length) logProgress('No test executables found');

	if (outcome.ok) {
		if (outcome.action === 'run-tests') logProgress('\n✓ All tests passed!');
		return 0;
	}

	switch (outcome.kind) {
		case 'tests-failed':
			logError(`\n✗ Some tests failed! (${outcome.message})`);
			break;
		case 'invalid':
			logError(outcome.message);
			break;
		case 'build-failed': {
			const output = outcome.error?.details?.output;
			logError(`\n✗ Build failed: ${outcome.message}`);
			if (output && !outcome.message.includes(output)) logError(output);
			break;
		}
	}
	return 1;
}
