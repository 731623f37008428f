#!/usr/bin/env node
/**
 * agent-pipe executable entry point.
 *
 * Loads `.env`, installs signal handlers and runs the command line. Signals
 * end the process only; the tmux session and the agent keep running.
 */

import dotenv from 'dotenv';
import path from 'path';
import { EXIT_CODES, LOG_PREFIX } from '../constants.js';
import { runCli } from './cli.js';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

function exitOnSignal(signal: NodeJS.Signals, code: number): void {
	process.once(signal, () => {
		process.stderr.write(`\n${LOG_PREFIX} interrupted by ${signal}; tmux session left running\n`);
		process.exit(code);
	});
}

exitOnSignal('SIGINT', EXIT_CODES.SIGINT);
exitOnSignal('SIGTERM', EXIT_CODES.SIGTERM);

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		process.stderr.write(`${LOG_PREFIX} ERROR: ${error instanceof Error ? error.message : String(error)}\n`);
		process.exitCode = EXIT_CODES.GENERAL_FAILURE;
	});
