/**
 * Command line surface.
 *
 * `agent-pipe [options] [message...]` sends the message (or standard input)
 * to the agent and prints only its answer on stdout. Diagnostics and errors
 * go to stderr; each failure kind has its own exit status.
 *
 * @module cli
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { AGENT_PIPE_CONSTANTS, EXIT_CODES, LOG_PREFIX, type ExitCode } from '../constants.js';
import { loadConfig, type EnvSource, type PipeConfig } from '../services/core/config.service.js';
import { LoggerService, type LogSink } from '../services/core/logger.service.js';
import { AgentPipeError, ResponseTimeoutError } from '../services/core/errors.js';
import { PipeRunner } from '../services/pipe/pipe-runner.service.js';

interface CliOptions {
	verbose?: boolean;
	session?: string;
	agentCommand?: string;
	idleTimeout?: number;
	maxWait?: number;
}

/** Anything that turns a prompt into an answer */
export interface PromptRunner {
	run(prompt: string): Promise<{ answer: string }>;
}

export interface CliDependencies {
	env?: EnvSource;
	stdout?: LogSink;
	stderr?: LogSink;
	/** Whether stdin is attached to a terminal (no piped message) */
	stdinIsTTY?: boolean;
	readStdin?: () => Promise<string>;
	createRunner?: (config: PipeConfig) => PromptRunner;
}

/**
 * Read all of a stream as UTF-8 text.
 */
export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
	const chunks: string[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
	}
	return chunks.join('');
}

function parseSeconds(value: string): number {
	const parsed = Number(value);
	if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Expected a positive number of seconds.');
	}
	return parsed;
}

/**
 * Exit status for a failure: the error's own status for pipe errors, 1 otherwise.
 */
export function exitCodeForError(error: unknown): ExitCode {
	return error instanceof AgentPipeError ? error.exitCode : EXIT_CODES.GENERAL_FAILURE;
}

function usage(name: string): string {
	return [
		'Usage:',
		`  ${name} [options] <message>`,
		`  <some-command> | ${name} [options]`,
		'',
		`Run '${name} --help' for the list of options.`,
		'',
	].join('\n');
}

function buildProgram(stdout: LogSink, stderr: LogSink): Command {
	const { NAME, VERSION, SESSIONS, AGENT } = AGENT_PIPE_CONSTANTS;

	return new Command()
		.name(NAME)
		.description('Send a prompt to an interactive agent running in tmux and print its answer')
		.version(VERSION, '-V, --version')
		.argument('[message...]', 'prompt text (read from stdin when omitted)')
		.option('-v, --verbose', 'print progress diagnostics on stderr')
		.option('-s, --session <name>', `tmux session name (default: ${SESSIONS.DEFAULT_NAME})`)
		.option('-a, --agent-command <cmd>', `command that starts the agent (default: ${AGENT.DEFAULT_COMMAND})`)
		.option('--idle-timeout <seconds>', 'quiet time that completes a response', parseSeconds)
		.option('--max-wait <seconds>', 'hard ceiling for one response', parseSeconds)
		.exitOverride()
		.configureOutput({
			writeOut: (text) => stdout.write(text),
			writeErr: (text) => stderr.write(text),
		});
}

/**
 * Run the command line.
 *
 * @param argv - Arguments after the executable and script path
 * @param deps - I/O and collaborators (process streams and PipeRunner by default)
 * @returns Process exit status
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
	const stdout = deps.stdout ?? process.stdout;
	const stderr = deps.stderr ?? process.stderr;
	const reportError = (message: string): void => {
		stderr.write(`${LOG_PREFIX} ERROR: ${message}\n`);
	};

	const program = buildProgram(stdout, stderr);
	try {
		program.parse([...argv], { from: 'user' });
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		throw error;
	}

	const options = program.opts<CliOptions>();
	const logger = LoggerService.getInstance();
	logger.setSink(stderr);

	const config = loadConfig(deps.env ?? process.env, {
		sessionName: options.session,
		agentCommand: options.agentCommand,
		idleTimeoutS: options.idleTimeout,
		maxWaitS: options.maxWait,
		logLevel: options.verbose ? 'debug' : undefined,
	});
	logger.setLevel(config.logLevel);
	const log = logger.createComponentLogger('Cli');

	let message: string;
	if (program.args.length > 0) {
		message = program.args.join(' ');
	} else if (!(deps.stdinIsTTY ?? Boolean(process.stdin.isTTY))) {
		message = (await (deps.readStdin ?? (() => readStream(process.stdin)))()).trim();
	} else {
		stderr.write(usage(program.name()));
		return EXIT_CODES.GENERAL_FAILURE;
	}

	if (message.trim().length === 0) {
		reportError('empty message');
		return EXIT_CODES.GENERAL_FAILURE;
	}

	log.debug('Resolved configuration', {
		sessionName: config.sessionName,
		agentCommand: config.agentCommand,
		idleTimeoutMs: config.idleTimeoutMs,
		maxWaitMs: config.maxWaitMs,
	});

	const runner = deps.createRunner ? deps.createRunner(config) : new PipeRunner(config);
	try {
		const { answer } = await runner.run(message);
		stdout.write(`${answer}\n`);
		return EXIT_CODES.SUCCESS;
	} catch (error) {
		if (error instanceof ResponseTimeoutError) {
			log.debug('Partial output at timeout', { partialOutput: error.partialOutput });
		}
		if (error instanceof AgentPipeError) {
			reportError(error.message);
		} else {
			reportError(`unexpected error: ${error instanceof Error ? error.message : String(error)}`);
		}
		return exitCodeForError(error);
	}
}
