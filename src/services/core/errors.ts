/**
 * Failure kinds of one request/response cycle. Each kind maps to its own
 * process exit status; none is retried.
 *
 * @module errors
 */

import { EXIT_CODES, type ExitCode } from '../../constants.js';

export type AgentPipeErrorKind =
	| 'SessionUnavailable'
	| 'SessionError'
	| 'AgentStartTimeout'
	| 'SubmitFailed'
	| 'TimedOut'
	| 'EmptyResponse';

/**
 * Base class of every failure raised by the pipe.
 */
export abstract class AgentPipeError extends Error {
	abstract readonly kind: AgentPipeErrorKind;
	abstract readonly exitCode: ExitCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * tmux is not installed or cannot be executed.
 */
export class SessionUnavailableError extends AgentPipeError {
	readonly kind = 'SessionUnavailable';
	readonly exitCode = EXIT_CODES.SESSION_UNAVAILABLE;

	constructor(readonly binary: string, cause?: unknown) {
		super(`${binary} is not installed or not executable`, { cause });
	}
}

/**
 * A tmux control call exited with a nonzero status.
 */
export class SessionError extends AgentPipeError {
	readonly kind = 'SessionError';
	readonly exitCode = EXIT_CODES.SESSION_ERROR;

	constructor(
		readonly args: readonly string[],
		readonly stderr: string,
		readonly exitStatus: number | null,
		cause?: unknown
	) {
		super(`tmux ${args[0] ?? ''} failed: ${stderr.trim() || `exit status ${exitStatus ?? 'unknown'}`}`, { cause });
	}
}

/**
 * The agent never became ready after being launched.
 */
export class AgentStartTimeoutError extends AgentPipeError {
	readonly kind = 'AgentStartTimeout';
	readonly exitCode = EXIT_CODES.AGENT_START_TIMEOUT;

	constructor(readonly agentCommand: string, readonly timeoutMs: number) {
		super(`agent '${agentCommand}' did not become ready within ${timeoutMs / 1000}s`);
	}
}

/**
 * The prompt could not be delivered to the pane.
 */
export class SubmitFailedError extends AgentPipeError {
	readonly kind = 'SubmitFailed';
	readonly exitCode = EXIT_CODES.SUBMIT_FAILED;

	constructor(readonly step: string, cause: unknown) {
		super(`failed to submit prompt (${step}): ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
	}
}

/**
 * No completion signal arrived before the hard ceiling. Carries the partial
 * pane text for diagnostics; it is never printed as the answer.
 */
export class ResponseTimeoutError extends AgentPipeError {
	readonly kind = 'TimedOut';
	readonly exitCode = EXIT_CODES.TIMED_OUT;

	constructor(readonly elapsedMs: number, readonly partialOutput: string) {
		super(`timed out waiting for response after ${(elapsedMs / 1000).toFixed(1)}s`);
	}
}

/**
 * Sanitizing the captured output left nothing.
 */
export class EmptyResponseError extends AgentPipeError {
	readonly kind = 'EmptyResponse';
	readonly exitCode = EXIT_CODES.EMPTY_RESPONSE;

	constructor(readonly rawOutput: string) {
		super('agent response was empty');
	}
}
