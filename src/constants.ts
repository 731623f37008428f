/**
 * Service-level constants
 * Re-exported from the main config constants for service use
 */

import {
	AGENT_PIPE_CONSTANTS as CONFIG_AGENT_PIPE_CONSTANTS,
	TIMING_CONSTANTS as CONFIG_TIMING_CONSTANTS,
} from '../config/constants.js';

export const AGENT_PIPE_CONSTANTS = CONFIG_AGENT_PIPE_CONSTANTS;
export const TIMING_CONSTANTS = CONFIG_TIMING_CONSTANTS;

export const LOG_PREFIX = `[${CONFIG_AGENT_PIPE_CONSTANTS.NAME}]`;

// Environment variable names
export const ENV_CONSTANTS = {
	AGENT_PIPE_SESSION: 'AGENT_PIPE_SESSION',
	AGENT_PIPE_AGENT_COMMAND: 'AGENT_PIPE_AGENT_COMMAND',
	AGENT_PIPE_IDLE_TIMEOUT_S: 'AGENT_PIPE_IDLE_TIMEOUT_S',
	AGENT_PIPE_MAX_WAIT_S: 'AGENT_PIPE_MAX_WAIT_S',
	AGENT_PIPE_POLL_INTERVAL_MS: 'AGENT_PIPE_POLL_INTERVAL_MS',
	AGENT_PIPE_LOG_LEVEL: 'AGENT_PIPE_LOG_LEVEL',
} as const;

// tmux invocation constants
export const TMUX_CONSTANTS = {
	BINARY: 'tmux',
	/** Named paste buffer used for multi-line prompts */
	PASTE_BUFFER_NAME: 'agent-pipe-prompt',
	/** Format string that yields the pane's foreground process */
	CURRENT_COMMAND_FORMAT: '#{pane_current_command}',
	/** Max bytes accepted on a tmux stdout before execFile fails */
	MAX_BUFFER: 64 * 1024 * 1024,
	/** stderr fragment tmux prints when new-session loses a creation race */
	DUPLICATE_SESSION_ERROR: 'duplicate session',
} as const;

// Session command timing delays (in milliseconds)
export const SESSION_COMMAND_DELAYS = {
	/** Base delay between literal text and Enter (allows bracketed paste to settle) */
	MESSAGE_DELAY: CONFIG_TIMING_CONSTANTS.SUBMIT_DELAY,
	/** Cap for the length-scaled message delay */
	MAX_MESSAGE_DELAY: CONFIG_TIMING_CONSTANTS.MAX_SUBMIT_DELAY,
	/** Delay after sending a key (allows key to be processed) */
	KEY_DELAY: 200,
} as const;

// Prompt detection constants
export const PROMPT_DETECTION_CONSTANTS = {
	/** Number of trailing pane lines scanned for an input prompt */
	VISIBLE_LINES: 8,
	/** Max length of a bare prompt line (prompt char plus cursor cell) */
	MAX_PROMPT_LINE_LENGTH: 2,
} as const;

// Completion detection constants
export const COMPLETION_CONSTANTS = {
	/** Idle window multiplier that completes even when no prompt is visible */
	IDLE_FALLBACK_MULTIPLIER: 3,
} as const;

// Output sanitizer constants
export const SANITIZER_CONSTANTS = {
	/** Prefix of the prompt used to find its echo in the pane */
	PROMPT_NEEDLE_LENGTH: 60,
	/** Hint line rendered under the agent input box */
	SHORTCUTS_HINT: '? for shortcuts',
} as const;

// Process exit codes, one per failure kind
export const EXIT_CODES = {
	SUCCESS: 0,
	GENERAL_FAILURE: 1,
	SESSION_UNAVAILABLE: 2,
	SESSION_ERROR: 3,
	AGENT_START_TIMEOUT: 4,
	SUBMIT_FAILED: 5,
	TIMED_OUT: 6,
	EMPTY_RESPONSE: 7,
	SIGINT: 130,
	SIGTERM: 143,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
