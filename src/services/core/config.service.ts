/**
 * Configuration loading.
 *
 * Tunables come from (highest precedence first) command line overrides, the
 * environment (optionally populated from `.env` by the entry point) and the
 * built-in defaults. Durations are read in seconds and kept in milliseconds.
 *
 * @module config.service
 */

import { LoggerService, isLogLevel } from './logger.service.js';
import {
	AGENT_PIPE_CONSTANTS,
	ENV_CONSTANTS,
	TIMING_CONSTANTS,
	type LogLevel,
} from '../../constants.js';

/** Environment-like source of configuration strings */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Resolved settings of one invocation.
 */
export interface PipeConfig {
	sessionName: string;
	agentCommand: string;
	/** Reset directive sent before every prompt */
	resetCommand: string;
	logLevel: LogLevel;
	idleTimeoutMs: number;
	maxWaitMs: number;
	pollIntervalMs: number;
	/** Wait after submitting, before the first completion poll */
	responseStartDelayMs: number;
	markerSettleMs: number;
	clearSettleMs: number;
	agentStartupDelayMs: number;
	agentStartTimeoutMs: number;
	startupStableMs: number;
	scrollbackLines: number;
}

/**
 * Values given on the command line. Durations in seconds.
 */
export interface ConfigOverrides {
	sessionName?: string;
	agentCommand?: string;
	idleTimeoutS?: number;
	maxWaitS?: number;
	logLevel?: LogLevel;
}

/**
 * Parse a positive number from an environment value, falling back to the
 * default (with a warning) when the value is not one.
 *
 * @param value - Raw value, possibly undefined
 * @param defaultValue - Value used when `value` is missing or invalid
 * @param envVarName - Variable name, for the warning
 */
export function parseNumberWithFallback(value: string | undefined, defaultValue: number, envVarName?: string): number {
	if (value === undefined || value.trim() === '') {
		return defaultValue;
	}

	const parsed = Number(value.trim());
	if (!Number.isFinite(parsed) || parsed <= 0) {
		const logger = LoggerService.getInstance().createComponentLogger('ConfigParser');
		logger.warn('Invalid numeric environment variable value, using default', {
			envVar: envVarName,
			value,
			defaultValue,
		});
		return defaultValue;
	}

	return parsed;
}

function secondsToMs(seconds: number): number {
	return Math.round(seconds * 1000);
}

function parseLogLevel(value: string | undefined): LogLevel {
	const fallback: LogLevel = 'warn';
	if (value === undefined || value.trim() === '') return fallback;

	const normalized = value.trim().toLowerCase();
	if (isLogLevel(normalized)) return normalized;

	LoggerService.getInstance().createComponentLogger('ConfigParser').warn('Unknown log level, using default', {
		envVar: ENV_CONSTANTS.AGENT_PIPE_LOG_LEVEL,
		value,
		defaultValue: fallback,
	});
	return fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * Resolve the configuration of one invocation.
 *
 * @param env - Environment to read (default: process.env)
 * @param overrides - Command line values, which win over the environment
 */
export function loadConfig(env: EnvSource = process.env, overrides: ConfigOverrides = {}): PipeConfig {
	const idleTimeoutS =
		overrides.idleTimeoutS ??
		parseNumberWithFallback(
			env[ENV_CONSTANTS.AGENT_PIPE_IDLE_TIMEOUT_S],
			TIMING_CONSTANTS.IDLE_TIMEOUT / 1000,
			ENV_CONSTANTS.AGENT_PIPE_IDLE_TIMEOUT_S
		);
	const maxWaitS =
		overrides.maxWaitS ??
		parseNumberWithFallback(
			env[ENV_CONSTANTS.AGENT_PIPE_MAX_WAIT_S],
			TIMING_CONSTANTS.MAX_WAIT / 1000,
			ENV_CONSTANTS.AGENT_PIPE_MAX_WAIT_S
		);
	const pollIntervalMs = parseNumberWithFallback(
		env[ENV_CONSTANTS.AGENT_PIPE_POLL_INTERVAL_MS],
		TIMING_CONSTANTS.POLL_INTERVAL,
		ENV_CONSTANTS.AGENT_PIPE_POLL_INTERVAL_MS
	);

	return {
		sessionName:
			overrides.sessionName ??
			nonEmpty(env[ENV_CONSTANTS.AGENT_PIPE_SESSION]) ??
			AGENT_PIPE_CONSTANTS.SESSIONS.DEFAULT_NAME,
		agentCommand:
			overrides.agentCommand ??
			nonEmpty(env[ENV_CONSTANTS.AGENT_PIPE_AGENT_COMMAND]) ??
			AGENT_PIPE_CONSTANTS.AGENT.DEFAULT_COMMAND,
		resetCommand: AGENT_PIPE_CONSTANTS.AGENT.RESET_COMMAND,
		logLevel: overrides.logLevel ?? parseLogLevel(env[ENV_CONSTANTS.AGENT_PIPE_LOG_LEVEL]),
		idleTimeoutMs: secondsToMs(idleTimeoutS),
		maxWaitMs: secondsToMs(maxWaitS),
		pollIntervalMs: Math.round(pollIntervalMs),
		responseStartDelayMs: TIMING_CONSTANTS.RESPONSE_START_DELAY,
		markerSettleMs: TIMING_CONSTANTS.MARKER_SETTLE_DELAY,
		clearSettleMs: TIMING_CONSTANTS.CLEAR_SETTLE_DELAY,
		agentStartupDelayMs: TIMING_CONSTANTS.AGENT_STARTUP_DELAY,
		agentStartTimeoutMs: TIMING_CONSTANTS.AGENT_START_TIMEOUT,
		startupStableMs: TIMING_CONSTANTS.AGENT_STARTUP_STABLE,
		scrollbackLines: AGENT_PIPE_CONSTANTS.SESSIONS.SCROLLBACK_LINES,
	};
}
