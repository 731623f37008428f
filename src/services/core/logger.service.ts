/**
 * Logger Service
 *
 * Process-wide diagnostics logger. Every record goes to the diagnostic
 * stream (stderr by default) so that stdout carries only the agent answer.
 *
 * @module logger.service
 */

import chalk from 'chalk';
import { LOG_LEVELS, LOG_PREFIX, type LogLevel } from '../../constants.js';

/** Structured context attached to a log record */
export type LogContext = Record<string, unknown>;

/** Minimal writable sink (process.stderr in production) */
export interface LogSink {
	write(chunk: string): unknown;
}

/**
 * Logger bound to one component name.
 */
export interface ComponentLogger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
	debug: chalk.gray,
	info: chalk.cyan,
	warn: chalk.yellow,
	error: chalk.red,
};

/**
 * Check whether a string names a known log level.
 */
export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Render a context object as `key=value` pairs. Errors are reduced to their message.
 */
function formatContext(context: LogContext | undefined): string {
	if (!context) return '';
	const parts: string[] = [];
	for (const [key, value] of Object.entries(context)) {
		if (value === undefined) continue;
		let rendered: string;
		if (value instanceof Error) {
			rendered = JSON.stringify(value.message);
		} else if (typeof value === 'string') {
			rendered = JSON.stringify(value);
		} else {
			rendered = JSON.stringify(value) ?? String(value);
		}
		parts.push(`${key}=${rendered}`);
	}
	return parts.length > 0 ? ' ' + parts.join(' ') : '';
}

/**
 * Singleton logger service.
 *
 * @example
 * ```typescript
 * const logger = LoggerService.getInstance().createComponentLogger('TmuxSessionBackend');
 * logger.debug('Captured pane', { sessionName, length: output.length });
 * ```
 */
export class LoggerService {
	private static instance: LoggerService | null = null;
	private level: LogLevel = 'warn';
	private sink: LogSink = process.stderr;

	private constructor() {}

	public static getInstance(): LoggerService {
		if (!LoggerService.instance) {
			LoggerService.instance = new LoggerService();
		}
		return LoggerService.instance;
	}

	/**
	 * Drop the singleton. Used by tests.
	 */
	public static resetInstance(): void {
		LoggerService.instance = null;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	/**
	 * Redirect output, e.g. to a capturing sink in tests.
	 */
	setSink(sink: LogSink): void {
		this.sink = sink;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
	}

	/**
	 * Create a logger whose records are tagged with a component name.
	 *
	 * @param component - Name shown in every record
	 */
	createComponentLogger(component: string): ComponentLogger {
		return {
			debug: (message, context) => this.log('debug', component, message, context),
			info: (message, context) => this.log('info', component, message, context),
			warn: (message, context) => this.log('warn', component, message, context),
			error: (message, context) => this.log('error', component, message, context),
		};
	}

	private log(level: LogLevel, component: string, message: string, context?: LogContext): void {
		if (!this.isLevelEnabled(level)) return;
		const tag = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
		const line = `${LOG_PREFIX} ${tag} ${chalk.bold(component)}: ${message}${formatContext(context)}\n`;
		this.sink.write(line);
	}
}
