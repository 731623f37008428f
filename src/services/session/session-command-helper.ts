/**
 * Session Command Helper
 *
 * Provides high-level terminal command operations on top of the ITerminalBackend
 * abstraction. Services such as AgentBootstrapService and PromptSubmitterService
 * talk to the pane only through this helper.
 *
 * Key mappings onto the backend:
 * - sendKeys(text, submit) → sendLiteral / pasteText, delay, sendControlKey('Enter')
 * - sendKey → sendControlKey
 * - capturePane → capturePane (trailing blank rows removed)
 * - hasRunningCommand → getForegroundCommand
 *
 * @module session-command-helper
 */

import type { ControlKey, ITerminalBackend, PaneSnapshot } from './session-backend.interface.js';
import { TmuxSessionBackend } from './tmux/tmux-session-backend.js';
import { LoggerService, type ComponentLogger } from '../core/logger.service.js';
import { AGENT_PIPE_CONSTANTS, SESSION_COMMAND_DELAYS } from '../../constants.js';
import { delay, type SleepFn } from '../../utils/async.utils.js';
import { isAgentAtPrompt, stripAnsiCodes } from '../../utils/terminal-string-ops.js';

/**
 * Delay between typing a message and pressing Enter. Large prompts need more
 * time for the agent to take in the bracketed paste: base delay plus 1ms per
 * 10 characters, capped.
 *
 * @param length - Message length in characters
 */
export function scaledMessageDelay(length: number): number {
	return Math.min(
		SESSION_COMMAND_DELAYS.MESSAGE_DELAY + Math.ceil(length / 10),
		SESSION_COMMAND_DELAYS.MAX_MESSAGE_DELAY
	);
}

/**
 * Session Command Helper class
 */
export class SessionCommandHelper {
	private logger: ComponentLogger;

	constructor(
		private readonly backend: ITerminalBackend,
		private readonly sleep: SleepFn = delay
	) {
		this.logger = LoggerService.getInstance().createComponentLogger('SessionCommandHelper');
	}

	/**
	 * Create the session if it does not exist yet.
	 */
	async ensureSession(sessionName: string): Promise<void> {
		await this.backend.ensureSession(sessionName);
	}

	/**
	 * Type text into a session, optionally followed by a separate Enter.
	 *
	 * Multi-line text goes in as one bracketed paste so its newlines are not
	 * taken as separate submissions. Enter is always sent on its own, after a
	 * delay scaled to the text length.
	 *
	 * @param sessionName - The session to send to
	 * @param text - Text to type
	 * @param submit - Whether to press Enter afterwards
	 */
	async sendKeys(sessionName: string, text: string, submit: boolean): Promise<void> {
		const isMultiLine = text.includes('\n');

		this.logger.debug('Sending text to session', {
			sessionName,
			messageLength: text.length,
			isMultiLine,
			submit,
		});

		if (isMultiLine) {
			await this.backend.pasteText(sessionName, text);
		} else if (text.length > 0) {
			await this.backend.sendLiteral(sessionName, text);
		}

		if (!submit) return;

		const pasteDelay = scaledMessageDelay(text.length);
		await this.sleep(pasteDelay);
		await this.backend.sendControlKey(sessionName, 'Enter');

		this.logger.debug('Text sent with Enter key', {
			sessionName,
			messageLength: text.length,
			pasteDelay,
		});
	}

	/**
	 * Send a named control key.
	 */
	async sendKey(sessionName: string, key: ControlKey): Promise<void> {
		await this.backend.sendControlKey(sessionName, key);
		this.logger.debug('Sent key to session', { sessionName, key });
		await this.sleep(SESSION_COMMAND_DELAYS.KEY_DELAY);
	}

	/**
	 * Capture terminal output from a session.
	 *
	 * Strips trailing empty lines left by unused terminal rows below the
	 * content. Iterative rather than a regex, so long captures with many blank
	 * rows stay linear.
	 *
	 * @param sessionName - The session to capture from
	 * @param scrollbackLines - History lines to include (default: configured scrollback)
	 * @returns The captured pane text with trailing empty lines removed
	 */
	async capturePane(
		sessionName: string,
		scrollbackLines: number = AGENT_PIPE_CONSTANTS.SESSIONS.SCROLLBACK_LINES
	): Promise<PaneSnapshot> {
		const output = await this.backend.capturePane(sessionName, scrollbackLines);
		const outputLines = output.split('\n');
		let lastContentLine = outputLines.length - 1;
		while (lastContentLine >= 0 && outputLines[lastContentLine].trim() === '') {
			lastContentLine--;
		}
		if (lastContentLine < 0) return '';
		return outputLines.slice(0, lastContentLine + 1).join('\n');
	}

	/**
	 * Check whether the pane's foreground process matches any of the given
	 * names (case-insensitive substring).
	 *
	 * @param sessionName - The session to inspect
	 * @param patterns - Process names, e.g. `['node', 'claude']`
	 */
	async hasRunningCommand(
		sessionName: string,
		patterns: readonly string[] = AGENT_PIPE_CONSTANTS.AGENT.PROCESS_NAMES
	): Promise<boolean> {
		const command = (await this.backend.getForegroundCommand(sessionName)).toLowerCase();
		const matched = command.length > 0 && patterns.some((pattern) => command.includes(pattern.toLowerCase()));
		this.logger.debug('Foreground command checked', { sessionName, command, matched });
		return matched;
	}

	/**
	 * True when the agent's input prompt is visible near the bottom of the pane.
	 */
	async isPromptVisible(sessionName: string): Promise<boolean> {
		const output = await this.capturePane(sessionName, 0);
		return isAgentAtPrompt(stripAnsiCodes(output));
	}
}

/**
 * Create a SessionCommandHelper, over tmux unless another backend is given.
 */
export function createSessionCommandHelper(
	backend: ITerminalBackend = new TmuxSessionBackend(),
	sleep: SleepFn = delay
): SessionCommandHelper {
	return new SessionCommandHelper(backend, sleep);
}
