/**
 * tmux Session Backend Module
 *
 * Implements ITerminalBackend on top of the tmux command line. The session is
 * an external resource shared across invocations: this backend creates it when
 * missing and never kills it.
 *
 * @module tmux-session-backend
 */

import type { ControlKey, ITerminalBackend, PaneSnapshot } from '../session-backend.interface.js';
import { ExecFileTmuxRunner, type TmuxCommandRunner } from './tmux-command-runner.js';
import { SessionError } from '../../core/errors.js';
import { LoggerService, type ComponentLogger } from '../../core/logger.service.js';
import { TMUX_CONSTANTS } from '../../../constants.js';

/**
 * tmux implementation of the terminal backend.
 *
 * @example
 * ```typescript
 * const backend = new TmuxSessionBackend();
 * await backend.ensureSession('agent-pipe');
 * await backend.sendLiteral('agent-pipe', 'hello');
 * await backend.sendControlKey('agent-pipe', 'Enter');
 * const text = await backend.capturePane('agent-pipe', 10000);
 * ```
 */
export class TmuxSessionBackend implements ITerminalBackend {
	private logger: ComponentLogger;

	constructor(private readonly runner: TmuxCommandRunner = new ExecFileTmuxRunner()) {
		this.logger = LoggerService.getInstance().createComponentLogger('TmuxSessionBackend');
	}

	/**
	 * Exact-match target for session-level commands (`=name` disables prefix matching).
	 */
	private sessionTarget(sessionName: string): string {
		return `=${sessionName}`;
	}

	async ensureSession(sessionName: string): Promise<void> {
		if (await this.hasSession(sessionName)) {
			this.logger.debug('Reusing tmux session', { sessionName });
			return;
		}

		try {
			await this.runner.run(['new-session', '-d', '-s', sessionName]);
			this.logger.info('Created tmux session', { sessionName });
		} catch (error) {
			// Another invocation created it between has-session and new-session
			if (error instanceof SessionError && error.stderr.includes(TMUX_CONSTANTS.DUPLICATE_SESSION_ERROR)) {
				this.logger.debug('tmux session created concurrently', { sessionName });
				return;
			}
			throw error;
		}
	}

	/**
	 * has-session exits nonzero when the session (or the server) does not exist.
	 */
	private async hasSession(sessionName: string): Promise<boolean> {
		try {
			await this.runner.run(['has-session', '-t', this.sessionTarget(sessionName)]);
			return true;
		} catch (error) {
			if (error instanceof SessionError) {
				return false;
			}
			throw error;
		}
	}

	async sendLiteral(sessionName: string, text: string): Promise<void> {
		await this.runner.run(['send-keys', '-t', sessionName, '-l', '--', text]);
	}

	async pasteText(sessionName: string, text: string): Promise<void> {
		const buffer = TMUX_CONSTANTS.PASTE_BUFFER_NAME;
		await this.runner.run(['set-buffer', '-b', buffer, '--', text]);
		await this.runner.run(['paste-buffer', '-p', '-d', '-b', buffer, '-t', sessionName]);
	}

	async sendControlKey(sessionName: string, key: ControlKey): Promise<void> {
		await this.runner.run(['send-keys', '-t', sessionName, key]);
	}

	async capturePane(sessionName: string, scrollbackLines: number): Promise<PaneSnapshot> {
		const args = ['capture-pane', '-p', '-J', '-t', sessionName];
		if (scrollbackLines > 0) {
			args.push('-S', String(-scrollbackLines));
		}
		return this.runner.run(args);
	}

	async getForegroundCommand(sessionName: string): Promise<string> {
		const output = await this.runner.run([
			'display-message',
			'-p',
			'-t',
			sessionName,
			TMUX_CONSTANTS.CURRENT_COMMAND_FORMAT,
		]);
		return output.split('\n')[0]?.trim() ?? '';
	}
}
