/**
 * Agent Bootstrap Service
 *
 * Makes sure the agent program is the foreground process of the session pane,
 * launching it when the pane is sitting at a shell.
 *
 * @module agent-bootstrap.service
 */

import { SessionCommandHelper } from '../session/session-command-helper.js';
import { LoggerService, type ComponentLogger } from '../core/logger.service.js';
import { AgentStartTimeoutError } from '../core/errors.js';
import { AGENT_PIPE_CONSTANTS, TIMING_CONSTANTS } from '../../constants.js';
import { delay, type NowFn, type SleepFn } from '../../utils/async.utils.js';
import { isAgentAtPrompt, stripAnsiCodes } from '../../utils/terminal-string-ops.js';

export interface AgentBootstrapOptions {
	/** Wait after sending the launch command, before the first readiness check */
	agentStartupDelayMs?: number;
	/** Give up when the agent is not ready this long after launch */
	agentStartTimeoutMs?: number;
	/** Output unchanged for this long counts as ready when no prompt is drawn */
	startupStableMs?: number;
	pollIntervalMs?: number;
	/** Foreground process names that mean the agent is running */
	processNames?: readonly string[];
	now?: NowFn;
	sleep?: SleepFn;
}

/**
 * Launches the agent on demand and waits until it accepts input.
 *
 * @example
 * ```typescript
 * const bootstrap = new AgentBootstrapService(createSessionCommandHelper());
 * const launched = await bootstrap.ensureAgentRunning('agent-pipe', 'claude');
 * ```
 */
export class AgentBootstrapService {
	private logger: ComponentLogger;
	private readonly startupDelayMs: number;
	private readonly startTimeoutMs: number;
	private readonly stableMs: number;
	private readonly pollIntervalMs: number;
	private readonly processNames: readonly string[];
	private readonly now: NowFn;
	private readonly sleep: SleepFn;

	constructor(
		private readonly sessionHelper: SessionCommandHelper,
		options: AgentBootstrapOptions = {}
	) {
		this.logger = LoggerService.getInstance().createComponentLogger('AgentBootstrap');
		this.startupDelayMs = options.agentStartupDelayMs ?? TIMING_CONSTANTS.AGENT_STARTUP_DELAY;
		this.startTimeoutMs = options.agentStartTimeoutMs ?? TIMING_CONSTANTS.AGENT_START_TIMEOUT;
		this.stableMs = options.startupStableMs ?? TIMING_CONSTANTS.AGENT_STARTUP_STABLE;
		this.pollIntervalMs = options.pollIntervalMs ?? TIMING_CONSTANTS.POLL_INTERVAL;
		this.processNames = options.processNames ?? AGENT_PIPE_CONSTANTS.AGENT.PROCESS_NAMES;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? delay;
	}

	/**
	 * Ensure the agent is running in the session, launching it if needed.
	 *
	 * @param sessionName - Session whose pane hosts the agent
	 * @param agentCommand - Shell command that starts the agent
	 * @returns true if the agent was launched, false if it was already running
	 * @throws AgentStartTimeoutError if a launched agent never becomes ready
	 */
	async ensureAgentRunning(sessionName: string, agentCommand: string): Promise<boolean> {
		if (await this.sessionHelper.hasRunningCommand(sessionName, this.processNames)) {
			this.logger.debug('Agent already running', { sessionName });
			return false;
		}

		this.logger.info('Starting agent', { sessionName, agentCommand });
		const startTime = this.now();
		await this.sessionHelper.sendKeys(sessionName, agentCommand, true);
		await this.sleep(this.startupDelayMs);

		if (await this.waitForAgentReady(sessionName, startTime)) {
			this.logger.info('Agent ready', { sessionName, totalElapsed: this.now() - startTime });
			return true;
		}

		const lastOutput = await this.sessionHelper.capturePane(sessionName, 0);
		this.logger.warn('Timeout waiting for agent to start', {
			sessionName,
			timeout: this.startTimeoutMs,
			lastTerminalLines: lastOutput.split('\n').slice(-10).join('\n'),
		});
		throw new AgentStartTimeoutError(agentCommand, this.startTimeoutMs);
	}

	/**
	 * Poll until the agent is the foreground process and either shows its input
	 * prompt or has stopped drawing.
	 */
	private async waitForAgentReady(sessionName: string, startTime: number): Promise<boolean> {
		let lastOutput: string | null = null;
		let stableSince = this.now();

		while (true) {
			const output = await this.sessionHelper.capturePane(sessionName, 0);
			const checkedAt = this.now();
			if (output !== lastOutput) {
				lastOutput = output;
				stableSince = checkedAt;
			}

			if (await this.sessionHelper.hasRunningCommand(sessionName, this.processNames)) {
				const atPrompt = isAgentAtPrompt(stripAnsiCodes(output));
				const settled = output.trim().length > 0 && checkedAt - stableSince >= this.stableMs;
				if (atPrompt || settled) {
					this.logger.debug('Agent readiness detected', { sessionName, atPrompt, settled });
					return true;
				}
			}

			if (checkedAt - startTime >= this.startTimeoutMs) {
				return false;
			}
			await this.sleep(this.pollIntervalMs);
		}
	}
}
