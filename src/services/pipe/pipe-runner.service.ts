/**
 * Pipe Runner
 *
 * One request/response cycle: ensure the session, ensure the agent, submit
 * the prompt, wait for completion and sanitize the captured answer. The tmux
 * session and the agent are left running afterwards.
 *
 * @module pipe-runner.service
 */

import type { ITerminalBackend } from '../session/session-backend.interface.js';
import { SessionCommandHelper, createSessionCommandHelper } from '../session/session-command-helper.js';
import { TmuxSessionBackend } from '../session/tmux/tmux-session-backend.js';
import { AgentBootstrapService } from '../agent/agent-bootstrap.service.js';
import { PromptSubmitterService } from '../agent/prompt-submitter.service.js';
import {
	CompletionDetector,
	type CompletedViaIdle,
	type CompletedViaMarker,
} from '../agent/completion-detector.service.js';
import { sanitize } from '../agent/output-sanitizer.js';
import { ResponseTimeoutError } from '../core/errors.js';
import { LoggerService, type ComponentLogger } from '../core/logger.service.js';
import type { PipeConfig } from '../core/config.service.js';
import { delay, type NowFn, type SleepFn } from '../../utils/async.utils.js';
import { isAgentAtPrompt, isAgentBusy, stripAnsiCodes } from '../../utils/terminal-string-ops.js';

export interface PipeRunResult {
	/** Sanitized answer text */
	answer: string;
	marker: string;
	/** How the wait ended */
	outcome: CompletedViaMarker | CompletedViaIdle;
	/** Whether this run had to launch the agent */
	launchedAgent: boolean;
}

/**
 * Collaborators of the runner. Anything left out is built from the config,
 * on top of tmux.
 */
export interface PipeRunnerDependencies {
	backend?: ITerminalBackend;
	sessionHelper?: SessionCommandHelper;
	bootstrap?: AgentBootstrapService;
	submitter?: PromptSubmitterService;
	detector?: CompletionDetector;
	createMarker?: () => string;
	now?: NowFn;
	sleep?: SleepFn;
}

/**
 * @example
 * ```typescript
 * const runner = new PipeRunner(loadConfig());
 * const { answer } = await runner.run('Summarize README.md');
 * process.stdout.write(answer + '\n');
 * ```
 */
export class PipeRunner {
	private logger: ComponentLogger;
	private readonly sessionHelper: SessionCommandHelper;
	private readonly bootstrap: AgentBootstrapService;
	private readonly submitter: PromptSubmitterService;
	private readonly detector: CompletionDetector;

	constructor(
		private readonly config: PipeConfig,
		deps: PipeRunnerDependencies = {}
	) {
		this.logger = LoggerService.getInstance().createComponentLogger('PipeRunner');
		const now = deps.now ?? Date.now;
		const sleep = deps.sleep ?? delay;

		this.sessionHelper =
			deps.sessionHelper ?? createSessionCommandHelper(deps.backend ?? new TmuxSessionBackend(), sleep);
		this.bootstrap =
			deps.bootstrap ??
			new AgentBootstrapService(this.sessionHelper, {
				agentStartupDelayMs: config.agentStartupDelayMs,
				agentStartTimeoutMs: config.agentStartTimeoutMs,
				startupStableMs: config.startupStableMs,
				pollIntervalMs: config.pollIntervalMs,
				now,
				sleep,
			});
		this.submitter =
			deps.submitter ??
			new PromptSubmitterService(this.sessionHelper, {
				resetCommand: config.resetCommand,
				clearSettleMs: config.clearSettleMs,
				scrollbackLines: config.scrollbackLines,
				createMarker: deps.createMarker,
				now,
				sleep,
			});
		this.detector =
			deps.detector ??
			new CompletionDetector({
				pollIntervalMs: config.pollIntervalMs,
				idleTimeoutMs: config.idleTimeoutMs,
				maxWaitMs: config.maxWaitMs,
				initialDelayMs: config.responseStartDelayMs,
				markerSettleMs: config.markerSettleMs,
				now,
				sleep,
			});
	}

	/**
	 * Send one prompt to the agent and return its cleaned answer.
	 *
	 * @param prompt - Prompt text
	 * @throws SessionUnavailableError, SessionError, AgentStartTimeoutError,
	 *   SubmitFailedError, ResponseTimeoutError or EmptyResponseError
	 */
	async run(prompt: string): Promise<PipeRunResult> {
		const { sessionName, agentCommand, scrollbackLines } = this.config;

		await this.sessionHelper.ensureSession(sessionName);
		const launchedAgent = await this.bootstrap.ensureAgentRunning(sessionName, agentCommand);

		const submitted = await this.submitter.submit(sessionName, prompt);
		const outcome = await this.detector.waitForCompletion({
			marker: submitted.marker,
			baseline: submitted.baseline,
			capture: () => this.sessionHelper.capturePane(sessionName, scrollbackLines),
			isReady: (snapshot) => {
				const text = stripAnsiCodes(snapshot);
				return isAgentAtPrompt(text) && !isAgentBusy(text);
			},
			isBusy: (snapshot) => isAgentBusy(stripAnsiCodes(snapshot)),
		});

		if (outcome.kind === 'timeout') {
			throw new ResponseTimeoutError(outcome.elapsedMs, outcome.snapshot);
		}

		const answer = sanitize(outcome.snapshot, { marker: submitted.marker, prompt });
		this.logger.info('Answer extracted', {
			sessionName,
			completion: outcome.kind,
			elapsedMs: outcome.elapsedMs,
			answerLength: answer.length,
		});

		return { answer, marker: submitted.marker, outcome, launchedAgent };
	}
}
