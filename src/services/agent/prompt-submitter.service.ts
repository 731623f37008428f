/**
 * Prompt Submitter Service
 *
 * Resets the agent conversation and types one prompt, tagged with a fresh
 * sentinel marker, into the session pane.
 *
 * @module prompt-submitter.service
 */

import { SessionCommandHelper } from '../session/session-command-helper.js';
import { LoggerService, type ComponentLogger } from '../core/logger.service.js';
import { SubmitFailedError } from '../core/errors.js';
import type { PaneSnapshot } from '../session/session-backend.interface.js';
import { AGENT_PIPE_CONSTANTS, TIMING_CONSTANTS } from '../../constants.js';
import { delay, type NowFn, type SleepFn } from '../../utils/async.utils.js';
import { appendMarkerInstruction, createSentinelMarker } from './sentinel-marker.js';

/**
 * Everything later stages need to know about a submitted prompt.
 */
export interface SubmittedPrompt {
	marker: string;
	/** Prompt as given by the caller */
	promptText: string;
	/** Text actually typed: prompt plus marker instruction */
	sentText: string;
	/** Pane captured after the reset and before the prompt was typed */
	baseline: PaneSnapshot;
	/** Epoch ms at which the prompt was submitted */
	submittedAt: number;
}

/** Stage of a submission, reported in SubmitFailedError */
export type SubmitStep = 'reset' | 'baseline' | 'send-prompt';

export interface PromptSubmitterOptions {
	/** Directive that starts a fresh conversation; empty string skips the reset */
	resetCommand?: string;
	/** Fixed wait after the reset directive */
	clearSettleMs?: number;
	scrollbackLines?: number;
	createMarker?: () => string;
	now?: NowFn;
	sleep?: SleepFn;
}

export class PromptSubmitterService {
	private logger: ComponentLogger;
	private readonly resetCommand: string;
	private readonly clearSettleMs: number;
	private readonly scrollbackLines: number;
	private readonly createMarker: () => string;
	private readonly now: NowFn;
	private readonly sleep: SleepFn;

	constructor(
		private readonly sessionHelper: SessionCommandHelper,
		options: PromptSubmitterOptions = {}
	) {
		this.logger = LoggerService.getInstance().createComponentLogger('PromptSubmitter');
		this.resetCommand = options.resetCommand ?? AGENT_PIPE_CONSTANTS.AGENT.RESET_COMMAND;
		this.clearSettleMs = options.clearSettleMs ?? TIMING_CONSTANTS.CLEAR_SETTLE_DELAY;
		this.scrollbackLines = options.scrollbackLines ?? AGENT_PIPE_CONSTANTS.SESSIONS.SCROLLBACK_LINES;
		this.createMarker = options.createMarker ?? createSentinelMarker;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? delay;
	}

	/**
	 * Reset the conversation and submit a prompt.
	 *
	 * @param sessionName - Session whose pane hosts the agent
	 * @param promptText - Prompt to send
	 * @throws SubmitFailedError if any send or capture fails
	 */
	async submit(sessionName: string, promptText: string): Promise<SubmittedPrompt> {
		if (this.resetCommand) {
			await this.step('reset', () => this.sessionHelper.sendKeys(sessionName, this.resetCommand, true));
			await this.sleep(this.clearSettleMs);
		}

		const marker = this.createMarker();
		const sentText = appendMarkerInstruction(promptText, marker);

		const baseline = await this.step('baseline', () =>
			this.sessionHelper.capturePane(sessionName, this.scrollbackLines)
		);

		await this.step('send-prompt', () => this.sessionHelper.sendKeys(sessionName, sentText, true));
		const submittedAt = this.now();

		this.logger.info('Prompt submitted', {
			sessionName,
			marker,
			promptLength: promptText.length,
			isMultiLine: sentText.includes('\n'),
		});

		return { marker, promptText, sentText, baseline, submittedAt };
	}

	private async step<T>(step: SubmitStep, action: () => Promise<T>): Promise<T> {
		try {
			return await action();
		} catch (error) {
			this.logger.error('Prompt submission failed', { step, error });
			throw new SubmitFailedError(step, error);
		}
	}
}
