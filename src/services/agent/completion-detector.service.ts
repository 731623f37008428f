/**
 * Completion Detector
 *
 * Decides when the agent has finished answering by polling the pane. Three
 * signals are checked on every tick, in this order:
 *
 * 1. marker  - more standalone sentinel marker lines than in the baseline;
 * 2. idle    - the normalized pane has not changed for `idleTimeoutMs` after
 *              the response started (and the agent is back at its prompt, or
 *              has been quiet for `idleTimeoutMs × idleFallbackMultiplier`).
 *              A visible busy indicator counts as activity;
 * 3. timeout - `maxWaitMs` elapsed since the wait began.
 *
 * Capture, clock and sleep are injected so the loop can run on a fake clock.
 *
 * @module completion-detector.service
 */

import type { PaneSnapshot } from '../session/session-backend.interface.js';
import { LoggerService, type ComponentLogger } from '../core/logger.service.js';
import { COMPLETION_CONSTANTS, TIMING_CONSTANTS } from '../../constants.js';
import { delay, type NowFn, type SleepFn } from '../../utils/async.utils.js';
import { countStandaloneMarkers } from './sentinel-marker.js';
import { normalizeSnapshot } from './output-sanitizer.js';

export type CompletionKind = 'marker' | 'idle' | 'timeout';

interface CompletionOutcomeBase {
	/** Pane text that ended the wait */
	snapshot: PaneSnapshot;
	elapsedMs: number;
	/** Number of captures taken by the poll loop */
	polls: number;
}

export interface CompletedViaMarker extends CompletionOutcomeBase {
	kind: 'marker';
}

export interface CompletedViaIdle extends CompletionOutcomeBase {
	kind: 'idle';
}

export interface TimedOut extends CompletionOutcomeBase {
	kind: 'timeout';
}

export type CompletionOutcome = CompletedViaMarker | CompletedViaIdle | TimedOut;

export interface CompletionRequest {
	marker: string;
	/** Pane captured before the prompt was typed */
	baseline: PaneSnapshot;
	capture: () => Promise<PaneSnapshot>;
	/** True when the snapshot shows the agent waiting for input */
	isReady?: (snapshot: PaneSnapshot) => boolean;
	/** True while the snapshot shows the agent working (spinner, interrupt hint) */
	isBusy?: (snapshot: PaneSnapshot) => boolean;
}

export interface CompletionDetectorOptions {
	pollIntervalMs?: number;
	idleTimeoutMs?: number;
	maxWaitMs?: number;
	/** Wait before the first poll, giving the agent time to pick up the prompt */
	initialDelayMs?: number;
	/** Wait after the marker is seen, before the final capture */
	markerSettleMs?: number;
	idleFallbackMultiplier?: number;
	now?: NowFn;
	sleep?: SleepFn;
}

export class CompletionDetector {
	private logger: ComponentLogger;
	private readonly pollIntervalMs: number;
	private readonly idleTimeoutMs: number;
	private readonly maxWaitMs: number;
	private readonly initialDelayMs: number;
	private readonly markerSettleMs: number;
	private readonly idleFallbackMultiplier: number;
	private readonly now: NowFn;
	private readonly sleep: SleepFn;

	constructor(options: CompletionDetectorOptions = {}) {
		this.logger = LoggerService.getInstance().createComponentLogger('CompletionDetector');
		this.pollIntervalMs = options.pollIntervalMs ?? TIMING_CONSTANTS.POLL_INTERVAL;
		this.idleTimeoutMs = options.idleTimeoutMs ?? TIMING_CONSTANTS.IDLE_TIMEOUT;
		this.maxWaitMs = options.maxWaitMs ?? TIMING_CONSTANTS.MAX_WAIT;
		this.initialDelayMs = options.initialDelayMs ?? 0;
		this.markerSettleMs = options.markerSettleMs ?? 0;
		this.idleFallbackMultiplier = options.idleFallbackMultiplier ?? COMPLETION_CONSTANTS.IDLE_FALLBACK_MULTIPLIER;
		this.now = options.now ?? Date.now;
		this.sleep = options.sleep ?? delay;
	}

	/**
	 * Poll the pane until one of the completion signals fires.
	 *
	 * Never rejects on its own; capture failures propagate.
	 */
	async waitForCompletion(request: CompletionRequest): Promise<CompletionOutcome> {
		const { marker, baseline, capture, isReady, isBusy } = request;
		const startTime = this.now();
		const baselineMarkers = countStandaloneMarkers(baseline, marker);
		const baselineNormalized = normalizeSnapshot(baseline);

		let previous = baselineNormalized;
		let lastChange = startTime;
		let responseStarted = false;
		let polls = 0;

		this.logger.debug('Waiting for completion', {
			marker,
			baselineMarkers,
			pollIntervalMs: this.pollIntervalMs,
			idleTimeoutMs: this.idleTimeoutMs,
			maxWaitMs: this.maxWaitMs,
		});

		if (this.initialDelayMs > 0) {
			await this.sleep(this.initialDelayMs);
		}

		while (true) {
			await this.sleep(this.pollIntervalMs);
			const snapshot = await capture();
			polls++;
			const checkedAt = this.now();

			if (countStandaloneMarkers(snapshot, marker) > baselineMarkers) {
				const finalSnapshot = await this.settleAfterMarker(snapshot, request, baselineMarkers);
				return this.finish({ kind: 'marker', snapshot: finalSnapshot, elapsedMs: this.now() - startTime, polls });
			}

			const normalized = normalizeSnapshot(snapshot);
			if (normalized !== previous) {
				previous = normalized;
				lastChange = checkedAt;
				if (normalized !== baselineNormalized) {
					responseStarted = true;
				}
			}
			// the busy line itself is normalized away
			if (isBusy?.(snapshot)) {
				lastChange = checkedAt;
				responseStarted = true;
			}

			const idleMs = checkedAt - lastChange;
			if (responseStarted && idleMs >= this.idleTimeoutMs) {
				const ready = isReady === undefined || isReady(snapshot);
				if (ready || idleMs >= this.idleTimeoutMs * this.idleFallbackMultiplier) {
					return this.finish({ kind: 'idle', snapshot, elapsedMs: checkedAt - startTime, polls });
				}
			}

			if (checkedAt - startTime >= this.maxWaitMs) {
				return this.finish({ kind: 'timeout', snapshot, elapsedMs: checkedAt - startTime, polls });
			}
		}
	}

	/**
	 * Give the agent a moment to finish drawing, then re-capture. The new
	 * capture is used only if it still carries the marker.
	 */
	private async settleAfterMarker(
		snapshot: PaneSnapshot,
		request: CompletionRequest,
		baselineMarkers: number
	): Promise<PaneSnapshot> {
		if (this.markerSettleMs <= 0) return snapshot;
		await this.sleep(this.markerSettleMs);
		const settled = await request.capture();
		return countStandaloneMarkers(settled, request.marker) > baselineMarkers ? settled : snapshot;
	}

	private finish(outcome: CompletionOutcome): CompletionOutcome {
		const context = { kind: outcome.kind, elapsedMs: outcome.elapsedMs, polls: outcome.polls };
		if (outcome.kind === 'timeout') {
			this.logger.warn('No completion signal before the wait ceiling', context);
		} else {
			this.logger.info('Response complete', context);
		}
		return outcome;
	}
}
