/**
 * agent-pipe Cross-Domain Constants
 *
 * Constants shared by the CLI and the session services. Service-specific
 * constants stay in src/constants.ts.
 */

// ========================= CORE SYSTEM CONSTANTS =========================

/**
 * agent-pipe core identifiers and defaults
 */
export const AGENT_PIPE_CONSTANTS = {
	/** Executable name, also used as the diagnostics prefix */
	NAME: 'agent-pipe',
	/** Release version reported by --version */
	VERSION: '0.1.0',

	/**
	 * Session configuration
	 */
	SESSIONS: {
		/** Default tmux session that hosts the agent */
		DEFAULT_NAME: 'agent-pipe',
		/** Lines of pane history captured on each poll */
		SCROLLBACK_LINES: 10000,
	},

	/**
	 * Agent program configuration
	 */
	AGENT: {
		/** Command typed into the pane when the agent is not running */
		DEFAULT_COMMAND: 'claude',
		/** Foreground process names that mean the agent is already running */
		PROCESS_NAMES: ['node', 'claude'],
		/** Directive that resets the agent conversation */
		RESET_COMMAND: '/clear',
	},

	/**
	 * Sentinel marker format. The middle part is randomized per request.
	 */
	MARKER: {
		PREFIX: '===PIPE_END_',
		SUFFIX: '===',
		/** Number of random bytes (rendered as hex) in each marker */
		RANDOM_BYTES: 4,
	},
} as const;

// ========================= TIMING CONSTANTS =========================

/**
 * Default timing of one request/response cycle (milliseconds)
 */
export const TIMING_CONSTANTS = {
	/** Delay between typing literal text and pressing Enter */
	SUBMIT_DELAY: 600,
	/** Upper bound of the length-scaled submit delay */
	MAX_SUBMIT_DELAY: 5000,
	/** Interval between pane captures while waiting for a response */
	POLL_INTERVAL: 500,
	/** Quiet time after which the response is considered complete */
	IDLE_TIMEOUT: 5000,
	/** Hard ceiling for one response */
	MAX_WAIT: 300000,
	/** Settle time after submitting, before the first poll */
	RESPONSE_START_DELAY: 3000,
	/** Settle time after the marker is seen, before the final capture */
	MARKER_SETTLE_DELAY: 1000,
	/** Fixed wait after the reset directive */
	CLEAR_SETTLE_DELAY: 1000,
	/** Wait after launching the agent before readiness polling starts */
	AGENT_STARTUP_DELAY: 5000,
	/** Upper bound for the agent to become ready */
	AGENT_START_TIMEOUT: 30000,
	/** Time the startup screen must stay unchanged to count as ready */
	AGENT_STARTUP_STABLE: 2000,
} as const;
