/**
 * Session Backend Interface
 *
 * The four semantic operations the pipe needs from a terminal multiplexer:
 * create-if-absent, send keys, capture pane text and query the foreground
 * process. tmux is the production implementation; tests provide in-memory fakes.
 *
 * @module session-backend-interface
 */

/** Full text of a pane at one instant */
export type PaneSnapshot = string;

/**
 * Named control keys sent as distinct actions, never mixed into literal text.
 */
export type ControlKey = 'Enter' | 'Escape' | 'C-c' | 'C-u';

/**
 * Terminal multiplexer backend.
 *
 * Every operation takes the session name explicitly; the backend keeps no
 * notion of a "current" session.
 */
export interface ITerminalBackend {
	/**
	 * Create the session if it does not exist yet.
	 *
	 * @throws SessionUnavailableError if the multiplexer cannot be executed
	 * @throws SessionError if the control call fails
	 */
	ensureSession(sessionName: string): Promise<void>;

	/**
	 * Type text into the pane literally (no key-name interpretation).
	 */
	sendLiteral(sessionName: string, text: string): Promise<void>;

	/**
	 * Paste text as one bracketed-paste block, so embedded newlines are not
	 * treated as separate submissions.
	 */
	pasteText(sessionName: string, text: string): Promise<void>;

	/**
	 * Send a named control key.
	 */
	sendControlKey(sessionName: string, key: ControlKey): Promise<void>;

	/**
	 * Capture the pane text.
	 *
	 * @param scrollbackLines - History lines to include above the visible screen (0 = screen only)
	 */
	capturePane(sessionName: string, scrollbackLines: number): Promise<PaneSnapshot>;

	/**
	 * Name of the pane's foreground process, e.g. `zsh` or `node`.
	 */
	getForegroundCommand(sessionName: string): Promise<string>;
}
