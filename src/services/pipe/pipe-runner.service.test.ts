import { PipeRunner } from './pipe-runner.service.js';
import type { ControlKey, ITerminalBackend } from '../session/session-backend.interface.js';
import type { PipeConfig } from '../core/config.service.js';
import {
	EmptyResponseError,
	ResponseTimeoutError,
	SessionUnavailableError,
} from '../core/errors.js';

jest.mock('../core/logger.service.js', () => ({
	LoggerService: {
		getInstance: () => ({
			createComponentLogger: () => ({
				info: jest.fn(),
				debug: jest.fn(),
				warn: jest.fn(),
				error: jest.fn(),
			}),
		}),
	},
}));

const MARKER = '===PIPE_END_0a1b2c3d===';
const INPUT_BOX = ['╭───╮', '│ > │', '╰───╯'];

const config: PipeConfig = {
	sessionName: 'agent-pipe',
	agentCommand: 'claude',
	resetCommand: '/clear',
	logLevel: 'warn',
	idleTimeoutMs: 1000,
	maxWaitMs: 3000,
	pollIntervalMs: 500,
	responseStartDelayMs: 0,
	markerSettleMs: 0,
	clearSettleMs: 1000,
	agentStartupDelayMs: 5000,
	agentStartTimeoutMs: 30000,
	startupStableMs: 2000,
	scrollbackLines: 10000,
};

/** Lines the fake agent prints for a prompt, or null to stay silent */
type Responder = (marker: string) => string[] | null;

function markerFromInstruction(line: string): string {
	const start = line.indexOf('print ') + 'print '.length;
	return line.slice(start, line.indexOf(' on its own line', start));
}

/**
 * In-process stand-in for a tmux pane: a shell that can start the agent, and
 * an agent that answers each submitted line through the responder.
 */
class FakeAgentTerminal implements ITerminalBackend {
	foreground: string;
	screen: string[] = [];
	submittedLines: string[] = [];
	private input = '';

	constructor(
		private readonly respond: Responder,
		agentRunning = true
	) {
		this.foreground = agentRunning ? 'node' : 'zsh';
	}

	async ensureSession(): Promise<void> {}

	async sendLiteral(_sessionName: string, text: string): Promise<void> {
		this.input += text;
	}

	async pasteText(_sessionName: string, text: string): Promise<void> {
		this.input += text;
	}

	async sendControlKey(_sessionName: string, key: ControlKey): Promise<void> {
		if (key !== 'Enter') return;
		const line = this.input;
		this.input = '';
		this.submittedLines.push(line);

		if (this.foreground !== 'node') {
			if (line === 'claude') this.foreground = 'node';
			return;
		}
		if (line === '/clear') {
			this.screen = [];
			return;
		}
		const response = this.respond(markerFromInstruction(line));
		if (response !== null) {
			this.screen.push(`> ${line}`, ...response);
		}
	}

	async capturePane(): Promise<string> {
		return [...this.screen, ...INPUT_BOX].join('\n');
	}

	async getForegroundCommand(): Promise<string> {
		return this.foreground;
	}
}

describe('PipeRunner', () => {
	let current: number;
	const now = (): number => current;
	const sleep = jest.fn(async (ms: number) => {
		current += ms;
	});

	const createRunner = (backend: ITerminalBackend): PipeRunner =>
		new PipeRunner(config, { backend, createMarker: () => MARKER, now, sleep });

	beforeEach(() => {
		current = 0;
		sleep.mockClear();
	});

	it('should return the answer once the agent prints the marker', async () => {
		const terminal = new FakeAgentTerminal((marker) => ['', '⏺ Hello there!', '', `⏺ ${marker}`]);

		const result = await createRunner(terminal).run('hi');

		expect(result.answer).toBe('Hello there!');
		expect(result.marker).toBe(MARKER);
		expect(result.outcome.kind).toBe('marker');
		expect(result.launchedAgent).toBe(false);
		expect(terminal.submittedLines).toEqual(['/clear', `hi (When done, print ${MARKER} on its own line)`]);
	});

	it('should fall back to idle detection when the marker is never printed', async () => {
		const terminal = new FakeAgentTerminal(() => ['', '⏺ Result: 42']);

		const result = await createRunner(terminal).run('what is six times seven?');

		expect(result.answer).toBe('Result: 42');
		expect(result.outcome.kind).toBe('idle');
	});

	it('should launch the agent when the pane is at a shell', async () => {
		const terminal = new FakeAgentTerminal((marker) => ['⏺ Started and answered', marker], false);

		const result = await createRunner(terminal).run('hi');

		expect(result.launchedAgent).toBe(true);
		expect(result.answer).toBe('Started and answered');
		expect(terminal.submittedLines[0]).toBe('claude');
	});

	it('should deliver multi-line prompts in one submission', async () => {
		const terminal = new FakeAgentTerminal((marker) => ['⏺ Two lines received', marker]);

		const result = await createRunner(terminal).run('first line\nsecond line');

		expect(result.answer).toBe('Two lines received');
		expect(terminal.submittedLines).toHaveLength(2);
	});

	it('should fail with the elapsed time when the agent never answers', async () => {
		const terminal = new FakeAgentTerminal(() => null);

		const error = await createRunner(terminal)
			.run('hi')
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ResponseTimeoutError);
		expect(error instanceof ResponseTimeoutError && error.message).toBe(
			'timed out waiting for response after 3.0s'
		);
		expect(error instanceof ResponseTimeoutError && error.partialOutput).toBe(INPUT_BOX.join('\n'));
		expect(error instanceof ResponseTimeoutError && error.exitCode).toBe(6);
	});

	it('should fail when the answer is empty after cleaning', async () => {
		const terminal = new FakeAgentTerminal((marker) => ['', `⏺ ${marker}`]);

		await expect(createRunner(terminal).run('hi')).rejects.toThrow(EmptyResponseError);
	});

	it('should not touch the agent when tmux is unavailable', async () => {
		const terminal = new FakeAgentTerminal(() => ['never']);
		jest.spyOn(terminal, 'ensureSession').mockRejectedValue(new SessionUnavailableError('tmux'));
		const getForegroundCommand = jest.spyOn(terminal, 'getForegroundCommand');

		await expect(createRunner(terminal).run('hi')).rejects.toThrow(SessionUnavailableError);
		expect(getForegroundCommand).not.toHaveBeenCalled();
	});
});
