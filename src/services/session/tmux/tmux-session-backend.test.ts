import { TmuxSessionBackend } from './tmux-session-backend.js';
import type { TmuxCommandRunner } from './tmux-command-runner.js';
import { SessionError, SessionUnavailableError } from '../../core/errors.js';

jest.mock('../../core/logger.service.js', () => ({
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

describe('TmuxSessionBackend', () => {
	let run: jest.Mock<Promise<string>, [readonly string[]]>;
	let backend: TmuxSessionBackend;

	beforeEach(() => {
		run = jest.fn<Promise<string>, [readonly string[]]>().mockResolvedValue('');
		const runner: TmuxCommandRunner = { run };
		backend = new TmuxSessionBackend(runner);
	});

	describe('ensureSession', () => {
		it('should reuse an existing session', async () => {
			await backend.ensureSession('agent-pipe');

			expect(run).toHaveBeenCalledTimes(1);
			expect(run).toHaveBeenCalledWith(['has-session', '-t', '=agent-pipe']);
		});

		it('should create a missing session', async () => {
			run.mockRejectedValueOnce(new SessionError(['has-session'], "can't find session: agent-pipe", 1));

			await backend.ensureSession('agent-pipe');

			expect(run).toHaveBeenNthCalledWith(2, ['new-session', '-d', '-s', 'agent-pipe']);
		});

		it('should treat a concurrently created session as success', async () => {
			run
				.mockRejectedValueOnce(new SessionError(['has-session'], 'no server running', 1))
				.mockRejectedValueOnce(new SessionError(['new-session'], 'duplicate session: agent-pipe', 1));

			await expect(backend.ensureSession('agent-pipe')).resolves.toBeUndefined();
		});

		it('should propagate other creation failures', async () => {
			run
				.mockRejectedValueOnce(new SessionError(['has-session'], 'no server running', 1))
				.mockRejectedValueOnce(new SessionError(['new-session'], 'create window failed', 1));

			await expect(backend.ensureSession('agent-pipe')).rejects.toThrow('tmux new-session failed: create window failed');
		});

		it('should propagate a missing tmux binary', async () => {
			run.mockRejectedValueOnce(new SessionUnavailableError('tmux'));

			await expect(backend.ensureSession('agent-pipe')).rejects.toThrow(SessionUnavailableError);
			expect(run).toHaveBeenCalledTimes(1);
		});
	});

	it('should send literal text after an option terminator', async () => {
		await backend.sendLiteral('agent-pipe', '-n hello');

		expect(run).toHaveBeenCalledWith(['send-keys', '-t', 'agent-pipe', '-l', '--', '-n hello']);
	});

	it('should paste multi-line text through a named buffer', async () => {
		await backend.pasteText('agent-pipe', 'line1\nline2');

		expect(run.mock.calls).toEqual([
			[['set-buffer', '-b', 'agent-pipe-prompt', '--', 'line1\nline2']],
			[['paste-buffer', '-p', '-d', '-b', 'agent-pipe-prompt', '-t', 'agent-pipe']],
		]);
	});

	it('should send control keys as key names', async () => {
		await backend.sendControlKey('agent-pipe', 'Enter');

		expect(run).toHaveBeenCalledWith(['send-keys', '-t', 'agent-pipe', 'Enter']);
	});

	describe('capturePane', () => {
		it('should include scrollback history', async () => {
			run.mockResolvedValueOnce('text\n');

			await expect(backend.capturePane('agent-pipe', 10000)).resolves.toBe('text\n');
			expect(run).toHaveBeenCalledWith(['capture-pane', '-p', '-J', '-t', 'agent-pipe', '-S', '-10000']);
		});

		it('should capture only the screen without scrollback', async () => {
			await backend.capturePane('agent-pipe', 0);

			expect(run).toHaveBeenCalledWith(['capture-pane', '-p', '-J', '-t', 'agent-pipe']);
		});
	});

	it('should return the trimmed foreground command', async () => {
		run.mockResolvedValueOnce('node\n');

		await expect(backend.getForegroundCommand('agent-pipe')).resolves.toBe('node');
		expect(run).toHaveBeenCalledWith(['display-message', '-p', '-t', 'agent-pipe', '#{pane_current_command}']);
	});
});
