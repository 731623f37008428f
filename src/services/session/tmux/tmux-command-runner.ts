/**
 * tmux Command Runner
 *
 * Executes tmux control commands without a shell (arguments are passed as an
 * array, so prompt text never needs escaping) and maps failures onto the
 * session error taxonomy.
 *
 * @module tmux-command-runner
 */

import { execFile, type ExecFileException } from 'child_process';
import { TMUX_CONSTANTS } from '../../../constants.js';
import { SessionError, SessionUnavailableError } from '../../core/errors.js';
import { LoggerService, type ComponentLogger } from '../../core/logger.service.js';

/** Error codes meaning the binary itself could not be started */
const UNAVAILABLE_ERROR_CODES = new Set(['ENOENT', 'EACCES']);

/**
 * Runs one tmux command and resolves with its stdout.
 */
export interface TmuxCommandRunner {
	run(args: readonly string[]): Promise<string>;
}

/**
 * The execFile call shape used here (string output, no shell).
 */
export type ExecFileFn = (
	file: string,
	args: readonly string[],
	options: { encoding: 'utf8'; maxBuffer: number },
	callback: (error: ExecFileException | null, stdout: string, stderr: string) => void
) => unknown;

/**
 * Narrow an execFile callback error to the fields used here.
 */
function describeExecError(error: Error): { code: string | number | undefined } {
	const code: unknown = 'code' in error ? error.code : undefined;
	return { code: typeof code === 'string' || typeof code === 'number' ? code : undefined };
}

/**
 * tmux runner backed by child_process.execFile.
 */
export class ExecFileTmuxRunner implements TmuxCommandRunner {
	private logger: ComponentLogger;

	constructor(
		private readonly binary: string = TMUX_CONSTANTS.BINARY,
		private readonly execFileImpl: ExecFileFn = execFile
	) {
		this.logger = LoggerService.getInstance().createComponentLogger('TmuxCommandRunner');
	}

	run(args: readonly string[]): Promise<string> {
		this.logger.debug('Running tmux command', { command: args[0] });

		return new Promise<string>((resolve, reject) => {
			this.execFileImpl(
				this.binary,
				args,
				{ encoding: 'utf8', maxBuffer: TMUX_CONSTANTS.MAX_BUFFER },
				(error, stdout, stderr) => {
					if (!error) {
						resolve(stdout);
						return;
					}

					const { code } = describeExecError(error);
					if (typeof code === 'string' && UNAVAILABLE_ERROR_CODES.has(code)) {
						reject(new SessionUnavailableError(this.binary, error));
						return;
					}

					this.logger.debug('tmux command failed', { command: args[0], code, stderr });
					reject(new SessionError(args, stderr, typeof code === 'number' ? code : null, error));
				}
			);
		});
	}
}
