import type { InjectOptions, PaneDriver } from '../types/index.ts';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export const TMUX_TIMEOUT = 5000; // 5 second timeout for tmux commands
const TMUX_HEALTH_CHECK_TIMEOUT = 2000; // 2 second timeout for health checks

export class TmuxTimeoutError extends Error {
	constructor(command: string, timeout: number) {
		super(`Tmux command timed out after ${timeout}ms: ${command}`);
		this.name = 'TmuxTimeoutError';
	}
}

/**
 * Runs one tmux invocation and resolves with its output
 */
export type TmuxExecutor = (args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultExecutor: TmuxExecutor = async args => execFileAsync('tmux', args);

/**
 * Pane capture and key injection through the tmux binary.
 *
 * Arguments are passed to tmux without a shell, so targets and injected text
 * need no quoting.
 */
export class TmuxManager implements PaneDriver {
	private readonly run: TmuxExecutor;

	constructor(executor: TmuxExecutor = defaultExecutor) {
		this.run = executor;
	}

	/**
	 * Execute a tmux command with timeout protection
	 */
	private async execWithTimeout(args: string[], timeout: number = TMUX_TIMEOUT): Promise<{ stdout: string; stderr: string }> {
		let timer: NodeJS.Timeout | undefined;
		try {
			return await Promise.race([
				this.run(args),
				new Promise<never>((_, reject) => {
					timer = setTimeout(() => reject(new TmuxTimeoutError(`tmux ${args.join(' ')}`, timeout)), timeout);
				}),
			]);
		}
		finally {
			clearTimeout(timer);
		}
	}

	/**
	 * Check if tmux is installed
	 */
	async isTmuxAvailable(): Promise<boolean> {
		try {
			await this.execWithTimeout(['-V'], TMUX_HEALTH_CHECK_TIMEOUT);
			return true;
		}
		catch {
			return false;
		}
	}

	/**
	 * Check whether a target resolves to a live pane
	 */
	async paneExists(target: string): Promise<boolean> {
		try {
			await this.execWithTimeout(['display-message', '-p', '-t', target, '#{pane_id}'], TMUX_HEALTH_CHECK_TIMEOUT);
			return true;
		}
		catch {
			return false;
		}
	}

	async capture(target: string): Promise<string> {
		try {
			const { stdout } = await this.execWithTimeout(['capture-pane', '-p', '-t', target]);
			return stdout;
		}
		catch (error) {
			if (error instanceof TmuxTimeoutError) {
				// eslint-disable-next-line unicorn/prefer-type-error
				throw new Error(`Tmux server is unresponsive. Cannot capture pane.\n\n${error.message}`);
			}

			throw new Error(`Failed to capture tmux pane: ${error instanceof Error ? error.message : String(error)}`);
		}
	}

	async inject(target: string, text: string, options: InjectOptions = {}): Promise<void> {
		try {
			// -l sends the characters literally instead of looking up key names
			await this.execWithTimeout(['send-keys', '-t', target, '-l', text]);
			if (options.enter) {
				await this.execWithTimeout(['send-keys', '-t', target, 'Enter']);
			}
		}
		catch (error) {
			if (error instanceof TmuxTimeoutError) {
				// eslint-disable-next-line unicorn/prefer-type-error
				throw new Error(`Tmux server is unresponsive. Cannot send keys.\n\n${error.message}`);
			}

			throw new Error(`Failed to send keys to tmux: ${error instanceof Error ? error.message : String(error)}`);
		}
	}
}

if (import.meta.vitest) {
	const vitest = await import('vitest');
	const { describe, it, expect, vi } = vitest;

	describe('TmuxManager', () => {
		it('should capture the visible pane text', async () => {
			const executor = vi.fn<TmuxExecutor>().mockResolvedValue({ stdout: 'hello\n', stderr: '' });
			const tmux = new TmuxManager(executor);

			await expect(tmux.capture('work:0.1')).resolves.toBe('hello\n');
			expect(executor).toHaveBeenCalledWith(['capture-pane', '-p', '-t', 'work:0.1']);
		});

		it('should wrap capture failures', async () => {
			const executor = vi.fn<TmuxExecutor>().mockRejectedValue(new Error('can\'t find pane: %9'));
			const tmux = new TmuxManager(executor);

			await expect(tmux.capture('%9')).rejects.toThrow('Failed to capture tmux pane: can\'t find pane: %9');
		});

		it('should send literal text followed by Enter when asked', async () => {
			const executor = vi.fn<TmuxExecutor>().mockResolvedValue({ stdout: '', stderr: '' });
			const tmux = new TmuxManager(executor);

			await tmux.inject('%3', 'y', { enter: true });

			expect(executor).toHaveBeenNthCalledWith(1, ['send-keys', '-t', '%3', '-l', 'y']);
			expect(executor).toHaveBeenNthCalledWith(2, ['send-keys', '-t', '%3', 'Enter']);
		});

		it('should send only the literal text by default', async () => {
			const executor = vi.fn<TmuxExecutor>().mockResolvedValue({ stdout: '', stderr: '' });
			const tmux = new TmuxManager(executor);

			await tmux.inject('%3', '1');

			expect(executor).toHaveBeenCalledTimes(1);
			expect(executor).toHaveBeenCalledWith(['send-keys', '-t', '%3', '-l', '1']);
		});

		it('should report an unresponsive server on timeout', async () => {
			vi.useFakeTimers();
			try {
				const executor = vi.fn<TmuxExecutor>().mockReturnValue(new Promise<{ stdout: string; stderr: string }>(() => {}));
				const tmux = new TmuxManager(executor);

				const pending = tmux.capture('%1');
				const assertion = expect(pending).rejects.toThrow('Tmux server is unresponsive. Cannot capture pane.');
				await vi.advanceTimersByTimeAsync(TMUX_TIMEOUT);
				await assertion;
			}
			finally {
				vi.useRealTimers();
			}
		});

		it('should report a missing pane as not existing', async () => {
			const executor = vi.fn<TmuxExecutor>().mockRejectedValue(new Error('can\'t find pane'));
			const tmux = new TmuxManager(executor);

			await expect(tmux.paneExists('%404')).resolves.toBe(false);
		});
	});
}
