import type { AwaitingPermissionState, MonitorSession, PaneDriver } from '../types/index.ts';
import { createHash } from 'node:crypto';
import { logger } from './logger.ts';

export type ResponseOutcome =
	| { status: 'sent'; fingerprint: string }
	| { status: 'already_answered'; fingerprint: string }
	| { status: 'failed'; fingerprint: string; error: string };

/**
 * Identifier for a visible prompt. Two dialogs asking the same question about
 * different commands differ in their context block and so in fingerprint.
 */
export function fingerprintPrompt(state: AwaitingPermissionState): string {
	return createHash('sha1')
		.update(state.matcher)
		.update('\0')
		.update(state.context)
		.update('\0')
		.update(state.response)
		.digest('hex');
}

export class AutoResponder {
	private driver: PaneDriver;

	constructor(driver: PaneDriver) {
		this.driver = driver;
	}

	/**
	 * Answer a prompt unless this session already answered it. The fingerprint is
	 * only recorded after a successful injection, so a failed send is retried when
	 * the prompt is seen again.
	 */
	async respond(session: MonitorSession, state: AwaitingPermissionState): Promise<ResponseOutcome> {
		const fingerprint = fingerprintPrompt(state);
		if (session.answered.has(fingerprint)) {
			logger.debug(`Prompt already answered, skipping: ${state.prompt}`);
			return { status: 'already_answered', fingerprint };
		}

		try {
			await this.driver.inject(session.target, state.response, { enter: state.submit });
		}
		catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			logger.warn(`Failed to answer prompt on ${session.target}: ${message}`);
			return { status: 'failed', fingerprint, error: message };
		}

		session.answered.add(fingerprint);
		logger.debug(`Answered "${state.prompt}" with '${state.response}' on ${session.target}`);
		return { status: 'sent', fingerprint };
	}
}

if (import.meta.vitest) {
	const vitest = await import('vitest');
	const { beforeEach, describe, it, expect, vi } = vitest;

	const prompt: AwaitingPermissionState = {
		kind: 'awaiting_permission',
		matcher: 'numbered-choice',
		prompt: 'Do you want to proceed?',
		response: '1',
		submit: false,
		options: [{ number: 1, text: 'Yes' }, { number: 2, text: 'No' }],
		context: 'rm -rf build\nDo you want to proceed?\n❯ 1. Yes\n2. No',
	};

	function createSession(): MonitorSession {
		return {
			target: '%1',
			startedAt: 0,
			deadline: 1000,
			elapsedMs: 0,
			unchangedStreak: 0,
			stateStreak: null,
			answered: new Set(),
			captureFailures: 0,
			injections: 0,
			events: [],
		};
	}

	describe('fingerprintPrompt', () => {
		it('should be stable for the same prompt', () => {
			expect(fingerprintPrompt(prompt)).toBe(fingerprintPrompt({ ...prompt, options: [...prompt.options] }));
		});

		it('should tell apart the same question about different commands', () => {
			const other = { ...prompt, context: 'git push --force\nDo you want to proceed?\n❯ 1. Yes\n2. No' };
			expect(fingerprintPrompt(other)).not.toBe(fingerprintPrompt(prompt));
		});
	});

	describe('AutoResponder', () => {
		function createDriver() {
			return {
				capture: vi.fn<PaneDriver['capture']>(),
				inject: vi.fn<PaneDriver['inject']>().mockResolvedValue(undefined),
			};
		}

		let driver: ReturnType<typeof createDriver>;
		let responder: AutoResponder;

		beforeEach(() => {
			driver = createDriver();
			responder = new AutoResponder(driver);
		});

		it('should inject the response and remember the prompt', async () => {
			const session = createSession();

			const outcome = await responder.respond(session, prompt);

			expect(outcome).toEqual({ status: 'sent', fingerprint: fingerprintPrompt(prompt) });
			expect(driver.inject).toHaveBeenCalledWith('%1', '1', { enter: false });
			expect(session.answered.has(fingerprintPrompt(prompt))).toBe(true);
		});

		it('should not answer the same prompt twice', async () => {
			const session = createSession();

			await responder.respond(session, prompt);
			const outcome = await responder.respond(session, prompt);

			expect(outcome.status).toBe('already_answered');
			expect(driver.inject).toHaveBeenCalledTimes(1);
		});

		it('should press Enter for prompts that need submitting', async () => {
			await responder.respond(createSession(), { ...prompt, matcher: 'yes-no', response: 'y', submit: true });

			expect(driver.inject).toHaveBeenCalledWith('%1', 'y', { enter: true });
		});

		it('should leave the prompt unanswered when injection fails', async () => {
			const session = createSession();
			driver.inject.mockRejectedValueOnce(new Error('Failed to send keys to tmux: no server running'));

			const failed = await responder.respond(session, prompt);
			const retried = await responder.respond(session, prompt);

			expect(failed).toEqual({
				status: 'failed',
				fingerprint: fingerprintPrompt(prompt),
				error: 'Failed to send keys to tmux: no server running',
			});
			expect(retried.status).toBe('sent');
			expect(driver.inject).toHaveBeenCalledTimes(2);
		});
	});
}
