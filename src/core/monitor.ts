import type { PanewatchConfig } from './config.ts';
import type {
	AwaitingPermissionState,
	Frame,
	MonitorEvent,
	MonitorEventKind,
	MonitorResult,
	MonitorSession,
	PaneDriver,
	TerminalStatus,
} from '../types/index.ts';
import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { formatElapsed, formatEvent } from '../utils/format.ts';
import { classify } from './classifier.ts';
import { DEFAULT_CONFIG } from './config.ts';
import { logger } from './logger.ts';
import { AutoResponder } from './responder.ts';

export const MIN_POLL_INTERVAL_MS = 50;
export const UNKNOWN_PROGRESS = 'output changing (unrecognized)';

export type MonitoringOptions = Partial<PanewatchConfig>;

export type RunOptions = {
	timeout?: number; // milliseconds, defaults to the monitor's timeout option
	signal?: AbortSignal;
};

/**
 * Monotonic time source and sleep used by the poll loop
 */
export type Clock = {
	now: () => number;
	sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export const systemClock: Clock = {
	now: () => performance.now(),
	async sleep(ms, signal) {
		try {
			await delay(ms, undefined, { signal });
		}
		catch (error) {
			// Cancellation wakes the sleep early; the loop sees the aborted signal next
			if (signal?.aborted) {
				return;
			}
			throw error;
		}
	},
};

function resolveTimeout(value: number | undefined, fallback: number): number {
	if (value === undefined) {
		return fallback;
	}
	if (!Number.isFinite(value) || value < 0) {
		logger.warn(`Ignoring invalid timeout ${value}, using ${fallback}ms`);
		return fallback;
	}
	return value;
}

type StopOutcome = { status: TerminalStatus; reason?: string };

type TickOutcome = { status: 'running'; interval: number } | StopOutcome;

/**
 * Polls a pane until its output settles, answering permission prompts on the way.
 *
 * Emits `'event'` with each {@link MonitorEvent} as it is recorded.
 *
 * One run per target at a time: a second {@link PaneMonitor.monitor} call for a
 * target this instance is already watching is refused. Runs on the same pane
 * from separate instances or processes are the caller's responsibility.
 */
export class PaneMonitor extends EventEmitter {
	private driver: PaneDriver;
	private responder: AutoResponder;
	private clock: Clock;
	private options: PanewatchConfig;
	private activeTargets = new Set<string>();

	constructor(driver: PaneDriver, options: MonitoringOptions = {}, clock: Clock = systemClock) {
		super();
		this.driver = driver;
		this.responder = new AutoResponder(driver);
		this.clock = clock;
		this.options = {
			pollInterval: Math.max(MIN_POLL_INTERVAL_MS, options.pollInterval ?? DEFAULT_CONFIG.pollInterval),
			busyPollInterval: Math.max(MIN_POLL_INTERVAL_MS, options.busyPollInterval ?? DEFAULT_CONFIG.busyPollInterval),
			timeout: resolveTimeout(options.timeout, DEFAULT_CONFIG.timeout),
			stabilityThreshold: Math.max(1, options.stabilityThreshold ?? DEFAULT_CONFIG.stabilityThreshold),
			promptScanLines: options.promptScanLines ?? DEFAULT_CONFIG.promptScanLines,
			progressScanLines: options.progressScanLines ?? DEFAULT_CONFIG.progressScanLines,
			maxCaptureFailures: Math.max(1, options.maxCaptureFailures ?? DEFAULT_CONFIG.maxCaptureFailures),
			progressLogInterval: options.progressLogInterval ?? DEFAULT_CONFIG.progressLogInterval,
		};
	}

	/**
	 * Watch a pane until it settles, the deadline passes, captures keep failing
	 * or the signal aborts. Never rejects: every outcome is reported through
	 * `terminalStatus`, and the result always carries a final capture.
	 */
	async monitor(target: string, runOptions: RunOptions = {}): Promise<MonitorResult> {
		const timeout = resolveTimeout(runOptions.timeout, this.options.timeout);
		const startedAt = this.clock.now();
		const session: MonitorSession = {
			target,
			startedAt,
			deadline: startedAt + timeout,
			elapsedMs: 0,
			unchangedStreak: 0,
			stateStreak: null,
			answered: new Set(),
			captureFailures: 0,
			injections: 0,
			events: [],
		};

		if (this.activeTargets.has(target)) {
			const reason = `pane ${target} is already being monitored`;
			logger.warn(`Refusing to start a second monitor: ${reason}`);
			return this.finish(session, { status: 'failed', reason });
		}

		this.activeTargets.add(target);
		logger.info(`Started monitoring pane: ${target} (timeout ${formatElapsed(timeout)})`);

		let outcome: StopOutcome;
		try {
			outcome = await this.run(session, runOptions.signal);
		}
		catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			logger.error(`Monitoring ${target} stopped on an unexpected error: ${message}`);
			outcome = { status: 'failed', reason: `unexpected error: ${message}` };
		}
		finally {
			this.activeTargets.delete(target);
		}

		return this.finish(session, outcome);
	}

	getActiveMonitoring(): string[] {
		return Array.from(this.activeTargets);
	}

	private async run(session: MonitorSession, signal?: AbortSignal): Promise<StopOutcome> {
		while (true) {
			if (signal?.aborted) {
				logger.info(`Monitoring of ${session.target} cancelled`);
				return { status: 'cancelled' };
			}

			const now = this.clock.now();
			session.elapsedMs = now - session.startedAt;
			if (now >= session.deadline) {
				logger.info(`Deadline reached for ${session.target} after ${formatElapsed(session.elapsedMs)}`);
				return { status: 'timed_out' };
			}

			const outcome = await this.tick(session);
			if (outcome.status !== 'running') {
				return outcome;
			}

			// Sleep no longer than the time left, and never less than the minimum interval
			const remaining = session.deadline - this.clock.now();
			if (remaining > 0) {
				await this.clock.sleep(Math.max(MIN_POLL_INTERVAL_MS, Math.min(outcome.interval, remaining)), signal);
			}
		}
	}

	private async tick(session: MonitorSession): Promise<TickOutcome> {
		let frame: Frame;
		try {
			frame = await this.driver.capture(session.target);
		}
		catch (error) {
			return this.handleCaptureError(session, error);
		}
		session.captureFailures = 0;

		session.unchangedStreak = frame === session.previousFrame ? session.unchangedStreak + 1 : 0;
		const state = classify(session.previousFrame, frame, {
			promptScanLines: this.options.promptScanLines,
			progressScanLines: this.options.progressScanLines,
		});
		session.previousFrame = frame;
		session.stateStreak = session.stateStreak?.kind === state.kind
			? { kind: state.kind, count: session.stateStreak.count + 1 }
			: { kind: state.kind, count: 1 };

		logger.debug(`${session.target} ${state.kind} x${session.stateStreak.count}, unchanged for ${session.unchangedStreak} polls`);

		switch (state.kind) {
			case 'awaiting_permission':
				await this.handlePrompt(session, state);
				return { status: 'running', interval: this.options.pollInterval };
			case 'processing':
				this.reportProgress(session, state.progress ?? 'working');
				return { status: 'running', interval: this.options.busyPollInterval };
			case 'unknown':
				this.reportProgress(session, UNKNOWN_PROGRESS);
				return { status: 'running', interval: this.options.busyPollInterval };
			case 'idle':
				if (session.unchangedStreak >= this.options.stabilityThreshold) {
					this.record(session, 'idle-detected', `no change for ${session.unchangedStreak} polls`);
					return { status: 'succeeded' };
				}
				return { status: 'running', interval: this.options.pollInterval };
		}
	}

	private handleCaptureError(session: MonitorSession, error: unknown): TickOutcome {
		session.captureFailures++;
		const message = error instanceof Error ? error.message : String(error);
		const max = this.options.maxCaptureFailures;
		this.record(session, 'capture-error', `${message} (${session.captureFailures}/${max})`);

		if (session.captureFailures >= max) {
			logger.error(`Max capture failures exceeded for ${session.target}, stopping monitoring`);
			return { status: 'failed', reason: `capture failed ${max} times in a row` };
		}

		logger.warn(`Capture error for ${session.target}, retry ${session.captureFailures}/${max}`);
		return { status: 'running', interval: this.options.pollInterval };
	}

	private async handlePrompt(session: MonitorSession, state: AwaitingPermissionState): Promise<void> {
		const outcome = await this.responder.respond(session, state);
		switch (outcome.status) {
			case 'sent':
				session.injections++;
				this.record(session, 'permission-request', `${state.prompt} -> sent '${state.response}'${state.submit ? ' + Enter' : ''}`);
				break;
			case 'already_answered':
				this.record(session, 'permission-request', `${state.prompt} -> already answered`);
				break;
			case 'failed':
				this.record(session, 'permission-request', `${state.prompt} -> injection failed: ${outcome.error}`);
				break;
		}
	}

	/**
	 * Progress lines are throttled: a line is written when the marker text
	 * changes, after another kind of event, or once per progressLogInterval.
	 */
	private reportProgress(session: MonitorSession, detail: string): void {
		const due = session.lastEventKind !== 'progress'
			|| session.lastProgress !== detail
			|| session.lastProgressAt === undefined
			|| session.elapsedMs - session.lastProgressAt >= this.options.progressLogInterval;
		if (!due) {
			return;
		}

		session.lastProgress = detail;
		session.lastProgressAt = session.elapsedMs;
		this.record(session, 'progress', detail);
	}

	private record(session: MonitorSession, kind: MonitorEventKind, detail: string): void {
		const event: MonitorEvent = { elapsedMs: session.elapsedMs, kind, detail };
		session.events.push(event);
		session.lastEventKind = kind;
		logger.debug(`${session.target} ${formatEvent(event)}`);
		this.emit('event', event);
	}

	private async finish(session: MonitorSession, outcome: StopOutcome): Promise<MonitorResult> {
		let finalText = session.previousFrame ?? '';
		try {
			finalText = await this.driver.capture(session.target);
		}
		catch (error) {
			logger.warn(`Final capture of ${session.target} failed, returning the last frame: ${error instanceof Error ? error.message : String(error)}`);
		}

		session.elapsedMs = this.clock.now() - session.startedAt;
		logger.info(`Stopped monitoring pane: ${session.target} (${outcome.status} after ${formatElapsed(session.elapsedMs)})`);

		const result: MonitorResult = {
			target: session.target,
			finalText,
			events: [...session.events],
			terminalStatus: outcome.status,
			elapsedMs: session.elapsedMs,
			injections: session.injections,
		};
		if (outcome.reason) {
			result.reason = outcome.reason;
		}
		return result;
	}
}
