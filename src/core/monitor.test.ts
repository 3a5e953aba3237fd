/**
 * Poll loop tests driven by a scripted pane and a fake clock
 */

import type { Clock } from './monitor.ts';
import type { Frame, MonitorEvent, PaneDriver } from '../types/index.ts';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PaneMonitor, UNKNOWN_PROGRESS } from './monitor.ts';

/**
 * Replays frames in order and keeps returning the last one. An Error entry
 * makes that capture fail.
 */
class ScriptedPane implements PaneDriver {
	private frames: Array<Frame | Error>;
	private index = 0;

	capture = vi.fn<PaneDriver['capture']>(async () => this.next());
	inject = vi.fn<PaneDriver['inject']>(async () => {});

	constructor(frames: Array<Frame | Error>) {
		this.frames = frames;
	}

	private next(): Frame {
		const entry = this.frames[Math.min(this.index, this.frames.length - 1)];
		this.index++;
		if (entry instanceof Error) {
			throw entry;
		}
		return entry;
	}
}

/**
 * Time only moves when the loop sleeps
 */
class FakeClock implements Clock {
	time = 0;
	sleeps: number[] = [];

	now = (): number => this.time;

	sleep = async (ms: number): Promise<void> => {
		this.sleeps.push(ms);
		this.time += ms;
	};
}

const spinner = (verb: string, seconds: number): Frame => `● Working on it\n\n✻ ${verb}… (${seconds}s · esc to interrupt)`;

const permissionDialog = `╭────────────────────────────────╮
│ Bash command                   │
│   rm -rf build                 │
│ Allow this command to run?     │
│ ❯ 1. Yes                       │
│   2. No                        │
╰────────────────────────────────╯`;

const idleScreen = '● All 12 tests pass.\n\n>';

const options = {
	pollInterval: 1000,
	busyPollInterval: 1000,
	stabilityThreshold: 3,
	progressLogInterval: 30_000,
};

describe('PaneMonitor', () => {
	let clock: FakeClock;

	beforeEach(() => {
		clock = new FakeClock();
	});

	describe('full session', () => {
		it('should answer the prompt once and stop when the pane settles', async () => {
			const pane = new ScriptedPane([
				spinner('Pondering', 1),
				spinner('Pondering', 2),
				spinner('Pondering', 3),
				permissionDialog,
				spinner('Writing', 4),
				spinner('Writing', 5),
				idleScreen,
			]);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1');

			expect(result.terminalStatus).toBe('succeeded');
			expect(result.elapsedMs).toBe(9000);
			expect(result.finalText).toBe(idleScreen);
			expect(result.injections).toBe(1);
			expect(result.reason).toBeUndefined();
			expect(result.events).toEqual([
				{ elapsedMs: 0, kind: 'progress', detail: 'Pondering…' },
				{ elapsedMs: 3000, kind: 'permission-request', detail: 'Allow this command to run? -> sent \'1\'' },
				{ elapsedMs: 4000, kind: 'progress', detail: 'Writing…' },
				{ elapsedMs: 6000, kind: 'progress', detail: UNKNOWN_PROGRESS },
				{ elapsedMs: 9000, kind: 'idle-detected', detail: 'no change for 3 polls' },
			]);
			expect(pane.inject).toHaveBeenCalledTimes(1);
			expect(pane.inject).toHaveBeenCalledWith('%1', '1', { enter: false });
		});

		it('should settle on a finished pane that still shows a progress line', async () => {
			const finished = '$ npm install\nResolving...\nadded 12 packages in 3s\n$';
			const pane = new ScriptedPane([finished]);
			const monitor = new PaneMonitor(pane, { ...options, timeout: 60_000 }, clock);

			const result = await monitor.monitor('%1');

			expect(result.terminalStatus).toBe('succeeded');
			expect(result.elapsedMs).toBe(3000);
			expect(result.events).toEqual([
				{ elapsedMs: 0, kind: 'progress', detail: 'Resolving...' },
				{ elapsedMs: 3000, kind: 'idle-detected', detail: 'no change for 3 polls' },
			]);
		});

		it('should emit every recorded event', async () => {
			const pane = new ScriptedPane([spinner('Pondering', 1), idleScreen]);
			const monitor = new PaneMonitor(pane, options, clock);
			const seen: MonitorEvent[] = [];
			monitor.on('event', (event: MonitorEvent) => seen.push(event));

			const result = await monitor.monitor('%1');

			expect(seen).toEqual(result.events);
			expect(seen.map(event => event.kind)).toEqual(['progress', 'progress', 'idle-detected']);
		});

		it('should log repeated progress again once the log interval passes', async () => {
			const frames = Array.from({ length: 4 }, (_, i) => spinner('Pondering', i));
			const pane = new ScriptedPane([...frames, idleScreen]);
			const monitor = new PaneMonitor(pane, { ...options, progressLogInterval: 2000 }, clock);

			const result = await monitor.monitor('%1');

			expect(result.events.filter(event => event.kind === 'progress').map(event => event.elapsedMs)).toEqual([0, 2000, 4000]);
		});
	});

	describe('prompts', () => {
		it('should not answer the same prompt twice', async () => {
			const pane = new ScriptedPane([permissionDialog, permissionDialog, permissionDialog, idleScreen]);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1');

			expect(pane.inject).toHaveBeenCalledTimes(1);
			expect(result.injections).toBe(1);
			expect(result.events.filter(event => event.kind === 'permission-request').map(event => event.detail)).toEqual([
				'Allow this command to run? -> sent \'1\'',
				'Allow this command to run? -> already answered',
				'Allow this command to run? -> already answered',
			]);
			expect(result.terminalStatus).toBe('succeeded');
			expect(result.events).toHaveLength(5);
		});

		it('should retry a prompt whose injection failed', async () => {
			const pane = new ScriptedPane([permissionDialog, permissionDialog, idleScreen]);
			pane.inject.mockRejectedValueOnce(new Error('send-keys failed'));
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1');

			expect(pane.inject).toHaveBeenCalledTimes(2);
			expect(result.injections).toBe(1);
			expect(result.events[0]).toEqual({
				elapsedMs: 0,
				kind: 'permission-request',
				detail: 'Allow this command to run? -> injection failed: send-keys failed',
			});
			expect(result.events[1]).toEqual({
				elapsedMs: 1000,
				kind: 'permission-request',
				detail: 'Allow this command to run? -> sent \'1\'',
			});
		});

		it('should press Enter after a yes/no answer', async () => {
			const pane = new ScriptedPane(['Unpacking...\nDo you want to continue? [Y/n] ', idleScreen]);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1');

			expect(pane.inject).toHaveBeenCalledWith('%1', 'y', { enter: true });
			expect(result.events[0].detail).toBe('Do you want to continue? -> sent \'y\' + Enter');
		});
	});

	describe('deadline', () => {
		it('should time out when the pane never settles', async () => {
			let frame = 0;
			const pane = new ScriptedPane([]);
			pane.capture.mockImplementation(async () => `output ${frame++}`);
			const monitor = new PaneMonitor(pane, { ...options, timeout: 5000 }, clock);

			const result = await monitor.monitor('%1');

			expect(result.terminalStatus).toBe('timed_out');
			expect(result.elapsedMs).toBe(5000);
			expect(pane.capture).toHaveBeenCalledTimes(6);
			expect(result.finalText).toBe('output 5');
			expect(result.events).toEqual([{ elapsedMs: 0, kind: 'progress', detail: UNKNOWN_PROGRESS }]);
			expect(pane.inject).not.toHaveBeenCalled();
		});

		it('should never sleep past the deadline', async () => {
			let frame = 0;
			const pane = new ScriptedPane([]);
			pane.capture.mockImplementation(async () => `output ${frame++}`);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1', { timeout: 4500 });

			expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000, 500]);
			expect(result.elapsedMs).toBe(4500);
			expect(result.terminalStatus).toBe('timed_out');
		});

		it('should fall back to the monitor timeout when a run timeout is not a number', async () => {
			let frame = 0;
			const pane = new ScriptedPane([]);
			pane.capture.mockImplementation(async () => `output ${frame++}`);
			const monitor = new PaneMonitor(pane, { ...options, timeout: 5000 }, clock);

			const result = await monitor.monitor('%1', { timeout: Number.NaN });

			expect(result.terminalStatus).toBe('timed_out');
			expect(result.elapsedMs).toBe(5000);
			expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000, 1000]);
		});

		it('should fall back to the default timeout when the configured one is invalid', async () => {
			let frame = 0;
			const pane = new ScriptedPane([]);
			pane.capture.mockImplementation(async () => `output ${frame++}`);
			const monitor = new PaneMonitor(pane, { ...options, timeout: -1 }, clock);

			const result = await monitor.monitor('%1');

			expect(result.terminalStatus).toBe('timed_out');
			expect(result.elapsedMs).toBe(600_000);
		});

		it('should wait the minimum interval when little time is left', async () => {
			let frame = 0;
			const pane = new ScriptedPane([]);
			pane.capture.mockImplementation(async () => `output ${frame++}`);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1', { timeout: 1010 });

			expect(clock.sleeps).toEqual([1000, 50]);
			expect(result.elapsedMs).toBe(1050);
			expect(result.terminalStatus).toBe('timed_out');
		});

		it('should still return a final capture when the timeout is zero', async () => {
			const pane = new ScriptedPane([idleScreen]);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1', { timeout: 0 });

			expect(result.terminalStatus).toBe('timed_out');
			expect(result.events).toEqual([]);
			expect(result.finalText).toBe(idleScreen);
			expect(pane.capture).toHaveBeenCalledTimes(1);
		});
	});

	describe('capture failures', () => {
		it('should fail after the maximum number of consecutive failures', async () => {
			const pane = new ScriptedPane([new Error('can\'t find pane: %1')]);
			const monitor = new PaneMonitor(pane, { ...options, maxCaptureFailures: 3 }, clock);

			const result = await monitor.monitor('%1');

			expect(result.terminalStatus).toBe('failed');
			expect(result.reason).toBe('capture failed 3 times in a row');
			expect(result.elapsedMs).toBe(2000);
			expect(result.finalText).toBe('');
			expect(result.events).toEqual([
				{ elapsedMs: 0, kind: 'capture-error', detail: 'can\'t find pane: %1 (1/3)' },
				{ elapsedMs: 1000, kind: 'capture-error', detail: 'can\'t find pane: %1 (2/3)' },
				{ elapsedMs: 2000, kind: 'capture-error', detail: 'can\'t find pane: %1 (3/3)' },
			]);
		});

		it('should keep going after a successful capture resets the count', async () => {
			const failure = new Error('server busy');
			const pane = new ScriptedPane([failure, failure, idleScreen]);
			const monitor = new PaneMonitor(pane, { ...options, maxCaptureFailures: 3 }, clock);

			const result = await monitor.monitor('%1');

			expect(result.terminalStatus).toBe('succeeded');
			expect(result.events.map(event => event.kind)).toEqual(['capture-error', 'capture-error', 'progress', 'idle-detected']);
			expect(result.elapsedMs).toBe(5000);
		});
	});

	describe('cancellation', () => {
		it('should stop at the next check once the signal aborts', async () => {
			const controller = new AbortController();
			let frame = 0;
			const pane = new ScriptedPane([]);
			pane.capture.mockImplementation(async () => {
				if (frame === 1) {
					controller.abort();
				}
				return `frame ${frame++}`;
			});
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1', { signal: controller.signal });

			expect(result.terminalStatus).toBe('cancelled');
			expect(result.finalText).toBe('frame 2');
			expect(result.elapsedMs).toBe(2000);
		});

		it('should not poll when the signal is already aborted', async () => {
			const pane = new ScriptedPane([idleScreen]);
			const monitor = new PaneMonitor(pane, options, clock);

			const result = await monitor.monitor('%1', { signal: AbortSignal.abort() });

			expect(result.terminalStatus).toBe('cancelled');
			expect(result.events).toEqual([]);
			expect(pane.capture).toHaveBeenCalledTimes(1);
		});
	});

	describe('concurrency', () => {
		it('should refuse a second run on a pane that is being monitored', async () => {
			const pane = new ScriptedPane(['same']);
			const monitor = new PaneMonitor(pane, options, clock);

			const first = monitor.monitor('%1');
			expect(monitor.getActiveMonitoring()).toEqual(['%1']);
			const second = await monitor.monitor('%1');

			expect(second.terminalStatus).toBe('failed');
			expect(second.reason).toBe('pane %1 is already being monitored');
			expect(second.events).toEqual([]);

			await expect(first).resolves.toMatchObject({ terminalStatus: 'succeeded' });
			expect(monitor.getActiveMonitoring()).toEqual([]);
		});

		it('should allow a new run once the previous one finished', async () => {
			const pane = new ScriptedPane(['same']);
			const monitor = new PaneMonitor(pane, options, clock);

			await monitor.monitor('%1');
			const again = await monitor.monitor('%1');

			expect(again.terminalStatus).toBe('succeeded');
		});

		it('should watch different panes side by side', async () => {
			const pane = new ScriptedPane(['same']);
			const monitor = new PaneMonitor(pane, options, clock);

			const results = await Promise.all([monitor.monitor('%1'), monitor.monitor('%2')]);

			expect(results.map(result => result.terminalStatus)).toEqual(['succeeded', 'succeeded']);
		});
	});

	describe('options', () => {
		it('should clamp intervals and thresholds to their minimums', async () => {
			const pane = new ScriptedPane(['same']);
			const monitor = new PaneMonitor(pane, { pollInterval: 0, busyPollInterval: 0, stabilityThreshold: 0 }, clock);

			const result = await monitor.monitor('%1');

			expect(clock.sleeps).toEqual([50]);
			expect(result.elapsedMs).toBe(50);
			expect(result.events.at(-1)).toEqual({ elapsedMs: 50, kind: 'idle-detected', detail: 'no change for 1 polls' });
		});
	});

	it('should report an unexpected error as a failed run', async () => {
		const pane = new ScriptedPane(['same']);
		const brokenClock: Clock = {
			now: () => 0,
			sleep: async () => {
				throw new Error('clock broke');
			},
		};
		const monitor = new PaneMonitor(pane, options, brokenClock);

		const result = await monitor.monitor('%1');

		expect(result.terminalStatus).toBe('failed');
		expect(result.reason).toBe('unexpected error: clock broke');
		expect(monitor.getActiveMonitoring()).toEqual([]);
	});
});
