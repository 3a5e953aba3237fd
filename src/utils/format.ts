import type { ActivityState, MonitorEvent, MonitorResult, TerminalStatus } from '../types/index.ts';

/**
 * Elapsed milliseconds as seconds with one decimal, e.g. "12.0s"
 */
export function formatElapsed(elapsedMs: number): string {
	return `${(elapsedMs / 1000).toFixed(1)}s`;
}

/**
 * One human-readable line per event, prefixed with elapsed seconds
 */
export function formatEvent(event: MonitorEvent): string {
	return `[${formatElapsed(event.elapsedMs)}] ${event.kind}: ${event.detail}`;
}

export function renderEventLog(events: MonitorEvent[]): string {
	return events.map(formatEvent).join('\n');
}

const STATUS_LABELS: Record<TerminalStatus, string> = {
	succeeded: 'pane settled',
	timed_out: 'timed out',
	failed: 'failed',
	cancelled: 'cancelled',
};

/**
 * Summary line for a finished run
 */
export function formatSummary(result: MonitorResult): string {
	const parts = [
		`${result.target}: ${STATUS_LABELS[result.terminalStatus]} after ${formatElapsed(result.elapsedMs)}`,
		`${result.injections} ${result.injections === 1 ? 'prompt' : 'prompts'} answered`,
	];
	if (result.reason) {
		parts.push(result.reason);
	}
	return parts.join(', ');
}

/**
 * One-line description of a classification, used by `status`
 */
export function describeState(state: ActivityState): string {
	switch (state.kind) {
		case 'processing':
			return `processing: ${state.progress ?? 'working'}`;
		case 'awaiting_permission':
			return `awaiting permission: ${state.prompt} (would answer '${state.response}'${state.submit ? ' + Enter' : ''})`;
		case 'idle':
			return 'idle';
		case 'unknown':
			return 'unknown (output changing)';
	}
}

if (import.meta.vitest) {
	const vitest = await import('vitest');
	const { describe, it, expect } = vitest;

	describe('formatEvent', () => {
		it('should prefix the line with elapsed seconds', () => {
			expect(formatEvent({ elapsedMs: 12_345, kind: 'progress', detail: 'Pondering…' })).toBe('[12.3s] progress: Pondering…');
		});
	});

	describe('renderEventLog', () => {
		it('should render one event per line in order', () => {
			const log = renderEventLog([
				{ elapsedMs: 0, kind: 'progress', detail: 'Pondering…' },
				{ elapsedMs: 3000, kind: 'permission-request', detail: 'Do you want to proceed? -> sent \'1\'' },
				{ elapsedMs: 9000, kind: 'idle-detected', detail: 'no change for 3 polls' },
			]);

			expect(log).toBe([
				'[0.0s] progress: Pondering…',
				'[3.0s] permission-request: Do you want to proceed? -> sent \'1\'',
				'[9.0s] idle-detected: no change for 3 polls',
			].join('\n'));
		});

		it('should render an empty log as an empty string', () => {
			expect(renderEventLog([])).toBe('');
		});
	});

	describe('describeState', () => {
		it('should show the progress marker', () => {
			expect(describeState({ kind: 'processing', progress: 'Pondering…' })).toBe('processing: Pondering…');
		});

		it('should show the prompt and the answer it would get', () => {
			const state = describeState({
				kind: 'awaiting_permission',
				matcher: 'yes-no',
				prompt: 'Overwrite existing config?',
				response: 'n',
				submit: true,
				options: [],
				context: 'Overwrite existing config? [y/N]',
			});

			expect(state).toBe('awaiting permission: Overwrite existing config? (would answer \'n\' + Enter)');
		});

		it('should name idle and unknown panes', () => {
			expect(describeState({ kind: 'idle' })).toBe('idle');
			expect(describeState({ kind: 'unknown' })).toBe('unknown (output changing)');
		});
	});

	describe('formatSummary', () => {
		it('should describe a finished run', () => {
			const summary = formatSummary({
				target: '%2',
				finalText: '',
				events: [],
				terminalStatus: 'timed_out',
				elapsedMs: 5000,
				injections: 1,
			});

			expect(summary).toBe('%2: timed out after 5.0s, 1 prompt answered');
		});

		it('should include the failure reason', () => {
			const summary = formatSummary({
				target: '%2',
				finalText: '',
				events: [],
				terminalStatus: 'failed',
				elapsedMs: 0,
				injections: 0,
				reason: 'pane %2 is already being monitored',
			});

			expect(summary).toBe('%2: failed after 0.0s, 0 prompts answered, pane %2 is already being monitored');
		});
	});
}
