import type { PanewatchConfig } from '../core/config.ts';
import type { MonitorEvent, MonitorResult, TerminalStatus } from '../types/index.ts';
import process from 'node:process';
import { define } from 'gunshi';
import { loadConfig, validateConfig } from '../core/config.ts';
import { log, logger } from '../core/logger.ts';
import { PaneMonitor } from '../core/monitor.ts';
import { TmuxManager } from '../core/tmux.ts';
import { parsePositiveInteger } from '../utils/args.ts';
import { formatEvent, formatSummary } from '../utils/format.ts';

export const EXIT_CODES: Record<TerminalStatus, number> = {
	succeeded: 0,
	failed: 1,
	timed_out: 2,
	cancelled: 130,
};

export const monitorCommand = define({
	name: 'monitor',
	description: 'Watch a tmux pane until it settles, answering permission prompts',
	args: {
		target: {
			type: 'string',
			description: 'tmux pane target (e.g. work:0.1 or %3)',
			required: true,
		},
		timeout: {
			type: 'string',
			description: 'Give up after this many seconds',
		},
		interval: {
			type: 'string',
			description: 'Poll interval in milliseconds',
		},
		stability: {
			type: 'string',
			description: 'Unchanged polls required before the pane counts as finished',
		},
		json: {
			type: 'boolean',
			description: 'Print the result as JSON instead of the event log',
		},
	},
	async run(ctx) {
		const { target, json } = ctx.values;

		let config: PanewatchConfig;
		try {
			config = loadConfig();
			const timeout = parsePositiveInteger('timeout', ctx.values.timeout);
			config.timeout = timeout != null ? timeout * 1000 : config.timeout;
			config.pollInterval = parsePositiveInteger('interval', ctx.values.interval) ?? config.pollInterval;
			config.stabilityThreshold = parsePositiveInteger('stability', ctx.values.stability) ?? config.stabilityThreshold;
			validateConfig(config);
		}
		catch (error) {
			logger.error('Configuration error:', error instanceof Error ? error.message : error);
			process.exit(1);
		}

		if (json) {
			// Keep stdout for the JSON document; warnings still reach stderr
			logger.level = 1;
		}

		const tmuxManager = new TmuxManager();
		if (!(await tmuxManager.isTmuxAvailable())) {
			logger.error('tmux is not installed or not available in PATH');
			process.exit(1);
		}
		if (!(await tmuxManager.paneExists(target))) {
			logger.error(`Pane not found: ${target}`);
			logger.info('List panes with: tmux list-panes -a');
			process.exit(1);
		}

		const monitor = new PaneMonitor(tmuxManager, config);
		if (!json) {
			monitor.on('event', (event: MonitorEvent) => log(formatEvent(event)));
		}

		const controller = new AbortController();
		const abort = (): void => {
			logger.warn('Interrupted, stopping after the current poll...');
			controller.abort();
		};
		process.once('SIGINT', abort);
		process.once('SIGTERM', abort);

		let result: MonitorResult;
		try {
			result = await monitor.monitor(target, { signal: controller.signal });
		}
		finally {
			process.off('SIGINT', abort);
			process.off('SIGTERM', abort);
		}

		if (json) {
			log(JSON.stringify(result, null, 2));
		}
		else {
			log('');
			log(formatSummary(result));
			const finalText = result.finalText.trimEnd();
			if (finalText !== '') {
				log('');
				log(finalText);
			}
		}

		process.exitCode = EXIT_CODES[result.terminalStatus];
	},
});
