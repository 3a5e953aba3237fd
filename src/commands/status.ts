import type { PanewatchConfig } from '../core/config.ts';
import process from 'node:process';
import { setTimeout as delay } from 'node:timers/promises';
import { define } from 'gunshi';
import { classify, scanWindow } from '../core/classifier.ts';
import { loadConfig, validateConfig } from '../core/config.ts';
import { log, logger } from '../core/logger.ts';
import { TmuxManager } from '../core/tmux.ts';
import { parsePositiveInteger } from '../utils/args.ts';
import { describeState } from '../utils/format.ts';

const DEFAULT_STATUS_LINES = 10;

export const statusCommand = define({
	name: 'status',
	description: 'Classify what a tmux pane is doing right now',
	args: {
		target: {
			type: 'string',
			description: 'tmux pane target (e.g. work:0.1 or %3)',
			required: true,
		},
		lines: {
			type: 'string',
			description: `Number of trailing pane lines to show (default: ${DEFAULT_STATUS_LINES})`,
		},
	},
	async run(ctx) {
		const { target } = ctx.values;

		let config: PanewatchConfig;
		let lines: number;
		try {
			config = loadConfig();
			validateConfig(config);
			lines = parsePositiveInteger('lines', ctx.values.lines) ?? DEFAULT_STATUS_LINES;
		}
		catch (error) {
			logger.error('Configuration error:', error instanceof Error ? error.message : error);
			process.exit(1);
		}

		const tmuxManager = new TmuxManager();
		if (!(await tmuxManager.paneExists(target))) {
			logger.error(`Pane not found: ${target}`);
			process.exit(1);
		}

		try {
			// Two captures one interval apart, so an unchanged pane reads as idle
			const first = await tmuxManager.capture(target);
			await delay(config.pollInterval);
			const second = await tmuxManager.capture(target);
			const state = classify(first, second, {
				promptScanLines: config.promptScanLines,
				progressScanLines: config.progressScanLines,
			});

			logger.info(`Pane: ${target}`);
			logger.info(`State: ${describeState(state)}`);
			if (state.kind === 'awaiting_permission' && state.options.length > 0) {
				for (const option of state.options) {
					logger.info(`  ${option.number}. ${option.text}${option.shortcut ? ` (${option.shortcut})` : ''}`);
				}
			}

			const recent = scanWindow(second, lines);
			if (recent.length > 0) {
				logger.info('');
				logger.info(`Recent output (last ${lines} lines):`);
				log(recent.join('\n'));
			}
		}
		catch (error) {
			logger.error('Failed to read pane status:', error instanceof Error ? error.message : error);
			process.exit(1);
		}
	},
});
