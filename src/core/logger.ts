/**
 * @fileoverview Logging utilities for panewatch
 *
 * Provides the consola logger instance shared by the monitor, the tmux adapter
 * and the CLI commands, tagged with the package name.
 *
 * @module logger
 */

import type { ConsolaInstance } from 'consola';
import process from 'node:process';
import { consola } from 'consola';

const packageName = 'panewatch';

/**
 * Application logger instance with package name tag
 */
export const logger: ConsolaInstance = consola.withTag(packageName);

// Apply LOG_LEVEL environment variable if set
if (process.env.LOG_LEVEL != null) {
	const level = Number.parseInt(process.env.LOG_LEVEL, 10);
	if (!Number.isNaN(level)) {
		logger.level = level;
	}
}

/**
 * Direct console.log function for output that must not carry logger formatting
 * (event lines, pane text, JSON results)
 */
// eslint-disable-next-line no-console
export const log = console.log;
