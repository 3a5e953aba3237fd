import process from 'node:process';
import { cli } from 'gunshi';
import { description, name, version } from '../../package.json';
import { monitorCommand } from './monitor.ts';
import { statusCommand } from './status.ts';

export { monitorCommand, statusCommand };

/**
 * Command entries as tuple array
 */
export const subCommandUnion = [
	['monitor', monitorCommand],
	['status', statusCommand],
] as const;

/**
 * Map of available CLI subcommands
 */
const subCommands = new Map();
for (const [name, command] of subCommandUnion) {
	subCommands.set(name, command);
}

/**
 * Default command when no subcommand is specified
 */
const mainCommand = monitorCommand;

export async function run(): Promise<void> {
	await cli(process.argv.slice(2), mainCommand, {
		name,
		version,
		description,
		subCommands,
		renderHeader: null,
	});
}
