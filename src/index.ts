#!/usr/bin/env node

/**
 * @fileoverview Main entry point for the panewatch CLI
 *
 * Watches an interactive program running in a tmux pane, answers its permission
 * prompts and reports when the pane has settled.
 *
 * @module index
 */

import { run } from './commands/index.ts';

await run();
