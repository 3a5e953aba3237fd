import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import process from 'node:process';
import { config } from 'dotenv';
import { logger } from './logger.ts';

export type PanewatchConfig = {
	pollInterval: number;
	busyPollInterval: number;
	timeout: number;
	stabilityThreshold: number;
	promptScanLines: number;
	progressScanLines: number;
	maxCaptureFailures: number;
	progressLogInterval: number;
};

export const DEFAULT_CONFIG: PanewatchConfig = {
	pollInterval: 2000,
	busyPollInterval: 1000,
	timeout: 10 * 60 * 1000,
	stabilityThreshold: 3,
	promptScanLines: 15,
	progressScanLines: 8,
	maxCaptureFailures: 3,
	progressLogInterval: 30_000,
};

const CONFIG_KEYS: Array<keyof PanewatchConfig> = [
	'pollInterval',
	'busyPollInterval',
	'timeout',
	'stabilityThreshold',
	'promptScanLines',
	'progressScanLines',
	'maxCaptureFailures',
	'progressLogInterval',
];

const ENV_KEYS: Record<keyof PanewatchConfig, string> = {
	pollInterval: 'PANEWATCH_POLL_INTERVAL',
	busyPollInterval: 'PANEWATCH_BUSY_POLL_INTERVAL',
	timeout: 'PANEWATCH_TIMEOUT',
	stabilityThreshold: 'PANEWATCH_STABILITY_THRESHOLD',
	promptScanLines: 'PANEWATCH_PROMPT_SCAN_LINES',
	progressScanLines: 'PANEWATCH_PROGRESS_SCAN_LINES',
	maxCaptureFailures: 'PANEWATCH_MAX_CAPTURE_FAILURES',
	progressLogInterval: 'PANEWATCH_PROGRESS_LOG_INTERVAL',
};

/**
 * Load configuration from environment variables and .env files
 *
 * Priority (highest to lowest):
 * 1. Environment variables (PANEWATCH_*)
 * 2. Project env file (./panewatch.env)
 * 3. Project .env file (./.env)
 * 4. Global env file (~/.panewatch.env)
 * 5. Default values
 */
export function loadConfig(): PanewatchConfig {
	loadEnvFiles();

	const values = { ...DEFAULT_CONFIG };
	for (const key of CONFIG_KEYS) {
		const raw = process.env[ENV_KEYS[key]];
		if (raw != null && raw.trim() !== '') {
			values[key] = parseInteger(ENV_KEYS[key], raw);
		}
	}

	return values;
}

function loadEnvFiles(): void {
	// Skip loading env files during testing if requested
	if (process.env.NODE_ENV === 'test' && process.env.SKIP_ENV_FILES) {
		return;
	}

	const envFiles = [
		resolve(process.cwd(), 'panewatch.env'),
		resolve(process.cwd(), '.env'),
		resolve(homedir(), '.panewatch.env'),
	];

	// dotenv never overrides, so the first file loaded wins
	for (const envFile of envFiles) {
		if (existsSync(envFile)) {
			config({ path: envFile, override: false });
			logger.debug(`Loaded environment from: ${envFile}`);
		}
	}
}

function parseInteger(name: string, raw: string): number {
	const value = Number(raw.trim());
	if (!Number.isInteger(value)) {
		throw new TypeError(`Invalid value for ${name}: expected an integer, got "${raw}"`);
	}
	return value;
}

/**
 * Validate that the current configuration is usable by the monitor
 */
export function validateConfig(cfg: PanewatchConfig): void {
	for (const key of CONFIG_KEYS) {
		if (!Number.isFinite(cfg[key]) || cfg[key] <= 0) {
			throw new Error(`${ENV_KEYS[key]} must be a positive number (got ${cfg[key]})`);
		}
	}
	if (cfg.pollInterval < 250 || cfg.busyPollInterval < 250) {
		logger.warn('Poll intervals under 250ms hammer the tmux server; consider a longer interval');
	}
}

/**
 * Create example configuration file contents
 */
export function createExampleEnv(): string {
	return `# panewatch Configuration
# Copy this to panewatch.env or .env and adjust as needed

# Poll interval while the pane is idle or showing a prompt (ms, default: 2000)
PANEWATCH_POLL_INTERVAL=2000
# Poll interval while the pane is busy (ms, default: 1000)
PANEWATCH_BUSY_POLL_INTERVAL=1000
# Give up after this long (ms, default: 600000)
PANEWATCH_TIMEOUT=600000
# Unchanged polls required before the pane counts as finished (default: 3)
PANEWATCH_STABILITY_THRESHOLD=3
# Trailing lines searched for permission prompts (default: 15)
PANEWATCH_PROMPT_SCAN_LINES=15
# Trailing lines searched for progress markers (default: 8)
PANEWATCH_PROGRESS_SCAN_LINES=8
# Consecutive capture failures before giving up (default: 3)
PANEWATCH_MAX_CAPTURE_FAILURES=3
# Minimum time between repeated progress lines (ms, default: 30000)
PANEWATCH_PROGRESS_LOG_INTERVAL=30000
`;
}

if (import.meta.vitest) {
	const vitest = await import('vitest');
	const { beforeEach, describe, it, expect } = vitest;

	describe('loadConfig', () => {
		beforeEach(() => {
			for (const key in process.env) {
				if (key.startsWith('PANEWATCH_')) {
					delete process.env[key];
				}
			}

			process.env.NODE_ENV = 'test';
			process.env.SKIP_ENV_FILES = 'true';
		});

		it('should return defaults when nothing is set', () => {
			expect(loadConfig()).toEqual(DEFAULT_CONFIG);
		});

		it('should read PANEWATCH_ prefixed variables', () => {
			process.env.PANEWATCH_POLL_INTERVAL = '500';
			process.env.PANEWATCH_STABILITY_THRESHOLD = ' 5 ';

			const cfg = loadConfig();

			expect(cfg.pollInterval).toBe(500);
			expect(cfg.stabilityThreshold).toBe(5);
			expect(cfg.promptScanLines).toBe(15);
		});

		it('should ignore empty variables', () => {
			process.env.PANEWATCH_TIMEOUT = '';

			expect(loadConfig().timeout).toBe(600_000);
		});

		it('should reject non-integer values', () => {
			process.env.PANEWATCH_MAX_CAPTURE_FAILURES = 'three';

			expect(() => loadConfig()).toThrow('Invalid value for PANEWATCH_MAX_CAPTURE_FAILURES: expected an integer, got "three"');
		});
	});

	describe('validateConfig', () => {
		it('should accept the defaults', () => {
			expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
		});

		it('should reject a zero poll interval', () => {
			expect(() => validateConfig({ ...DEFAULT_CONFIG, pollInterval: 0 })).toThrow('PANEWATCH_POLL_INTERVAL must be a positive number (got 0)');
		});

		it('should reject a negative stability threshold', () => {
			expect(() => validateConfig({ ...DEFAULT_CONFIG, stabilityThreshold: -1 })).toThrow('PANEWATCH_STABILITY_THRESHOLD must be a positive number (got -1)');
		});
	});

	describe('createExampleEnv', () => {
		it('should document every variable', () => {
			const example = createExampleEnv();
			for (const name of Object.values(ENV_KEYS)) {
				expect(example).toContain(`${name}=`);
			}
		});
	});
}
