/**
 * @fileoverview Activity classification for captured pane frames
 *
 * Prompt matchers run first, over the trailing {@link DEFAULT_PROMPT_SCAN_LINES}
 * lines. A frame identical to the previous one is idle otherwise, even when a
 * stale progress line is still on screen. A changed frame is matched against
 * the progress matchers over the trailing {@link DEFAULT_PROGRESS_SCAN_LINES}
 * lines, and is unknown when none of them fires.
 *
 * @module classifier
 */

import type { ActivityState, AwaitingPermissionState, Frame, PromptOption } from '../types/index.ts';

export const DEFAULT_PROMPT_SCAN_LINES = 15;
export const DEFAULT_PROGRESS_SCAN_LINES = 8;

export type ClassifierOptions = {
	promptScanLines?: number;
	progressScanLines?: number;
};

export type PromptMatch = Omit<AwaitingPermissionState, 'kind' | 'matcher'>;

export type PromptMatcher = {
	name: string;
	match: (lines: string[]) => PromptMatch | null;
};

export type ProgressMatcher = {
	name: string;
	match: (line: string) => string | null;
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001B\[[0-?]*[ -/]*[@-~]|\u001B\][^\u0007\u001B]*(?:\u0007|\u001B\\)/g;
const BOX_CHARS = /[│┃┆┊╎╏║╭╮╯╰┌┐└┘├┤┬┴┼─━┄┅┈┉═╔╗╚╝╠╣╦╩╬]/g;
const QUESTION_PATTERNS = [
	/\bdo you want to\b.*\?/i,
	/\b(?:allow|approve|permit)\b.*\?/i,
];
const OPTION_LINE = /^(?:([❯›→>])\s*)?(\d+)\.\s+(\S.*)$/;
// Lines above the question kept in the prompt context (tool name, command)
const CONTEXT_LINES_ABOVE = 4;

/**
 * Trailing lines of a frame with escape sequences removed. tmux pads a capture
 * to the pane height, so trailing blank lines are dropped before counting.
 */
export function scanWindow(frame: Frame, count: number): string[] {
	const lines = frame.replace(ANSI_PATTERN, '').split('\n').map(line => line.replace(/\r$/, ''));
	let end = lines.length;
	while (end > 0 && lines[end - 1].trim() === '') {
		end--;
	}
	return lines.slice(Math.max(0, end - count), end);
}

/**
 * Remove box drawing characters and collapse whitespace
 */
export function cleanLine(line: string): string {
	return line.replace(BOX_CHARS, '').replace(/\s+/g, ' ').trim();
}

function parseOption(cleaned: string): { option: PromptOption; selected: boolean } | null {
	const match = cleaned.match(OPTION_LINE);
	if (!match) {
		return null;
	}

	const number = Number.parseInt(match[2], 10);
	let text = match[3].trim();
	let shortcut: string | undefined;

	// Shortcut hint in parentheses at the end, e.g. "(shift+tab)"
	const shortcutMatch = text.match(/\(([^)]+)\)$/);
	if (shortcutMatch) {
		text = text.slice(0, -shortcutMatch[0].length).trim();
		shortcut = shortcutMatch[1];
	}

	const option: PromptOption = shortcut ? { number, text, shortcut } : { number, text };
	return { option, selected: Boolean(match[1]) };
}

/**
 * Question line followed by a numbered option list with one highlighted entry:
 *
 *   Do you want to proceed?
 *   ❯ 1. Yes
 *     2. No
 */
function matchNumberedChoice(lines: string[]): PromptMatch | null {
	let questionIndex = -1;
	for (let i = lines.length - 1; i >= 0; i--) {
		const cleaned = cleanLine(lines[i]);
		if (QUESTION_PATTERNS.some(pattern => pattern.test(cleaned))) {
			questionIndex = i;
			break;
		}
	}
	if (questionIndex === -1) {
		return null;
	}

	const options: PromptOption[] = [];
	let selected: number | undefined;
	let lastOptionIndex = questionIndex;
	for (let i = questionIndex + 1; i < lines.length; i++) {
		const parsed = parseOption(cleanLine(lines[i]));
		if (!parsed) {
			continue;
		}
		options.push(parsed.option);
		lastOptionIndex = i;
		if (parsed.selected) {
			selected = parsed.option.number;
		}
	}

	if (options.length < 2 || selected === undefined) {
		return null;
	}

	const context = lines
		.slice(Math.max(0, questionIndex - CONTEXT_LINES_ABOVE), lastOptionIndex + 1)
		.map(cleanLine)
		.filter(line => line.length > 0)
		.join('\n');

	return {
		prompt: cleanLine(lines[questionIndex]),
		response: String(selected),
		submit: false,
		options,
		context,
	};
}

const YES_NO_LINE = /^(.*?\b(?:do you want to|allow|approve|proceed|continue|overwrite)\b.*?)\s*[[(]\s*(y(?:es)?)\s*\/\s*(no?)\s*[\])]/i;

/**
 * Interrogative line with a yes/no suffix on the cursor line, e.g.
 * "Proceed with installation? [Y/n]". The capitalised letter is the default.
 */
function matchYesNo(lines: string[]): PromptMatch | null {
	const lastLine = lines.at(-1);
	if (lastLine === undefined) {
		return null;
	}

	const cleaned = cleanLine(lastLine);
	const match = cleaned.match(YES_NO_LINE);
	if (!match) {
		return null;
	}

	const [, question, yes, no] = match;
	const defaultsToNo = no[0] === 'N' && yes[0] === 'y';
	return {
		prompt: question.trim(),
		response: (defaultsToNo ? no : yes).toLowerCase(),
		submit: true,
		options: [],
		context: cleaned,
	};
}

export const promptMatchers: readonly PromptMatcher[] = [
	{ name: 'numbered-choice', match: matchNumberedChoice },
	{ name: 'yes-no', match: matchYesNo },
];

export const progressMatchers: readonly ProgressMatcher[] = [
	{
		name: 'spinner',
		match: line => line.match(/^\s*[·✢✳✶✻✽⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏]\s*(\p{Lu}[\p{L}-]*(?:…|\.{3}))/u)?.[1] ?? null,
	},
	{
		name: 'verb-ellipsis',
		match: line => line.match(/\b([A-Z][a-z]+ing)(?:…|\.{3})/)?.[0] ?? null,
	},
	{
		name: 'token-counter',
		match: (line) => {
			const count = line.match(/(\d+(?:\.\d+)?k?)\s+tokens\b/i)?.[1];
			return count ? `${count} tokens` : null;
		},
	},
	{
		name: 'byte-counter',
		match: (line) => {
			const match = line.match(/(\d+(?:\.\d+)?\s?[KMG]i?B)\s*\/\s*(\d+(?:\.\d+)?\s?[KMG]i?B)/);
			return match ? `${match[1]} / ${match[2]}` : null;
		},
	},
	{
		name: 'interrupt-hint',
		match: line => (/\b(?:esc|ctrl\+c) to interrupt\b/i.test(line) ? 'working' : null),
	},
];

/**
 * First progress marker found, trying matchers in order and lines bottom-up
 */
export function detectProgress(lines: string[]): string | null {
	for (const matcher of progressMatchers) {
		for (let i = lines.length - 1; i >= 0; i--) {
			const marker = matcher.match(lines[i]);
			if (marker) {
				return marker;
			}
		}
	}
	return null;
}

/**
 * Classify the current frame. Total and side-effect free: every input maps to
 * exactly one state.
 */
export function classify(previousFrame: Frame | undefined, currentFrame: Frame, options: ClassifierOptions = {}): ActivityState {
	const promptLines = scanWindow(currentFrame, options.promptScanLines ?? DEFAULT_PROMPT_SCAN_LINES);
	for (const matcher of promptMatchers) {
		const match = matcher.match(promptLines);
		if (match) {
			return { kind: 'awaiting_permission', matcher: matcher.name, ...match };
		}
	}

	if (previousFrame !== undefined && previousFrame === currentFrame) {
		return { kind: 'idle' };
	}

	const progress = detectProgress(scanWindow(currentFrame, options.progressScanLines ?? DEFAULT_PROGRESS_SCAN_LINES));
	if (progress) {
		return { kind: 'processing', progress };
	}

	return { kind: 'unknown' };
}

if (import.meta.vitest) {
	const vitest = await import('vitest');
	const { describe, it, expect } = vitest;

	const bashDialogFixture = `╭──────────────────────────────────────────────────────────╮
│ Bash command                                             │
│                                                          │
│   npm run lint                                           │
│   Run the linter                                         │
│                                                          │
│ Do you want to proceed?                                  │
│ ❯ 1. Yes                                                 │
│   2. Yes, and don't ask again for npm run lint commands  │
│   3. No, and tell the agent what to do differently (esc) │
╰──────────────────────────────────────────────────────────╯


`;

	const editDialogFixture = `│ Do you want to make this edit to parser.ts?                │
│   1. Yes                                                   │
│ ❯ 2. Yes, allow all edits during this session (shift+tab)  │
│   3. No, and tell the agent what to do differently (esc)   │
╰────────────────────────────────────────────────────────────╯`;

	const thinkingFixture = `> refactor the parser

● I'll start by reading the parser module.

✻ Pondering… (12s · ↑ 1.2k tokens · esc to interrupt)

──────────────────────────────────────────────
>
──────────────────────────────────────────────
  ? for shortcuts`;

	const idleFixture = `● Done. The parser now handles nested groups.

──────────────────────────────────────────────
>
──────────────────────────────────────────────
  ? for shortcuts`;

	describe('scanWindow', () => {
		it('should drop trailing blank lines before taking the tail', () => {
			expect(scanWindow('a\nb\nc\n\n   \n', 2)).toEqual(['b', 'c']);
		});

		it('should strip ANSI escape sequences', () => {
			expect(scanWindow('\u001B[1;36mDo you want to proceed?\u001B[0m', 5)).toEqual(['Do you want to proceed?']);
		});
	});

	describe('prompt matchers', () => {
		it('should detect a bash permission dialog and pick the highlighted option', () => {
			const state = classify(undefined, bashDialogFixture);
			expect(state).toEqual({
				kind: 'awaiting_permission',
				matcher: 'numbered-choice',
				prompt: 'Do you want to proceed?',
				response: '1',
				submit: false,
				options: [
					{ number: 1, text: 'Yes' },
					{ number: 2, text: 'Yes, and don\'t ask again for npm run lint commands' },
					{ number: 3, text: 'No, and tell the agent what to do differently', shortcut: 'esc' },
				],
				context: [
					'npm run lint',
					'Run the linter',
					'Do you want to proceed?',
					'❯ 1. Yes',
					'2. Yes, and don\'t ask again for npm run lint commands',
					'3. No, and tell the agent what to do differently (esc)',
				].join('\n'),
			});
		});

		it('should answer with whichever option is highlighted', () => {
			const state = classify(undefined, editDialogFixture);
			expect(state.kind).toBe('awaiting_permission');
			if (state.kind === 'awaiting_permission') {
				expect(state.prompt).toBe('Do you want to make this edit to parser.ts?');
				expect(state.response).toBe('2');
				expect(state.options[1]).toEqual({ number: 2, text: 'Yes, allow all edits during this session', shortcut: 'shift+tab' });
			}
		});

		it('should accept allow phrasing as the question', () => {
			const frame = 'Allow this command to run?\n❯ 1. Yes\n  2. No';
			const state = classify(undefined, frame);
			expect(state.kind === 'awaiting_permission' && state.response).toBe('1');
		});

		it('should not treat a numbered list without a highlighted entry as a prompt', () => {
			const frame = 'Do you want to proceed?\n  1. Yes\n  2. No';
			expect(classify(undefined, frame).kind).toBe('unknown');
		});

		it('should not treat a plain numbered list as a prompt', () => {
			const frame = 'Steps:\n❯ 1. Install\n  2. Configure';
			expect(classify(undefined, frame).kind).toBe('unknown');
		});

		it('should ignore a prompt that has scrolled above the scan window', () => {
			const scrollback = Array.from({ length: 20 }, (_, i) => `log line ${i}`).join('\n');
			const frame = `${bashDialogFixture.trimEnd()}\n${scrollback}`;
			expect(classify(frame, frame).kind).toBe('idle');
		});

		it('should honour a custom scan window', () => {
			const frame = `${bashDialogFixture.trimEnd()}\nline a\nline b\nline c`;
			expect(classify(undefined, frame, { promptScanLines: 14 }).kind).toBe('awaiting_permission');
			expect(classify(undefined, frame, { promptScanLines: 4 }).kind).toBe('unknown');
		});

		it('should detect a yes/no prompt with a capitalised default', () => {
			const state = classify(undefined, 'Reading package lists...\nDo you want to continue? [Y/n] ');
			expect(state).toEqual({
				kind: 'awaiting_permission',
				matcher: 'yes-no',
				prompt: 'Do you want to continue?',
				response: 'y',
				submit: true,
				options: [],
				context: 'Do you want to continue? [Y/n]',
			});
		});

		it('should answer a default-no prompt with its default', () => {
			const state = classify(undefined, 'Overwrite existing config? [y/N]');
			expect(state.kind === 'awaiting_permission' && state.response).toBe('n');
		});

		it('should answer with the full word when the prompt spells it out', () => {
			const state = classify(undefined, 'Approve these changes? (yes/no)');
			expect(state.kind === 'awaiting_permission' && state.response).toBe('yes');
		});

		it('should only consider a yes/no prompt on the cursor line', () => {
			const frame = 'Proceed with install? [Y/n] y\nInstalling packages\nDone';
			expect(classify(undefined, frame).kind).toBe('unknown');
		});

		it('should prefer a prompt over progress markers', () => {
			const frame = `✻ Pondering… (esc to interrupt)\n${bashDialogFixture}`;
			expect(classify(undefined, frame).kind).toBe('awaiting_permission');
		});
	});

	describe('progress matchers', () => {
		it('should extract the spinner phrase', () => {
			expect(classify(undefined, thinkingFixture)).toEqual({ kind: 'processing', progress: 'Pondering…' });
		});

		it('should treat an unchanged frame with a stale marker as idle', () => {
			const frame = '$ npm install\nResolving...\nadded 12 packages in 3s\n$';
			expect(classify(frame, frame)).toEqual({ kind: 'idle' });
			expect(classify(thinkingFixture, thinkingFixture)).toEqual({ kind: 'idle' });
		});

		it('should keep a prompt on an unchanged frame', () => {
			expect(classify(bashDialogFixture, bashDialogFixture).kind).toBe('awaiting_permission');
		});

		it('should recognise a verb followed by three dots', () => {
			expect(classify(undefined, 'npm install\nResolving...')).toEqual({ kind: 'processing', progress: 'Resolving...' });
		});

		it('should recognise a token counter', () => {
			expect(classify(undefined, 'stream open · 3.4k tokens')).toEqual({ kind: 'processing', progress: '3.4k tokens' });
		});

		it('should recognise a byte counter', () => {
			expect(classify(undefined, 'model.bin  12.5MB / 40MB')).toEqual({ kind: 'processing', progress: '12.5MB / 40MB' });
		});

		it('should fall back to the interrupt hint', () => {
			expect(classify(undefined, 'output\n(ctrl+c to interrupt)')).toEqual({ kind: 'processing', progress: 'working' });
		});

		it('should ignore markers above the progress window', () => {
			const frame = `Compiling...\n${Array.from({ length: 8 }, (_, i) => `row ${i}`).join('\n')}`;
			expect(classify(frame, frame).kind).toBe('idle');
		});
	});

	describe('idle and unknown', () => {
		it('should classify identical frames as idle', () => {
			expect(classify(idleFixture, idleFixture)).toEqual({ kind: 'idle' });
		});

		it('should classify identical empty frames as idle', () => {
			expect(classify('', '')).toEqual({ kind: 'idle' });
		});

		it('should classify a changed unrecognised frame as unknown', () => {
			expect(classify(idleFixture, `${idleFixture}\nmore`)).toEqual({ kind: 'unknown' });
		});

		it('should classify the first frame as unknown', () => {
			expect(classify(undefined, idleFixture)).toEqual({ kind: 'unknown' });
		});
	});
}
