/**
 * One captured snapshot of a pane's visible text.
 */
export type Frame = string;

export type PromptOption = {
	number: number;
	text: string;
	shortcut?: string;
};

export type ActivityState =
	| { kind: 'processing'; progress?: string }
	| {
		kind: 'awaiting_permission';
		matcher: string;
		prompt: string;
		response: string;
		submit: boolean;
		options: PromptOption[];
		context: string;
	}
	| { kind: 'idle' }
	| { kind: 'unknown' };

export type ActivityKind = ActivityState['kind'];

export type AwaitingPermissionState = Extract<ActivityState, { kind: 'awaiting_permission' }>;

export type MonitorEventKind = 'progress' | 'permission-request' | 'idle-detected' | 'capture-error';

export type MonitorEvent = {
	elapsedMs: number;
	kind: MonitorEventKind;
	detail: string;
};

export type TerminalStatus = 'succeeded' | 'timed_out' | 'failed' | 'cancelled';

export type MonitorSession = {
	target: string;
	startedAt: number;
	deadline: number;
	elapsedMs: number;
	unchangedStreak: number;
	stateStreak: { kind: ActivityKind; count: number } | null;
	answered: Set<string>;
	captureFailures: number;
	injections: number;
	previousFrame?: Frame;
	lastProgress?: string;
	lastProgressAt?: number;
	lastEventKind?: MonitorEventKind;
	events: MonitorEvent[];
};

export type MonitorResult = {
	target: string;
	finalText: Frame;
	events: MonitorEvent[];
	terminalStatus: TerminalStatus;
	elapsedMs: number;
	injections: number;
	reason?: string;
};

export type InjectOptions = {
	enter?: boolean;
};

/**
 * The two multiplexer primitives the monitor consumes. Both reject on failure.
 */
export type PaneDriver = {
	capture: (target: string) => Promise<Frame>;
	inject: (target: string, text: string, options?: InjectOptions) => Promise<void>;
};
