export type RunStateKind =
	| 'IDLE'
	| 'STARTING'
	| 'RUNNING'
	| 'MUX_SCANNING'
	| 'PAUSED'
	| 'FINISHING'
	| 'STOPPED'
	| 'ERROR';

export type RunState =
	| { kind: Exclude<RunStateKind, 'ERROR'> }
	| { kind: 'ERROR'; message: string };

const ACTIVE_KINDS: ReadonlySet<RunStateKind> = new Set(['STARTING', 'RUNNING', 'MUX_SCANNING', 'PAUSED', 'FINISHING']);

const LABELS: Record<RunStateKind, string> = {
	IDLE: 'Idle',
	STARTING: 'Starting',
	RUNNING: 'Running',
	MUX_SCANNING: 'Mux scan',
	PAUSED: 'Paused',
	FINISHING: 'Finishing',
	STOPPED: 'Stopped',
	ERROR: 'Error'
};

export function runState(kind: Exclude<RunStateKind, 'ERROR'>): RunState {
	return { kind };
}

export function runStateError(message: string): RunState {
	return { kind: 'ERROR', message };
}

export function isRunActive(state: RunState | undefined): boolean {
	return state !== undefined && ACTIVE_KINDS.has(state.kind);
}

export function runStateLabel(state: RunState): string {
	return LABELS[state.kind];
}

export function sameRunState(left: RunState | undefined, right: RunState | undefined): boolean {
	if (left === undefined || right === undefined) {
		return left === right;
	}
	if (left.kind === 'ERROR' && right.kind === 'ERROR') {
		return left.message === right.message;
	}
	return left.kind === right.kind;
}
