import { EN_LOAD_STATE_LABELS, type LoadStateLabels } from './loadStateLabels';

/**
 * Discriminants of {@link LoadState} in declaration order.
 * The order is for display (menus, legends) and carries no meaning for comparison.
 */
export const LOAD_STATE_KINDS = ['idle', 'progress', 'success', 'error', 'offline'] as const;

export type LoadStateKind = typeof LOAD_STATE_KINDS[number];

/**
 * Loading state of a web-content view.
 *
 * Each variant carries only its own payload, so a progress state always has a percent
 * and an error state always has a message. Instances are never mutated: a transition
 * is a new value.
 */
export type LoadState =
    | { readonly kind: 'idle' }                                 // Nothing requested yet
    | { readonly kind: 'progress'; readonly percent: number }   // Navigation in flight
    | { readonly kind: 'success' }                              // Page finished loading
    | { readonly kind: 'error'; readonly message: string }      // Load failed
    | { readonly kind: 'offline' };                             // No connection

const IDLE: LoadState = Object.freeze({ kind: 'idle' });
const SUCCESS: LoadState = Object.freeze({ kind: 'success' });
const OFFLINE: LoadState = Object.freeze({ kind: 'offline' });

/**
 * Factories, one per variant. Construction never fails.
 *
 * The percent is stored as given: callers may use either 0-100 or 0-1.
 */
export const LoadState = {
    idle: (): LoadState => IDLE,
    progress: (percent: number): LoadState => Object.freeze({ kind: 'progress', percent }),
    success: (): LoadState => SUCCESS,
    error: (message: string): LoadState => Object.freeze({ kind: 'error', message }),
    offline: (): LoadState => OFFLINE,
} as const;

/**
 * Compare two load states by discriminant and the payload that variant declares.
 * Payload-free variants are equal whenever their kinds match.
 */
export function loadStatesEqual(a: LoadState, b: LoadState): boolean {
    if (a.kind !== b.kind) {
        return false;
    }
    switch (a.kind) {
        case 'progress':
            return b.kind === 'progress' && a.percent === b.percent;
        case 'error':
            return b.kind === 'error' && a.message === b.message;
        default:
            return true;
    }
}

export const isLoading = (state: LoadState): boolean => state.kind === 'progress';
export const isSuccessful = (state: LoadState): boolean => state.kind === 'success';
export const hasError = (state: LoadState): boolean => state.kind === 'error';

/** Percent of a progress state, undefined for every other variant. */
export function loadStatePercent(state: LoadState): number | undefined {
    return state.kind === 'progress' ? state.percent : undefined;
}

/** Message of an error state, undefined for every other variant. */
export function loadStateMessage(state: LoadState): string | undefined {
    return state.kind === 'error' ? state.message : undefined;
}

export function kindLabel(kind: LoadStateKind, labels: LoadStateLabels = EN_LOAD_STATE_LABELS): string {
    return labels.kinds[kind];
}

export interface DescribeOptions {
    labels?: LoadStateLabels;
    formatPercent?: (percent: number) => string;
}

/**
 * Render a load state for logging or a debug panel, e.g. "State: Loading (50%)".
 * The output is for people; do not parse it.
 *
 * States restored from untyped sources (persisted snapshots, worker messages) may lack
 * their payload; those render with the placeholder text from the labels.
 */
export function describeLoadState(state: LoadState, options: DescribeOptions = {}): string {
    const labels = options.labels ?? EN_LOAD_STATE_LABELS;
    const formatPercent: (percent: number) => string = options.formatPercent ?? String;
    const head = `${labels.prefix}: ${kindLabel(state.kind, labels)}`;

    switch (state.kind) {
        case 'progress': {
            const percent = typeof state.percent === 'number'
                ? formatPercent(state.percent)
                : labels.unknownPercent;
            return `${head} (${percent}%)`;
        }
        case 'error': {
            const message = typeof state.message === 'string' ? state.message : labels.unknownError;
            return `${head} (${message})`;
        }
        case 'idle':
        case 'success':
        case 'offline':
            return head;
    }
}
