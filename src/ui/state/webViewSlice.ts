import { createSlice, type PayloadAction } from '@reduxjs/toolkit';
import { reduceError } from '../../types/reduceError';
import {
  LoadState,
  describeLoadState,
  hasError,
  isLoading,
  isSuccessful,
  loadStateMessage,
  loadStatePercent,
  loadStatesEqual,
} from './loadState';

/**
 * State of the embedded web-content view.
 */
export interface WebViewState {
  /** Current load state, replaced wholesale on every transition */
  loadState: LoadState;
}

const initialState: WebViewState = {
  loadState: LoadState.idle(),
};

/**
 * Store the incoming state unless it equals the current one.
 * Keeping the existing instance stops memoised selectors and the transition
 * listener from firing on repeated progress callbacks with the same value.
 */
function replaceLoadState(state: WebViewState, next: LoadState): void {
  if (!loadStatesEqual(state.loadState, next)) {
    state.loadState = next;
  }
}

/**
 * Web view slice holding the page load state.
 *
 * No transition rules are enforced here: the navigation delegate may report any
 * state after any other (e.g. progress straight after success on a reload).
 */
const webViewSlice = createSlice({
  name: 'webView',
  initialState,
  reducers: {
    /**
     * Replace the load state with a value built by the caller.
     */
    loadStateChanged: (state, action: PayloadAction<LoadState>) => {
      replaceLoadState(state, action.payload);
    },

    /**
     * Return to idle, e.g. when the view is reused for another page.
     */
    loadReset: (state) => {
      replaceLoadState(state, LoadState.idle());
    },

    /**
     * Report navigation progress. The percent is stored as given.
     */
    loadProgressed: {
      reducer: (state, action: PayloadAction<LoadState>) => {
        replaceLoadState(state, action.payload);
      },
      prepare: (percent: number) => ({ payload: LoadState.progress(percent) }),
    },

    /**
     * Page finished loading.
     */
    loadSucceeded: (state) => {
      replaceLoadState(state, LoadState.success());
    },

    /**
     * Navigation failed. Accepts whatever the host rejected with; the message is
     * derived in the action creator so the payload stays serialisable.
     */
    loadFailed: {
      reducer: (state, action: PayloadAction<LoadState>) => {
        replaceLoadState(state, action.payload);
      },
      prepare: (error: unknown) => ({ payload: LoadState.error(reduceError(error)) }),
    },

    /**
     * The host reported that the device has no connection.
     */
    connectionLost: (state) => {
      replaceLoadState(state, LoadState.offline());
    },
  },
});

export const {
  loadStateChanged,
  loadReset,
  loadProgressed,
  loadSucceeded,
  loadFailed,
  connectionLost,
} = webViewSlice.actions;

// Slice-relative selectors (take WebViewState, not RootState)
export const selectLoadState = (state: WebViewState): LoadState => state.loadState;
export const selectIsLoading = (state: WebViewState): boolean => isLoading(state.loadState);
export const selectIsSuccessful = (state: WebViewState): boolean => isSuccessful(state.loadState);
export const selectHasError = (state: WebViewState): boolean => hasError(state.loadState);
export const selectLoadPercent = (state: WebViewState): number | undefined => loadStatePercent(state.loadState);
export const selectLoadErrorMessage = (state: WebViewState): string | undefined => loadStateMessage(state.loadState);
export const selectLoadDescription = (state: WebViewState): string => describeLoadState(state.loadState);

export default webViewSlice.reducer;
