import { createListenerMiddleware } from '@reduxjs/toolkit';
import type { RootState } from './rootReducer';
import { describeLoadState, hasError } from './loadState';
import type { LoadStateLabels } from './loadStateLabels';

export interface LoadStateListenerOptions {
  /** Log each load state transition to the console */
  logTransitions: boolean;
  /** Labels used when describing the new state */
  labels?: LoadStateLabels;
}

/**
 * Listener middleware for load state side effects.
 *
 * Pattern: "When the stored load state instance changes, log the new state"
 *
 * The web view slice keeps the existing instance when an equal state arrives, so a
 * reference change here is always a real transition.
 */
export function createLoadStateListenerMiddleware(options: LoadStateListenerOptions) {
  const listenerMiddleware = createListenerMiddleware<RootState>();

  if (!options.logTransitions) {
    return listenerMiddleware;
  }

  listenerMiddleware.startListening({
    predicate: (_action, currentState, previousState) =>
      currentState.webView.loadState !== previousState.webView.loadState,
    effect: (_action, listenerApi) => {
      const loadState = listenerApi.getState().webView.loadState;
      const description = describeLoadState(loadState, { labels: options.labels });

      if (hasError(loadState)) {
        console.warn('[listener] Web view load failed:', description);
        return;
      }
      console.log('[listener] Web view load state changed:', description);
    },
  });

  return listenerMiddleware;
}
