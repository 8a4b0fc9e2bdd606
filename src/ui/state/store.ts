import { configureStore } from '@reduxjs/toolkit';
import { rootReducer, type RootState } from './rootReducer';
import { createLoadStateListenerMiddleware } from './listenerMiddleware';
import type { LoadStateLabels } from './loadStateLabels';

export interface AppStoreOptions {
  /** State to start from, e.g. a snapshot restored by the host */
  preloadedState?: Partial<RootState>;
  /** Log load state transitions (default true) */
  logTransitions?: boolean;
  /** Labels used in transition logs (default English) */
  labels?: LoadStateLabels;
}

/**
 * Create the store that owns the web view UI state.
 *
 * One store per view: the host tears it down together with the view.
 */
export function createAppStore(options: AppStoreOptions = {}) {
  const listenerMiddleware = createLoadStateListenerMiddleware({
    logTransitions: options.logTransitions ?? true,
    labels: options.labels,
  });

  return configureStore({
    reducer: rootReducer,
    preloadedState: options.preloadedState,
    middleware: (getDefaultMiddleware) =>
      getDefaultMiddleware().prepend(listenerMiddleware.middleware),
  });
}

export type AppStore = ReturnType<typeof createAppStore>;
export type AppDispatch = AppStore['dispatch'];
export type { RootState };
