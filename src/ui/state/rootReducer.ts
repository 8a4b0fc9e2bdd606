import {combineReducers, createSelector} from '@reduxjs/toolkit';
import * as webView from './webViewSlice';
import webViewReducer from './webViewSlice';
import type {LoadState} from './loadState';

export const rootReducer = combineReducers({
    webView: webViewReducer,
})

export type RootState = ReturnType<typeof rootReducer>;
export type AppSelector<T> = (state: RootState) => T;
export const createAppSelector = createSelector.withTypes<RootState>();

// Re-export types from slices
export type {WebViewState} from './webViewSlice';

// Slice state extractors
const selectWebViewState: AppSelector<webView.WebViewState> = (state) => state.webView;

// App-level selectors for web view slice
export {selectWebViewState};
export const selectLoadState: AppSelector<LoadState> = createAppSelector([selectWebViewState], webView.selectLoadState);
export const selectIsWebViewLoading = createAppSelector([selectWebViewState], webView.selectIsLoading);
export const selectIsWebViewLoaded = createAppSelector([selectWebViewState], webView.selectIsSuccessful);
export const selectWebViewHasError = createAppSelector([selectWebViewState], webView.selectHasError);
export const selectLoadPercent = createAppSelector([selectWebViewState], webView.selectLoadPercent);
export const selectLoadErrorMessage = createAppSelector([selectWebViewState], webView.selectLoadErrorMessage);

/**
 * Selects the human-readable description of the current load state.
 * Memoised on the load state instance, which the slice keeps across equal updates.
 */
export const selectLoadDescription: AppSelector<string> =
    createAppSelector([selectWebViewState], webView.selectLoadDescription);
