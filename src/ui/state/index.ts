// Store
export {createAppStore} from './store';
export type {AppStore, AppStoreOptions, AppDispatch, RootState} from './store';

// Load state value type
export {
    LOAD_STATE_KINDS,
    LoadState,
    loadStatesEqual,
    isLoading,
    isSuccessful,
    hasError,
    loadStatePercent,
    loadStateMessage,
    kindLabel,
    describeLoadState,
} from './loadState';
export type {LoadStateKind, DescribeOptions} from './loadState';

// Labels
export {EN_LOAD_STATE_LABELS, RU_LOAD_STATE_LABELS} from './loadStateLabels';
export type {LoadStateLabels} from './loadStateLabels';

// Web view slice - actions
export {
    loadStateChanged,
    loadReset,
    loadProgressed,
    loadSucceeded,
    loadFailed,
    connectionLost,
} from './webViewSlice';

// Web view slice - types and selectors (from rootReducer)
export type {WebViewState} from './rootReducer';
export {
    selectWebViewState,
    selectLoadState,
    selectIsWebViewLoading,
    selectIsWebViewLoaded,
    selectWebViewHasError,
    selectLoadPercent,
    selectLoadErrorMessage,
    selectLoadDescription,
} from './rootReducer';

// Errors
export {reduceError} from '../../types/reduceError';
