import { createAppStore, type AppStore } from './store';
import {
  connectionLost,
  loadFailed,
  loadProgressed,
  loadReset,
  loadStateChanged,
  loadSucceeded,
} from './webViewSlice';
import {
  selectIsWebViewLoaded,
  selectIsWebViewLoading,
  selectLoadDescription,
  selectLoadErrorMessage,
  selectLoadPercent,
  selectLoadState,
  selectWebViewHasError,
} from './rootReducer';
import { LoadState } from './loadState';
import { RU_LOAD_STATE_LABELS } from './loadStateLabels';

describe('webViewSlice', () => {
  let store: AppStore;

  beforeEach(() => {
    store = createAppStore({ logTransitions: false });
  });

  describe('Initial State', () => {
    it('should start idle', () => {
      expect(selectLoadState(store.getState())).toEqual(LoadState.idle());
      expect(selectLoadDescription(store.getState())).toBe('State: Idle');
    });

    it('should start from a preloaded state', () => {
      const restored = createAppStore({
        logTransitions: false,
        preloadedState: { webView: { loadState: LoadState.offline() } },
      });
      expect(selectLoadState(restored.getState())).toEqual(LoadState.offline());
    });
  });

  describe('Transitions', () => {
    it('should track progress', () => {
      store.dispatch(loadProgressed(40));

      const state = store.getState();
      expect(selectLoadState(state)).toEqual({ kind: 'progress', percent: 40 });
      expect(selectIsWebViewLoading(state)).toBe(true);
      expect(selectLoadPercent(state)).toBe(40);
      expect(selectLoadDescription(state)).toBe('State: Loading (40%)');
    });

    it('should record success', () => {
      store.dispatch(loadProgressed(90));
      store.dispatch(loadSucceeded());

      const state = store.getState();
      expect(selectIsWebViewLoaded(state)).toBe(true);
      expect(selectIsWebViewLoading(state)).toBe(false);
      expect(selectLoadPercent(state)).toBeUndefined();
    });

    it('should derive the error message from whatever the host rejected with', () => {
      store.dispatch(loadFailed(new Error('net::ERR_NAME_NOT_RESOLVED')));

      const state = store.getState();
      expect(selectWebViewHasError(state)).toBe(true);
      expect(selectLoadErrorMessage(state)).toBe('net::ERR_NAME_NOT_RESOLVED');
      expect(selectLoadDescription(state)).toBe('State: Error (net::ERR_NAME_NOT_RESOLVED)');
    });

    it('should carry a serialisable payload on failure', () => {
      expect(loadFailed({ status: 500 }).payload).toEqual({ kind: 'error', message: '{"status":500}' });
    });

    it('should go offline and reset to idle', () => {
      store.dispatch(connectionLost());
      expect(selectLoadDescription(store.getState())).toBe('State: Offline');

      store.dispatch(loadReset());
      expect(selectLoadState(store.getState())).toEqual(LoadState.idle());
    });

    it('should accept any transition order', () => {
      store.dispatch(loadSucceeded());
      store.dispatch(loadProgressed(5));
      expect(selectLoadPercent(store.getState())).toBe(5);
    });

    it('should accept a state built by the caller', () => {
      store.dispatch(loadStateChanged(LoadState.error('')));
      expect(selectLoadErrorMessage(store.getState())).toBe('');
      expect(selectLoadDescription(store.getState())).toBe('State: Error ()');
    });
  });

  describe('Equal updates', () => {
    it('should keep the stored instance when an equal state arrives', () => {
      store.dispatch(loadProgressed(30));
      const before = selectLoadState(store.getState());

      store.dispatch(loadProgressed(30));
      expect(selectLoadState(store.getState())).toBe(before);

      store.dispatch(loadProgressed(31));
      expect(selectLoadState(store.getState())).not.toBe(before);
    });

    it('should keep the whole root state for a repeated payload-free state', () => {
      store.dispatch(loadSucceeded());
      const before = store.getState();

      store.dispatch(loadStateChanged(LoadState.success()));
      expect(store.getState()).toBe(before);
    });
  });

  describe('Transition logging', () => {
    let consoleLog: jest.SpyInstance;
    let consoleWarn: jest.SpyInstance;

    beforeEach(() => {
      consoleLog = jest.spyOn(console, 'log').mockImplementation(() => {});
      consoleWarn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should log each real transition once', () => {
      const logged = createAppStore();

      logged.dispatch(loadProgressed(10));
      logged.dispatch(loadProgressed(10));
      logged.dispatch(loadSucceeded());

      expect(consoleLog.mock.calls).toEqual([
        ['[listener] Web view load state changed:', 'State: Loading (10%)'],
        ['[listener] Web view load state changed:', 'State: Success'],
      ]);
      expect(consoleWarn).not.toHaveBeenCalled();
    });

    it('should warn when the load fails', () => {
      const logged = createAppStore({ labels: RU_LOAD_STATE_LABELS });

      logged.dispatch(loadFailed('timeout'));

      expect(consoleWarn).toHaveBeenCalledWith('[listener] Web view load failed:', 'Состояние: Ошибка (timeout)');
      expect(consoleLog).not.toHaveBeenCalled();
    });

    it('should stay quiet when logging is disabled', () => {
      store.dispatch(loadProgressed(10));
      store.dispatch(connectionLost());

      expect(consoleLog).not.toHaveBeenCalled();
      expect(consoleWarn).not.toHaveBeenCalled();
    });
  });
});
