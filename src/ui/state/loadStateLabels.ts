import type { LoadStateKind } from './loadState';

/**
 * Display text used when rendering a load state for logs and debug panels.
 */
export interface LoadStateLabels {
    /** Leading word of every description, e.g. "State" */
    prefix: string;
    /** Human-readable name of each discriminant */
    kinds: Record<LoadStateKind, string>;
    /** Shown in place of a progress percent that is missing */
    unknownPercent: string;
    /** Shown in place of an error message that is missing */
    unknownError: string;
}

export const EN_LOAD_STATE_LABELS: LoadStateLabels = {
    prefix: 'State',
    kinds: {
        idle: 'Idle',
        progress: 'Loading',
        success: 'Success',
        error: 'Error',
        offline: 'Offline',
    },
    unknownPercent: '0',
    unknownError: 'Unknown error',
};

export const RU_LOAD_STATE_LABELS: LoadStateLabels = {
    prefix: 'Состояние',
    kinds: {
        idle: 'Ожидание',
        progress: 'Загрузка',
        success: 'Успешно',
        error: 'Ошибка',
        offline: 'Нет подключения',
    },
    unknownPercent: '0',
    unknownError: 'Неизвестная ошибка',
};
