/**
 * Derive a human-readable error message from a thrown value.
 * Most failures reaching the web view are Error objects, but navigation callbacks and
 * some libraries reject with strings or plain objects.
 *
 * @param error value to derive a message from
 * @param fallback text to use if we cannot derive a message from the value
 */
export function reduceError(error: unknown, fallback: string = "Unknown error"): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    if (error instanceof Object && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    try {
        // undefined and functions have no JSON form
        const json: string | undefined = JSON.stringify(error);
        return json ?? fallback;
    } catch (e) {
        console.error(e);
        return fallback;
    }
}
