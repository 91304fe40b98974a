import { setTimeout as sleep } from "node:timers/promises";
import { CancelledError } from "./Errors";

/**
 * Settles with `promise`, or rejects with a CancelledError as soon as
 * `signal` aborts. A result arriving after the abort is dropped.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new CancelledError());
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener("abort", onAbort, { once: true });
        }
        promise.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(error);
            }
        );
    });
}

/**
 * Waits `ms`. Resolves `false` instead of waiting out the delay when
 * `signal` aborts.
 */
export async function delay(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    try {
        await sleep(ms, undefined, { signal });
        return true;
    } catch (error) {
        if (signal.aborted) return false;
        throw error;
    }
}

/**
 * Signal that aborts when `parent` aborts or after `timeoutMs`.
 * Call `dispose` once the guarded work is over.
 */
export function withTimeout(timeoutMs: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
    const onParentAbort = () => controller.abort(parent?.reason);

    if (parent?.aborted) {
        controller.abort(parent.reason);
    } else {
        parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    return {
        signal: controller.signal,
        dispose: () => {
            clearTimeout(timer);
            parent?.removeEventListener("abort", onParentAbort);
        }
    };
}
