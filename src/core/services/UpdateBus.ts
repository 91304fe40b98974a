import { Update } from "../models/Update";
import { Logger } from "../utils/Logger";

type Waiter = (update: Update | null) => void;

/**
 * Hands updates from the session controller to the renderer.
 *
 * Holds at most one undelivered update. Publishing never waits: a newer
 * update replaces one the renderer has not taken yet, which is safe because
 * every update is a full snapshot. Updates from an older session generation
 * than the last one published are refused.
 */
export class UpdateBus {
    private pending: Update | null = null;
    private last: Update | null = null;
    private waiters: Waiter[] = [];
    private dropped = 0;

    public publish(update: Update): boolean {
        if (this.last && update.generation < this.last.generation) {
            Logger.debug(`[UpdateBus] Refused update of generation ${update.generation} after ${this.last.generation}`);
            return false;
        }
        this.last = update;

        if (this.waiters.length > 0) {
            const waiters = this.waiters;
            this.waiters = [];
            waiters.forEach(w => w(update));
            return true;
        }

        if (this.pending) this.dropped++;
        this.pending = update;
        return true;
    }

    /**
     * Takes the undelivered update, or waits for the next one.
     * Resolves `null` when `signal` aborts first.
     */
    public next(signal?: AbortSignal): Promise<Update | null> {
        if (this.pending) {
            const update = this.pending;
            this.pending = null;
            return Promise.resolve(update);
        }
        if (signal?.aborted) return Promise.resolve(null);

        return new Promise<Update | null>((resolve) => {
            const onAbort = () => {
                this.waiters = this.waiters.filter(w => w !== waiter);
                resolve(null);
            };
            const waiter: Waiter = (update) => {
                signal?.removeEventListener("abort", onAbort);
                resolve(update);
            };
            this.waiters.push(waiter);
            signal?.addEventListener("abort", onAbort, { once: true });
        });
    }

    /** Yields updates until `signal` aborts. */
    public async *stream(signal?: AbortSignal): AsyncGenerator<Update, void, undefined> {
        while (!signal?.aborted) {
            const update = await this.next(signal);
            if (!update) return;
            yield update;
        }
    }

    /** The last update published, delivered or not. */
    public latest(): Update | null {
        return this.last;
    }

    /** How many updates were replaced before the renderer took them. */
    public get droppedCount(): number {
        return this.dropped;
    }
}
