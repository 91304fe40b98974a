import { describe, it, expect } from 'vitest';
import { delay, raceAbort, withTimeout } from './Abort';
import { CancelledError } from './Errors';

describe('raceAbort', () => {
    it('should pass the result through', async () => {
        const controller = new AbortController();
        await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
    });

    it('should pass failures through', async () => {
        const controller = new AbortController();
        await expect(raceAbort(Promise.reject(new Error('boom')), controller.signal)).rejects.toThrow('boom');
    });

    it('should reject with CancelledError when aborted first', async () => {
        const controller = new AbortController();
        let finish: (value: number) => void = () => undefined;
        const slow = new Promise<number>((resolve) => { finish = resolve; });

        const raced = raceAbort(slow, controller.signal);
        controller.abort();
        finish(7);

        await expect(raced).rejects.toBeInstanceOf(CancelledError);
    });

    it('should reject at once on an aborted signal', async () => {
        await expect(raceAbort(Promise.resolve(7), AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
    });
});

describe('delay', () => {
    it('should resolve true after waiting', async () => {
        await expect(delay(1, new AbortController().signal)).resolves.toBe(true);
    });

    it('should resolve false when aborted', async () => {
        const controller = new AbortController();
        const waiting = delay(60_000, controller.signal);
        controller.abort();

        await expect(waiting).resolves.toBe(false);
        await expect(delay(1, controller.signal)).resolves.toBe(false);
    });
});

describe('withTimeout', () => {
    it('should abort after the timeout', async () => {
        const { signal, dispose } = withTimeout(1);
        await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));

        expect(signal.aborted).toBe(true);
        dispose();
    });

    it('should follow the parent signal', () => {
        const parent = new AbortController();
        const { signal, dispose } = withTimeout(60_000, parent.signal);
        expect(signal.aborted).toBe(false);

        parent.abort();

        expect(signal.aborted).toBe(true);
        dispose();
    });

    it('should stay quiet once disposed', async () => {
        const parent = new AbortController();
        const { signal, dispose } = withTimeout(1, parent.signal);
        dispose();
        parent.abort();
        await delay(5, new AbortController().signal);

        expect(signal.aborted).toBe(false);
    });
});
