import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SessionController } from './SessionController';
import { UpdateBus } from './UpdateBus';
import { LyricsResolver } from '../interfaces/LyricsResolver';
import { TrackIdentity } from '../interfaces/TrackIdentity';
import { PlaybackState, PlaybackStatus } from '../interfaces/PlaybackState';
import { LyricSet } from '../models/LyricsData';
import { Update } from '../models/Update';
import { LyricsLookupError } from '../utils/Errors';
import { Logger } from '../utils/Logger';

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

interface ResolveCall {
    identity: TrackIdentity;
    duration: number;
    signal?: AbortSignal;
    earlierCallsAborted: boolean;
    result: ReturnType<typeof deferred<LyricSet | null>>;
}

class FakeResolver implements LyricsResolver {
    public calls: ResolveCall[] = [];

    public resolve(identity: TrackIdentity, duration: number, signal?: AbortSignal): Promise<LyricSet | null> {
        const result = deferred<LyricSet | null>();
        this.calls.push({
            identity,
            duration,
            signal,
            earlierCallsAborted: this.calls.every(call => call.signal?.aborted === true),
            result
        });
        return result.promise;
    }
}

const lines: LyricSet = [
    { time: 1, text: 'one' },
    { time: 5, text: 'two' },
    { time: 9, text: 'three' }
];

const trackA: TrackIdentity = { title: 'First Song', artist: 'Test Artist', album: 'Test Album' };
const trackB: TrackIdentity = { title: 'Second Song', artist: 'Test Artist', album: 'Test Album' };
const trackC: TrackIdentity = { title: 'Third Song', artist: 'Test Artist', album: 'Test Album' };

const NOW = 10_000;

function state(identity: TrackIdentity, position: number, status: PlaybackStatus = 'Paused'): PlaybackState {
    return { identity, position, status, sampledAt: NOW, duration: 200 };
}

describe('SessionController', () => {
    let clock: { now: number };
    let resolver: FakeResolver;
    let bus: UpdateBus;
    let published: Update[];
    let controller: SessionController;

    beforeEach(() => {
        Logger.setEcho(false);
        clock = { now: NOW };
        resolver = new FakeResolver();
        bus = new UpdateBus();
        published = [];
        const publish = bus.publish.bind(bus);
        vi.spyOn(bus, 'publish').mockImplementation((update) => {
            published.push(update);
            return publish(update);
        });
        controller = new SessionController({
            resolver,
            bus,
            tickIntervalMs: 60_000,
            clock: () => clock.now
        });
    });

    afterEach(async () => {
        await controller.shutdown();
        vi.restoreAllMocks();
        Logger.setEcho(true);
    });

    it('should become active and publish the seeded line once lyrics are found', async () => {
        await controller.trackChanged(state(trackA, 5.2));
        expect(controller.state).toBe('resolving');
        expect(resolver.calls[0].identity).toEqual(trackA);
        expect(resolver.calls[0].duration).toBe(200);

        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        expect(controller.state).toBe('active');
        expect(published).toEqual([
            { lines, index: 1, playing: false, generation: 1, track: trackA }
        ]);
    });

    it('should go idle with an empty update when nothing is found', async () => {
        await controller.trackChanged(state(trackA, 0, 'Playing'));
        resolver.calls[0].result.resolve(null);
        await controller.settled();

        expect(controller.state).toBe('idle');
        expect(published).toEqual([
            { lines: [], index: 0, playing: true, generation: 1, track: trackA }
        ]);
    });

    it('should treat an empty line set like not found', async () => {
        await controller.trackChanged(state(trackA, 0));
        resolver.calls[0].result.resolve([]);
        await controller.settled();

        expect(controller.state).toBe('idle');
        expect(published).toHaveLength(1);
        expect(published[0].lines).toEqual([]);
        expect(published[0].error).toBeUndefined();
    });

    it('should carry the lookup error in the empty update', async () => {
        await controller.trackChanged(state(trackA, 0));
        resolver.calls[0].result.reject(new LyricsLookupError('LRCLIB: unexpected status 500', { status: 500 }));
        await controller.settled();

        expect(controller.state).toBe('idle');
        expect(published).toHaveLength(1);
        expect(published[0].lines).toEqual([]);
        expect(published[0].error?.message).toBe('LRCLIB: unexpected status 500');
    });

    it('should only deliver the last of several rapid track changes', async () => {
        void controller.trackChanged(state(trackA, 0));
        void controller.trackChanged(state(trackB, 0));
        await controller.trackChanged(state(trackC, 0));

        expect(resolver.calls.map(call => call.identity.title)).toEqual(['First Song', 'Second Song', 'Third Song']);
        expect(resolver.calls.map(call => call.earlierCallsAborted)).toEqual([true, true, true]);
        expect(resolver.calls.map(call => call.signal?.aborted)).toEqual([true, true, false]);

        // the abandoned lookups complete after they were superseded
        resolver.calls[0].result.resolve(lines);
        resolver.calls[1].result.resolve(lines);
        await Promise.resolve();
        expect(published).toEqual([]);

        resolver.calls[2].result.resolve(lines);
        await controller.settled();

        expect(published).toEqual([
            { lines, index: 0, playing: false, generation: 3, track: trackC }
        ]);
        expect(controller.currentTrack).toEqual(trackC);
    });

    it('should drop a failure of a cancelled lookup', async () => {
        void controller.trackChanged(state(trackA, 0));
        await controller.trackChanged(state(trackB, 0));

        resolver.calls[0].result.reject(new LyricsLookupError('too late'));
        resolver.calls[1].result.resolve(null);
        await controller.settled();

        expect(published).toHaveLength(1);
        expect(published[0].error).toBeUndefined();
        expect(published[0].generation).toBe(2);
    });

    it('should treat a repeated track change for the same track as a sample', async () => {
        await controller.trackChanged(state(trackA, 0));
        await controller.trackChanged(state(trackA, 9.5));

        expect(resolver.calls).toHaveLength(1);
        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        expect(published.map(update => update.index)).toEqual([2]);
    });

    it('should recompute the line of the current track on seek', async () => {
        await controller.trackChanged(state(trackA, 5.2));
        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        await controller.seek(9.5);
        await controller.seek(0);

        expect(published.map(update => [update.index, update.track?.title])).toEqual([
            [1, 'First Song'],
            [2, 'First Song'],
            [0, 'First Song']
        ]);
        expect(controller.state).toBe('active');
        expect(resolver.calls).toHaveLength(1);
    });

    it('should ignore seeks while idle', async () => {
        await controller.trackChanged(state(trackA, 0));
        resolver.calls[0].result.resolve(null);
        await controller.settled();

        await controller.seek(42);

        expect(published).toHaveLength(1);
    });

    it('should start from a position sought during the lookup', async () => {
        await controller.trackChanged(state(trackA, 0));
        await controller.seek(9.5);
        expect(published).toEqual([]);

        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        expect(published.map(update => update.index)).toEqual([2]);
    });

    it('should not publish twice for identical samples', async () => {
        await controller.trackChanged(state(trackA, 0));
        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        await controller.sample(state(trackA, 5.5));
        await controller.sample(state(trackA, 5.5));

        expect(published.map(update => update.index)).toEqual([0, 1]);
    });

    it('should publish when only the playing flag changes', async () => {
        await controller.trackChanged(state(trackA, 5.5));
        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        await controller.sample(state(trackA, 5.5, 'Playing'));

        expect(published.map(update => [update.index, update.playing])).toEqual([
            [1, false],
            [1, true]
        ]);
    });

    it('should ignore samples of another track', async () => {
        await controller.trackChanged(state(trackA, 0));
        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        await controller.sample(state(trackB, 9.5));

        expect(published).toHaveLength(1);
    });

    it('should clear the display when the player goes away', async () => {
        await controller.trackChanged(state(trackA, 0));
        resolver.calls[0].result.resolve(lines);
        await controller.settled();

        await controller.playerGone();

        expect(resolver.calls[0].signal?.aborted).toBe(true);
        expect(controller.state).toBe('idle');
        expect(controller.currentTrack).toBeNull();
        expect(published[1]).toEqual({ lines: [], index: 0, playing: false, generation: 2 });
    });

    it('should publish nothing after shutdown', async () => {
        await controller.trackChanged(state(trackA, 0));
        await controller.shutdown();

        resolver.calls[0].result.resolve(lines);
        await Promise.resolve();
        await controller.trackChanged(state(trackB, 0));

        expect(resolver.calls).toHaveLength(1);
        expect(published).toEqual([]);
    });

    it('should advance the line as playback moves on', async () => {
        const ticking = new SessionController({ resolver, bus, tickIntervalMs: 1, clock: () => clock.now });
        await ticking.trackChanged(state(trackA, 0.5, 'Playing'));
        resolver.calls[0].result.resolve(lines);
        await ticking.settled();
        await expect(bus.next()).resolves.toMatchObject({ index: 0, playing: true });

        clock.now = NOW + 5_000;

        await expect(bus.next()).resolves.toMatchObject({ index: 1, playing: true });
        await ticking.shutdown();
    });
});
