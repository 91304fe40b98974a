import { Logger } from "../utils/Logger";
import { LyricsResolver } from "../interfaces/LyricsResolver";
import { PlaybackState } from "../interfaces/PlaybackState";
import { PlayerObserverHandlers } from "../interfaces/PlayerObserver";
import { TrackIdentity } from "../interfaces/TrackIdentity";
import { EMPTY_LYRICS, LyricSet } from "../models/LyricsData";
import { Update } from "../models/Update";
import { PositionTracker } from "./PositionTracker";
import { UpdateBus } from "./UpdateBus";
import { delay, raceAbort } from "../utils/Abort";
import { toError } from "../utils/Errors";
import { describeTrack, isSameTrack } from "../utils/TrackNormalizer";

export type SessionState = "resolving" | "active" | "idle";

interface Session {
    generation: number;
    identity: TrackIdentity;
    controller: AbortController;
    state: SessionState;

    /** Newest sample of this track, seeds the tracker once lyrics arrive */
    latest: PlaybackState;

    lines: LyricSet | null;
    tracker: PositionTracker | null;

    /** Playing flag of the last update this session published */
    lastPlaying: boolean | null;

    /** Settles when the lookup phase is over */
    resolved: Promise<void>;

    /** Settles when the session has fully exited */
    task: Promise<void>;
}

export interface SessionControllerOptions {
    resolver: LyricsResolver;
    bus: UpdateBus;
    /** How often an active session re-evaluates its line. Default 100ms. */
    tickIntervalMs?: number;
    clock?: () => number;
}

/**
 * Owns the one live session: lyrics lookup and line tracking for the
 * current track.
 *
 * Every transition (track change, seek, sample, player loss, shutdown) runs
 * on one promise chain, one at a time. A track change aborts the previous
 * session and waits for its task to exit before the next one starts, so two
 * sessions are never live together. Lookups run inside the session task,
 * off that chain, and are abandoned as soon as their session is aborted.
 */
export class SessionController {
    private readonly resolver: LyricsResolver;
    private readonly bus: UpdateBus;
    private readonly tickIntervalMs: number;
    private readonly clock: () => number;

    private current: Session | null = null;
    private generation = 0;
    private transitions: Promise<void> = Promise.resolve();
    private stopped = false;

    constructor(options: SessionControllerOptions) {
        this.resolver = options.resolver;
        this.bus = options.bus;
        this.tickIntervalMs = options.tickIntervalMs ?? 100;
        this.clock = options.clock ?? Date.now;
    }

    public trackChanged(state: PlaybackState): Promise<void> {
        return this.enqueue(() => this.startSession(state));
    }

    public seek(position: number): Promise<void> {
        return this.enqueue(() => this.applySeek(position));
    }

    public sample(state: PlaybackState): Promise<void> {
        return this.enqueue(() => this.applySample(state));
    }

    public playerGone(): Promise<void> {
        return this.enqueue(() => this.clearTrack());
    }

    /** Ends the live session. Nothing is published afterwards. */
    public shutdown(): Promise<void> {
        return this.enqueue(async () => {
            this.stopped = true;
            await this.endSession();
        });
    }

    /** Waits for queued transitions and for the current lookup to finish. */
    public async settled(): Promise<void> {
        await this.transitions;
        await this.current?.resolved;
    }

    public get state(): SessionState {
        return this.current?.state ?? "idle";
    }

    public get currentTrack(): TrackIdentity | null {
        return this.current?.identity ?? null;
    }

    /** Adapts the controller to player observer callbacks. */
    public handlers(): PlayerObserverHandlers {
        return {
            onTrackChanged: (state) => void this.trackChanged(state),
            onSeek: (position) => void this.seek(position),
            onSample: (state) => void this.sample(state),
            onPlayerGone: () => void this.playerGone()
        };
    }

    private enqueue(step: () => void | Promise<void>): Promise<void> {
        this.transitions = this.transitions
            .then(step)
            .catch((error: unknown) => Logger.error("[Session] Transition failed", error));
        return this.transitions;
    }

    private async startSession(state: PlaybackState) {
        if (this.current && isSameTrack(this.current.identity, state.identity)) {
            this.applySample(state);
            return;
        }

        await this.endSession();
        if (this.stopped) return;

        const session: Session = {
            generation: ++this.generation,
            identity: state.identity,
            controller: new AbortController(),
            state: "resolving",
            latest: state,
            lines: null,
            tracker: null,
            lastPlaying: null,
            resolved: Promise.resolve(),
            task: Promise.resolve()
        };
        this.current = session;
        Logger.info(`[Session] #${session.generation} ${describeTrack(state.identity)}`);

        session.resolved = this.resolveLyrics(session);
        session.task = session.resolved
            .then(() => this.runTracker(session))
            .catch((error: unknown) => Logger.error(`[Session] #${session.generation} crashed`, error));
    }

    /** Aborts the live session and waits until its task has exited. */
    private async endSession() {
        const session = this.current;
        if (!session) return;

        this.current = null;
        session.controller.abort();
        await session.task;
        Logger.debug(`[Session] #${session.generation} ended`);
    }

    private async resolveLyrics(session: Session) {
        const { signal } = session.controller;

        try {
            const lines = await raceAbort(
                this.resolver.resolve(session.identity, session.latest.duration, signal),
                signal
            );
            if (signal.aborted) return;

            if (!lines || lines.length === 0) {
                Logger.info(`[Session] #${session.generation} no synced lyrics found`);
                session.state = "idle";
                this.publish(session, { lines: EMPTY_LYRICS, index: 0, playing: session.latest.status === "Playing" });
                return;
            }

            const tracker = new PositionTracker(lines, this.clock);
            tracker.sync(session.latest.position, session.latest.status, session.latest.sampledAt);
            tracker.update();

            session.lines = lines;
            session.tracker = tracker;
            session.state = "active";
            Logger.info(`[Session] #${session.generation} ${lines.length} lines, starting at line ${tracker.index}`);
            this.publishTracked(session);
        } catch (error) {
            // a cancelled lookup's outcome is discarded
            if (signal.aborted) return;

            Logger.warn(`[Session] #${session.generation} lookup failed`, error);
            session.state = "idle";
            this.publish(session, {
                lines: EMPTY_LYRICS,
                index: 0,
                playing: session.latest.status === "Playing",
                error: toError(error)
            });
        }
    }

    private async runTracker(session: Session) {
        const { signal } = session.controller;
        const tracker = session.tracker;
        if (session.state !== "active" || !tracker) return;

        while (await delay(this.tickIntervalMs, signal)) {
            if (tracker.update()) this.publishTracked(session);
        }
    }

    private applySeek(position: number) {
        const session = this.current;
        if (!session) return;

        if (session.state === "resolving") {
            session.latest = { ...session.latest, position, sampledAt: this.clock() };
            return;
        }
        if (session.state !== "active" || !session.tracker) return;

        session.tracker.seek(position);
        session.tracker.update();
        Logger.debug(`[Session] #${session.generation} seek to ${position.toFixed(2)}s, line ${session.tracker.index}`);
        this.publishTracked(session);
    }

    private applySample(state: PlaybackState) {
        const session = this.current;
        if (!session || !isSameTrack(session.identity, state.identity)) return;

        session.latest = state;
        const tracker = session.tracker;
        if (session.state !== "active" || !tracker) return;

        tracker.sync(state.position, state.status, state.sampledAt);
        const moved = tracker.update();
        if (moved || tracker.playing !== session.lastPlaying) {
            this.publishTracked(session);
        }
    }

    private async clearTrack() {
        if (!this.current) return;

        Logger.info("[Session] Player went away");
        await this.endSession();
        if (this.stopped) return;

        this.bus.publish({ lines: EMPTY_LYRICS, index: 0, playing: false, generation: ++this.generation });
    }

    private publishTracked(session: Session) {
        const tracker = session.tracker;
        if (!tracker || !session.lines) return;
        this.publish(session, { lines: session.lines, index: tracker.index, playing: tracker.playing });
    }

    private publish(session: Session, snapshot: Pick<Update, "lines" | "index" | "playing" | "error">) {
        // only the live session may reach the renderer
        if (session !== this.current || session.controller.signal.aborted) return;

        session.lastPlaying = snapshot.playing;
        this.bus.publish({ ...snapshot, generation: session.generation, track: session.identity });
    }
}
