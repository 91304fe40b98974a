import { z } from "zod";
import { Logger } from "../utils/Logger";
import { MediaBus, MediaBusEvent, MediaSubscription, RawPlayerProperties } from "../interfaces/MediaBus";
import { PlaybackState, PlaybackStatus } from "../interfaces/PlaybackState";
import { PlayerObserver, PlayerObserverHandlers } from "../interfaces/PlayerObserver";
import { TrackIdentity } from "../interfaces/TrackIdentity";
import { delay } from "../utils/Abort";
import { createIdentity, describeTrack, isSameTrack, titleFromUrl } from "../utils/TrackNormalizer";

/**
 * `poll` samples on a timer; `subscribe` samples once, then follows the
 * player's change notifications.
 */
export type ObserverStrategy = "poll" | "subscribe";

export interface MprisObserverOptions {
    strategy: ObserverStrategy;
    pollIntervalMs: number;
    /** Wait after a failed sample or subscription before trying again */
    retryDelayMs: number;
    clock: () => number;
}

const DEFAULT_OPTIONS: MprisObserverOptions = {
    strategy: "subscribe",
    pollIntervalMs: 1000,
    retryDelayMs: 2000,
    clock: Date.now
};

// MPRIS times are in microseconds; dbus reports 64-bit integers as bigint
const MicrosSchema = z.union([z.bigint(), z.number()]).transform(value => Number(value) / 1e6);

const MetadataSchema = z.object({
    "xesam:title": z.string().optional(),
    "xesam:url": z.string().optional(),
    "xesam:artist": z.union([z.array(z.string()), z.string()]).optional(),
    "xesam:album": z.string().optional(),
    "mpris:length": MicrosSchema.optional()
});

const StatusSchema = z.enum(["Playing", "Paused", "Stopped"]);

interface FollowedPlayer {
    player: string;
    /** Aborted when samples show the player went away or was replaced */
    lost: AbortController;
}

/**
 * Observes an MPRIS player through a MediaBus.
 *
 * Samples run one at a time in the order they were asked for, so a slow
 * read never reports a track after a newer read already did.
 */
export class MprisPlayerObserver implements PlayerObserver {
    private readonly options: MprisObserverOptions;
    private lastIdentity: TrackIdentity | null = null;
    private samples: Promise<boolean> = Promise.resolve(true);
    private followed: FollowedPlayer | null = null;

    constructor(private readonly bus: MediaBus, options: Partial<MprisObserverOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    public async sample(): Promise<PlaybackState | null> {
        const raw = await this.bus.readPlayer();
        return raw ? this.toPlaybackState(raw) : null;
    }

    public async watch(handlers: PlayerObserverHandlers, signal: AbortSignal): Promise<void> {
        Logger.info(`[MPRIS] Watching player (${this.options.strategy})`);
        if (this.options.strategy === "poll") {
            await this.poll(handlers, signal);
        } else {
            await this.subscribe(handlers, signal);
        }
        // reads asked for by notifications may still be queued
        await this.samples;
        Logger.debug("[MPRIS] Stopped watching");
    }

    /**
     * Turns raw properties into a sample, or `null` when a property is
     * missing or malformed.
     */
    public toPlaybackState(raw: RawPlayerProperties): PlaybackState | null {
        const metadata = MetadataSchema.safeParse(raw.metadata);
        const position = MicrosSchema.safeParse(raw.position);
        const status = StatusSchema.safeParse(raw.status);
        if (!metadata.success || !position.success || !status.success) {
            Logger.debug("[MPRIS] Unusable player properties", raw);
            return null;
        }

        const meta = metadata.data;
        const artists = meta["xesam:artist"];
        const artist = Array.isArray(artists) ? artists[0] ?? "" : artists ?? "";
        let title = meta["xesam:title"] ?? "";
        if (!title && meta["xesam:url"]) {
            title = titleFromUrl(meta["xesam:url"]);
        }

        const identity = createIdentity(title, artist, meta["xesam:album"] ?? "");
        if (!identity.title || !identity.artist) return null;

        return {
            identity,
            position: Math.max(0, position.data),
            status: this.toStatus(status.data),
            sampledAt: this.options.clock(),
            duration: Math.max(0, meta["mpris:length"] ?? 0)
        };
    }

    private toStatus(status: "Playing" | "Paused" | "Stopped"): PlaybackStatus {
        return status === "Playing" ? "Playing" : "Paused";
    }

    private async poll(handlers: PlayerObserverHandlers, signal: AbortSignal) {
        while (!signal.aborted) {
            const ok = await this.sampleAndDispatch(handlers);
            const wait = ok ? this.options.pollIntervalMs : this.options.retryDelayMs;
            if (!(await delay(wait, signal))) break;
        }
    }

    private async subscribe(handlers: PlayerObserverHandlers, signal: AbortSignal) {
        // A track that is already playing is reported without waiting for a change
        await this.sampleAndDispatch(handlers);

        while (!signal.aborted) {
            const subscription = await this.openSubscription(handlers, signal);
            if (!subscription) return;

            await this.follow(subscription, handlers, signal);
            if (!signal.aborted) {
                Logger.info(`[MPRIS] Lost ${subscription.player}, subscribing again`);
            }
        }
    }

    private async openSubscription(handlers: PlayerObserverHandlers, signal: AbortSignal): Promise<MediaSubscription | null> {
        while (!signal.aborted) {
            try {
                return await this.bus.subscribe((event) => this.onBusEvent(event, handlers));
            } catch (error) {
                Logger.warn("[MPRIS] Cannot subscribe to player changes, retrying", error);
                if (!(await delay(this.options.retryDelayMs, signal))) break;
                await this.sampleAndDispatch(handlers);
            }
        }
        return null;
    }

    /**
     * Resyncs now and then so drift and missed notifications get corrected,
     * until `signal` aborts or the subscribed player is gone.
     */
    private async follow(subscription: MediaSubscription, handlers: PlayerObserverHandlers, signal: AbortSignal) {
        const lost = new AbortController();
        const onAbort = () => lost.abort();
        if (signal.aborted) {
            lost.abort();
        } else {
            signal.addEventListener("abort", onAbort, { once: true });
        }
        this.followed = { player: subscription.player, lost };

        try {
            while (await delay(this.options.pollIntervalMs, lost.signal)) {
                await this.sampleAndDispatch(handlers);
            }
        } finally {
            signal.removeEventListener("abort", onAbort);
            this.followed = null;
            subscription.unsubscribe();
        }
    }

    private onBusEvent(event: MediaBusEvent, handlers: PlayerObserverHandlers) {
        if (event.type === "seeked") {
            this.dispatchSeek(event.position, handlers);
            return;
        }

        const changed = event.changed;
        if ("Metadata" in changed || "PlaybackStatus" in changed) {
            this.sampleAndDispatch(handlers).catch((error: unknown) => Logger.error("[MPRIS] Resample failed", error));
        } else if ("Position" in changed) {
            this.dispatchSeek(changed["Position"], handlers);
        }
    }

    private dispatchSeek(rawPosition: unknown, handlers: PlayerObserverHandlers) {
        if (!this.lastIdentity) return;
        const position = MicrosSchema.safeParse(rawPosition);
        if (!position.success) {
            Logger.debug("[MPRIS] Ignoring malformed seek position", rawPosition);
            return;
        }
        handlers.onSeek(Math.max(0, position.data));
    }

    /**
     * Queues one sample behind those already asked for and reports what
     * changed.
     * @returns false when sampling failed and the caller should back off.
     */
    private sampleAndDispatch(handlers: PlayerObserverHandlers): Promise<boolean> {
        const next = this.samples.then(() => this.readAndDispatch(handlers));
        this.samples = next;
        return next;
    }

    private async readAndDispatch(handlers: PlayerObserverHandlers): Promise<boolean> {
        try {
            const raw = await this.bus.readPlayer();
            this.checkFollowed(raw?.player ?? null);
            this.dispatch(raw ? this.toPlaybackState(raw) : null, handlers);
            return true;
        } catch (error) {
            // an unreachable bus is the same as no player
            Logger.warn("[MPRIS] Sampling failed", error);
            this.checkFollowed(null);
            this.dispatch(null, handlers);
            return false;
        }
    }

    /** Drops the subscription once the bus reads a different player, or none. */
    private checkFollowed(player: string | null) {
        const followed = this.followed;
        if (followed && followed.player !== player) {
            Logger.debug(`[MPRIS] Followed player ${followed.player} replaced by ${player ?? "nothing"}`);
            followed.lost.abort();
        }
    }

    private dispatch(state: PlaybackState | null, handlers: PlayerObserverHandlers) {
        if (!state) {
            if (this.lastIdentity) {
                this.lastIdentity = null;
                handlers.onPlayerGone();
            }
            return;
        }

        if (!isSameTrack(this.lastIdentity, state.identity)) {
            this.lastIdentity = state.identity;
            Logger.info(`[MPRIS] Now playing: ${describeTrack(state.identity)}`);
            handlers.onTrackChanged(state);
        } else {
            handlers.onSample(state);
        }
    }
}
