import { PlaybackState } from "./PlaybackState";

export interface PlayerObserverHandlers {
    /** A different track started (or was found at startup). */
    onTrackChanged(state: PlaybackState): void;

    /** The user jumped to `position` (seconds) within the known track. */
    onSeek(position: number): void;

    /** A fresh sample of the track already known. */
    onSample(state: PlaybackState): void;

    /** The known track disappeared together with its player. */
    onPlayerGone(): void;
}

/**
 * Watches the desktop media player.
 */
export interface PlayerObserver {
    /**
     * Reads the player once.
     * @returns `null` when there is no usable player.
     */
    sample(): Promise<PlaybackState | null>;

    /**
     * Reports player events until `signal` aborts. Never rejects on player
     * or transport failures; it backs off and retries instead.
     */
    watch(handlers: PlayerObserverHandlers, signal: AbortSignal): Promise<void>;
}
