import { TrackIdentity } from "./TrackIdentity";

export type PlaybackStatus = "Playing" | "Paused";

/**
 * One sample of the player, as seen by the PlayerObserver.
 */
export interface PlaybackState {
    identity: TrackIdentity;

    /** Playback position in seconds at `sampledAt` */
    position: number;

    status: PlaybackStatus;

    /** Wall-clock time of the sample (epoch ms) */
    sampledAt: number;

    /** Track length in seconds, 0 when the player does not report one */
    duration: number;
}
