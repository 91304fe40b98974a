import { TrackIdentity } from "./TrackIdentity";
import { LyricSet } from "../models/LyricsData";

/**
 * Source of synchronized lyrics for a track.
 */
export interface LyricsResolver {
    /**
     * Looks up lyrics for the track.
     * @param identity Track to look up.
     * @param approxDurationSeconds Track length, 0 when unknown.
     * @param signal Aborts the lookup.
     * @returns The lines, or `null` when the track has no synchronized lyrics.
     * Rejects with a `LyricsLookupError` when the lookup itself failed.
     */
    resolve(identity: TrackIdentity, approxDurationSeconds: number, signal?: AbortSignal): Promise<LyricSet | null>;
}
