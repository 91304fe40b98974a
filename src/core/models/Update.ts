import { LyricSet } from "./LyricsData";
import { TrackIdentity } from "../interfaces/TrackIdentity";

/**
 * Display state handed to the renderer.
 * Always a full snapshot, never a diff.
 */
export interface Update {
    lines: LyricSet;

    /** Index of the current line. 0 when `lines` is empty. */
    index: number;

    playing: boolean;

    /** Why the lookup failed, when it did. */
    error?: Error;

    /** Sequence number of the session that produced this update. */
    generation: number;

    /** Track of that session, absent once the player went away. */
    track?: TrackIdentity;
}
