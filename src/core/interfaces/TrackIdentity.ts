/**
 * Identifies a track. Two identities are the same track when all three
 * fields are equal; see `isSameTrack`.
 */
export interface TrackIdentity {
    /** Normalized track title */
    title: string;

    /** Normalized first artist */
    artist: string;

    /** Normalized album name, may be empty */
    album: string;
}
