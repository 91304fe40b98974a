/**
 * Represents a single line of synchronized lyrics.
 */
export interface LyricLine {
    /** Absolute start time in seconds */
    time: number;

    /** Text content, never empty */
    text: string;
}

/**
 * Parsed lyrics of one track, ascending by time.
 * Empty when nothing usable was found.
 */
export type LyricSet = readonly LyricLine[];

export const EMPTY_LYRICS: LyricSet = Object.freeze([]);
