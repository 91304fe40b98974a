import { LyricSet } from "../models/LyricsData";

/**
 * Interface for lyrics parsing strategies.
 * Design Pattern: Strategy Pattern.
 */
export interface LyricsParser {
    /**
     * Parses raw synchronized lyrics into an ordered line set.
     * @param rawText The lyrics payload.
     */
    parse(rawText: string): LyricSet;
}
