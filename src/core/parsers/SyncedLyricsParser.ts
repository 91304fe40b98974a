import { LyricsParser } from "../interfaces/LyricsParser";
import { LyricLine, LyricSet } from "../models/LyricsData";

/**
 * Parses line-synchronized lyrics `[mm:ss.xx]Text`.
 * Lines without a well-formed leading timestamp, or without text, are dropped.
 */
export class SyncedLyricsParser implements LyricsParser {
    // All timestamps at the start of a line: [mm:ss], [mm:ss.x], [mm:ss.xx], [mm:ss.xxx]
    private static LEADING_TIMESTAMPS_REGEX = /^(?:\[\d+:\d{1,2}(?:\.\d{1,3})?\])+/;
    // Group 1: minutes, Group 2: seconds, Group 3: fraction digits
    private static TIMESTAMP_REGEX = /\[(\d+):(\d{1,2})(?:\.(\d{1,3}))?\]/g;

    public parse(rawText: string): LyricSet {
        const parsedEntries: { line: LyricLine; rawIndex: number }[] = [];

        rawText.split(/\r?\n/).forEach((rawLine, index) => {
            const leading = rawLine.trimStart().match(SyncedLyricsParser.LEADING_TIMESTAMPS_REGEX);
            if (!leading) return;

            const text = rawLine.trimStart().slice(leading[0].length).trim();
            if (!text) return;

            // Handles [00:01.00][00:10.00]Repeated lyrics
            for (const match of leading[0].matchAll(SyncedLyricsParser.TIMESTAMP_REGEX)) {
                parsedEntries.push({
                    line: { time: SyncedLyricsParser.toSeconds(match[1], match[2], match[3]), text },
                    rawIndex: index
                });
            }
        });

        // Stable by source order for equal timestamps
        parsedEntries.sort((a, b) => a.line.time - b.line.time || a.rawIndex - b.rawIndex);

        return parsedEntries.map(entry => entry.line);
    }

    private static toSeconds(minutes: string, seconds: string, fraction: string | undefined): number {
        const whole = parseInt(minutes, 10) * 60 + parseInt(seconds, 10);
        if (!fraction) return whole;
        // one or two digits are centiseconds ("3" is 0.03s), three are milliseconds
        return whole + parseInt(fraction, 10) / (fraction.length === 3 ? 1000 : 100);
    }
}
