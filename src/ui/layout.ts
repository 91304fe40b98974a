import { LyricSet } from "../core/models/LyricsData";

export type Alignment = "left" | "center" | "right";

const ALIGNMENTS: Alignment[] = ["left", "center", "right"];

/** Moves the alignment one step, stopping at the edges. */
export function shiftAlignment(current: Alignment, step: -1 | 1): Alignment {
    const next = ALIGNMENTS.indexOf(current) + step;
    return ALIGNMENTS[Math.min(Math.max(next, 0), ALIGNMENTS.length - 1)];
}

export interface LyricsWindow {
    /** Lines above the current one, oldest first */
    before: string[];
    current: string;
    after: string[];
}

/**
 * Picks the lines that fit in `rows` terminal rows with the current line in
 * the middle. Rows a short line set cannot fill stay empty.
 */
export function lyricsWindow(lines: LyricSet, index: number, rows: number): LyricsWindow {
    if (lines.length === 0) return { before: [], current: "", after: [] };

    const current = Math.min(Math.max(index, 0), lines.length - 1);
    const free = Math.max(rows - 1, 0);
    const beforeCount = Math.floor(free / 2);
    const afterCount = free - beforeCount;

    return {
        before: lines.slice(Math.max(0, current - beforeCount), current).map(line => line.text),
        current: lines[current].text,
        after: lines.slice(current + 1, current + 1 + afterCount).map(line => line.text)
    };
}
