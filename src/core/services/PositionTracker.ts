import { LyricSet } from "../models/LyricsData";
import { PlaybackStatus } from "../interfaces/PlaybackState";

// Lines stepped over from the previous index before falling back to binary search
const MAX_LOCAL_STEPS = 4;

/**
 * Finds the active line for a position: the greatest `i` with
 * `lines[i].time <= position`, 0 before the first line.
 *
 * Starts from `hint` (the previous result) and steps a few lines forward or
 * backward, which covers normal playback and short seeks. Larger jumps fall
 * back to a binary search of the remaining range.
 */
export function findLineIndex(lines: LyricSet, position: number, hint = 0): number {
    const count = lines.length;
    if (count === 0) return 0;

    let i = Math.min(Math.max(hint, 0), count - 1);
    let steps = 0;

    if (lines[i].time <= position) {
        while (i + 1 < count && lines[i + 1].time <= position && steps < MAX_LOCAL_STEPS) {
            i++;
            steps++;
        }
        if (i + 1 >= count || lines[i + 1].time > position) return i;
        return binarySearch(lines, position, i + 1, count - 1);
    }

    while (i > 0 && lines[i].time > position && steps < MAX_LOCAL_STEPS) {
        i--;
        steps++;
    }
    if (lines[i].time <= position) return i;
    if (i === 0) return 0;
    return Math.max(0, binarySearch(lines, position, 0, i - 1));
}

/**
 * Greatest index in [low, high] whose line starts at or before `position`,
 * -1 when there is none.
 */
function binarySearch(lines: LyricSet, position: number, low: number, high: number): number {
    let result = -1;

    while (low <= high) {
        const mid = Math.floor((low + high) / 2);
        if (lines[mid].time <= position) {
            result = mid; // Candidate found
            low = mid + 1; // Try to find a later one that is still <= position
        } else {
            high = mid - 1;
        }
    }

    return result;
}

/**
 * Keeps the playback position between player samples and the line index
 * that goes with it.
 *
 * While playing, the position advances with the wall clock from the last
 * sample. Each new sample replaces the extrapolated value.
 */
export class PositionTracker {
    private anchorPosition = 0;
    private anchorTime: number;
    private status: PlaybackStatus = "Paused";
    private currentIndex = 0;

    constructor(private readonly lines: LyricSet, private readonly clock: () => number = Date.now) {
        this.anchorTime = clock();
    }

    public get index(): number {
        return this.currentIndex;
    }

    public get playing(): boolean {
        return this.status === "Playing";
    }

    /**
     * Resets the position to a sampled value.
     * @param sampledAt Epoch ms the sample was taken at.
     */
    public sync(position: number, status: PlaybackStatus, sampledAt: number = this.clock()) {
        this.anchorPosition = Math.max(0, position);
        this.anchorTime = sampledAt;
        this.status = status;
    }

    /** Jumps to `position` now, keeping the play/pause status. */
    public seek(position: number) {
        this.sync(position, this.status, this.clock());
    }

    /** Position in seconds at `now`. */
    public position(now: number = this.clock()): number {
        if (this.status !== "Playing") return this.anchorPosition;
        return this.anchorPosition + Math.max(0, now - this.anchorTime) / 1000;
    }

    /**
     * Recomputes the index for the current position.
     * @returns Whether the index changed.
     */
    public update(now: number = this.clock()): boolean {
        if (this.lines.length === 0) return false;

        const next = findLineIndex(this.lines, this.position(now), this.currentIndex);
        if (next === this.currentIndex) return false;

        this.currentIndex = next;
        return true;
    }
}
