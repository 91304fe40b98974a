import { z } from "zod";
import { Logger } from "../utils/Logger";
import { LyricsResolver } from "../interfaces/LyricsResolver";
import { LyricsParser } from "../interfaces/LyricsParser";
import { TrackIdentity } from "../interfaces/TrackIdentity";
import { LyricSet } from "../models/LyricsData";
import { SyncedLyricsParser } from "../parsers/SyncedLyricsParser";
import { LyricsLookupError } from "../utils/Errors";
import { normalizeQuotes } from "../utils/TrackNormalizer";
import { withTimeout } from "../utils/Abort";

/**
 * `strict` sends the track length with the exact-match lookup so that
 * remixes and covers of the same title do not match; `loose` leaves it out.
 */
export type MatchStrictness = "strict" | "loose";

export interface LRCLibOptions {
    baseUrl: string;
    timeoutMs: number;
    matching: MatchStrictness;
    userAgent: string;
}

export const DEFAULT_LRCLIB_OPTIONS: LRCLibOptions = {
    baseUrl: "https://lrclib.net/api",
    timeoutMs: 10_000,
    matching: "strict",
    userAgent: "lyricline/0.1.0"
};

const LRCLibRecordSchema = z.object({
    id: z.number().optional(),
    trackName: z.string().nullish(),
    artistName: z.string().nullish(),
    albumName: z.string().nullish(),
    duration: z.number().nullish(),
    syncedLyrics: z.string().nullish()
});

type LRCLibRecord = z.infer<typeof LRCLibRecordSchema>;

// Statuses the exact-match endpoint uses for "no such track"
const NOT_FOUND_STATUSES = new Set([400, 404]);

export class LRCLibNetworkProvider implements LyricsResolver {
    public name = "LRCLIB";
    private readonly options: LRCLibOptions;

    constructor(options: Partial<LRCLibOptions> = {}, private readonly parser: LyricsParser = new SyncedLyricsParser()) {
        this.options = { ...DEFAULT_LRCLIB_OPTIONS, ...options };
    }

    public async resolve(identity: TrackIdentity, approxDurationSeconds: number, signal?: AbortSignal): Promise<LyricSet | null> {
        const track = {
            title: normalizeQuotes(identity.title),
            artist: normalizeQuotes(identity.artist),
            album: normalizeQuotes(identity.album)
        };

        const exact = await this.getExact(track, approxDurationSeconds, signal);
        if (exact) return exact;

        return this.search(track, signal);
    }

    private async getExact(track: TrackIdentity, durationSeconds: number, signal?: AbortSignal): Promise<LyricSet | null> {
        const params = new URLSearchParams({
            track_name: track.title,
            artist_name: track.artist,
            album_name: track.album
        });
        if (this.options.matching === "strict" && durationSeconds > 0) {
            params.set("duration", String(Math.round(durationSeconds)));
        }
        const url = `${this.options.baseUrl}/get?${params.toString()}`;

        Logger.info(`[LRCLIB] Exact match: ${url}`);
        const response = await this.request(url, signal);

        if (NOT_FOUND_STATUSES.has(response.status)) {
            Logger.info(`[LRCLIB] No exact match (status ${response.status}). Falling back to search.`);
            return null;
        }
        if (response.status !== 200) {
            throw new LyricsLookupError(`LRCLIB: unexpected status ${response.status}`, { status: response.status });
        }

        const record = LRCLibRecordSchema.safeParse(response.body);
        if (!record.success) {
            throw new LyricsLookupError("LRCLIB: malformed exact-match response", { cause: record.error });
        }

        const lines = this.parseRecord(record.data);
        if (!lines) {
            Logger.info(`[LRCLIB] Exact match has no synced lyrics. Falling back to search.`);
        }
        return lines;
    }

    private async search(track: TrackIdentity, signal?: AbortSignal): Promise<LyricSet | null> {
        const query = `${track.artist} ${track.title}`.trim();
        const url = `${this.options.baseUrl}/search?${new URLSearchParams({ q: query }).toString()}`;

        Logger.info(`[LRCLIB] Searching: ${url}`);
        const response = await this.request(url, signal);

        if (response.status !== 200) {
            throw new LyricsLookupError(`LRCLIB search: unexpected status ${response.status}`, { status: response.status });
        }

        const records = z.array(LRCLibRecordSchema).safeParse(response.body);
        if (!records.success) {
            throw new LyricsLookupError("LRCLIB search: malformed response", { cause: records.error });
        }

        for (const record of records.data) {
            const lines = this.parseRecord(record);
            if (lines) {
                Logger.info(`[LRCLIB] Using search result "${record.trackName ?? "?"} - ${record.artistName ?? "?"}" (${lines.length} lines).`);
                return lines;
            }
        }

        Logger.info(`[LRCLIB] ${records.data.length} search results, none with synced lyrics.`);
        return null;
    }

    /** Parsed lines of a record, or null when it carries none. */
    private parseRecord(record: LRCLibRecord): LyricSet | null {
        if (!record.syncedLyrics) return null;
        const lines = this.parser.parse(record.syncedLyrics);
        return lines.length > 0 ? lines : null;
    }

    private async request(url: string, signal?: AbortSignal): Promise<{ status: number; body: unknown }> {
        const guard = withTimeout(this.options.timeoutMs, signal);
        try {
            const response = await fetch(url, {
                headers: { "User-Agent": this.options.userAgent },
                signal: guard.signal
            });
            if (response.status !== 200) {
                await response.body?.cancel();
                return { status: response.status, body: undefined };
            }
            const body: unknown = await response.json();
            return { status: response.status, body };
        } catch (error) {
            if (signal?.aborted) throw error;
            throw new LyricsLookupError(`LRCLIB request failed: ${url}`, { cause: error });
        } finally {
            guard.dispose();
        }
    }
}
