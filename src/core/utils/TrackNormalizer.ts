import { TrackIdentity } from "../interfaces/TrackIdentity";

/**
 * Replaces curly quotes with straight ones.
 * Lookup services index titles with straight quotes.
 */
export function normalizeQuotes(text: string): string {
    return text
        .replace(/[‘’]/g, "'")
        .replace(/[“”]/g, "\"");
}

export function normalizeText(text: string): string {
    return normalizeQuotes(text).replace(/\s+/g, " ").trim();
}

export function createIdentity(title: string, artist: string, album: string): TrackIdentity {
    return {
        title: normalizeText(title),
        artist: normalizeText(artist),
        album: normalizeText(album)
    };
}

export function isSameTrack(a: TrackIdentity | null | undefined, b: TrackIdentity | null | undefined): boolean {
    if (!a || !b) return a === b;
    return a.title === b.title && a.artist === b.artist && a.album === b.album;
}

/**
 * Derives a title from a media URL: the file name without its extension.
 * Returns "" when the URL cannot be parsed.
 */
export function titleFromUrl(url: string): string {
    try {
        const path = decodeURIComponent(new URL(url).pathname);
        const base = path.split("/").pop() ?? "";
        const dot = base.lastIndexOf(".");
        return dot > 0 ? base.slice(0, dot) : base;
    } catch {
        return "";
    }
}

export function describeTrack(identity: TrackIdentity): string {
    return identity.album
        ? `${identity.artist} - ${identity.title} (${identity.album})`
        : `${identity.artist} - ${identity.title}`;
}
