/**
 * Failure of a lyrics lookup (transport, timeout, unexpected status or body).
 * "Not found" is not an error; resolvers return `null` for it.
 */
export class LyricsLookupError extends Error {
    public readonly status?: number;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "LyricsLookupError";
        this.status = options?.status;
    }
}

/** Raised into an await that was abandoned because its session was cancelled. */
export class CancelledError extends Error {
    constructor(message = "Operation cancelled") {
        super(message);
        this.name = "CancelledError";
    }
}

/** The renderer could not start. This is the one fatal condition. */
export class RendererInitError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "RendererInitError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
