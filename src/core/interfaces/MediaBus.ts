/**
 * Player properties with bus-specific wrappers removed.
 * Shapes are not trusted; the observer validates them.
 */
export interface RawPlayerProperties {
    /** Bus name of the player that was read */
    player: string;
    metadata: unknown;
    position: unknown;
    status: unknown;
}

export type MediaBusEvent =
    | { type: "propertiesChanged"; changed: Record<string, unknown> }
    | { type: "seeked"; position: unknown };

export interface MediaSubscription {
    /** Bus name of the player the notifications come from */
    player: string;
    unsubscribe(): void;
}

/**
 * Transport to the media-control bus.
 */
export interface MediaBus {
    /** Bus names of every player on the bus. */
    listPlayers(): Promise<string[]>;

    /** Reads the followed player, `null` when there is none. */
    readPlayer(): Promise<RawPlayerProperties | null>;

    /**
     * Delivers property changes and seeks of the followed player.
     * Rejects when no subscription can be made right now.
     */
    subscribe(listener: (event: MediaBusEvent) => void): Promise<MediaSubscription>;

    close(): void;
}
