import * as dbus from "dbus-next";
import { z } from "zod";
import { Logger } from "../utils/Logger";
import { MediaBus, MediaBusEvent, MediaSubscription, RawPlayerProperties } from "../interfaces/MediaBus";

const MPRIS_PREFIX = "org.mpris.MediaPlayer2.";
// playerctld proxies whichever player was active last
const PLAYERCTLD = "org.mpris.MediaPlayer2.playerctld";
const MPRIS_PATH = "/org/mpris/MediaPlayer2";
const PLAYER_IFACE = "org.mpris.MediaPlayer2.Player";
const PROPERTIES_IFACE = "org.freedesktop.DBus.Properties";

export interface DBusMediaBusOptions {
    /** Bus name of the player to follow. Picked automatically when absent. */
    playerName?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Strips Variant wrappers, recursively. */
function unwrap(value: unknown): unknown {
    if (value instanceof dbus.Variant) {
        const inner: unknown = value.value;
        return unwrap(inner);
    }
    if (Array.isArray(value)) {
        return value.map(unwrap);
    }
    if (isRecord(value) && !Buffer.isBuffer(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, unwrap(entry)]));
    }
    return value;
}

/**
 * MPRIS over the D-Bus session bus.
 *
 * The connection is opened on first use and dropped after a transport
 * error, so the next call reconnects.
 */
export class DBusMediaBus implements MediaBus {
    private connection: dbus.MessageBus | null = null;
    private proxies = new Map<string, dbus.ProxyObject>();

    constructor(private readonly options: DBusMediaBusOptions = {}) { }

    public async listPlayers(): Promise<string[]> {
        return this.withConnection(async (bus) => {
            const daemon = await bus.getProxyObject("org.freedesktop.DBus", "/org/freedesktop/DBus");
            const names: unknown = await daemon.getInterface("org.freedesktop.DBus").ListNames();
            return z.array(z.string()).parse(names).filter(name => name.startsWith(MPRIS_PREFIX));
        });
    }

    public async readPlayer(): Promise<RawPlayerProperties | null> {
        const name = await this.findPlayer();
        if (!name) return null;

        try {
            const player = await this.proxy(name);
            const props = player.getInterface(PROPERTIES_IFACE);
            const [metadata, position, status]: unknown[] = await Promise.all([
                props.Get(PLAYER_IFACE, "Metadata"),
                props.Get(PLAYER_IFACE, "Position"),
                props.Get(PLAYER_IFACE, "PlaybackStatus")
            ]);
            return { player: name, metadata: unwrap(metadata), position: unwrap(position), status: unwrap(status) };
        } catch (error) {
            if (error instanceof dbus.DBusError) {
                // the player quit or does not implement a property: no player
                Logger.debug(`[DBus] ${name}: ${error.type}`);
                this.proxies.delete(name);
                return null;
            }
            this.reset();
            throw error;
        }
    }

    public async subscribe(listener: (event: MediaBusEvent) => void): Promise<MediaSubscription> {
        const name = await this.findPlayer();
        if (!name) throw new Error("No MPRIS player on the session bus");

        const player = await this.proxy(name);
        const props = player.getInterface(PROPERTIES_IFACE);
        const controls = player.getInterface(PLAYER_IFACE);

        const onPropertiesChanged = (iface: unknown, changed: unknown) => {
            if (iface !== PLAYER_IFACE) return;
            const values = unwrap(changed);
            listener({ type: "propertiesChanged", changed: isRecord(values) ? values : {} });
        };
        const onSeeked = (position: unknown) => {
            listener({ type: "seeked", position: unwrap(position) });
        };

        props.on("PropertiesChanged", onPropertiesChanged);
        controls.on("Seeked", onSeeked);
        Logger.info(`[DBus] Subscribed to ${name}`);

        return {
            player: name,
            unsubscribe: () => {
                props.removeListener("PropertiesChanged", onPropertiesChanged);
                controls.removeListener("Seeked", onSeeked);
            }
        };
    }

    public close() {
        this.reset();
    }

    private async findPlayer(): Promise<string | null> {
        const players = await this.listPlayers();
        const wanted = this.options.playerName;
        if (wanted) return players.includes(wanted) ? wanted : null;
        if (players.includes(PLAYERCTLD)) return PLAYERCTLD;
        return players[0] ?? null;
    }

    private async proxy(name: string): Promise<dbus.ProxyObject> {
        const cached = this.proxies.get(name);
        if (cached) return cached;

        const proxy = await this.withConnection(bus => bus.getProxyObject(name, MPRIS_PATH));
        this.proxies.set(name, proxy);
        return proxy;
    }

    private async withConnection<T>(work: (bus: dbus.MessageBus) => Promise<T>): Promise<T> {
        try {
            return await work(this.connect());
        } catch (error) {
            if (!(error instanceof dbus.DBusError)) this.reset();
            throw error;
        }
    }

    private connect(): dbus.MessageBus {
        if (!this.connection) {
            const bus = dbus.sessionBus();
            bus.on("error", (error: unknown) => {
                Logger.warn("[DBus] Connection error", error);
                if (this.connection === bus) this.reset();
            });
            this.connection = bus;
        }
        return this.connection;
    }

    private reset() {
        const bus = this.connection;
        this.connection = null;
        this.proxies.clear();
        bus?.disconnect();
    }
}
