import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError } from "../core/utils/Errors";
import { DEFAULT_LRCLIB_OPTIONS } from "../core/providers/LRCLibNetworkProvider";

const positiveMs = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const AppConfigSchema = z.object({
    mode: z.enum(["pipe", "modern"]).default("modern"),
    pollIntervalMs: positiveMs(1000),
    strategy: z.enum(["poll", "subscribe"]).default("subscribe"),
    tickIntervalMs: positiveMs(100),
    matching: z.enum(["strict", "loose"]).default("strict"),
    timeoutMs: positiveMs(DEFAULT_LRCLIB_OPTIONS.timeoutMs),
    apiUrl: z.string().url().transform(url => url.replace(/\/+$/, "")).default(DEFAULT_LRCLIB_OPTIONS.baseUrl),
    player: z.string().min(1).optional(),
    listPlayers: z.boolean().default(false),
    verbose: z.boolean().default(false),
    help: z.boolean().default(false)
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// schema key -> command-line flag, for error messages
const FLAG_NAMES: Record<string, string> = {
    mode: "--mode",
    pollIntervalMs: "--poll",
    strategy: "--strategy",
    tickIntervalMs: "--tick",
    matching: "--match",
    timeoutMs: "--timeout",
    apiUrl: "--api",
    player: "--player"
};

export const USAGE = `Usage: lyricline [options]

Shows the synced lyrics of the track playing in your MPRIS media player.

Options:
  --mode <pipe|modern>        pipe prints one line at a time, modern is full-screen (default: modern)
  --poll <ms>                 player poll / resync interval (default: 1000)
  --strategy <poll|subscribe> follow the player by polling or by change notifications (default: subscribe)
  --tick <ms>                 line tracking interval (default: 100)
  --match <strict|loose>      strict also matches the track length when looking up lyrics (default: strict)
  --timeout <ms>              lyrics request timeout (default: 10000)
  --api <url>                 LRCLIB API base URL (default: $LRCLIB_API_URL or https://lrclib.net/api)
  --player <bus name>         MPRIS player to follow, e.g. org.mpris.MediaPlayer2.spotify
  --list-players              print the MPRIS players on the session bus and exit
  --verbose                   log every level on stderr (errors only otherwise)
  -h, --help                  show this help
`;

function readFlags(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            strict: true,
            allowPositionals: false,
            options: {
                mode: { type: "string" },
                poll: { type: "string" },
                strategy: { type: "string" },
                tick: { type: "string" },
                match: { type: "string" },
                timeout: { type: "string" },
                api: { type: "string" },
                player: { type: "string" },
                "list-players": { type: "boolean" },
                verbose: { type: "boolean" },
                help: { type: "boolean", short: "h" }
            }
        }).values;
    } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Reads command-line flags into a validated configuration.
 * @throws ConfigError for unknown flags or invalid values.
 */
export function parseCliOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): AppConfig {
    const values = readFlags(argv);

    const parsed = AppConfigSchema.safeParse({
        mode: values.mode,
        pollIntervalMs: values.poll,
        strategy: values.strategy,
        tickIntervalMs: values.tick,
        matching: values.match,
        timeoutMs: values.timeout,
        apiUrl: values.api ?? env.LRCLIB_API_URL,
        player: values.player,
        listPlayers: values["list-players"],
        verbose: values.verbose,
        help: values.help
    });

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const key = String(issue.path[0] ?? "");
        throw new ConfigError(`Invalid value for ${FLAG_NAMES[key] ?? key}: ${issue.message}`);
    }
    return parsed.data;
}
