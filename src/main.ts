import { AppConfig, parseCliOptions, USAGE } from './cli/CliOptions';
import { Renderer } from './core/interfaces/Renderer';
import { DBusMediaBus } from './core/providers/DBusMediaBus';
import { LRCLibNetworkProvider } from './core/providers/LRCLibNetworkProvider';
import { MprisPlayerObserver } from './core/services/MprisPlayerObserver';
import { SessionController } from './core/services/SessionController';
import { UpdateBus } from './core/services/UpdateBus';
import { ConfigError } from './core/utils/Errors';
import { Logger } from './core/utils/Logger';
import { InkRenderer } from './ui/InkRenderer';
import { PipeRenderer } from './ui/PipeRenderer';

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_USAGE = 2;

function createRenderer(config: AppConfig): Renderer {
    return config.mode === 'pipe' ? new PipeRenderer(process.stdout) : new InkRenderer();
}

async function listPlayers(mediaBus: DBusMediaBus): Promise<number> {
    try {
        const players = await mediaBus.listPlayers();
        process.stdout.write(players.length > 0 ? `${players.join('\n')}\n` : 'No MPRIS players found.\n');
        return EXIT_OK;
    } catch (error) {
        Logger.error('Cannot reach the D-Bus session bus', error);
        return EXIT_FATAL;
    } finally {
        mediaBus.close();
    }
}

async function main(argv: string[]): Promise<number> {
    let config: AppConfig;
    try {
        config = parseCliOptions(argv);
    } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        process.stderr.write(`${error.message}\n\n${USAGE}`);
        return EXIT_USAGE;
    }

    if (config.help) {
        process.stdout.write(USAGE);
        return EXIT_OK;
    }
    Logger.setVerbose(config.verbose);

    const mediaBus = new DBusMediaBus({ playerName: config.player });
    if (config.listPlayers) return listPlayers(mediaBus);

    const renderer = createRenderer(config);
    try {
        renderer.open();
    } catch (error) {
        Logger.error('Cannot start the display', error);
        mediaBus.close();
        return EXIT_FATAL;
    }

    const shutdown = new AbortController();
    const stop = () => shutdown.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    const updates = new UpdateBus();
    const controller = new SessionController({
        resolver: new LRCLibNetworkProvider({
            baseUrl: config.apiUrl,
            timeoutMs: config.timeoutMs,
            matching: config.matching
        }),
        bus: updates,
        tickIntervalMs: config.tickIntervalMs
    });
    const observer = new MprisPlayerObserver(mediaBus, {
        strategy: config.strategy,
        pollIntervalMs: config.pollIntervalMs
    });

    const watching = observer.watch(controller.handlers(), shutdown.signal);
    try {
        await renderer.run(updates, shutdown.signal);
    } finally {
        shutdown.abort();
        await watching;
        await controller.shutdown();
        renderer.close();
        mediaBus.close();
        process.removeListener('SIGINT', stop);
        process.removeListener('SIGTERM', stop);
    }
    return EXIT_OK;
}

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        Logger.error('lyricline crashed', error);
        process.exitCode = EXIT_FATAL;
    }
);
