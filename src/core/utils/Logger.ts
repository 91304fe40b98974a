type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

class LoggerService {
    private listeners: LogListener[] = [];
    private verbose = false;
    private echo = true;

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /**
     * Only errors are echoed to stderr unless verbose.
     * Listeners always receive every entry.
     */
    public setVerbose(verbose: boolean) {
        this.verbose = verbose;
    }

    /** Turns the stderr echo off, e.g. while a test captures entries itself. */
    public setEcho(echo: boolean) {
        this.echo = echo;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };
        // stdout belongs to the renderer, so everything goes to stderr
        if (this.echo && (level === 'error' || this.verbose)) {
            if (data === undefined) {
                console.error(`[${level.toUpperCase()}] ${message}`);
            } else {
                console.error(`[${level.toUpperCase()}] ${message}`, data);
            }
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();
