import { Renderer } from "../core/interfaces/Renderer";
import { Update } from "../core/models/Update";
import { UpdateBus } from "../core/services/UpdateBus";

export interface LineSink {
    write(chunk: string): unknown;
}

export const NO_LYRICS_PLACEHOLDER = "♪";

/**
 * Prints the current line to a stream, once per line change, for status
 * bars and other line-oriented consumers.
 */
export class PipeRenderer implements Renderer {
    private lastKey: string | null = null;

    constructor(private readonly out: LineSink, private readonly placeholder: string = NO_LYRICS_PLACEHOLDER) { }

    public open() {
        this.lastKey = null;
    }

    public async run(bus: UpdateBus, signal: AbortSignal): Promise<void> {
        for await (const update of bus.stream(signal)) {
            this.render(update);
        }
    }

    public close() { }

    /** Writes the line for `update`, unless it repeats what was written last. */
    public render(update: Update) {
        const { key, text } = this.describe(update);
        if (key === this.lastKey) return;

        this.lastKey = key;
        this.out.write(`${text}\n`);
    }

    private describe(update: Update): { key: string; text: string } {
        if (update.error) {
            return { key: `${update.generation}:error`, text: update.error.message };
        }
        if (update.lines.length === 0) {
            return { key: `${update.generation}:empty`, text: this.placeholder };
        }
        const index = Math.min(Math.max(update.index, 0), update.lines.length - 1);
        return { key: `${update.generation}:${index}`, text: update.lines[index].text };
    }
}
