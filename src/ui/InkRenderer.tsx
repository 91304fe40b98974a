import { render } from 'ink';
import { Renderer } from '../core/interfaces/Renderer';
import { UpdateBus } from '../core/services/UpdateBus';
import { RendererInitError } from '../core/utils/Errors';
import App from './App';

const ENTER_ALT_SCREEN = '\x1b[?1049h';
const LEAVE_ALT_SCREEN = '\x1b[?1049l';

/**
 * Full-screen lyrics view in the terminal's alternate screen.
 */
export class InkRenderer implements Renderer {
    private opened = false;

    constructor(
        private readonly stdin: NodeJS.ReadStream = process.stdin,
        private readonly stdout: NodeJS.WriteStream = process.stdout
    ) { }

    public open() {
        if (!this.stdout.isTTY || !this.stdin.isTTY) {
            throw new RendererInitError('Full-screen mode needs an interactive terminal, try --mode pipe');
        }
        this.stdout.write(ENTER_ALT_SCREEN);
        this.opened = true;
    }

    public async run(bus: UpdateBus, signal: AbortSignal): Promise<void> {
        if (!this.opened) throw new RendererInitError('Renderer used before open()');

        const instance = render(<App bus={bus} />, {
            stdin: this.stdin,
            stdout: this.stdout,
            exitOnCtrlC: true,
            // verbose log lines are printed above the frame instead of over it
            patchConsole: true
        });
        const onAbort = () => instance.unmount();
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }

        try {
            await instance.waitUntilExit();
        } finally {
            signal.removeEventListener('abort', onAbort);
        }
    }

    public close() {
        if (!this.opened) return;
        this.opened = false;
        this.stdout.write(LEAVE_ALT_SCREEN);
    }
}
