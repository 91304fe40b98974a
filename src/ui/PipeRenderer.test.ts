import { describe, it, expect, vi } from 'vitest';
import { PipeRenderer } from './PipeRenderer';
import { UpdateBus } from '../core/services/UpdateBus';
import { LyricSet } from '../core/models/LyricsData';

const lines: LyricSet = [
    { time: 1, text: 'First line' },
    { time: 4, text: 'Second line' }
];

function createSink() {
    const written: string[] = [];
    return { written, write: (chunk: string) => written.push(chunk) };
}

describe('PipeRenderer', () => {
    it('should print each line once', () => {
        const sink = createSink();
        const renderer = new PipeRenderer(sink);
        renderer.open();

        renderer.render({ lines, index: 0, playing: true, generation: 1 });
        renderer.render({ lines, index: 0, playing: false, generation: 1 });
        renderer.render({ lines, index: 1, playing: false, generation: 1 });

        expect(sink.written).toEqual(['First line\n', 'Second line\n']);
    });

    it('should print the same line again for a new track', () => {
        const sink = createSink();
        const renderer = new PipeRenderer(sink);

        renderer.render({ lines, index: 0, playing: true, generation: 1 });
        renderer.render({ lines, index: 0, playing: true, generation: 2 });

        expect(sink.written).toEqual(['First line\n', 'First line\n']);
    });

    it('should print the placeholder without lyrics and the message on errors', () => {
        const sink = createSink();
        const renderer = new PipeRenderer(sink, '(no lyrics)');

        renderer.render({ lines: [], index: 0, playing: true, generation: 1 });
        renderer.render({ lines: [], index: 0, playing: false, generation: 1 });
        renderer.render({ lines: [], index: 0, playing: true, generation: 2, error: new Error('LRCLIB: unexpected status 500') });

        expect(sink.written).toEqual(['(no lyrics)\n', 'LRCLIB: unexpected status 500\n']);
    });

    it('should clamp an index past the end', () => {
        const sink = createSink();
        new PipeRenderer(sink).render({ lines, index: 5, playing: true, generation: 1 });

        expect(sink.written).toEqual(['Second line\n']);
    });

    it('should forget the last line when reopened', () => {
        const sink = createSink();
        const renderer = new PipeRenderer(sink);
        const update = { lines, index: 1, playing: true, generation: 1 };

        renderer.render(update);
        renderer.open();
        renderer.render(update);

        expect(sink.written).toEqual(['Second line\n', 'Second line\n']);
    });

    it('should render updates from the bus until aborted', async () => {
        const sink = createSink();
        const renderer = new PipeRenderer(sink);
        const bus = new UpdateBus();
        const controller = new AbortController();

        bus.publish({ lines, index: 0, playing: true, generation: 1 });
        const running = renderer.run(bus, controller.signal);
        await vi.waitFor(() => expect(sink.written).toEqual(['First line\n']));

        bus.publish({ lines, index: 1, playing: true, generation: 1 });
        await vi.waitFor(() => expect(sink.written).toEqual(['First line\n', 'Second line\n']));

        controller.abort();
        await expect(running).resolves.toBeUndefined();
    });
});
