import { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { UpdateBus } from '../core/services/UpdateBus';
import { Update } from '../core/models/Update';
import { Logger } from '../core/utils/Logger';
import { Alignment, lyricsWindow, shiftAlignment } from './layout';
import { NO_LYRICS_PLACEHOLDER } from './PipeRenderer';

const DEFAULT_ROWS = 24;
const DEFAULT_COLUMNS = 80;

const FLEX_ALIGN: Record<Alignment, 'flex-start' | 'center' | 'flex-end'> = {
    left: 'flex-start',
    center: 'center',
    right: 'flex-end'
};

export default function App({ bus, placeholder = NO_LYRICS_PLACEHOLDER }: { bus: UpdateBus, placeholder?: string }) {
    const { exit } = useApp();
    const { stdout } = useStdout();
    const [update, setUpdate] = useState<Update | null>(() => bus.latest());
    // Lines scrolled away from the live one while paused
    const [offset, setOffset] = useState(0);
    const [alignment, setAlignment] = useState<Alignment>('center');

    useEffect(() => {
        const controller = new AbortController();
        const consume = async () => {
            for await (const next of bus.stream(controller.signal)) {
                setUpdate(next);
                setOffset(0);
            }
        };
        consume().catch((error: unknown) => Logger.error('[UI] Update stream failed', error));
        return () => controller.abort();
    }, [bus]);

    useInput((input, key) => {
        if (input === 'q' || key.escape) {
            exit();
            return;
        }
        if (key.leftArrow) setAlignment(current => shiftAlignment(current, -1));
        if (key.rightArrow) setAlignment(current => shiftAlignment(current, 1));

        // Browsing only while paused; playback drives the line otherwise
        if (!update || update.playing || update.lines.length === 0) return;
        const index = update.index;
        const last = update.lines.length - 1;
        if (key.upArrow) setOffset(current => Math.max(current - 1, -index));
        if (key.downArrow) setOffset(current => Math.min(current + 1, last - index));
    });

    // Asked on every render instead of tracked through resize events
    const rows = stdout.rows || DEFAULT_ROWS;
    const columns = stdout.columns || DEFAULT_COLUMNS;

    if (!update) {
        return <Message rows={rows} columns={columns} text='Waiting for a player…' dim />;
    }
    if (update.error) {
        return <Message rows={rows} columns={columns} text={update.error.message} />;
    }
    if (update.lines.length === 0) {
        return <Message rows={rows} columns={columns} text={placeholder} dim />;
    }

    const visible = lyricsWindow(update.lines, update.index + offset, rows);

    return (
        <Box flexDirection='column' width={columns} height={rows} justifyContent='center' alignItems={FLEX_ALIGN[alignment]}>
            {visible.before.map((text, idx) => (
                <Text key={`before-${idx}`} dimColor italic wrap='truncate-end'>{text}</Text>
            ))}
            <Text bold color='cyan' wrap='truncate-end'>{visible.current}</Text>
            {visible.after.map((text, idx) => (
                <Text key={`after-${idx}`} wrap='truncate-end'>{text}</Text>
            ))}
        </Box>
    );
}

function Message({ rows, columns, text, dim = false }: { rows: number, columns: number, text: string, dim?: boolean }) {
    return (
        <Box width={columns} height={rows} justifyContent='center' alignItems='center'>
            <Text bold={!dim} dimColor={dim} color={dim ? undefined : 'cyan'}>{text}</Text>
        </Box>
    );
}
