export interface SseEvent {
    event: string | null;
    data: string;
}

/**
 * Incremental `text/event-stream` reader. Yields one event per blank-line
 * delimited block; comment lines are dropped.
 */
export async function* readSseEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<SseEvent, void, undefined> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let event: string | null = null;
    let data: string[] = [];

    const takeLine = (line: string): SseEvent | null => {
        if (line === '') {
            const dispatched = data.length > 0 ? { event, data: data.join('\n') } : null;
            event = null;
            data = [];
            return dispatched;
        }
        if (line.startsWith(':')) {
            return null;
        }

        const colon = line.indexOf(':');
        const field = colon === -1 ? line : line.slice(0, colon);
        const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '');
        if (field === 'event') {
            event = value;
        } else if (field === 'data') {
            data.push(value);
        }
        return null;
    };

    try {
        while (true) {
            const { value, done } = await reader.read();
            buffer += done ? decoder.decode() : decoder.decode(value, { stream: true });

            let newline = buffer.indexOf('\n');
            while (newline !== -1) {
                const line = buffer.slice(0, newline).replace(/\r$/, '');
                buffer = buffer.slice(newline + 1);
                const dispatched = takeLine(line);
                if (dispatched) {
                    yield dispatched;
                }
                newline = buffer.indexOf('\n');
            }

            if (done) {
                break;
            }
        }

        const trailing = takeLine(buffer.replace(/\r$/, '')) ?? takeLine('');
        if (trailing) {
            yield trailing;
        }
    } finally {
        reader.releaseLock();
    }
}
