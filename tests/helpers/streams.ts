import { HlsStream } from '../../src/core/hlsStream';
import { createPart } from '../../src/core/segment';
import { createStreamSettings } from '../../src/core/streamSettings';
import { Part } from '../../src/types';

export const TEST_SETTINGS = createStreamSettings(10, 1);
export const TEST_INIT = Buffer.from('test-init');

export function createTestStream(windowSize = 5, id = 'test-stream'): HlsStream {
    return new HlsStream(id, { settings: TEST_SETTINGS, windowSize });
}

/** A part of `size` bytes, each byte holding `fill`. */
export function bytePart(size = 1, fill = 0, independent = false, duration = 1): Part {
    return createPart(duration, independent, Buffer.alloc(size, fill));
}

/** Puts segment `sequence` and appends `parts` one-byte parts, byte i holding value i. */
export function produceSegment(stream: HlsStream, sequence: number, parts: number, seal = false): void {
    stream.put({ sequence, init: TEST_INIT, startTime: new Date('2024-01-01T00:00:00.000Z') });
    for (let i = 0; i < parts; i++) {
        stream.appendPart(sequence, bytePart(1, i, i === 0));
    }
    if (seal) {
        stream.seal(sequence);
    }
}

export function partLines(body: string): string[] {
    return body.split('\n').filter(line => line.startsWith('#EXT-X-PART:'));
}

export function preloadHint(body: string): string | undefined {
    return body.split('\n').find(line => line.startsWith('#EXT-X-PRELOAD-HINT:'));
}
