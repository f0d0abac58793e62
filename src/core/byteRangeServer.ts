import { Logger } from 'winston';
import { ByteRange, SegmentResponse, SegmentSnapshot, WindowSnapshot } from '../types';
import { RangeNotSatisfiableError, SegmentNotFoundError, StaleOrEvictedDataError } from './errors';
import { readSegmentBytes } from './segment';
import { SegmentPartBuffer } from './segmentPartBuffer';
import { StreamSettings } from './streamSettings';
import { WaiterRegistry } from './waiterRegistry';
import { findSegment, isEvicted } from './windowSnapshot';
import logger from '../utils/logger';

/** Last byte position of an open-ended range (`bytes=N-` or a huge sentinel end). */
export const OPEN_END = Number.MAX_SAFE_INTEGER;

export const SEGMENT_CONTENT_TYPE = 'video/mp4';

export class ByteRangeServer {
    private readonly buffer: SegmentPartBuffer;
    private readonly registry: WaiterRegistry;
    private readonly settings: StreamSettings;
    private readonly streamId: string;
    private logger: Logger;

    constructor(
        streamId: string,
        buffer: SegmentPartBuffer,
        registry: WaiterRegistry,
        settings: StreamSettings,
        loggerInstance?: Logger
    ) {
        this.streamId = streamId;
        this.buffer = buffer;
        this.registry = registry;
        this.settings = settings;
        this.logger = loggerInstance || logger;
    }

    /**
     * Serves `range` (or the whole segment) out of a segment that may still be
     * growing. A request starting exactly at the current end of an open segment
     * is held until bytes arrive there or the segment is sealed; one starting
     * past it is unsatisfiable. A segment not created yet gets one production
     * step (the next put or part) to appear, judged on the snapshot of that step.
     */
    public async serve(sequence: number, range: ByteRange | undefined, signal?: AbortSignal): Promise<SegmentResponse> {
        const window = this.buffer.snapshot();
        const segment = findSegment(window, sequence);
        if (segment) {
            return this.serveFrom(segment, range, signal);
        }
        if (isEvicted(window, sequence)) {
            throw new StaleOrEvictedDataError(sequence);
        }

        this.logger.debug(`[${this.streamId}] Segment ${sequence} not created yet, waiting one production step`);
        const latest = await this.registry.wait({ kind: 'production' }, window, signal);
        const created = findSegment(latest, sequence);
        if (!created) {
            throw isEvicted(latest, sequence) ? new StaleOrEvictedDataError(sequence) : new SegmentNotFoundError(sequence);
        }
        return this.serveFrom(created, range, signal);
    }

    private async serveFrom(
        found: SegmentSnapshot,
        range: ByteRange | undefined,
        signal?: AbortSignal
    ): Promise<SegmentResponse> {
        const sequence = found.sequence;
        const start = range?.start ?? 0;
        let segment = found;

        if (start > segment.dataSize || (range && segment.complete && start === segment.dataSize)) {
            throw new RangeNotSatisfiableError(start, segment.dataSize);
        }
        if (start === segment.dataSize && !segment.complete) {
            this.logger.debug(`[${this.streamId}] Holding request for segment ${sequence} at byte ${start}`);
            // The hold starts now, so it is judged against the current buffer.
            const ready = await this.registry.wait({ kind: 'bytes', sequence, offset: start }, this.buffer.snapshot(), signal);
            segment = this.segmentIn(ready, sequence);
            if (range && segment.dataSize <= start) {
                throw new RangeNotSatisfiableError(start, segment.dataSize);
            }
        }

        const headers: Record<string, string> = {
            'Content-Type': SEGMENT_CONTENT_TYPE,
            'Cache-Control': `max-age=${6 * this.settings.targetDuration}`,
        };

        if (!range) {
            return { status: 200, headers, body: readSegmentBytes(segment, 0, segment.dataSize) };
        }

        const servedEnd = Math.min(range.end, segment.dataSize - 1);
        const total = segment.complete ? String(segment.dataSize) : '*';
        headers['Content-Range'] = `bytes ${start}-${servedEnd}/${total}`;

        return { status: 206, headers, body: readSegmentBytes(segment, start, servedEnd + 1) };
    }

    private segmentIn(window: WindowSnapshot, sequence: number): SegmentSnapshot {
        const segment = findSegment(window, sequence);
        if (!segment) {
            throw new StaleOrEvictedDataError(sequence);
        }
        return segment;
    }
}
