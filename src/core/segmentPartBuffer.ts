import { Logger } from 'winston';
import { MutationEvent, NewSegment, Part, WindowSnapshot } from '../types';
import { SegmentSequenceError, StaleOrEvictedDataError } from './errors';
import { Segment } from './segment';
import { WaiterRegistry } from './waiterRegistry';
import { EMPTY_WINDOW } from './windowSnapshot';
import logger from '../utils/logger';

/**
 * Rolling window of segments fed by a single producer. Every mutation is
 * followed, synchronously, by a broadcast of the new snapshot to the waiter
 * registry, so readers never see a state that spans two mutations.
 */
export class SegmentPartBuffer {
    private readonly segments: Segment[] = [];
    private readonly windowSize: number;
    private readonly registry: WaiterRegistry;
    private readonly streamId: string;
    private logger: Logger;
    private evictedDiscontinuities = 0;
    private version = 0;
    private cachedSnapshot: WindowSnapshot = EMPTY_WINDOW;

    constructor(streamId: string, windowSize: number, registry: WaiterRegistry, loggerInstance?: Logger) {
        if (!Number.isInteger(windowSize) || windowSize < 1) {
            throw new RangeError(`Window size must be a positive integer, got ${windowSize}`);
        }
        this.streamId = streamId;
        this.windowSize = windowSize;
        this.registry = registry;
        this.logger = loggerInstance || logger;
    }

    public put(options: NewSegment): Segment {
        if (!Number.isInteger(options.sequence) || options.sequence < 0) {
            throw new SegmentSequenceError(`Invalid segment sequence ${options.sequence}`);
        }
        const previous = this.current();
        if (previous && options.sequence !== previous.sequence + 1) {
            throw new SegmentSequenceError(
                `Segment ${options.sequence} does not follow segment ${previous.sequence}`
            );
        }

        if (previous && !previous.complete) {
            const duration = previous.partsDuration;
            previous.seal(duration);
            this.logger.warn(
                `[${this.streamId}] Segment ${previous.sequence} was still open when ${options.sequence} arrived; sealed at ${duration.toFixed(3)}s`
            );
        }

        const segment = new Segment(options);
        this.segments.push(segment);
        while (this.segments.length > this.windowSize) {
            const evicted = this.segments.shift();
            if (evicted?.discontinuity) {
                this.evictedDiscontinuities++;
            }
            this.logger.debug(`[${this.streamId}] Evicted segment ${evicted?.sequence}`);
        }

        this.logger.info(`[${this.streamId}] Segment ${segment.sequence} started${segment.discontinuity ? ' (discontinuity)' : ''}`);
        this.signal('put');
        return segment;
    }

    public appendPart(sequence: number, part: Part, discontinuity = false): number {
        const segment = this.requireLive(sequence);
        const offset = segment.addPart(part, discontinuity);

        this.logger.debug(
            `[${this.streamId}] Part ${segment.partCount - 1} of segment ${sequence}: ${part.data.length} bytes @${offset}${part.independent ? ' (independent)' : ''}`
        );
        this.signal('part');
        return offset;
    }

    /** Seals a segment. Without `duration`, the sum of its part durations is used. */
    public seal(sequence: number, duration?: number): void {
        const segment = this.requireLive(sequence);
        const sealedDuration = duration ?? segment.partsDuration;
        segment.seal(sealedDuration);

        this.logger.info(
            `[${this.streamId}] Segment ${sequence} sealed: ${segment.partCount} parts, ${segment.dataSize} bytes, ${sealedDuration.toFixed(3)}s`
        );
        this.signal('seal');
    }

    public get(sequence: number): Segment {
        const segment = this.find(sequence);
        if (!segment) {
            throw new StaleOrEvictedDataError(sequence);
        }
        return segment;
    }

    public find(sequence: number): Segment | undefined {
        const first = this.segments[0];
        if (!first) {
            return undefined;
        }
        return this.segments[sequence - first.sequence];
    }

    public current(): Segment | undefined {
        return this.segments[this.segments.length - 1];
    }

    public snapshot(): WindowSnapshot {
        if (this.cachedSnapshot.version !== this.version) {
            this.cachedSnapshot = Object.freeze({
                segments: Object.freeze(this.segments.map(segment => segment.snapshot())),
                discontinuitySequence: this.evictedDiscontinuities,
                version: this.version,
            });
        }
        return this.cachedSnapshot;
    }

    private requireLive(sequence: number): Segment {
        const segment = this.find(sequence);
        if (!segment) {
            throw new SegmentSequenceError(`Segment ${sequence} is not in the window of stream ${this.streamId}`);
        }
        return segment;
    }

    private signal(event: MutationEvent): void {
        this.version++;
        this.registry.broadcast(this.snapshot(), event);
    }
}
