import { NewSegment, Part, PartEntry, SegmentSnapshot } from '../types';
import { SealedSegmentError } from './errors';

/**
 * A segment while it is owned by the buffer. Parts are stored contiguously and
 * keyed by their byte offset; the duration is set exactly once, when sealed.
 */
export class Segment {
    public readonly sequence: number;
    public readonly init: Buffer;
    public readonly startTime: Date;
    private discontinuityFlag: boolean;
    private readonly partsByOffset = new Map<number, Part>();
    private size = 0;
    private sealedDuration: number | undefined;
    private cachedSnapshot: SegmentSnapshot | undefined;

    constructor(options: NewSegment) {
        this.sequence = options.sequence;
        this.init = options.init;
        this.startTime = options.startTime ?? new Date();
        this.discontinuityFlag = options.discontinuity ?? false;
    }

    public get dataSize(): number {
        return this.size;
    }

    public get partCount(): number {
        return this.partsByOffset.size;
    }

    public get complete(): boolean {
        return this.sealedDuration !== undefined;
    }

    public get duration(): number | undefined {
        return this.sealedDuration;
    }

    public get discontinuity(): boolean {
        return this.discontinuityFlag;
    }

    /** Sum of the durations of the parts appended so far. */
    public get partsDuration(): number {
        let total = 0;
        for (const part of this.partsByOffset.values()) {
            total += part.duration;
        }
        return total;
    }

    /** Appends a part at the next contiguous offset and returns that offset. */
    public addPart(part: Part, discontinuity = false): number {
        if (this.complete) {
            throw new SealedSegmentError(this.sequence);
        }
        const offset = this.size;
        this.partsByOffset.set(offset, part);
        this.size += part.data.length;
        if (discontinuity) {
            this.discontinuityFlag = true;
        }
        this.cachedSnapshot = undefined;
        return offset;
    }

    public seal(duration: number): void {
        if (this.complete) {
            throw new SealedSegmentError(this.sequence);
        }
        this.sealedDuration = duration;
        this.cachedSnapshot = undefined;
    }

    public snapshot(): SegmentSnapshot {
        if (!this.cachedSnapshot) {
            const parts: PartEntry[] = [];
            for (const [offset, part] of this.partsByOffset) {
                parts.push(Object.freeze({ offset, part }));
            }
            this.cachedSnapshot = Object.freeze({
                sequence: this.sequence,
                init: this.init,
                startTime: this.startTime,
                discontinuity: this.discontinuityFlag,
                parts: Object.freeze(parts),
                dataSize: this.size,
                duration: this.sealedDuration,
                complete: this.complete,
            });
        }
        return this.cachedSnapshot;
    }
}

export function createPart(duration: number, independent: boolean, data: Buffer): Part {
    return Object.freeze({ duration, independent, data });
}

/**
 * Copies the bytes in `[start, endExclusive)` out of a segment snapshot.
 * Only the parts overlapping the range are touched.
 */
export function readSegmentBytes(segment: SegmentSnapshot, start: number, endExclusive: number): Buffer {
    const end = Math.min(endExclusive, segment.dataSize);
    if (start >= end) {
        return Buffer.alloc(0);
    }
    const chunks: Buffer[] = [];
    for (const { offset, part } of segment.parts) {
        const partEnd = offset + part.data.length;
        if (partEnd <= start) {
            continue;
        }
        if (offset >= end) {
            break;
        }
        chunks.push(part.data.subarray(Math.max(start - offset, 0), Math.min(end, partEnd) - offset));
    }
    return Buffer.concat(chunks, end - start);
}
