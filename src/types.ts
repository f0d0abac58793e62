export interface Part {
    readonly duration: number;      // seconds
    readonly independent: boolean;  // starts with a keyframe
    readonly data: Buffer;
}

export interface PartEntry {
    readonly offset: number; // byte offset inside the parent segment
    readonly part: Part;
}

export interface NewSegment {
    sequence: number;
    init: Buffer;
    startTime?: Date;
    discontinuity?: boolean;
}

/** Frozen view of a segment, safe to hold across later mutations. */
export interface SegmentSnapshot {
    readonly sequence: number;
    readonly init: Buffer;
    readonly startTime: Date;
    readonly discontinuity: boolean;
    readonly parts: readonly PartEntry[];
    readonly dataSize: number;
    readonly duration: number | undefined;
    readonly complete: boolean;
}

export interface WindowSnapshot {
    readonly segments: readonly SegmentSnapshot[];
    readonly discontinuitySequence: number; // discontinuities that left the window
    readonly version: number;               // bumped on every mutation
}

export type MutationEvent = 'put' | 'part' | 'seal';

export type WaitTarget =
    | { kind: 'live' }
    | { kind: 'segment'; sequence: number }
    | { kind: 'complete'; sequence: number }
    | { kind: 'part'; sequence: number; part: number }
    | { kind: 'bytes'; sequence: number; offset: number }
    | { kind: 'production' };

export interface PlaylistRequest {
    msn?: number;
    part?: number;
}

export interface RenderedPlaylist {
    body: string;
    blocking: boolean;
}

/** Inclusive byte range; `end` may be the open-ended sentinel. */
export interface ByteRange {
    start: number;
    end: number;
}

export interface SegmentResponse {
    status: 200 | 206;
    headers: Record<string, string>;
    body: Buffer;
}

declare global {
    namespace Express {
        interface Request {
            /** Request body collected by the raw-body middleware on PUT. */
            rawBody?: Buffer;
        }
    }
}
