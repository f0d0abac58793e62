import { SegmentSnapshot, WindowSnapshot } from '../types';

export const EMPTY_WINDOW: WindowSnapshot = Object.freeze({
    segments: Object.freeze([]),
    discontinuitySequence: 0,
    version: 0,
});

export function firstSegment(window: WindowSnapshot): SegmentSnapshot | undefined {
    return window.segments[0];
}

export function lastSegment(window: WindowSnapshot): SegmentSnapshot | undefined {
    return window.segments[window.segments.length - 1];
}

/** Sequence of the newest segment, or -1 before the first `put`. */
export function lastSequence(window: WindowSnapshot): number {
    return lastSegment(window)?.sequence ?? -1;
}

// Sequences are contiguous, so the index is a subtraction away.
export function findSegment(window: WindowSnapshot, sequence: number): SegmentSnapshot | undefined {
    const first = firstSegment(window);
    if (!first) {
        return undefined;
    }
    return window.segments[sequence - first.sequence];
}

export function isEvicted(window: WindowSnapshot, sequence: number): boolean {
    const first = firstSegment(window);
    return first !== undefined && sequence < first.sequence;
}
