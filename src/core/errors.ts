/**
 * Error taxonomy of the live buffer. Each reader-facing error carries the HTTP
 * status it maps to; producer errors carry 409 and are only ever returned to
 * the ingest side.
 */
export class StreamError extends Error {
    public readonly statusCode: number;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
    }
}

/** Malformed combination of delivery directives, e.g. `_HLS_part` without `_HLS_msn`. */
export class ProtocolViolationError extends StreamError {
    constructor(message: string) {
        super(message, 400);
    }
}

/** Blocking request too far ahead of the live edge. */
export class OutOfRangeRequestError extends StreamError {
    constructor(message: string) {
        super(message, 400);
    }
}

export class StaleOrEvictedDataError extends StreamError {
    public readonly sequence: number;

    constructor(sequence: number) {
        super(`Segment ${sequence} is no longer in the window`, 404);
        this.sequence = sequence;
    }
}

export class SegmentNotFoundError extends StreamError {
    public readonly sequence: number;

    constructor(sequence: number) {
        super(`Segment ${sequence} does not exist`, 404);
        this.sequence = sequence;
    }
}

export class StreamStoppedError extends StreamError {
    constructor(streamId: string) {
        super(`Stream ${streamId} has stopped`, 404);
    }
}

export class RangeNotSatisfiableError extends StreamError {
    public readonly dataSize: number;

    constructor(start: number, dataSize: number, message?: string) {
        super(message ?? `Range start ${start} is beyond the ${dataSize} available bytes`, 416);
        this.dataSize = dataSize;
    }
}

export class SealedSegmentError extends StreamError {
    constructor(sequence: number) {
        super(`Segment ${sequence} is already sealed`, 409);
    }
}

export class SegmentSequenceError extends StreamError {
    constructor(message: string) {
        super(message, 409);
    }
}

/** The client went away while its request was parked. Nothing is sent back. */
export class RequestAbandonedError extends Error {
    constructor() {
        super('Request abandoned by client');
        this.name = 'RequestAbandonedError';
    }
}
