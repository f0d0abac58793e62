import { Response } from 'express';
import { Logger } from 'winston';
import { ProtocolViolationError, RangeNotSatisfiableError, RequestAbandonedError, StreamError } from '../core/errors';

/**
 * Aborts when the client disconnects before a response was written, so a
 * parked request can drop its registration.
 */
export function abortOnClose(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) {
            controller.abort();
        }
    });
    return controller.signal;
}

export function readIntegerParam(query: Record<string, unknown>, name: string): number | undefined {
    const value = query[name];
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'string' || !/^\d+$/.test(value)) {
        throw new ProtocolViolationError(`${name} must be a non-negative integer`);
    }
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed)) {
        throw new ProtocolViolationError(`${name} is out of range`);
    }
    return parsed;
}

export function readDurationParam(query: Record<string, unknown>, name: string): number | undefined {
    const value = query[name];
    if (value === undefined) {
        return undefined;
    }
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new ProtocolViolationError(`${name} must be a non-negative number of seconds`);
    }
    return parsed;
}

export function readBooleanParam(query: Record<string, unknown>, name: string): boolean {
    const value = query[name];
    return value === '1' || value === 'true' || value === 'yes';
}

/** Writes the status of a stream error, or 500 for anything unexpected. */
export function sendStreamError(
    res: Response,
    error: unknown,
    logger: Logger,
    context: string,
    cacheSeconds?: number
): void {
    if (error instanceof RequestAbandonedError) {
        logger.debug(`${context}: client disconnected while waiting`);
        return;
    }
    if (res.headersSent) {
        logger.error(`${context}: failed after headers were sent`, error);
        return;
    }
    if (error instanceof StreamError) {
        logger.debug(`${context}: ${error.statusCode} ${error.message}`);
        if (cacheSeconds !== undefined) {
            res.set('Cache-Control', `max-age=${cacheSeconds}`);
        }
        if (error instanceof RangeNotSatisfiableError) {
            res.set('Content-Range', `bytes */${error.dataSize}`);
        }
        res.status(error.statusCode).send(error.message);
        return;
    }
    logger.error(`${context}: unexpected error`, error);
    res.status(500).send('Internal Server Error');
}
