import { Logger } from 'winston';
import { PlaylistRequest, RenderedPlaylist, WaitTarget, WindowSnapshot } from '../types';
import {
    OutOfRangeRequestError,
    ProtocolViolationError,
    StaleOrEvictedDataError,
    StreamError,
} from './errors';
import { renderPlaylist } from './playlistGenerator';
import { SegmentPartBuffer } from './segmentPartBuffer';
import { StreamSettings } from './streamSettings';
import { WaiterRegistry } from './waiterRegistry';
import { findSegment, isEvicted, lastSegment, lastSequence } from './windowSnapshot';
import logger from '../utils/logger';

export type PlaylistPlan =
    | { state: 'immediate-reject'; error: StreamError }
    | { state: 'immediate-serve' }
    | { state: 'waiting'; target: WaitTarget };

/**
 * Decides what to do with a playlist request, against one snapshot:
 * reject it now, serve it now, or park it until a wait target holds.
 */
export function planPlaylistRequest(
    request: PlaylistRequest,
    window: WindowSnapshot,
    settings: StreamSettings
): PlaylistPlan {
    const { msn, part } = request;

    if (msn === undefined) {
        if (part !== undefined) {
            return {
                state: 'immediate-reject',
                error: new ProtocolViolationError('_HLS_part requires _HLS_msn'),
            };
        }
        return window.segments.length > 0 ? { state: 'immediate-serve' } : { state: 'waiting', target: { kind: 'live' } };
    }

    const last = lastSequence(window);
    const limit = settings.hlsAdvancePartLimit;

    if (msn > last + 1) {
        return {
            state: 'immediate-reject',
            error: new OutOfRangeRequestError(`_HLS_msn=${msn} is beyond the next segment ${last + 1}`),
        };
    }
    if (isEvicted(window, msn)) {
        return { state: 'immediate-reject', error: new StaleOrEvictedDataError(msn) };
    }

    if (msn === last + 1) {
        if (part === undefined) {
            return { state: 'waiting', target: { kind: 'segment', sequence: msn } };
        }
        // Segment msn has no parts yet, so part 0 is already one past the live edge.
        if (part >= limit - 1) {
            return {
                state: 'immediate-reject',
                error: new OutOfRangeRequestError(`_HLS_part=${part} exceeds the advance part limit of ${limit}`),
            };
        }
        return { state: 'waiting', target: { kind: 'part', sequence: msn, part } };
    }

    const segment = findSegment(window, msn);
    if (!segment) {
        return { state: 'immediate-reject', error: new StaleOrEvictedDataError(msn) };
    }

    if (part === undefined) {
        return segment.complete
            ? { state: 'immediate-serve' }
            : { state: 'waiting', target: { kind: 'complete', sequence: msn } };
    }

    const partCount = segment.parts.length;
    if (msn === last && part >= partCount - 1 + limit) {
        return {
            state: 'immediate-reject',
            error: new OutOfRangeRequestError(
                `_HLS_part=${part} exceeds the last part ${partCount - 1} by the advance part limit of ${limit}`
            ),
        };
    }
    if (part < partCount) {
        return { state: 'immediate-serve' };
    }
    return { state: 'waiting', target: { kind: 'part', sequence: msn, part } };
}

export class BlockingRequestDispatcher {
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
     * Answers a playlist request, parking it first when the requested part or
     * segment does not exist yet. The playlist is rendered from the snapshot
     * that satisfied the wait, so requests released together render the same
     * bytes.
     */
    public async dispatch(request: PlaylistRequest, signal?: AbortSignal): Promise<RenderedPlaylist> {
        const blocking = request.msn !== undefined || request.part !== undefined;
        const window = this.buffer.snapshot();
        const plan = planPlaylistRequest(request, window, this.settings);
        const directives = `msn=${request.msn ?? '-'} part=${request.part ?? '-'}`;

        switch (plan.state) {
            case 'immediate-reject':
                this.logger.debug(`[${this.streamId}] Playlist request ${directives} rejected: ${plan.error.message}`);
                throw plan.error;
            case 'immediate-serve':
                return { body: renderPlaylist(window, this.settings), blocking };
            case 'waiting': {
                this.logger.debug(
                    `[${this.streamId}] Playlist request ${directives} waiting (live edge ${lastSegment(window)?.sequence ?? 'none'})`
                );
                const ready = await this.registry.wait(plan.target, window, signal);
                return { body: renderPlaylist(ready, this.settings), blocking };
            }
        }
    }
}
