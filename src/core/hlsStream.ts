import { Logger } from 'winston';
import { ByteRange, NewSegment, Part, PlaylistRequest, RenderedPlaylist, SegmentResponse, WindowSnapshot } from '../types';
import { BlockingRequestDispatcher } from './blockingRequestDispatcher';
import { ByteRangeServer } from './byteRangeServer';
import { StreamStoppedError } from './errors';
import { averageBandwidth, renderMasterPlaylist } from './playlistGenerator';
import { SegmentPartBuffer } from './segmentPartBuffer';
import { StreamSettings } from './streamSettings';
import { WaiterRegistry } from './waiterRegistry';
import { lastSegment } from './windowSnapshot';
import logger from '../utils/logger';

export interface HlsStreamOptions {
    settings: StreamSettings;
    windowSize: number;
    loggerInstance?: Logger;
}

/**
 * One live stream: the producer-facing mutations (`put`, `appendPart`,
 * `seal`) and the reader-facing requests (playlist, segment bytes, init).
 */
export class HlsStream {
    public readonly id: string;
    public readonly settings: StreamSettings;
    private readonly buffer: SegmentPartBuffer;
    private readonly registry: WaiterRegistry;
    private readonly dispatcher: BlockingRequestDispatcher;
    private readonly rangeServer: ByteRangeServer;
    private logger: Logger;
    private stoppedFlag = false;
    private lastProducedAt: number;

    constructor(id: string, options: HlsStreamOptions) {
        this.id = id;
        this.settings = options.settings;
        this.logger = options.loggerInstance || logger;
        this.registry = new WaiterRegistry(id, this.logger);
        this.buffer = new SegmentPartBuffer(id, options.windowSize, this.registry, this.logger);
        this.dispatcher = new BlockingRequestDispatcher(id, this.buffer, this.registry, this.settings, this.logger);
        this.rangeServer = new ByteRangeServer(id, this.buffer, this.registry, this.settings, this.logger);
        this.lastProducedAt = Date.now();
    }

    public get stopped(): boolean {
        return this.stoppedFlag;
    }

    /** Time of the last producer mutation, in epoch milliseconds. */
    public get lastActivity(): number {
        return this.lastProducedAt;
    }

    public get pendingWaiters(): number {
        return this.registry.size;
    }

    public pendingByKey(): Map<string, number> {
        return this.registry.pendingByKey();
    }

    public put(segment: NewSegment): void {
        this.ensureRunning();
        this.buffer.put(segment);
        this.lastProducedAt = Date.now();
    }

    public appendPart(sequence: number, part: Part, discontinuity = false): void {
        this.ensureRunning();
        this.buffer.appendPart(sequence, part, discontinuity);
        this.lastProducedAt = Date.now();
    }

    public seal(sequence: number, duration?: number): void {
        this.ensureRunning();
        this.buffer.seal(sequence, duration);
        this.lastProducedAt = Date.now();
    }

    public snapshot(): WindowSnapshot {
        return this.buffer.snapshot();
    }

    public playlist(request: PlaylistRequest, signal?: AbortSignal): Promise<RenderedPlaylist> {
        if (this.stoppedFlag) {
            return Promise.reject(new StreamStoppedError(this.id));
        }
        return this.dispatcher.dispatch(request, signal);
    }

    public segment(sequence: number, range: ByteRange | undefined, signal?: AbortSignal): Promise<SegmentResponse> {
        if (this.stoppedFlag) {
            return Promise.reject(new StreamStoppedError(this.id));
        }
        return this.rangeServer.serve(sequence, range, signal);
    }

    /** Master playlist, or undefined until a segment with a duration has been sealed. */
    public masterPlaylist(): string | undefined {
        this.ensureRunning();
        const window = this.buffer.snapshot();
        return averageBandwidth(window) === undefined ? undefined : renderMasterPlaylist(window);
    }

    /** Init section of the newest segment, if any. */
    public initSection(): Buffer | undefined {
        return lastSegment(this.buffer.snapshot())?.init;
    }

    /** Stops the stream. Parked requests and all later requests get 404. */
    public stop(): void {
        if (this.stoppedFlag) {
            return;
        }
        this.stoppedFlag = true;
        const pending = this.registry.size;
        this.registry.close(new StreamStoppedError(this.id));
        this.logger.info(`[${this.id}] Stream stopped (${pending} pending request(s) released)`);
    }

    private ensureRunning(): void {
        if (this.stoppedFlag) {
            throw new StreamStoppedError(this.id);
        }
    }
}
