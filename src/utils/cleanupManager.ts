import { Logger } from 'winston';
import { HlsStream } from '../core/hlsStream';
import logger from './logger';

export class CleanupManager {
    private streams: Map<string, HlsStream>;
    private idleTimeoutMs: number;
    private cleanupIntervalMs: number;
    private isEnabled: boolean;
    private intervalId: NodeJS.Timeout | null = null;
    private logger: Logger;

    constructor(
        streams: Map<string, HlsStream>,
        options: {
            isEnabled?: boolean;
            idleTimeoutMs?: number;
            cleanupIntervalMs?: number;
            loggerInstance?: Logger;
        } = {}
    ) {
        this.streams = streams;
        this.isEnabled = options.isEnabled ?? false;
        this.idleTimeoutMs = options.idleTimeoutMs ?? 600000; // 10 minutes
        this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60000; // 1 minute
        this.logger = options.loggerInstance || logger;
    }

    public start(): void {
        if (!this.isEnabled) {
            this.logger.info('Idle stream cleanup is disabled');
            return;
        }

        this.logger.info(`Starting idle stream cleanup. Idle timeout: ${this.idleTimeoutMs / 60000} minutes, Interval: ${this.cleanupIntervalMs / 60000} minutes`);
        this.intervalId = setInterval(() => this.removeIdleStreams(), this.cleanupIntervalMs);
    }

    public stop(): void {
        if (this.intervalId) {
            clearInterval(this.intervalId);
            this.intervalId = null;
            this.logger.info('Idle stream cleanup stopped');
        }
    }

    /** Stops and forgets every stream whose producer has been silent too long. Returns their ids. */
    public removeIdleStreams(now: number = Date.now()): string[] {
        const cutoffTime = now - this.idleTimeoutMs;
        const removed: string[] = [];

        for (const [streamId, stream] of this.streams) {
            if (stream.lastActivity < cutoffTime) {
                stream.stop();
                this.streams.delete(streamId);
                removed.push(streamId);
                this.logger.info(`[${streamId}] Removed after ${((now - stream.lastActivity) / 1000).toFixed(0)}s without producer activity`);
            }
        }

        if (removed.length === 0) {
            this.logger.debug('Cleanup complete. No idle streams.');
        }
        return removed;
    }
}
