import fs from 'fs';
import path from 'path';
import { Logger } from 'winston';
import { HlsStream } from '../core/hlsStream';
import { firstSegment, lastSegment } from '../core/windowSnapshot';
import logger from './logger';

export interface StreamMetrics {
    streamId: string;
    stopped: boolean;
    firstSequence: number | undefined;
    lastSequence: number | undefined;
    segmentCount: number;
    sealedSegments: number;
    currentPartCount: number;
    totalBytes: number;
    sealedDuration: number; // seconds
    bitrate: number;        // bits per second over sealed segments
    idleSeconds: number;
    pendingWaiters: Map<string, number>;
}

export class ReportGenerator {
    private streams: Map<string, HlsStream>;
    private logger: Logger;

    constructor(streams: Map<string, HlsStream>, loggerInstance?: Logger) {
        this.streams = streams;
        this.logger = loggerInstance || logger;
    }

    public calculateStreamMetrics(stream: HlsStream, now: number = Date.now()): StreamMetrics {
        const window = stream.snapshot();
        const sealed = window.segments.filter(segment => segment.complete);
        const sealedBytes = sealed.reduce((sum, segment) => sum + segment.dataSize, 0);
        const sealedDuration = sealed.reduce((sum, segment) => sum + (segment.duration ?? 0), 0);
        const newest = lastSegment(window);

        return {
            streamId: stream.id,
            stopped: stream.stopped,
            firstSequence: firstSegment(window)?.sequence,
            lastSequence: newest?.sequence,
            segmentCount: window.segments.length,
            sealedSegments: sealed.length,
            currentPartCount: newest && !newest.complete ? newest.parts.length : 0,
            totalBytes: window.segments.reduce((sum, segment) => sum + segment.dataSize, 0),
            sealedDuration,
            bitrate: sealedDuration > 0 ? (sealedBytes * 8) / sealedDuration : 0,
            idleSeconds: Math.max(0, (now - stream.lastActivity) / 1000),
            pendingWaiters: stream.pendingByKey(),
        };
    }

    private formatBytes(bytes: number): string {
        const units = ['B', 'KB', 'MB', 'GB'];
        let size = bytes;
        let unitIndex = 0;
        while (size >= 1024 && unitIndex < units.length - 1) {
            size /= 1024;
            unitIndex++;
        }
        return `${size.toFixed(2)} ${units[unitIndex]}`;
    }

    private formatBitrate(bps: number): string {
        const units = ['bps', 'Kbps', 'Mbps', 'Gbps'];
        let rate = bps;
        let unitIndex = 0;
        while (rate >= 1000 && unitIndex < units.length - 1) {
            rate /= 1000;
            unitIndex++;
        }
        return `${rate.toFixed(2)} ${units[unitIndex]}`;
    }

    public generateReport(now: number = Date.now()): string {
        const metrics = Array.from(this.streams.values()).map(stream => this.calculateStreamMetrics(stream, now));
        const totalBytes = metrics.reduce((sum, metric) => sum + metric.totalBytes, 0);
        const totalWaiters = metrics.reduce(
            (sum, metric) => sum + Array.from(metric.pendingWaiters.values()).reduce((a, b) => a + b, 0),
            0
        );

        const report = [
            '=== Live Buffer Report ===',
            `Generated at: ${new Date(now).toISOString()}`,
            `Active streams: ${metrics.length}`,
            `Total data buffered: ${this.formatBytes(totalBytes)}`,
            `Pending requests: ${totalWaiters}`,
            '',
            '=== Streams ===',
        ];

        for (const metric of metrics) {
            const windowRange = metric.firstSequence === undefined
                ? 'empty'
                : `${metric.firstSequence}-${metric.lastSequence}`;

            report.push(
                `Stream: ${metric.streamId}${metric.stopped ? ' (stopped)' : ''}`,
                `Window: ${windowRange}`,
                `Segments: ${metric.segmentCount} (${metric.sealedSegments} sealed)`,
                `Parts in open segment: ${metric.currentPartCount}`,
                `Data buffered: ${this.formatBytes(metric.totalBytes)}`,
                `Bitrate: ${this.formatBitrate(metric.bitrate)}`,
                `Idle: ${metric.idleSeconds.toFixed(2)} seconds`
            );

            if (metric.pendingWaiters.size === 0) {
                report.push('Pending requests: none');
            } else {
                report.push('Pending requests:');
                for (const [key, count] of metric.pendingWaiters) {
                    report.push(`  ${key}: ${count}`);
                }
            }
            report.push('---');
        }

        return report.join('\n');
    }

    /** Appends a timestamped report to `reportPath`, creating the file and its directory on first use. */
    public saveReport(reportPath: string): void {
        try {
            const timestampedReport = [
                '\n\n========================================',
                `Live Buffer Report - ${new Date().toISOString()}`,
                '========================================\n',
                this.generateReport(),
            ].join('\n');

            fs.mkdirSync(path.dirname(reportPath), { recursive: true });
            if (fs.existsSync(reportPath)) {
                fs.appendFileSync(reportPath, timestampedReport);
                this.logger.info(`Report appended to: ${reportPath}`);
            } else {
                fs.writeFileSync(reportPath, timestampedReport);
                this.logger.info(`Report created at: ${reportPath}`);
            }
        } catch (error) {
            this.logger.error('Failed to save report:', error);
        }
    }
}
