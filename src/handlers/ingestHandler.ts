import { Request, Response } from 'express';
import { Logger } from 'winston';
import { ProtocolViolationError } from '../core/errors';
import { HlsStream } from '../core/hlsStream';
import { createPart } from '../core/segment';
import { StreamSettings, createStreamSettings } from '../core/streamSettings';
import { StreamingConfig } from '../utils/configLoader';
import { readBooleanParam, readDurationParam, readIntegerParam, sendStreamError } from './common';
import logger from '../utils/logger';

/**
 * Producer side: segments, parts and seals pushed by the packager. Streams
 * are created on their first segment PUT.
 */
export class IngestHandler {
    private streams: Map<string, HlsStream>;
    private streamingConfig: StreamingConfig;
    private settings: StreamSettings;
    private logger: Logger;

    constructor(streams: Map<string, HlsStream>, streamingConfig: StreamingConfig, loggerInstance?: Logger) {
        this.streams = streams;
        this.streamingConfig = streamingConfig;
        this.settings = createStreamSettings(streamingConfig.segmentDuration, streamingConfig.partDuration);
        this.logger = loggerInstance || logger;
    }

    public handlePutSegment = (req: Request, res: Response): void => {
        const streamId = req.params.streamId;
        const context = `[${streamId}] PUT segment ${req.params.sequence}`;
        const rawBody = req.rawBody;

        if (!rawBody || rawBody.length === 0) {
            this.logger.error(`${context}: empty init section`);
            res.status(400).send('Bad Request: Missing body');
            return;
        }

        try {
            const sequence = this.readSequence(req);
            const startTime = this.readStartTime(req.query.startTime);
            const discontinuity = readBooleanParam(req.query, 'discontinuity');

            const stream = this.streams.get(streamId) ?? this.createStream(streamId);
            stream.put({ sequence, init: rawBody, startTime, discontinuity });
            res.status(201).send('Created');
        } catch (error) {
            sendStreamError(res, error, this.logger, context);
        }
    };

    public handlePutPart = (req: Request, res: Response): void => {
        const streamId = req.params.streamId;
        const context = `[${streamId}] PUT part of segment ${req.params.sequence}`;
        const stream = this.findStream(streamId, res);
        if (!stream) {
            return;
        }

        const rawBody = req.rawBody;
        if (!rawBody || rawBody.length === 0) {
            this.logger.error(`${context}: empty part payload`);
            res.status(400).send('Bad Request: Missing body');
            return;
        }

        try {
            const sequence = this.readSequence(req);
            const duration = readDurationParam(req.query, 'duration');
            if (duration === undefined) {
                throw new ProtocolViolationError('duration is required');
            }
            const part = createPart(duration, readBooleanParam(req.query, 'independent'), rawBody);
            stream.appendPart(sequence, part, readBooleanParam(req.query, 'discontinuity'));
            res.status(200).send('OK');
        } catch (error) {
            sendStreamError(res, error, this.logger, context);
        }
    };

    public handleSeal = (req: Request, res: Response): void => {
        const streamId = req.params.streamId;
        const context = `[${streamId}] Seal segment ${req.params.sequence}`;
        const stream = this.findStream(streamId, res);
        if (!stream) {
            return;
        }

        try {
            stream.seal(this.readSequence(req), readDurationParam(req.query, 'duration'));
            res.status(200).send('OK');
        } catch (error) {
            sendStreamError(res, error, this.logger, context);
        }
    };

    public handleDelete = (req: Request, res: Response): void => {
        const streamId = req.params.streamId;
        const stream = this.findStream(streamId, res);
        if (!stream) {
            return;
        }

        stream.stop();
        this.streams.delete(streamId);
        this.logger.info(`[${streamId}] Stream removed`);
        res.status(200).send('OK');
    };

    private createStream(streamId: string): HlsStream {
        const stream = new HlsStream(streamId, {
            settings: this.settings,
            windowSize: this.streamingConfig.windowSize,
            loggerInstance: this.logger,
        });
        this.streams.set(streamId, stream);
        this.logger.info(
            `[${streamId}] Stream created (target ${this.settings.targetDuration}s, part target ${this.settings.partTargetDuration.toFixed(3)}s, window ${this.streamingConfig.windowSize})`
        );
        return stream;
    }

    private findStream(streamId: string, res: Response): HlsStream | undefined {
        const stream = this.streams.get(streamId);
        if (!stream) {
            this.logger.warn(`[${streamId}] Producer request for unknown stream`);
            res.status(404).send('Stream not found');
            return undefined;
        }
        return stream;
    }

    private readSequence(req: Request): number {
        const sequence = readIntegerParam(req.params, 'sequence');
        if (sequence === undefined) {
            throw new ProtocolViolationError('sequence is required');
        }
        return sequence;
    }

    private readStartTime(value: unknown): Date | undefined {
        if (value === undefined) {
            return undefined;
        }
        const startTime = typeof value === 'string' ? new Date(value) : new Date(NaN);
        if (Number.isNaN(startTime.getTime())) {
            throw new ProtocolViolationError('startTime must be an ISO-8601 timestamp');
        }
        return startTime;
    }
}
