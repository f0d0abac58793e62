import { Request, Response } from 'express';
import { Logger } from 'winston';
import { RangeNotSatisfiableError } from '../core/errors';
import { HlsStream } from '../core/hlsStream';
import { SEGMENT_CONTENT_TYPE } from '../core/byteRangeServer';
import { findSegment } from '../core/windowSnapshot';
import { abortOnClose, readIntegerParam, sendStreamError } from './common';
import { parseRangeHeader } from '../utils/rangeHeader';
import logger from '../utils/logger';

export class SegmentHandler {
    private streams: Map<string, HlsStream>;
    private logger: Logger;

    constructor(streams: Map<string, HlsStream>, loggerInstance?: Logger) {
        this.streams = streams;
        this.logger = loggerInstance || logger;
    }

    public handleGet = async (req: Request, res: Response): Promise<void> => {
        const streamId = req.params.streamId;
        const stream = this.findStream(streamId, res);
        if (!stream) {
            return;
        }

        const targetDuration = stream.settings.targetDuration;
        const context = `[${streamId}] Segment ${req.params.sequence}`;

        let sequence: number;
        try {
            const parsed = readIntegerParam(req.params, 'sequence');
            if (parsed === undefined) {
                res.status(400).send('Bad Request: Missing segment sequence');
                return;
            }
            sequence = parsed;
        } catch (error) {
            sendStreamError(res, error, this.logger, context);
            return;
        }

        const rangeHeader = parseRangeHeader(req.get('Range'));
        if (rangeHeader.kind === 'unsatisfiable') {
            this.logger.debug(`${context}: unsatisfiable range ${req.get('Range')}`);
            const dataSize = findSegment(stream.snapshot(), sequence)?.dataSize ?? 0;
            const error = new RangeNotSatisfiableError(0, dataSize, 'Requested range not satisfiable');
            sendStreamError(res, error, this.logger, context, targetDuration);
            return;
        }
        const range = rangeHeader.kind === 'range' ? rangeHeader.range : undefined;
        const signal = abortOnClose(res);

        try {
            const response = await stream.segment(sequence, range, signal);
            this.logger.debug(`${context}: ${response.status} ${response.body.length} bytes`);
            res.status(response.status).set(response.headers).send(response.body);
        } catch (error) {
            sendStreamError(res, error, this.logger, context, targetDuration);
        }
    };

    public handleInit = (req: Request, res: Response): void => {
        const streamId = req.params.streamId;
        const stream = this.findStream(streamId, res);
        if (!stream) {
            return;
        }

        const init = stream.initSection();
        if (!init) {
            res.status(404).send('Init section not available');
            return;
        }
        res.status(200)
            .set({
                'Content-Type': SEGMENT_CONTENT_TYPE,
                'Cache-Control': `max-age=${6 * stream.settings.targetDuration}`,
            })
            .send(init);
    };

    private findStream(streamId: string, res: Response): HlsStream | undefined {
        const stream = this.streams.get(streamId);
        if (!stream || stream.stopped) {
            this.logger.warn(`[${streamId}] Media requested for unknown or stopped stream`);
            res.status(404).send('Stream not found');
            return undefined;
        }
        return stream;
    }
}
