import express, { Express, NextFunction, Request, Response } from 'express';
import { Logger } from 'winston';
import { HlsStream } from './core/hlsStream';
import { IngestHandler } from './handlers/ingestHandler';
import { PlaylistHandler } from './handlers/playlistHandler';
import { SegmentHandler } from './handlers/segmentHandler';
import { StreamingConfig } from './utils/configLoader';
import { ReportGenerator } from './utils/reportGenerator';
import defaultLogger, { reloadLoggerConfig } from './utils/logger';

const VALID_LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export interface AppOptions {
    streams: Map<string, HlsStream>;
    streamingConfig: StreamingConfig;
    reportGenerator: ReportGenerator;
    loggerInstance?: Logger;
}

export function createApp(options: AppOptions): Express {
    const { streams, streamingConfig, reportGenerator } = options;
    const logger = options.loggerInstance || defaultLogger;

    const playlistHandler = new PlaylistHandler(streams, logger);
    const segmentHandler = new SegmentHandler(streams, logger);
    const ingestHandler = new IngestHandler(streams, streamingConfig, logger);

    const app = express();

    // Middleware to get raw body for PUT requests
    app.use((req: Request, res: Response, next: NextFunction) => {
        if (req.method !== 'PUT') {
            next();
            return;
        }
        const data: Buffer[] = [];
        req.on('data', (chunk: Buffer) => {
            data.push(chunk);
        });
        req.on('end', () => {
            req.rawBody = Buffer.concat(data);
            logger.http(`[${req.method}] ${req.originalUrl} - Body length: ${req.rawBody.length}`);
            next();
        });
        req.on('error', next);
    });

    // Log all requests
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.debug(`[${req.method}] ${req.originalUrl} - Range: ${req.get('Range') ?? 'none'}`);
        next();
    });

    // Reader routes
    app.get('/live/:streamId/master_playlist.m3u8', playlistHandler.handleMaster);
    app.get('/live/:streamId/playlist.m3u8', playlistHandler.handleGet);
    app.get('/live/:streamId/init.mp4', segmentHandler.handleInit);
    app.get('/live/:streamId/segment/:sequence(\\d+).m4s', segmentHandler.handleGet);

    // Producer routes
    app.put('/live/:streamId/segment/:sequence(\\d+).m4s', ingestHandler.handlePutSegment);
    app.put('/live/:streamId/segment/:sequence(\\d+)/part', ingestHandler.handlePutPart);
    app.post('/live/:streamId/segment/:sequence(\\d+)/seal', ingestHandler.handleSeal);
    app.delete('/live/:streamId', ingestHandler.handleDelete);

    app.get('/', (req: Request, res: Response) => {
        res.send('LL-HLS live buffer is running.');
    });

    app.get('/report', (req: Request, res: Response) => {
        res.setHeader('Content-Type', 'text/plain');
        res.send(reportGenerator.generateReport());
    });

    app.post('/config/loglevel', (req: Request, res: Response) => {
        const newLogLevel = req.query.level;

        if (typeof newLogLevel !== 'string' || !newLogLevel) {
            res.status(400).json({ error: 'Log level not provided', message: 'Please provide a log level as a query parameter' });
            return;
        }
        if (!VALID_LOG_LEVELS.includes(newLogLevel)) {
            res.status(400).json({
                error: 'Invalid log level',
                message: `Log level must be one of: ${VALID_LOG_LEVELS.join(', ')}`,
            });
            return;
        }

        process.env.LOG_LEVEL = newLogLevel;
        reloadLoggerConfig();

        logger.info(`Log level changed to: ${newLogLevel}`);
        res.status(200).json({ success: true, message: `Log level set to: ${newLogLevel}` });
    });

    // Error handler
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        logger.error('Unhandled error:', err);
        if (res.headersSent) {
            return;
        }
        res.status(500).send('Internal Server Error');
    });

    return app;
}
