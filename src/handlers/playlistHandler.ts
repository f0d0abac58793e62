import { Request, Response } from 'express';
import { Logger } from 'winston';
import { HlsStream } from '../core/hlsStream';
import { PlaylistRequest } from '../types';
import { abortOnClose, readIntegerParam, sendStreamError } from './common';
import logger from '../utils/logger';

export const PLAYLIST_CONTENT_TYPE = 'application/vnd.apple.mpegurl';

export class PlaylistHandler {
    private streams: Map<string, HlsStream>;
    private logger: Logger;

    constructor(streams: Map<string, HlsStream>, loggerInstance?: Logger) {
        this.streams = streams;
        this.logger = loggerInstance || logger;
    }

    public handleGet = async (req: Request, res: Response): Promise<void> => {
        const streamId = req.params.streamId;
        const stream = this.streams.get(streamId);

        if (!stream || stream.stopped) {
            this.logger.warn(`[${streamId}] Playlist requested for unknown or stopped stream`);
            res.status(404).send('Stream not found');
            return;
        }

        const targetDuration = stream.settings.targetDuration;
        let request: PlaylistRequest;
        try {
            request = {
                msn: readIntegerParam(req.query, '_HLS_msn'),
                part: readIntegerParam(req.query, '_HLS_part'),
            };
        } catch (error) {
            sendStreamError(res, error, this.logger, `[${streamId}] Playlist`, targetDuration);
            return;
        }

        const blocking = request.msn !== undefined || request.part !== undefined;
        const signal = abortOnClose(res);

        try {
            const playlist = await stream.playlist(request, signal);
            res.status(200)
                .set({
                    'Content-Type': PLAYLIST_CONTENT_TYPE,
                    'Cache-Control': playlist.blocking ? `max-age=${6 * targetDuration}` : 'no-cache',
                })
                .send(playlist.body);
        } catch (error) {
            sendStreamError(res, error, this.logger, `[${streamId}] Playlist`, (blocking ? 6 : 1) * targetDuration);
        }
    };

    public handleMaster = (req: Request, res: Response): void => {
        const streamId = req.params.streamId;
        const stream = this.streams.get(streamId);

        if (!stream || stream.stopped) {
            this.logger.warn(`[${streamId}] Master playlist requested for unknown or stopped stream`);
            res.status(404).send('Stream not found');
            return;
        }

        const body = stream.masterPlaylist();
        if (body === undefined) {
            this.logger.debug(`[${streamId}] Master playlist requested before the first sealed segment`);
            res.status(404).send('No complete segment yet');
            return;
        }

        res.status(200)
            .set({ 'Content-Type': PLAYLIST_CONTENT_TYPE, 'Cache-Control': 'no-cache' })
            .send(body);
    };
}
