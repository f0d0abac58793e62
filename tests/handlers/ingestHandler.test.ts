import { HlsStream } from '../../src/core/hlsStream';
import { IngestHandler } from '../../src/handlers/ingestHandler';
import { asResponse, createMockRequest, createMockResponse } from '../helpers/express';

const streamingConfig = { segmentDuration: 4, partDuration: 0.5, windowSize: 3 };

describe('IngestHandler', () => {
    let streams: Map<string, HlsStream>;
    let handler: IngestHandler;

    beforeEach(() => {
        streams = new Map();
        handler = new IngestHandler(streams, streamingConfig);
    });

    function putSegment(sequence: string, query: Record<string, string> = {}, body = Buffer.from('test-init')) {
        const res = createMockResponse();
        handler.handlePutSegment(
            createMockRequest({ params: { streamId: 'test-stream', sequence }, query, rawBody: body }),
            asResponse(res)
        );
        return res;
    }

    function putPart(sequence: string, query: Record<string, string>, body = Buffer.from('abc')) {
        const res = createMockResponse();
        handler.handlePutPart(
            createMockRequest({ params: { streamId: 'test-stream', sequence }, query, rawBody: body }),
            asResponse(res)
        );
        return res;
    }

    function seal(sequence: string, query: Record<string, string> = {}) {
        const res = createMockResponse();
        handler.handleSeal(createMockRequest({ params: { streamId: 'test-stream', sequence }, query }), asResponse(res));
        return res;
    }

    it('creates the stream on its first segment', () => {
        const res = putSegment('0', { startTime: '2024-01-01T00:00:00.000Z' });

        expect(res.status).toHaveBeenCalledWith(201);
        const stream = streams.get('test-stream');
        expect(stream?.settings.targetDuration).toBe(4);
        expect(stream?.settings.partTargetDuration).toBe(0.5);
        expect(stream?.snapshot().segments[0].startTime.toISOString()).toBe('2024-01-01T00:00:00.000Z');
        expect(stream?.initSection()?.toString()).toBe('test-init');
    });

    it('rejects a segment without an init section', () => {
        const res = putSegment('0', {}, Buffer.alloc(0));

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.send).toHaveBeenCalledWith('Bad Request: Missing body');
        expect(streams.size).toBe(0);
    });

    it('rejects an invalid start time', () => {
        const res = putSegment('0', { startTime: 'yesterday' });

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.send).toHaveBeenCalledWith('startTime must be an ISO-8601 timestamp');
    });

    it('rejects a segment that skips a sequence number', () => {
        putSegment('0');
        const res = putSegment('2');

        expect(res.status).toHaveBeenCalledWith(409);
        expect(res.send).toHaveBeenCalledWith('Segment 2 does not follow segment 0');
    });

    it('appends parts and seals the segment', () => {
        putSegment('0', { discontinuity: 'true' });

        expect(putPart('0', { duration: '0.5', independent: 'true' }).status).toHaveBeenCalledWith(200);
        expect(putPart('0', { duration: '0.5' }, Buffer.from('de')).status).toHaveBeenCalledWith(200);
        expect(seal('0').status).toHaveBeenCalledWith(200);

        const segment = streams.get('test-stream')?.snapshot().segments[0];
        expect(segment?.discontinuity).toBe(true);
        expect(segment?.parts.map(entry => [entry.offset, entry.part.independent])).toEqual([[0, true], [3, false]]);
        expect(segment?.duration).toBe(1);
    });

    it('seals with an explicit duration', () => {
        putSegment('0');
        putPart('0', { duration: '0.5' });

        seal('0', { duration: '0.75' });

        expect(streams.get('test-stream')?.snapshot().segments[0].duration).toBe(0.75);
    });

    it('requires a part duration', () => {
        putSegment('0');
        const res = putPart('0', {});

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.send).toHaveBeenCalledWith('duration is required');
    });

    it('rejects a negative part duration', () => {
        putSegment('0');
        const res = putPart('0', { duration: '-1' });

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.send).toHaveBeenCalledWith('duration must be a non-negative number of seconds');
    });

    it('answers 409 for parts after the seal', () => {
        putSegment('0');
        seal('0');
        const res = putPart('0', { duration: '0.5' });

        expect(res.status).toHaveBeenCalledWith(409);
        expect(res.send).toHaveBeenCalledWith('Segment 0 is already sealed');
    });

    it('answers 404 for parts of an unknown stream', () => {
        const res = putPart('0', { duration: '0.5' });

        expect(res.status).toHaveBeenCalledWith(404);
        expect(res.send).toHaveBeenCalledWith('Stream not found');
    });

    it('stops and removes a stream on delete', async () => {
        putSegment('0');
        const stream = streams.get('test-stream');
        const pending = stream?.playlist({ msn: 1 });
        const res = createMockResponse();

        handler.handleDelete(createMockRequest({ params: { streamId: 'test-stream' } }), asResponse(res));

        expect(res.status).toHaveBeenCalledWith(200);
        expect(streams.has('test-stream')).toBe(false);
        expect(stream?.stopped).toBe(true);
        await expect(pending).rejects.toThrow('Stream test-stream has stopped');
    });
});
