import { StreamStoppedError } from '../../src/core/errors';
import { HlsStream } from '../../src/core/hlsStream';
import { bytePart, createTestStream, produceSegment } from '../helpers/streams';

describe('HlsStream', () => {
    let stream: HlsStream;

    beforeEach(() => {
        stream = createTestStream();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('has no init section before the first segment', () => {
        expect(stream.initSection()).toBeUndefined();
    });

    it('serves the init section of the newest segment', () => {
        stream.put({ sequence: 0, init: Buffer.from('init-a') });
        stream.put({ sequence: 1, init: Buffer.from('init-b') });

        expect(stream.initSection()?.toString()).toBe('init-b');
    });

    it('offers a master playlist once a segment is sealed', () => {
        produceSegment(stream, 0, 2);
        expect(stream.masterPlaylist()).toBeUndefined();

        stream.seal(0);
        expect(stream.masterPlaylist()).toBe('#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=8\nplaylist.m3u8\n');

        stream.stop();
        expect(() => stream.masterPlaylist()).toThrow(StreamStoppedError);
    });

    it('records the time of the last producer mutation', () => {
        const now = jest.spyOn(Date, 'now');
        now.mockReturnValue(5000);
        stream.put({ sequence: 0, init: Buffer.from('test-init') });
        expect(stream.lastActivity).toBe(5000);

        now.mockReturnValue(7000);
        stream.appendPart(0, bytePart());
        expect(stream.lastActivity).toBe(7000);

        now.mockReturnValue(9000);
        stream.seal(0);
        expect(stream.lastActivity).toBe(9000);
    });

    it('refuses producer mutations once stopped', () => {
        produceSegment(stream, 0, 1);
        stream.stop();

        expect(stream.stopped).toBe(true);
        expect(() => stream.appendPart(0, bytePart())).toThrow(StreamStoppedError);
        expect(() => stream.seal(0)).toThrow(StreamStoppedError);
        expect(() => stream.put({ sequence: 1, init: Buffer.from('test-init') })).toThrow(StreamStoppedError);
    });

    it('releases pending segment requests on stop', async () => {
        produceSegment(stream, 0, 1);
        const request = stream.segment(0, { start: 1, end: 10 });
        expect(stream.pendingWaiters).toBe(1);

        stream.stop();

        await expect(request).rejects.toThrow(StreamStoppedError);
        await expect(stream.segment(0, undefined)).rejects.toThrow(StreamStoppedError);
        expect(stream.pendingWaiters).toBe(0);
    });
});
