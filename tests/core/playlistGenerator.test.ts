import { averageBandwidth, renderMasterPlaylist, renderPlaylist, segmentUri } from '../../src/core/playlistGenerator';
import { createPart } from '../../src/core/segment';
import { SegmentPartBuffer } from '../../src/core/segmentPartBuffer';
import { createStreamSettings } from '../../src/core/streamSettings';
import { WaiterRegistry } from '../../src/core/waiterRegistry';
import { EMPTY_WINDOW } from '../../src/core/windowSnapshot';

const settings = createStreamSettings(10, 1);
const init = Buffer.from('test-init');
const startTime = new Date('2024-01-01T00:00:00.000Z');

const HEADER = [
    '#EXTM3U',
    '#EXT-X-VERSION:6',
    '#EXT-X-INDEPENDENT-SEGMENTS',
    '#EXT-X-MAP:URI="init.mp4"',
    '#EXT-X-TARGETDURATION:10',
];

const SERVER_LINES = [
    '#EXT-X-PART-INF:PART-TARGET=1.000',
    '#EXT-X-SERVER-CONTROL:CAN-BLOCK-RELOAD=YES,PART-HOLD-BACK=2.000',
    '#EXT-X-START:TIME-OFFSET=-2.000,PRECISE=YES',
];

describe('renderPlaylist', () => {
    let buffer: SegmentPartBuffer;

    beforeEach(() => {
        buffer = new SegmentPartBuffer('test-stream', 3, new WaiterRegistry('test-stream'));
    });

    it('renders sealed segments in full and the open segment as parts', () => {
        buffer.put({ sequence: 0, init, startTime });
        buffer.appendPart(0, createPart(1, true, Buffer.from('a')));
        buffer.appendPart(0, createPart(1, false, Buffer.from('b')));
        buffer.seal(0);
        buffer.put({ sequence: 1, init, startTime });
        buffer.appendPart(1, createPart(0.5, true, Buffer.from('cd')));
        buffer.appendPart(1, createPart(0.5, false, Buffer.from('efg')));

        expect(renderPlaylist(buffer.snapshot(), settings)).toBe([
            ...HEADER,
            '#EXT-X-MEDIA-SEQUENCE:0',
            '#EXT-X-DISCONTINUITY-SEQUENCE:0',
            ...SERVER_LINES,
            '#EXT-X-PROGRAM-DATE-TIME:2024-01-01T00:00:00.000Z',
            '#EXTINF:2.000,',
            './segment/0.m4s',
            '#EXT-X-PART:DURATION=0.500,URI="./segment/1.m4s",BYTERANGE="2@0",INDEPENDENT=YES',
            '#EXT-X-PART:DURATION=0.500,URI="./segment/1.m4s",BYTERANGE="3@2"',
            '#EXT-X-PRELOAD-HINT:TYPE=PART,URI="./segment/1.m4s",BYTERANGE-START=5',
            '',
        ].join('\n'));
    });

    it('points the preload hint at the next segment when the last one is sealed', () => {
        buffer.put({ sequence: 4, init, startTime });
        buffer.appendPart(4, createPart(1, true, Buffer.from('a')));
        buffer.seal(4, 1.5);

        expect(renderPlaylist(buffer.snapshot(), settings)).toBe([
            ...HEADER,
            '#EXT-X-MEDIA-SEQUENCE:4',
            '#EXT-X-DISCONTINUITY-SEQUENCE:0',
            ...SERVER_LINES,
            '#EXT-X-PROGRAM-DATE-TIME:2024-01-01T00:00:00.000Z',
            '#EXTINF:1.500,',
            './segment/4.m4s',
            '#EXT-X-PRELOAD-HINT:TYPE=PART,URI="./segment/5.m4s",BYTERANGE-START=0',
            '',
        ].join('\n'));
    });

    it('marks discontinuities and counts the ones evicted', () => {
        buffer.put({ sequence: 0, init, startTime, discontinuity: true });
        buffer.put({ sequence: 1, init, startTime });
        buffer.put({ sequence: 2, init, startTime });
        buffer.put({ sequence: 3, init, startTime, discontinuity: true });

        const lines = renderPlaylist(buffer.snapshot(), settings).split('\n');

        expect(lines).toContain('#EXT-X-MEDIA-SEQUENCE:1');
        expect(lines).toContain('#EXT-X-DISCONTINUITY-SEQUENCE:1');
        expect(lines.filter(line => line === '#EXT-X-DISCONTINUITY')).toHaveLength(1);
        expect(lines.slice(-3)).toEqual([
            '#EXT-X-DISCONTINUITY',
            '#EXT-X-PRELOAD-HINT:TYPE=PART,URI="./segment/3.m4s",BYTERANGE-START=0',
            '',
        ]);
    });

    it('refuses to render an empty window', () => {
        expect(() => renderPlaylist(EMPTY_WINDOW, settings)).toThrow('Cannot render a playlist for an empty window');
    });
});

describe('renderMasterPlaylist', () => {
    let buffer: SegmentPartBuffer;

    beforeEach(() => {
        buffer = new SegmentPartBuffer('test-stream', 3, new WaiterRegistry('test-stream'));
        buffer.put({ sequence: 0, init, startTime });
        buffer.appendPart(0, createPart(2, true, Buffer.alloc(1000)));
    });

    it('advertises the average bandwidth of the sealed segments', () => {
        buffer.seal(0);
        buffer.put({ sequence: 1, init, startTime });
        buffer.appendPart(1, createPart(1, true, Buffer.alloc(3000)));
        buffer.seal(1, 2);
        buffer.put({ sequence: 2, init, startTime });
        buffer.appendPart(2, createPart(1, true, Buffer.alloc(500)));

        expect(renderMasterPlaylist(buffer.snapshot())).toBe(
            '#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=8000\nplaylist.m3u8\n'
        );
    });

    it('refuses to render before a segment is sealed', () => {
        expect(averageBandwidth(buffer.snapshot())).toBeUndefined();
        expect(() => renderMasterPlaylist(buffer.snapshot())).toThrow(
            'Cannot render a master playlist before a segment is sealed'
        );
    });

    it('ignores segments sealed without a duration', () => {
        const empty = new SegmentPartBuffer('test-stream', 3, new WaiterRegistry('test-stream'));
        empty.put({ sequence: 0, init, startTime });
        empty.put({ sequence: 1, init, startTime });

        expect(averageBandwidth(empty.snapshot())).toBeUndefined();
    });
});

describe('segmentUri', () => {
    it('addresses segments relative to the playlist', () => {
        expect(segmentUri(12)).toBe('./segment/12.m4s');
    });
});
