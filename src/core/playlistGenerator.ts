import { SegmentSnapshot, WindowSnapshot } from '../types';
import { StreamSettings } from './streamSettings';
import { firstSegment, lastSegment } from './windowSnapshot';

export const INIT_URI = 'init.mp4';

export function segmentUri(sequence: number): string {
    return `./segment/${sequence}.m4s`;
}

function renderSegment(segment: SegmentSnapshot): string[] {
    const lines: string[] = [];
    if (segment.discontinuity) {
        lines.push('#EXT-X-DISCONTINUITY');
    }
    if (segment.complete && segment.duration !== undefined) {
        lines.push(
            `#EXT-X-PROGRAM-DATE-TIME:${segment.startTime.toISOString()}`,
            `#EXTINF:${segment.duration.toFixed(3)},`,
            segmentUri(segment.sequence)
        );
        return lines;
    }
    const uri = segmentUri(segment.sequence);
    for (const { offset, part } of segment.parts) {
        lines.push(
            `#EXT-X-PART:DURATION=${part.duration.toFixed(3)},URI="${uri}",BYTERANGE="${part.data.length}@${offset}"`
            + (part.independent ? ',INDEPENDENT=YES' : '')
        );
    }
    return lines;
}

// The next part lives in the open segment, or starts the following one.
function renderPreloadHint(segment: SegmentSnapshot): string {
    const sequence = segment.complete ? segment.sequence + 1 : segment.sequence;
    const start = segment.complete ? 0 : segment.dataSize;
    return `#EXT-X-PRELOAD-HINT:TYPE=PART,URI="${segmentUri(sequence)}",BYTERANGE-START=${start}`;
}

/**
 * Renders the LL-HLS media playlist for a window snapshot. Sealed segments get
 * a full entry, the open segment gets one EXT-X-PART line per appended part,
 * and a single preload hint points at the next part.
 */
export function renderPlaylist(window: WindowSnapshot, settings: StreamSettings): string {
    const first = firstSegment(window);
    const last = lastSegment(window);
    if (!first || !last) {
        throw new Error('Cannot render a playlist for an empty window');
    }

    const lines = [
        '#EXTM3U',
        '#EXT-X-VERSION:6',
        '#EXT-X-INDEPENDENT-SEGMENTS',
        `#EXT-X-MAP:URI="${INIT_URI}"`,
        `#EXT-X-TARGETDURATION:${settings.targetDuration}`,
        `#EXT-X-MEDIA-SEQUENCE:${first.sequence}`,
        `#EXT-X-DISCONTINUITY-SEQUENCE:${window.discontinuitySequence}`,
        `#EXT-X-PART-INF:PART-TARGET=${settings.partTargetDuration.toFixed(3)}`,
        `#EXT-X-SERVER-CONTROL:CAN-BLOCK-RELOAD=YES,PART-HOLD-BACK=${settings.partHoldBack.toFixed(3)}`,
        `#EXT-X-START:TIME-OFFSET=-${settings.startTimeOffset.toFixed(3)},PRECISE=YES`,
    ];

    for (const segment of window.segments) {
        lines.push(...renderSegment(segment));
    }
    lines.push(renderPreloadHint(last));

    return lines.join('\n') + '\n';
}

export const MEDIA_PLAYLIST_URI = 'playlist.m3u8';

/** Average bits per second over the sealed segments with a positive duration. */
export function averageBandwidth(window: WindowSnapshot): number | undefined {
    let bytes = 0;
    let seconds = 0;
    for (const segment of window.segments) {
        if (segment.complete && segment.duration !== undefined && segment.duration > 0) {
            bytes += segment.dataSize;
            seconds += segment.duration;
        }
    }
    return seconds > 0 ? Math.round((bytes * 8) / seconds) : undefined;
}

/** Single-variant master playlist pointing at the media playlist. */
export function renderMasterPlaylist(window: WindowSnapshot): string {
    const bandwidth = averageBandwidth(window);
    if (bandwidth === undefined) {
        throw new Error('Cannot render a master playlist before a segment is sealed');
    }
    return ['#EXTM3U', `#EXT-X-STREAM-INF:BANDWIDTH=${bandwidth}`, MEDIA_PLAYLIST_URI].join('\n') + '\n';
}
