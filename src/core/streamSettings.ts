export interface StreamSettings {
    readonly segmentDuration: number;
    readonly partDuration: number;
    readonly partTargetDuration: number;
    readonly targetDuration: number;
    readonly hlsAdvancePartLimit: number;
    readonly partHoldBack: number;
    readonly startTimeOffset: number;
}

/**
 * Derives the playlist-level timing values from the nominal durations.
 *
 * PART-TARGET is rendered with millisecond precision, so the nominal part
 * duration is rounded up to the next millisecond. Sub-millisecond float noise
 * (0.333 * 1000 = 333.00000000000006) is removed before rounding up.
 */
export function createStreamSettings(segmentDuration: number, partDuration: number): StreamSettings {
    const partTargetMillis = Math.ceil(Math.round(partDuration * 1e6) / 1e3);
    const partTargetDuration = partTargetMillis / 1e3;
    const hlsAdvancePartLimit = partTargetMillis < 1000 ? Math.ceil(3000 / partTargetMillis) : 3;

    return Object.freeze({
        segmentDuration,
        partDuration,
        partTargetDuration,
        targetDuration: Math.ceil(segmentDuration),
        hlsAdvancePartLimit,
        partHoldBack: 2 * partTargetDuration,
        startTimeOffset: 2 * partTargetDuration,
    });
}
