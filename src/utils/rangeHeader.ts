import parseRange from 'range-parser';
import { OPEN_END } from '../core/byteRangeServer';
import { ByteRange } from '../types';

export type RangeHeaderResult =
    | { kind: 'none' }
    | { kind: 'range'; range: ByteRange }
    | { kind: 'unsatisfiable' };

const BYTE_RANGE_SET = /^bytes=\d*-\d*(?:,\s*\d*-\d*)*$/;
const SUFFIX_RANGE = /^bytes=-/;

/**
 * Parses a `Range` header against a resource whose length is not known yet.
 * `bytes=N-` and ends past the sentinel both map to `OPEN_END`. Suffix ranges
 * need the final length and are unsatisfiable here. Headers that are not a
 * byte-range set are ignored; of several ranges only the first is used.
 */
export function parseRangeHeader(header: string | undefined): RangeHeaderResult {
    const value = header?.trim();
    if (!value || !BYTE_RANGE_SET.test(value)) {
        return { kind: 'none' };
    }
    if (SUFFIX_RANGE.test(value)) {
        return { kind: 'unsatisfiable' };
    }

    const parsed = parseRange(OPEN_END + 1, value);
    if (parsed === -2) {
        return { kind: 'none' };
    }
    if (parsed === -1) {
        return { kind: 'unsatisfiable' };
    }
    return { kind: 'range', range: { start: parsed[0].start, end: parsed[0].end } };
}
