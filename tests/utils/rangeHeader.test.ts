import { OPEN_END } from '../../src/core/byteRangeServer';
import { parseRangeHeader } from '../../src/utils/rangeHeader';

describe('parseRangeHeader', () => {
    it('reports no range without a header', () => {
        expect(parseRangeHeader(undefined)).toEqual({ kind: 'none' });
        expect(parseRangeHeader('')).toEqual({ kind: 'none' });
    });

    it('parses a bounded range', () => {
        expect(parseRangeHeader('bytes=0-9')).toEqual({ kind: 'range', range: { start: 0, end: 9 } });
    });

    it('maps an open-ended range to the sentinel end', () => {
        expect(parseRangeHeader('bytes=5-')).toEqual({ kind: 'range', range: { start: 5, end: OPEN_END } });
    });

    it('clips a huge end to the sentinel', () => {
        expect(parseRangeHeader('bytes=0-99999999999999999999')).toEqual({
            kind: 'range',
            range: { start: 0, end: OPEN_END },
        });
    });

    it('treats suffix and inverted ranges as unsatisfiable', () => {
        expect(parseRangeHeader('bytes=-5')).toEqual({ kind: 'unsatisfiable' });
        expect(parseRangeHeader('bytes=5-3')).toEqual({ kind: 'unsatisfiable' });
    });

    it('ignores malformed headers and other units', () => {
        expect(parseRangeHeader('bytes=abc')).toEqual({ kind: 'none' });
        expect(parseRangeHeader('items=0-5')).toEqual({ kind: 'none' });
        expect(parseRangeHeader('0-5')).toEqual({ kind: 'none' });
    });

    it('uses the first of several ranges', () => {
        expect(parseRangeHeader('bytes=0-1, 4-5')).toEqual({ kind: 'range', range: { start: 0, end: 1 } });
    });
});
