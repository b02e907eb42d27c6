import { readParamAsNumber, readTimings, timeSpan } from './util';

describe('util', () => {
    describe('readTimings', () => {
        it('should read threshold overrides', () => {
            expect(readTimings('bitMarkMin=620&bitMarkMax=820')).toEqual({ bitMarkMin: 620, bitMarkMax: 820 });
        });

        it('should read negative pause thresholds', () => {
            expect(readTimings('gapSpaceMax=-18000')).toEqual({ gapSpaceMax: -18000 });
        });

        it('should return no overrides for an empty query', () => {
            expect(readTimings(undefined)).toEqual({});
            expect(readTimings('')).toEqual({});
        });

        it('should refuse unknown names', () => {
            expect(() => readTimings('bitMark=600')).toThrow('unknown pulse timing: bitMark');
        });

        it('should refuse values that are not numbers', () => {
            expect(() => readTimings('bitMarkMin=abc')).toThrow('pulse timing bitMarkMin is not a number: abc');
        });
    });

    it('should read numeric params', () => {
        const params = new URLSearchParams('a=1.5&b=x');
        expect(readParamAsNumber(params, 'a')).toBe(1.5);
        expect(readParamAsNumber(params, 'b')).toBeUndefined();
        expect(readParamAsNumber(params, 'c')).toBeUndefined();
    });

    it('should convert time spans to milliseconds', () => {
        expect(timeSpan(30, 'seconds')).toBe(30000);
        expect(timeSpan(2, 'minutes')).toBe(120000);
    });
});
