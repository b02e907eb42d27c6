import { basicPayload, catchFrameError, footerPayload, tempPayload, timerPayload } from '../test-utils';
import { Fan, HGuide, Mode, TempDisplay, VGuide } from './enums';
import { EnumValueError } from './errors';
import { decodeBasic, decodeCommon, decodeFooter, decodeRecord, decodeTemp, decodeTimer } from './fields';
import type { DecodeWarning } from './types';

describe('field decoding', () => {
    let warnings: DecodeWarning[];
    const warn = (w: DecodeWarning) => { warnings.push(w); };

    beforeEach(() => {
        warnings = [];
    });

    describe('decodeCommon', () => {
        it('should decode target temperature and timer hours', () => {
            const common = decodeCommon(timerPayload, warn);

            expect(common.timer).toBe(true);
            expect(common.timerHours).toBe(12.5);
            expect(common.temp).toBe(22);
            expect(warnings).toEqual([]);
        });

        it('should add half a degree when set in fahrenheit', () => {
            const common = decodeCommon([0x29, 0x08, 0x20, 0x5C], warn);

            expect(common.fahrenheit).toBe(true);
            expect(common.temp).toBe(24.5);
        });

        it('should decode the function flags', () => {
            const common = decodeCommon([0xC9, 0x08, 0xF0, 0x59], warn);

            expect(common).toMatchObject({
                sleep: true,
                swing: true,
                xFan: true,
                health: true,
                light: true,
                turbo: true,
                fahrenheit: true,
                freshAir: true,
            });
        });

        it('should warn about the reserved bit of byte 3', () => {
            const payload = [0x29, 0x08, 0x20, 0x52];
            decodeCommon(payload, warn);

            expect(warnings).toEqual([{
                kind: 'reserved-bits', field: 'func2-unused', index: 3, mask: 0x02, value: 0x02, expected: 0, payload,
            }]);
        });

        it('should throw for a mode without a variant', () => {
            expect(() => decodeCommon([0x0F, 0x08, 0x00, 0x50], warn)).toThrow(EnumValueError);
        });
    });

    describe('decodeBasic', () => {
        it('should decode the cool, medium fan, on frame', () => {
            expect(decodeBasic(basicPayload, warn)).toEqual({
                type: 'basic',
                sleep: false,
                fan: Fan.Med,
                on: true,
                mode: Mode.Cool,
                timer: false,
                timerHours: 0,
                temp: 24,
                xFan: false,
                health: false,
                light: true,
                turbo: false,
                fahrenheit: false,
                freshAir: false,
                hGuide: HGuide.Closed,
                vGuide: VGuide.Closed,
                wifi: false,
                ifeel: false,
                tempDisplay: TempDisplay.Default,
                energySave: false,
            });
            expect(warnings).toEqual([]);
        });

        it('should omit swing when the guides already swing', () => {
            const payload = [0x69, 0x08, 0x20, 0x50, 0x01, 0x80, 0x00, 0x30];
            const record = decodeBasic(payload, warn);

            expect(record.vGuide).toBe(VGuide.SwingUpDown);
            expect('swing' in record).toBe(false);
            expect(warnings).toEqual([]);
        });

        it('should keep swing and warn when it disagrees with the guides', () => {
            const payload = [0x69, 0x08, 0x20, 0x50, 0x00, 0x80, 0x00, 0x30];
            const record = decodeBasic(payload, warn);

            expect(record.swing).toBe(true);
            expect(warnings).toEqual([{
                kind: 'swing-mismatch', swing: true, hGuide: HGuide.Closed, vGuide: VGuide.Closed,
            }]);
        });

        it('should decode byte 5 and 7 functions', () => {
            const payload = [0x29, 0x08, 0x20, 0x50, 0x24, 0xC7, 0x00, 0x34];
            const record = decodeBasic(payload, warn);

            expect(record).toMatchObject({
                hGuide: HGuide.Left,
                vGuide: VGuide.Mid,
                wifi: true,
                ifeel: true,
                tempDisplay: TempDisplay.Outdoor,
                energySave: true,
            });
            expect(warnings).toEqual([]);
        });

        it('should warn about unexpected bits of bytes 5, 6 and 7', () => {
            const payload = [0x29, 0x08, 0x20, 0x50, 0x00, 0x08, 0x10, 0x31];
            decodeBasic(payload, warn);

            expect(warnings.map(w => w.kind === 'reserved-bits' && [w.field, w.index, w.value])).toEqual([
                ['func3-lead', 5, 0x00],
                ['func3-unused', 5, 0x08],
                ['unused', 6, 0x10],
                ['control-unused', 7, 0x01],
            ]);
        });

        it('should throw for a horizontal guide without a variant', () => {
            const payload = [0x29, 0x08, 0x20, 0x50, 0x80, 0x80, 0x00, 0x30];
            expect(() => decodeBasic(payload, warn)).toThrow('HGuide: no variant for raw value 8');
        });
    });

    describe('decodeTimer', () => {
        it('should decode on and off delays', () => {
            expect(decodeTimer(timerPayload, warn)).toEqual({
                type: 'timer',
                sleep: false,
                swing: false,
                fan: Fan.Auto,
                on: true,
                mode: Mode.Cool,
                timer: true,
                timerHours: 12.5,
                temp: 22,
                xFan: false,
                health: false,
                light: false,
                turbo: false,
                fahrenheit: false,
                freshAir: false,
                onMins: 300,
                overlap: false,
                offMins: 739,
                onSet: true,
                offSet: true,
            });
            expect(warnings).toEqual([]);
        });

        it('should decode the overlap flag', () => {
            const payload = [...timerPayload];
            payload[5] |= 0x80;

            expect(decodeTimer(payload, warn).overlap).toBe(true);
        });

        it('should warn about the lead bit and unused control bits', () => {
            const payload = [...timerPayload];
            payload[5] = 0x31;
            payload[7] = 0x27;
            decodeTimer(payload, warn);

            expect(warnings.map(w => w.kind === 'reserved-bits' && w.field)).toEqual(['on-lead', 'control-unused']);
        });
    });

    describe('decodeFooter', () => {
        it('should carry no fields', () => {
            expect(decodeFooter(footerPayload, warn)).toEqual({ type: 'footer' });
            expect(warnings).toEqual([]);
        });

        it('should warn about every nonzero unused byte', () => {
            const payload = [0x00, 0x01, 0x00, 0xA2, 0x00, 0x00, 0x00, 0xA0];
            decodeFooter(payload, warn);

            expect(warnings.map(w => w.kind === 'reserved-bits' && [w.field, w.index])).toEqual([
                ['footer-unused', 1],
                ['type-unused', 3],
            ]);
        });
    });

    describe('decodeTemp', () => {
        it('should decode the sensed temperature', () => {
            expect(decodeTemp(tempPayload, warn)).toEqual({ type: 'temp', temp: 23 });
            expect(warnings).toEqual([]);
        });

        it('should warn about a wrong magic byte', () => {
            const payload = [23, 0x00];

            expect(decodeTemp(payload, warn)).toEqual({ type: 'temp', temp: 23 });
            expect(warnings).toEqual([{ kind: 'magic-mismatch', value: 0x00, expected: 0xA5, payload }]);
        });
    });

    describe('decodeRecord', () => {
        it('should dispatch on the frame type nibble', () => {
            expect(decodeRecord(basicPayload, warn).type).toBe('basic');
            expect(decodeRecord(timerPayload, warn).type).toBe('timer');
            expect(decodeRecord(footerPayload, warn).type).toBe('footer');
            expect(decodeRecord(tempPayload, warn).type).toBe('temp');
            expect(warnings).toEqual([]);
        });

        it('should still decode a frame with a checksum mismatch', () => {
            const payload = [...basicPayload];
            payload[7] = 0x50;

            expect(decodeRecord(payload, warn).type).toBe('basic');
            expect(warnings.map(w => w.kind)).toEqual(['checksum-mismatch']);
        });

        it('should reject an unknown frame type', () => {
            const err = catchFrameError(() => decodeRecord([0, 0, 0, 0x70, 0, 0, 0, 0xA0], warn));

            expect(err.kind).toBe('unknown-type');
            expect(err.message).toBe('unknown frame type 0x70');
        });

        it('should reject an unsupported payload length', () => {
            expect(catchFrameError(() => decodeRecord([1, 2, 3], warn)).kind).toBe('unsupported-length');
        });
    });
});
