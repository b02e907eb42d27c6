import { matchChecksum } from './checksum';
import { isSwinging, toFan, toHGuide, toMode, toTempDisplay, toVGuide } from './enums';
import { FrameError } from './errors';
import { SHORT_PAYLOAD_LENGTH, STANDARD_PAYLOAD_LENGTH } from './payload';
import type {
    BasicRecord, CommonFields, DecodedRecord, FooterRecord,
    TempRecord, TimerRecord, WarningSink
} from './types';

// high nibble of byte 3
export const BASIC_FRAME = 0x50;
export const TIMER_FRAME = 0x60;
export const FOOTER_FRAME = 0xA0;

// fixed second byte of the Temp frame, sent in place of a checksum
export const TEMP_MAGIC = 0xA5;

function expectBits(
    payload: readonly number[],
    warn: WarningSink,
    field: string,
    index: number,
    mask: number,
    expected = 0,
) {
    const value = payload[index] & mask;
    if (value !== expected) {
        warn({ kind: 'reserved-bits', field, index, mask, value, expected, payload });
    }
}

export function decodeCommon(payload: readonly number[], warn: WarningSink): CommonFields {
    expectBits(payload, warn, 'func2-unused', 3, 0x02);

    const [b0, b1, b2, b3] = payload;
    return {
        // byte 0: basic functions
        sleep: (b0 & 0x80) !== 0,
        swing: (b0 & 0x40) !== 0,
        fan: toFan((b0 & 0x30) >> 4),
        on: (b0 & 0x08) !== 0,
        mode: toMode(b0 & 0x07),

        // byte 1: temperature and coarse timer
        timer: (b1 & 0x80) !== 0,
        timerHours: ((b1 & 0x60) >> 5) * 10 + (b2 & 0x0F) + ((b1 & 0x10) >> 4) * 0.5,
        temp: (b1 & 0x0F) + ((b3 & 0x04) !== 0 ? 16.5 : 16),

        // byte 2: functions
        xFan: (b2 & 0x80) !== 0,
        health: (b2 & 0x40) !== 0,
        light: (b2 & 0x20) !== 0,
        turbo: (b2 & 0x10) !== 0,

        // byte 3: more functions
        fahrenheit: (b3 & 0x08) !== 0,
        freshAir: (b3 & 0x01) !== 0,
    };
}

export function decodeBasic(payload: readonly number[], warn: WarningSink): BasicRecord {
    expectBits(payload, warn, 'func3-lead', 5, 0x80, 0x80);
    expectBits(payload, warn, 'func3-unused', 5, 0x38);
    expectBits(payload, warn, 'unused', 6, 0xFF);
    expectBits(payload, warn, 'control-unused', 7, 0x0B);

    const [, , , , b4, b5, , b7] = payload;
    const record: BasicRecord = {
        type: 'basic',
        ...decodeCommon(payload, warn),
        hGuide: toHGuide((b4 & 0xF0) >> 4),
        vGuide: toVGuide(b4 & 0x0F),
        wifi: (b5 & 0x40) !== 0,
        ifeel: (b5 & 0x04) !== 0,
        tempDisplay: toTempDisplay(b5 & 0x03),
        // energy saving when cooling, absence when heating
        energySave: (b7 & 0x04) !== 0,
    };

    const guidesSwing = isSwinging(record.hGuide) || isSwinging(record.vGuide);
    if (record.swing === guidesSwing) {
        delete record.swing;
    } else {
        warn({ kind: 'swing-mismatch', swing: record.swing === true, hGuide: record.hGuide, vGuide: record.vGuide });
    }
    return record;
}

export function decodeTimer(payload: readonly number[], warn: WarningSink): TimerRecord {
    expectBits(payload, warn, 'on-lead', 5, 0x08, 0x08);
    expectBits(payload, warn, 'control-unused', 7, 0x0C);

    const [, , , , b4, b5, b6, b7] = payload;
    return {
        type: 'timer',
        ...decodeCommon(payload, warn),
        // minutes from now
        onMins: ((b5 & 0x07) << 8) | b4,
        // off time was moved to keep 15 minutes from the on time
        overlap: (b5 & 0x80) !== 0,
        offMins: (b6 << 4) | ((b5 & 0x70) >> 4),
        onSet: (b7 & 0x02) !== 0,
        offSet: (b7 & 0x01) !== 0,
    };
}

export function decodeFooter(payload: readonly number[], warn: WarningSink): FooterRecord {
    for (const index of [0, 1, 2, 4, 5, 6]) {
        expectBits(payload, warn, 'footer-unused', index, 0xFF);
    }
    expectBits(payload, warn, 'type-unused', 3, 0x0F);
    expectBits(payload, warn, 'checksum-unused', 7, 0x0F);

    return { type: 'footer' };
}

export function decodeTemp(payload: readonly number[], warn: WarningSink): TempRecord {
    if (payload[1] !== TEMP_MAGIC) {
        warn({ kind: 'magic-mismatch', value: payload[1], expected: TEMP_MAGIC, payload });
    }

    return { type: 'temp', temp: payload[0] };
}

export function decodeRecord(payload: readonly number[], warn: WarningSink = () => { }): DecodedRecord {
    if (payload.length === SHORT_PAYLOAD_LENGTH) {
        return decodeTemp(payload, warn);
    }

    if (payload.length !== STANDARD_PAYLOAD_LENGTH) {
        throw new FrameError('unsupported-length', `unsupported ${payload.length} byte payload`, { payload });
    }

    matchChecksum(payload, warn);

    const frameType = payload[3] & 0xF0;
    switch (frameType) {
        case BASIC_FRAME: return decodeBasic(payload, warn);
        case TIMER_FRAME: return decodeTimer(payload, warn);
        case FOOTER_FRAME: return decodeFooter(payload, warn);
        default:
            throw new FrameError('unknown-type', `unknown frame type 0x${frameType.toString(16)}`, { payload });
    }
}
