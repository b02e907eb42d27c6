export enum PulseSymbol {
    StartStandard = 'S',
    StartShort = 's',
    Zero = '0',
    One = '1',
    Space = '_',
    Stop = '$',
    Invalid = 'x',
}

/**
 * Acceptance windows for burst and pause widths, in microseconds.
 * Pauses are negative, so `...Min` is the longer pause.
 */
export interface PulseTimings {
    startMarkMin: number;
    startSpaceMax: number;
    shortMarkMin: number;
    shortMarkMax: number;
    shortSpaceMin: number;
    shortSpaceMax: number;
    bitMarkMin: number;
    bitMarkMax: number;
    zeroSpaceMin: number;
    zeroSpaceMax: number;
    oneSpaceMin: number;
    oneSpaceMax: number;
    gapSpaceMax: number;
}

// midpoints between the nominal widths measured on the remote
export const defaultTimings: Readonly<PulseTimings> = {
    startMarkMin: 8000,     // 9ms
    startSpaceMax: -4000,   // 4.5ms
    shortMarkMin: 5000,     // 6ms
    shortMarkMax: 7000,
    shortSpaceMin: -3500,   // 3ms
    shortSpaceMax: -2500,
    bitMarkMin: 600,        // 700us, not the 560us of plain NEC
    bitMarkMax: 800,
    zeroSpaceMin: -600,     // 500us
    zeroSpaceMax: -400,
    oneSpaceMin: -1700,     // 1.6ms
    oneSpaceMax: -1500,
    gapSpaceMax: -19000,    // 19.8ms
};

export function isTimingName(name: string): name is keyof PulseTimings {
    return Object.prototype.hasOwnProperty.call(defaultTimings, name);
}

export function isStartStandard(hi: number, lo: number, t: Readonly<PulseTimings> = defaultTimings) {
    return hi > t.startMarkMin && lo < t.startSpaceMax;
}

export function isStartShort(hi: number, lo: number, t: Readonly<PulseTimings> = defaultTimings) {
    return t.shortMarkMin < hi && hi < t.shortMarkMax && t.shortSpaceMin < lo && lo < t.shortSpaceMax;
}

export function isBitLead(hi: number, t: Readonly<PulseTimings> = defaultTimings) {
    return t.bitMarkMin < hi && hi < t.bitMarkMax;
}

export function isZero(hi: number, lo: number, t: Readonly<PulseTimings> = defaultTimings) {
    return isBitLead(hi, t) && t.zeroSpaceMin < lo && lo < t.zeroSpaceMax;
}

export function isOne(hi: number, lo: number, t: Readonly<PulseTimings> = defaultTimings) {
    return isBitLead(hi, t) && t.oneSpaceMin < lo && lo < t.oneSpaceMax;
}

export function isSpace(hi: number, lo: number, t: Readonly<PulseTimings> = defaultTimings) {
    return isBitLead(hi, t) && lo < t.gapSpaceMax;
}

export function classifyPair(hi: number, lo: number, t: Readonly<PulseTimings> = defaultTimings): PulseSymbol {
    if (isStartStandard(hi, lo, t)) { return PulseSymbol.StartStandard; }
    if (isStartShort(hi, lo, t)) { return PulseSymbol.StartShort; }
    if (isZero(hi, lo, t)) { return PulseSymbol.Zero; }
    if (isOne(hi, lo, t)) { return PulseSymbol.One; }
    if (isSpace(hi, lo, t)) { return PulseSymbol.Space; }
    return PulseSymbol.Invalid;
}
