import type { Fan, HGuide, Mode, TempDisplay, VGuide } from './enums';

export type DecodeWarning =
    | { kind: 'extra-bits'; pulses: readonly number[] }
    | { kind: 'checksum-mismatch'; received: number; calculated: number; payload: readonly number[] }
    | {
        kind: 'reserved-bits';
        field: string;
        index: number;
        mask: number;
        value: number;
        expected: number;
        payload: readonly number[];
    }
    | { kind: 'magic-mismatch'; value: number; expected: number; payload: readonly number[] }
    | { kind: 'swing-mismatch'; swing: boolean; hGuide: HGuide; vGuide: VGuide };

export type WarningKind = DecodeWarning['kind'];

export type WarningSink = (warning: DecodeWarning) => void;

/** Fields shared by the Basic and Timer frames (bytes 0..3). */
export interface CommonFields {
    sleep: boolean;
    swing: boolean;
    fan: Fan;
    on: boolean;
    mode: Mode;
    timer: boolean;
    /** hours until the next timed event, in half hour steps */
    timerHours: number;
    /** target temperature in celsius, 0.5 steps when set in fahrenheit */
    temp: number;
    xFan: boolean;
    health: boolean;
    light: boolean;
    turbo: boolean;
    fahrenheit: boolean;
    freshAir: boolean;
}

export interface BasicRecord extends Omit<CommonFields, 'swing'> {
    type: 'basic';
    /** only present when it disagrees with the swing state of the guides */
    swing?: boolean;
    hGuide: HGuide;
    vGuide: VGuide;
    wifi: boolean;
    ifeel: boolean;
    tempDisplay: TempDisplay;
    energySave: boolean;
}

export interface TimerRecord extends CommonFields {
    type: 'timer';
    onMins: number;
    overlap: boolean;
    offMins: number;
    onSet: boolean;
    offSet: boolean;
}

export interface FooterRecord {
    type: 'footer';
}

export interface TempRecord {
    type: 'temp';
    /** room temperature sensed by the remote, whole degrees celsius */
    temp: number;
}

export type DecodedRecord = BasicRecord | TimerRecord | FooterRecord | TempRecord;

export type RecordType = DecodedRecord['type'];

export interface PulseChunk {
    start: boolean;
    pulses: number[];
}
