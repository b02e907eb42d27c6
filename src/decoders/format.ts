import type { DecodedRecord, DecodeWarning } from './types';

export function toHex(value: number, digits = 2) {
    return '0x' + value.toString(16).toUpperCase().padStart(digits, '0');
}

export function formatPayload(payload: readonly number[]) {
    return '[' + payload.map(b => toHex(b)).join(', ') + ']';
}

/**
 * Renders a record as `{type = basic, sleep = false, ...}` in field order.
 */
export function formatRecord(record: DecodedRecord): string {
    const fields = Object.entries(record).map(([key, value]) => `${key} = ${value}`);
    return '{' + fields.join(', ') + '}';
}

export function describeWarning(warning: DecodeWarning): string {
    switch (warning.kind) {
        case 'extra-bits':
            return `extra bits: ${warning.pulses.length} pulses of an unfinished frame dropped`;
        case 'checksum-mismatch':
            return `checksum mismatch ${toHex(warning.received)} != ${toHex(warning.calculated)} ` +
                formatPayload(warning.payload);
        case 'reserved-bits':
            return `unexpected ${warning.field} bits in byte ${warning.index} ` +
                `(mask ${toHex(warning.mask)}): ${toHex(warning.value)} != ${toHex(warning.expected)}`;
        case 'magic-mismatch':
            return `invalid magic byte ${toHex(warning.value)} != ${toHex(warning.expected)} ` +
                formatPayload(warning.payload);
        case 'swing-mismatch':
            return `swing flag ${warning.swing} disagrees with guides ${warning.hGuide}/${warning.vGuide}`;
    }
}
