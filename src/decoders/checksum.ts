import { FrameError } from './errors';
import { STANDARD_PAYLOAD_LENGTH } from './payload';
import type { WarningSink } from './types';

/**
 * 4 bit sum of the low nibbles of bytes 0..3, the high nibbles of bytes 4..6
 * and a constant 0x0A. Byte 4 takes part and byte 7 does not, which is what
 * the remote sends.
 */
export function calculateChecksum(payload: readonly number[]): number {
    if (payload.length !== STANDARD_PAYLOAD_LENGTH) {
        throw new FrameError('unsupported-length', `no checksum in ${payload.length} byte payload`, { payload });
    }

    let sum = 0x0A;
    for (let i = 0; i < 4; i++) {
        sum += payload[i] & 0x0F;
    }
    for (let i = 4; i < 7; i++) {
        sum += (payload[i] & 0xF0) >> 4;
    }
    return sum & 0x0F;
}

export function receivedChecksum(payload: readonly number[]): number {
    return (payload[7] & 0xF0) >> 4;
}

export function matchChecksum(payload: readonly number[], warn: WarningSink = () => { }): boolean {
    const received = receivedChecksum(payload);
    const calculated = calculateChecksum(payload);
    if (received !== calculated) {
        warn({ kind: 'checksum-mismatch', received, calculated, payload });
        return false;
    }
    return true;
}
