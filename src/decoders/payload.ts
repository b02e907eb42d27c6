import { FrameError } from './errors';
import { PulseSymbol } from './pulse';

export const SYNC_BITS = `${PulseSymbol.Zero}${PulseSymbol.One}${PulseSymbol.Zero}${PulseSymbol.Space}`;

export const STANDARD_PAYLOAD_LENGTH = 8;
export const SHORT_PAYLOAD_LENGTH = 2;

/**
 * Strips start, stop and sync symbols and packs the data bits into bytes,
 * least significant bit first.
 */
export function extractPayload(code: string): number[] {
    let bits = code.slice(1, -1);
    if (code[0] === PulseSymbol.StartStandard) {
        bits = bits.replace(SYNC_BITS, '');
    }

    if (bits.length % 8 !== 0) {
        throw new FrameError('invalid-length', `payload of ${bits.length} bits is not whole bytes`, { code });
    }

    const payload: number[] = [];
    for (let offset = 0; offset < bits.length; offset += 8) {
        let byte = 0;
        for (let bit = 0; bit < 8; bit++) {
            if (bits[offset + bit] === PulseSymbol.One) {
                byte |= 1 << bit;
            }
        }
        payload.push(byte);
    }
    return payload;
}

function toBits(bytes: readonly number[]) {
    let bits = '';
    for (const byte of bytes) {
        for (let bit = 0; bit < 8; bit++) {
            bits += (byte & (1 << bit)) !== 0 ? PulseSymbol.One : PulseSymbol.Zero;
        }
    }
    return bits;
}

export function payloadToCode(payload: readonly number[]): string {
    switch (payload.length) {
        case STANDARD_PAYLOAD_LENGTH:
            return PulseSymbol.StartStandard
                + toBits(payload.slice(0, 4)) + SYNC_BITS + toBits(payload.slice(4))
                + PulseSymbol.Stop;
        case SHORT_PAYLOAD_LENGTH:
            return PulseSymbol.StartShort + toBits(payload) + PulseSymbol.Stop;
        default:
            throw new FrameError('unsupported-length', `cannot encode ${payload.length} byte payload`, { payload });
    }
}
