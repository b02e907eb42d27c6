import { FrameError } from './errors';
import type { IDecoder } from './IDecoder';
import { extractPayload, payloadToCode } from './payload';
import { classifyPair, defaultTimings, isBitLead, PulseSymbol } from './pulse';
import type { PulseTimings } from './pulse';

export const STANDARD_CODE_LENGTH = 70;
export const SHORT_CODE_LENGTH = 18;

/**
 * NEC-like protocol of the GREE YAP1F remote: 8 byte frames with a sync
 * gap after the 4th byte, and 2 byte "I FEEL" frames with a shorter header.
 */
export class GreeDecoder implements IDecoder<number[]> {
    private static readonly header_mark = 9000;
    private static readonly header_space = 4500;
    private static readonly short_header_mark = 6000;
    private static readonly short_header_space = 3000;

    private static readonly bit_mark = 700;
    private static readonly zero_space = 500;
    private static readonly one_space = 1600;
    private static readonly gap_space = 19800;

    private readonly timings: Readonly<PulseTimings>;

    constructor(timings: Partial<PulseTimings> = {}) {
        this.timings = { ...defaultTimings, ...timings };
    }

    decode(pulses: readonly number[]): number[] {
        return extractPayload(this.toCode(pulses));
    }

    toCode(pulses: readonly number[]): string {
        // the closing burst is needed to measure the last pause
        if (pulses.length % 2 === 0) {
            throw new FrameError('even-length', `even number of pulses (${pulses.length})`, { pulses });
        }

        let code = '';
        for (let i = 0; i < pulses.length - 1; i += 2) {
            code += classifyPair(pulses[i], pulses[i + 1], this.timings);
        }
        code += isBitLead(pulses[pulses.length - 1], this.timings) ? PulseSymbol.Stop : PulseSymbol.Invalid;

        if (code.includes(PulseSymbol.Invalid)) {
            throw new FrameError('invalid-symbol', `invalid bit in ${code}`, { pulses, code });
        }

        if (!this.hasValidShape(code)) {
            throw new FrameError('invalid-structure', `invalid code structure ${code}`, { pulses, code });
        }

        return code;
    }

    encode(payload: number[]): number[] {
        const code = payloadToCode(payload);

        const pulses: number[] = [];
        for (const symbol of code) {
            switch (symbol) {
                case PulseSymbol.StartStandard:
                    pulses.push(GreeDecoder.header_mark, -GreeDecoder.header_space);
                    break;
                case PulseSymbol.StartShort:
                    pulses.push(GreeDecoder.short_header_mark, -GreeDecoder.short_header_space);
                    break;
                case PulseSymbol.Zero:
                    pulses.push(GreeDecoder.bit_mark, -GreeDecoder.zero_space);
                    break;
                case PulseSymbol.One:
                    pulses.push(GreeDecoder.bit_mark, -GreeDecoder.one_space);
                    break;
                case PulseSymbol.Space:
                    pulses.push(GreeDecoder.bit_mark, -GreeDecoder.gap_space);
                    break;
                case PulseSymbol.Stop:
                    pulses.push(GreeDecoder.bit_mark);
                    break;
            }
        }
        return pulses;
    }

    private hasValidShape(code: string) {
        const spaces = code.split(PulseSymbol.Space).length - 1;
        const stopped = code[code.length - 1] === PulseSymbol.Stop;

        if (code[0] === PulseSymbol.StartStandard) {
            return spaces === 1 && stopped && code.length === STANDARD_CODE_LENGTH;
        }
        if (code[0] === PulseSymbol.StartShort) {
            return spaces === 0 && stopped && code.length === SHORT_CODE_LENGTH;
        }
        return false;
    }
}
