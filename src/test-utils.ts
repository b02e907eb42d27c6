import { FrameError } from './decoders/errors';
import type { Logger } from './Logger';

// Cool, Med fan, on, 24C, light
export const basicPayload = [0x29, 0x08, 0x20, 0x50, 0x00, 0x80, 0x00, 0x30];
// on in 300 mins, off in 739 mins, timer hours 12.5, 22C
export const timerPayload = [0x09, 0xB6, 0x02, 0x60, 0x2C, 0x39, 0x2E, 0x23];
export const footerPayload = [0x00, 0x00, 0x00, 0xA0, 0x00, 0x00, 0x00, 0xA0];
export const tempPayload = [23, 0xA5];

export function createLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function catchFrameError(fn: () => unknown): FrameError {
    try {
        fn();
    } catch (err) {
        if (err instanceof FrameError) { return err; }
        throw err;
    }
    throw new Error('expected a FrameError');
}

export function rawDumpLines(pulses: readonly number[], split: number) {
    return [
        `[10:21:03][I][remote.raw:041]: Received Raw: ${pulses.slice(0, split).join(', ')}`,
        `[10:21:03][I][remote.raw:041]:   ${pulses.slice(split).join(', ')}`,
    ];
}
