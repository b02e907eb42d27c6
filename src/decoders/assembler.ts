import { defaultTimings, isStartShort, isStartStandard } from './pulse';
import type { PulseTimings } from './pulse';
import type { WarningSink } from './types';

// 69 pulse pairs plus the closing burst
export const STANDARD_FRAME_LENGTH = 139;
// 17 pulse pairs plus the closing burst
export const SHORT_FRAME_LENGTH = 35;

/**
 * Collects pulses of a frame that arrives split over several log lines.
 */
export class FrameAssembler {
    private buffer: number[] = [];

    constructor(
        private readonly warn: WarningSink = () => { },
        private readonly timings: Readonly<PulseTimings> = defaultTimings,
    ) {
    }

    get pending(): readonly number[] {
        return this.buffer;
    }

    feed(pulses: readonly number[], isFrameStart: boolean): number[] | null {
        if (isFrameStart) {
            if (this.buffer.length > 0) {
                this.warn({ kind: 'extra-bits', pulses: this.buffer });
            }
            this.buffer = [...pulses];
        } else {
            this.buffer.push(...pulses);
        }

        const length = this.expectedLength();
        if (length === null || this.buffer.length < length) {
            return null;
        }

        const frame = this.buffer.slice(0, length);
        this.buffer = [];
        return frame;
    }

    reset() {
        this.buffer = [];
    }

    private expectedLength(): number | null {
        if (this.buffer.length < 2) { return null; }

        const [hi, lo] = this.buffer;
        if (isStartStandard(hi, lo, this.timings)) { return STANDARD_FRAME_LENGTH; }
        if (isStartShort(hi, lo, this.timings)) { return SHORT_FRAME_LENGTH; }
        return null;
    }
}
