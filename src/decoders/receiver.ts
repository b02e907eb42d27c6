import { Subject } from 'rxjs';
import type { Observable, OperatorFunction } from 'rxjs';
import { filter, map } from 'rxjs/operators';

import type { Logger } from '../Logger';
import { FrameAssembler } from './assembler';
import { FrameError } from './errors';
import { decodeRecord } from './fields';
import { formatPayload } from './format';
import { GreeDecoder } from './gree';
import { defaultTimings } from './pulse';
import type { PulseTimings } from './pulse';
import type { DecodedRecord, DecodeWarning, PulseChunk, WarningSink } from './types';

/**
 * Runs pulse chunks through assembly, decoding and field decoding. Rejected
 * frames and warnings are published separately from the decoded records.
 */
export class GreeReceiver {
    private readonly _warnings = new Subject<DecodeWarning>();
    private readonly _rejected = new Subject<FrameError>();

    private readonly warn: WarningSink = warning => this._warnings.next(warning);
    private readonly assembler: FrameAssembler;
    private readonly decoder: GreeDecoder;

    readonly warnings = this._warnings.asObservable();
    readonly rejected = this._rejected.asObservable();

    constructor(
        private logger: Logger,
        timings: Partial<PulseTimings> = {},
    ) {
        this.decoder = new GreeDecoder(timings);
        this.assembler = new FrameAssembler(this.warn, { ...defaultTimings, ...timings });
    }

    get pending(): readonly number[] {
        return this.assembler.pending;
    }

    feed({ start, pulses }: PulseChunk): DecodedRecord | null {
        const frame = this.assembler.feed(pulses, start);
        if (!frame) { return null; }

        try {
            const payload = this.decoder.decode(frame);
            this.logger.debug(`gree: frame ${formatPayload(payload)}`);
            return decodeRecord(payload, this.warn);
        } catch (err) {
            if (err instanceof FrameError) {
                this._rejected.next(err);
                return null;
            }
            throw err;
        }
    }

    decodeChunks(): OperatorFunction<PulseChunk, DecodedRecord> {
        return (chunks: Observable<PulseChunk>) => chunks.pipe(
            map(chunk => this.feed(chunk)),
            filter((record): record is DecodedRecord => record !== null),
        );
    }

    close() {
        this._warnings.complete();
        this._rejected.complete();
    }
}
