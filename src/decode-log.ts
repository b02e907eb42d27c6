import type { Observable } from 'rxjs';
import { filter, map } from 'rxjs/operators';

import { formatRecord } from './decoders/format';
import type { GreeReceiver } from './decoders/receiver';
import type { PulseChunk } from './decoders/types';
import { parseLogLine } from './esphome';
import type { Logger } from './Logger';

/**
 * Diagnostics go to stderr, stdout only carries the decoded records.
 */
export function createStderrLogger(verbose = false): Logger {
    return {
        debug: msg => { if (verbose) { console.error(msg); } },
        info: msg => console.error(msg),
        warn: msg => console.error(msg),
        error: msg => console.error(msg),
    };
}

export function decodeLog(lines: Observable<string>, receiver: GreeReceiver, json = false): Observable<string> {
    return lines.pipe(
        map(parseLogLine),
        filter((chunk): chunk is PulseChunk => chunk !== null),
        receiver.decodeChunks(),
        map(record => json ? JSON.stringify(record) : formatRecord(record)),
    );
}
