import type { PulseChunk } from './decoders/types';

// ESPHome remote_receiver with `dump: [raw]`
const RAW_DUMP_TAG = '[I][remote.raw';
const FRAME_START = 'Received';

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

/**
 * Extracts the pulse timings of one raw dump log line. A frame is logged over
 * several lines, only the first one starts with "Received Raw:".
 */
export function parseLogLine(line: string): PulseChunk | null {
    const clean = line.replace(ANSI_ESCAPE, '');
    if (!clean.includes(RAW_DUMP_TAG)) { return null; }

    const separator = clean.indexOf(']:');
    if (separator === -1) { return null; }

    const payload = clean.slice(separator + 2);
    const pulses = (payload.match(/-?\d+/g) || []).map(p => parseInt(p, 10));
    return {
        start: payload.trimStart().startsWith(FRAME_START),
        pulses,
    };
}
