import moment from 'moment';

import { isTimingName } from './decoders/pulse';
import type { PulseTimings } from './decoders/pulse';

export function timeSpan(value: number, unit: moment.unitOfTime.DurationConstructor) {
    return moment.duration(value, unit).asMilliseconds();
}

export function readParamAsNumber(params: URLSearchParams, name: string): number | undefined {
    const value = params.get(name);
    if (value === null) { return undefined; }
    const numberValue = parseFloat(value);
    if (!isFinite(numberValue) || isNaN(numberValue)) { return undefined; }
    return numberValue;
}

/**
 * Reads pulse threshold overrides from a query string,
 * eg. `bitMarkMin=620&bitMarkMax=820`.
 */
export function readTimings(query: string | undefined): Partial<PulseTimings> {
    const params = new URLSearchParams(query || '');
    const timings: Partial<PulseTimings> = {};
    for (const name of params.keys()) {
        if (!isTimingName(name)) {
            throw new Error(`unknown pulse timing: ${name}`);
        }
        const value = readParamAsNumber(params, name);
        if (value === undefined) {
            throw new Error(`pulse timing ${name} is not a number: ${params.get(name)}`);
        }
        timings[name] = value;
    }
    return timings;
}
