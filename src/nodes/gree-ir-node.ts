import moment from 'moment';
import { combineLatest, EMPTY, interval, Subject } from 'rxjs';
import { catchError, share, startWith, takeUntil, timestamp } from 'rxjs/operators';

import { describeWarning } from '../decoders/format';
import { GreeReceiver } from '../decoders/receiver';
import type { PulseChunk } from '../decoders/types';
import { parseLogLine } from '../esphome';
import { readTimings, timeSpan } from '../util';
import type { NodeMessage, NodeRedNode, NodeRedRuntime } from './contracts';

export interface GreeIrNodeConfig {
    name?: string;
    timings?: string;
}

export function isPulseChunk(value: unknown): value is PulseChunk {
    if (typeof value !== 'object' || value === null) { return false; }
    if (!('start' in value) || !('pulses' in value)) { return false; }
    return typeof value.start === 'boolean'
        && Array.isArray(value.pulses)
        && value.pulses.every((p: unknown) => typeof p === 'number' && isFinite(p));
}

function toChunks(msg: NodeMessage): PulseChunk[] {
    if (typeof msg.payload === 'string') {
        return msg.payload
            .split(/\r?\n/)
            .map(parseLogLine)
            .filter((chunk): chunk is PulseChunk => chunk !== null);
    }
    if (isPulseChunk(msg.payload)) {
        return [msg.payload];
    }
    return [];
}

export function registerGreeIrNode(RED: NodeRedRuntime) {

    function GreeIrNode(this: NodeRedNode, config: GreeIrNodeConfig) {
        RED.nodes.createNode(this, config);

        let receiver: GreeReceiver;
        try {
            receiver = new GreeReceiver(RED.log, readTimings(config.timings));
        } catch (err) {
            this.error(`invalid timings: ${err instanceof Error ? err.message : err}`);
            this.status({ fill: 'red', shape: 'ring', text: 'invalid timings' });
            return;
        }

        const stop = new Subject<void>();
        const input = new Subject<PulseChunk>();

        receiver.warnings.pipe(takeUntil(stop)).subscribe(w => this.warn(describeWarning(w)));
        receiver.rejected.pipe(takeUntil(stop)).subscribe(err => this.warn(`rejected frame: ${err.message}`));

        const records = input.pipe(
            receiver.decodeChunks(),
            timestamp(),
            catchError(err => {
                this.error(`while decoding: ${err.message}`);
                return EMPTY;
            }),
            share(),
        );

        records.pipe(takeUntil(stop)).subscribe(({ value }) => {
            this.send({ payload: value, topic: value.type });
        });

        combineLatest([
            records.pipe(startWith(null)),
            interval(timeSpan(30, 'seconds')).pipe(startWith(0)),
        ]).pipe(
            takeUntil(stop),
        ).subscribe(([record]) => {
            const lastFrame = record ? `${record.value.type} (${moment(record.timestamp).fromNow()})` : 'no frames yet';
            this.status(record
                ? { fill: 'green', shape: 'dot', text: lastFrame }
                : { fill: 'grey', shape: 'ring', text: lastFrame });
        });

        this.on('input', msg => {
            for (const chunk of toChunks(msg)) {
                input.next(chunk);
            }
        });

        this.on('close', () => {
            stop.next();
            stop.complete();
            input.complete();
            receiver.close();
        });
    }

    RED.nodes.registerType('gree-ir', GreeIrNode);
}
