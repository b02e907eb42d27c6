#!/usr/bin/env node
import * as fs from 'fs';
import * as readline from 'readline';
import { concat, Observable } from 'rxjs';

import { decodeLog, createStderrLogger } from './decode-log';
import { describeWarning } from './decoders/format';
import { GreeReceiver } from './decoders/receiver';
import { readTimings } from './util';

function usage(): never {
    console.error('Usage:');
    console.error('  Decode a log:    gree-ir-decode <log file>... [--json] [--verbose] [--timings=<query>]');
    console.error('  Decode a stream: esphome logs irtest.yaml | gree-ir-decode [--json]');
    process.exit(1);
}

function readLines(input: NodeJS.ReadableStream) {
    return new Observable<string>(observer => {
        const lines = readline.createInterface({ input, crlfDelay: Infinity });
        lines.on('line', line => observer.next(line));
        lines.once('close', () => observer.complete());
        input.once('error', err => observer.error(err));
        return () => lines.close();
    });
}

const argv = process.argv.slice(2);
const flags = argv.filter(a => a.startsWith('-'));
const files = argv.filter(a => !a.startsWith('-'));
const jsonFlag = flags.includes('--json');
const verboseFlag = flags.includes('--verbose');
const timingsFlag = flags.find(f => f.startsWith('--timings='));

if (flags.some(f => f !== '--json' && f !== '--verbose' && f !== timingsFlag)) { usage(); }

const logger = createStderrLogger(verboseFlag);

let receiver: GreeReceiver;
try {
    receiver = new GreeReceiver(logger, readTimings(timingsFlag && timingsFlag.slice('--timings='.length)));
} catch (err) {
    logger.error(`${err instanceof Error ? err.message : err}`);
    usage();
}

receiver.warnings.subscribe(w => logger.warn(`warning: ${describeWarning(w)}`));
receiver.rejected.subscribe(err => logger.warn(`rejected: ${err.message}`));

const sources = files.length
    ? files.map(file => readLines(fs.createReadStream(file)))
    : [readLines(process.stdin)];

decodeLog(concat(...sources), receiver, jsonFlag)
    .subscribe({
        next: line => console.log(line),
        error: err => {
            logger.error(`${err instanceof Error ? err.message : err}`);
            process.exitCode = 1;
        },
        complete: () => receiver.close(),
    });
