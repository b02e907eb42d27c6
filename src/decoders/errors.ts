export type FrameErrorKind =
    | 'even-length'
    | 'invalid-symbol'
    | 'invalid-structure'
    | 'invalid-length'
    | 'unknown-type'
    | 'unsupported-length';

export interface FrameContext {
    pulses?: readonly number[];
    code?: string;
    payload?: readonly number[];
}

/**
 * A frame that cannot be decoded. The frame is dropped, the stream goes on.
 */
export class FrameError extends Error {
    constructor(
        readonly kind: FrameErrorKind,
        message: string,
        readonly context: FrameContext = {},
    ) {
        super(message);
        this.name = 'FrameError';
    }
}

/**
 * A raw field value with no matching enum variant: the bit layout is wrong.
 */
export class EnumValueError extends Error {
    constructor(
        readonly enumName: string,
        readonly value: number,
    ) {
        super(`${enumName}: no variant for raw value ${value}`);
        this.name = 'EnumValueError';
    }
}
