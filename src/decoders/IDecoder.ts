export interface IDecoder<T> {
    decode(pulses: readonly number[]): T;
    encode(value: T): number[];
}
