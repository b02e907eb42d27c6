export * from './decoders/assembler';
export * from './decoders/checksum';
export * from './decoders/enums';
export * from './decoders/errors';
export * from './decoders/fields';
export * from './decoders/format';
export * from './decoders/gree';
export * from './decoders/IDecoder';
export * from './decoders/payload';
export * from './decoders/pulse';
export * from './decoders/receiver';
export * from './decoders/types';
export * from './esphome';
export * from './Logger';
export { readTimings } from './util';
