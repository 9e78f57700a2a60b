/**
 * Codec exports
 * 编解码器导出
 */

export { TypeTag, isTypeTag } from './TypeTag';
export { CodecRegistry, typeTagOf } from './CodecRegistry';
export { BUILTIN_CODECS } from './Codecs';
export { ValueTranscoder } from './ValueTranscoder';
export { codecFailure, readNumbers, readString } from './ValueCodec';
export type { CodecContext, EnumLookup, JsonValue, ValueCodec } from './ValueCodec';
export type { Transcoded, ValueSite } from './ValueTranscoder';
