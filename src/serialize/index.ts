/**
 * Serialization exports
 * 序列化系统导出
 */

export { TreeSerializer } from './TreeSerializer';
export { TreeDeserializer } from './TreeDeserializer';
export { SerializedRecordSchema, parseSerializedRecord, forEachRecord } from './Types';
export {
  DocumentFormat,
  CURRENT_DOCUMENT_VERSION,
  encodeDocument,
  decodeDocument,
  isVersionCompatible
} from './DocumentCodec';
export type { SerializedRecord, AttributeEntry } from './Types';
export type {
  TreeDocument,
  DocumentVersion,
  DocumentEncodeOptions,
  DocumentDecodeOptions
} from './DocumentCodec';
