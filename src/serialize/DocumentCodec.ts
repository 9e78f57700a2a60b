/**
 * Versioned transport documents using Superjson and MessagePack
 * 使用 Superjson 与 MessagePack 的版本化传输文档
 *
 * @example
 * ```typescript
 * // JSON (human-readable)
 * const text = encodeDocument(record, { format: DocumentFormat.JSON, prettyPrint: true });
 * const doc = decodeDocument(text);
 *
 * // MessagePack (binary, compact)
 * const bytes = encodeDocument(record, { format: DocumentFormat.Binary });
 * const same = decodeDocument(bytes).root;
 * ```
 */

import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import { z } from 'zod';
import type { DiagnosticSink } from '../diagnostics/Diagnostic';
import { diagnostic, NULL_SINK } from '../diagnostics/Diagnostic';
import { SerdeError } from '../utils/SerdeError';
import type { SerializedRecord } from './Types';
import { SerializedRecordSchema } from './Types';

export enum DocumentFormat {
  /** Human-readable JSON JSON格式，便于阅读 */
  JSON = 'json',
  /** MessagePack bytes 二进制格式 */
  Binary = 'binary'
}

export interface DocumentVersion {
  major: number;
  minor: number;
  patch: number;
}

export const CURRENT_DOCUMENT_VERSION: DocumentVersion = {
  major: 1,
  minor: 0,
  patch: 0
};

/**
 * Document envelope around a record tree
 * 记录树外层的文档封装
 */
export interface TreeDocument {
  version: DocumentVersion;
  timestamp: number;
  root: SerializedRecord;
}

export interface DocumentEncodeOptions {
  format?: DocumentFormat;
  /** Indent JSON output 格式化 JSON 输出 */
  prettyPrint?: boolean;
  /** Fixed timestamp instead of `Date.now()` 使用固定时间戳代替 `Date.now()` */
  timestamp?: number;
}

export interface DocumentDecodeOptions {
  /** Reject documents from an incompatible version 拒绝不兼容版本的文档 */
  strict?: boolean;
  diagnostics?: DiagnosticSink;
}

const VersionSchema = z.object({
  major: z.number().int().nonnegative(),
  minor: z.number().int().nonnegative(),
  patch: z.number().int().nonnegative()
});

const TreeDocumentSchema = z.object({
  version: VersionSchema,
  timestamp: z.number(),
  root: SerializedRecordSchema
});

export function encodeDocument(
  root: SerializedRecord,
  options: DocumentEncodeOptions & { format: DocumentFormat.Binary }
): Uint8Array;
export function encodeDocument(
  root: SerializedRecord,
  options?: DocumentEncodeOptions & { format?: DocumentFormat.JSON }
): string;
/**
 * Wrap a record tree in a versioned document and encode it
 * 将记录树封装为版本化文档并编码
 */
export function encodeDocument(root: SerializedRecord, options: DocumentEncodeOptions = {}): string | Uint8Array {
  const format = options.format ?? DocumentFormat.JSON;
  const document: TreeDocument = {
    version: CURRENT_DOCUMENT_VERSION,
    timestamp: options.timestamp ?? Date.now(),
    root
  };

  switch (format) {
    case DocumentFormat.JSON: {
      const jsonString = superjson.stringify(document);
      return options.prettyPrint ? JSON.stringify(JSON.parse(jsonString), null, 2) : jsonString;
    }

    case DocumentFormat.Binary:
      try {
        return new Uint8Array(msgpackEncode(document));
      } catch (error) {
        throw new SerdeError(
          'MALFORMED_INPUT',
          `Document encoding failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }

    default:
      throw new SerdeError('MALFORMED_INPUT', `Unsupported document format: ${String(format)}`);
  }
}

/**
 * Decode a document; strings are read as JSON, bytes as MessagePack
 * 解码文档；字符串按 JSON 读取，字节按 MessagePack 读取
 *
 * @throws SerdeError MALFORMED_INPUT for undecodable or invalid documents,
 * INCOMPATIBLE_VERSION in strict mode
 */
export function decodeDocument(data: string | Uint8Array, options: DocumentDecodeOptions = {}): TreeDocument {
  let raw: unknown;
  try {
    raw = typeof data === 'string' ? superjson.parse<unknown>(data) : msgpackDecode(data);
  } catch (error) {
    throw new SerdeError(
      'MALFORMED_INPUT',
      `Document decoding failed: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const parsed = TreeDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SerdeError('MALFORMED_INPUT', `Invalid document: ${parsed.error.message}`, parsed.error.issues);
  }
  const document: TreeDocument = parsed.data;

  if (!isVersionCompatible(document.version)) {
    const { major, minor, patch } = document.version;
    const current = CURRENT_DOCUMENT_VERSION;
    const message =
      `Incompatible document version. Source: ${major}.${minor}.${patch}, ` +
      `Current: ${current.major}.${current.minor}.${current.patch}`;
    if (options.strict) {
      throw new SerdeError('INCOMPATIBLE_VERSION', message, document.version);
    }
    (options.diagnostics ?? NULL_SINK).report(diagnostic('incompatible-version', message));
  }

  return document;
}

/**
 * Same major version, and not newer than the current one
 * 主版本相同且不高于当前版本
 */
export function isVersionCompatible(source: DocumentVersion): boolean {
  const current = CURRENT_DOCUMENT_VERSION;

  if (source.major !== current.major) {
    return false;
  }
  if (source.minor > current.minor) {
    return false;
  }
  if (source.minor === current.minor && source.patch > current.patch) {
    return false;
  }
  return true;
}
