/**
 * Error type for hard failures at the serializer's call boundaries
 * 序列化器调用边界上的硬失败错误类型
 */

export type SerdeErrorCode =
  | 'MALFORMED_INPUT'
  | 'NOT_INSTANTIABLE'
  | 'SCHEMA_NOT_BUILT'
  | 'SCHEMA_ALREADY_BUILT'
  | 'DEFAULTS_UNAVAILABLE'
  | 'CODEC_FAILURE'
  | 'INCOMPATIBLE_VERSION';

export class SerdeError extends Error {
  readonly code: SerdeErrorCode;
  readonly details?: unknown;

  constructor(code: SerdeErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'SerdeError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Check whether a thrown value is a SerdeError, optionally with a given code
 * 检查抛出值是否为 SerdeError（可指定错误码）
 */
export function isSerdeError(e: unknown, code?: SerdeErrorCode): e is SerdeError {
  return e instanceof SerdeError && (code === undefined || e.code === code);
}

/**
 * Normalize any thrown value into a SerdeError
 * 将任意抛出值规范化为 SerdeError
 */
export function toSerdeError(e: unknown, fallback: SerdeErrorCode = 'MALFORMED_INPUT'): SerdeError {
  if (e instanceof SerdeError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new SerdeError(fallback, message, e);
}
