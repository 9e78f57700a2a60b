/**
 * Structured diagnostics for degrade-and-continue outcomes
 * 降级继续处理结果的结构化诊断
 */

/**
 * Diagnostic kinds reported while building, serializing or deserializing
 * 构建、序列化或反序列化过程中报告的诊断类型
 */
export type DiagnosticKind =
  | 'unknown-type'
  | 'codec-failure'
  | 'not-instantiable'
  | 'orphaned-subtree'
  | 'missing-schema'
  | 'dangling-reference'
  | 'duplicate-id'
  | 'incompatible-version';

export type DiagnosticLevel = 'info' | 'warn';

export interface Diagnostic {
  kind: DiagnosticKind;
  level: DiagnosticLevel;
  message: string;
  className?: string;
  property?: string;
  typeTag?: string;
  id?: number;
}

/**
 * Receiver of diagnostics
 * 诊断接收器
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

const LEVELS: Record<DiagnosticKind, DiagnosticLevel> = {
  'unknown-type': 'warn',
  'codec-failure': 'warn',
  'not-instantiable': 'info',
  'orphaned-subtree': 'warn',
  'missing-schema': 'info',
  'dangling-reference': 'info',
  'duplicate-id': 'warn',
  'incompatible-version': 'warn'
};

/**
 * Build a diagnostic with the level its kind carries
 * 按诊断类型的默认级别构建诊断
 */
export function diagnostic(
  kind: DiagnosticKind,
  message: string,
  context: Omit<Diagnostic, 'kind' | 'level' | 'message'> = {}
): Diagnostic {
  return { kind, level: LEVELS[kind], message, ...context };
}

/**
 * Sink that discards everything
 * 丢弃所有诊断的接收器
 */
export const NULL_SINK: DiagnosticSink = {
  report(): void {}
};
