/**
 * Diagnostics exports
 * 诊断导出
 */

export { diagnostic, NULL_SINK } from './Diagnostic';
export { ConsoleDiagnosticSink } from './ConsoleDiagnosticSink';
export { DiagnosticChannel } from './DiagnosticChannel';
export type { Diagnostic, DiagnosticKind, DiagnosticLevel, DiagnosticSink } from './Diagnostic';
