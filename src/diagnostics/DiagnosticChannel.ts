/**
 * Queue of diagnostics for batch inspection
 * 用于批量检查的诊断队列
 */

import type { Diagnostic, DiagnosticKind, DiagnosticSink } from './Diagnostic';

export class DiagnosticChannel implements DiagnosticSink {
  private q: Diagnostic[] = [];

  /**
   * Queue a diagnostic
   * 将诊断加入队列
   */
  report(diagnostic: Diagnostic): void {
    this.q.push(diagnostic);
  }

  /**
   * Consume all diagnostics and clear the queue
   * 逐条消费所有诊断并清空队列
   */
  drain(fn: (diagnostic: Diagnostic) => void): void {
    for (const d of this.q) {
      fn(d);
    }
    this.q.length = 0;
  }

  /**
   * Take all diagnostics and clear the queue
   * 取出所有诊断并清空队列
   */
  takeAll(): Diagnostic[] {
    const out = this.q.slice();
    this.q.length = 0;
    return out;
  }

  /**
   * Queued diagnostics of one kind, without consuming them
   * 查看某一类型的诊断（不消费）
   */
  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.q.filter(d => d.kind === kind);
  }

  get size(): number {
    return this.q.length;
  }

  get hasEvents(): boolean {
    return this.q.length > 0;
  }

  clear(): void {
    this.q.length = 0;
  }
}
