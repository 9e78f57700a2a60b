import type { Diagnostic, DiagnosticLevel, DiagnosticSink } from './Diagnostic';

const RANK: Record<DiagnosticLevel, number> = { info: 0, warn: 1 };

/**
 * Diagnostic sink printing to the console with a prefix
 * 带前缀输出到控制台的诊断接收器
 *
 * @example
 * ```typescript
 * const sink = new ConsoleDiagnosticSink({ minLevel: 'info' });
 * const serde = new InstanceSerde(world, { diagnostics: sink });
 * ```
 */
export class ConsoleDiagnosticSink implements DiagnosticSink {
  private readonly _prefix: string;
  private readonly _minLevel: DiagnosticLevel;

  constructor(options: { prefix?: string; minLevel?: DiagnosticLevel } = {}) {
    this._prefix = `[${options.prefix ?? 'instance-serde'}]`;
    this._minLevel = options.minLevel ?? 'warn';
  }

  report(diagnostic: Diagnostic): void {
    if (RANK[diagnostic.level] < RANK[this._minLevel]) return;
    this.log(`${diagnostic.message} (${diagnostic.kind})`, diagnostic.level);
  }

  protected log(message: string, level: DiagnosticLevel): void {
    const fullMessage = `${this._prefix} ${message}`;

    switch (level) {
      case 'warn':
        console.warn(fullMessage);
        break;
      default:
        console.log(fullMessage);
        break;
    }
  }
}
