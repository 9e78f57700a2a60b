/**
 * Codec dispatch with degrade-and-continue reporting
 * 带降级继续报告的编解码分发
 */

import type { DiagnosticSink } from '../diagnostics/Diagnostic';
import { diagnostic } from '../diagnostics/Diagnostic';
import { isSerdeError } from '../utils/SerdeError';
import type { CodecRegistry } from './CodecRegistry';
import type { CodecContext } from './ValueCodec';

export type Transcoded = { ok: true; value: unknown } | { ok: false };

/**
 * Where a value lives, for diagnostics
 * 值所在位置（用于诊断）
 */
export interface ValueSite {
  className: string;
  property: string;
  id?: number;
}

export class ValueTranscoder {
  constructor(
    private readonly codecs: CodecRegistry,
    private readonly context: CodecContext,
    private readonly diagnostics: DiagnosticSink
  ) {}

  /**
   * Encode a live value. Unknown tags pass the value through unchanged;
   * a value the codec rejects is skipped.
   * 编码实时值。未知标签原样透传；编解码器拒绝的值被跳过。
   */
  encode(tag: string, value: unknown, site: ValueSite): Transcoded {
    const codec = this.codecs.get(tag);
    if (!codec) {
      this.unknownType(tag, site);
      return { ok: true, value };
    }
    if (!codec.is(value)) {
      this.diagnostics.report(diagnostic(
        'codec-failure',
        `${site.className}.${site.property}: value does not match type ${tag}`,
        { ...site, typeTag: tag }
      ));
      return { ok: false };
    }
    try {
      return { ok: true, value: codec.encode(value, this.context) };
    } catch (e) {
      return this.failed(e, tag, site);
    }
  }

  /**
   * Decode transport data
   * 解码传输数据
   */
  decode(tag: string, data: unknown, site: ValueSite): Transcoded {
    const codec = this.codecs.get(tag);
    if (!codec) {
      this.unknownType(tag, site);
      return { ok: true, value: data };
    }
    try {
      return { ok: true, value: codec.decode(data, this.context) };
    } catch (e) {
      return this.failed(e, tag, site);
    }
  }

  private unknownType(tag: string, site: ValueSite): void {
    this.diagnostics.report(diagnostic(
      'unknown-type',
      `Unknown type ${tag} for ${site.className}.${site.property}, passing value through`,
      { ...site, typeTag: tag }
    ));
  }

  private failed(e: unknown, tag: string, site: ValueSite): Transcoded {
    const known = isSerdeError(e, 'CODEC_FAILURE') || e instanceof RangeError ? e : undefined;
    if (!known) throw e;
    this.diagnostics.report(diagnostic(
      'codec-failure',
      `${site.className}.${site.property}: ${known.message}`,
      { ...site, typeTag: tag }
    ));
    return { ok: false };
  }
}
