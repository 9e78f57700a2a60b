/**
 * Tests for diagnostics, errors and options
 * 诊断、错误与选项测试
 */

import { describe, test, expect, afterEach, vi } from 'vitest';
import { ConsoleDiagnosticSink } from '../src/diagnostics/ConsoleDiagnosticSink';
import { diagnostic } from '../src/diagnostics/Diagnostic';
import { DiagnosticChannel } from '../src/diagnostics/DiagnosticChannel';
import { SerdeError, isSerdeError, toSerdeError } from '../src/utils/SerdeError';
import { DEFAULT_SCHEMA_OPTIONS, resolveSerdeOptions } from '../src/utils/SerdeOptions';

describe('Diagnostics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should assign each kind its level', () => {
    expect(diagnostic('unknown-type', 'x').level).toBe('warn');
    expect(diagnostic('orphaned-subtree', 'x').level).toBe('warn');
    expect(diagnostic('missing-schema', 'x').level).toBe('info');
    expect(diagnostic('dangling-reference', 'x', { id: 4 })).toEqual({
      kind: 'dangling-reference',
      level: 'info',
      message: 'x',
      id: 4
    });
  });

  describe('ConsoleDiagnosticSink', () => {
    test('should print warnings with the default prefix', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const sink = new ConsoleDiagnosticSink();

      sink.report(diagnostic('codec-failure', 'Part.Size: bad value'));
      sink.report(diagnostic('missing-schema', 'hidden by default'));

      expect(warn).toHaveBeenCalledWith('[instance-serde] Part.Size: bad value (codec-failure)');
      expect(log).not.toHaveBeenCalled();
    });

    test('should print info diagnostics when asked', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const sink = new ConsoleDiagnosticSink({ prefix: 'loader', minLevel: 'info' });

      sink.report(diagnostic('missing-schema', 'Leaf.Nope is not in the schema, skipped'));

      expect(log).toHaveBeenCalledWith('[loader] Leaf.Nope is not in the schema, skipped (missing-schema)');
    });
  });

  describe('DiagnosticChannel', () => {
    test('should queue, filter and drain', () => {
      const channel = new DiagnosticChannel();
      channel.report(diagnostic('unknown-type', 'a'));
      channel.report(diagnostic('duplicate-id', 'b'));
      channel.report(diagnostic('unknown-type', 'c'));

      expect(channel.size).toBe(3);
      expect(channel.ofKind('unknown-type').map(d => d.message)).toEqual(['a', 'c']);

      const seen: string[] = [];
      channel.drain(d => seen.push(d.message));
      expect(seen).toEqual(['a', 'b', 'c']);
      expect(channel.hasEvents).toBe(false);
    });

    test('should hand over and clear on takeAll', () => {
      const channel = new DiagnosticChannel();
      channel.report(diagnostic('duplicate-id', 'a'));

      expect(channel.takeAll()).toHaveLength(1);
      expect(channel.size).toBe(0);

      channel.report(diagnostic('duplicate-id', 'b'));
      channel.clear();
      expect(channel.hasEvents).toBe(false);
    });
  });

  describe('SerdeError', () => {
    test('should carry a code and details', () => {
      const error = new SerdeError('CODEC_FAILURE', 'bad', { at: 1 });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('SerdeError');
      expect(error.details).toEqual({ at: 1 });
      expect(isSerdeError(error)).toBe(true);
      expect(isSerdeError(error, 'CODEC_FAILURE')).toBe(true);
      expect(isSerdeError(error, 'MALFORMED_INPUT')).toBe(false);
      expect(isSerdeError(new Error('bad'))).toBe(false);
    });

    test('should normalize foreign errors', () => {
      const original = new SerdeError('NOT_INSTANTIABLE', 'nope');
      expect(toSerdeError(original)).toBe(original);

      const wrapped = toSerdeError(new TypeError('boom'), 'DEFAULTS_UNAVAILABLE');
      expect(wrapped.code).toBe('DEFAULTS_UNAVAILABLE');
      expect(wrapped.message).toBe('boom');
      expect(toSerdeError('plain').message).toBe('plain');
    });
  });

  describe('resolveSerdeOptions', () => {
    test('should fill in defaults', () => {
      const resolved = resolveSerdeOptions();

      expect(resolved.schema).toEqual(DEFAULT_SCHEMA_OPTIONS);
      expect(resolved.orphanPolicy).toBe('drop');
      expect(resolved.diagnostics).toBeInstanceOf(ConsoleDiagnosticSink);
    });

    test('should merge schema overrides', () => {
      const channel = new DiagnosticChannel();
      const resolved = resolveSerdeOptions({ schema: { serviceTag: 'Singleton' }, diagnostics: channel });

      expect(resolved.schema.serviceTag).toBe('Singleton');
      expect(resolved.schema.notCreatableTag).toBe('NotCreatable');
      expect(resolved.diagnostics).toBe(channel);
    });
  });
});
