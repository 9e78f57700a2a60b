/**
 * Tests for value codecs and the transcoder
 * 值编解码器与转码器测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { CodecRegistry, typeTagOf } from '../src/codec/CodecRegistry';
import { TypeTag } from '../src/codec/TypeTag';
import type { ValueCodec } from '../src/codec/ValueCodec';
import { ValueTranscoder } from '../src/codec/ValueTranscoder';
import { BrickColor } from '../src/datatypes/BrickColor';
import { CFrame } from '../src/datatypes/CFrame';
import { Color3 } from '../src/datatypes/Color3';
import { valuesEqual } from '../src/datatypes/DataType';
import { Font } from '../src/datatypes/Font';
import { NumberRange } from '../src/datatypes/NumberRange';
import { NumberSequence, NumberSequenceKeypoint } from '../src/datatypes/NumberSequence';
import { PhysicalProperties } from '../src/datatypes/PhysicalProperties';
import { UDim2 } from '../src/datatypes/UDim2';
import { Vector3 } from '../src/datatypes/Vector3';
import { DiagnosticChannel } from '../src/diagnostics/DiagnosticChannel';
import { SchemaRegistry } from '../src/schema/SchemaRegistry';
import { BOLD, ITALIC, NEON, PLASTIC, reflectionDump } from './fixtures/world';

const site = { className: 'Part', property: 'Test', id: 1 };

describe('Value codecs', () => {
  let channel: DiagnosticChannel;
  let values: ValueTranscoder;

  beforeEach(() => {
    const schema = new SchemaRegistry();
    schema.build(reflectionDump);
    channel = new DiagnosticChannel();
    values = new ValueTranscoder(new CodecRegistry(), { enums: schema.enums }, channel);
  });

  describe('encode', () => {
    test('should encode primitives unchanged', () => {
      expect(values.encode('string', 'hello', site)).toEqual({ ok: true, value: 'hello' });
      expect(values.encode('bool', false, site)).toEqual({ ok: true, value: false });
      expect(values.encode('float', 0.25, site)).toEqual({ ok: true, value: 0.25 });
      expect(values.encode('int64', 12, site)).toEqual({ ok: true, value: 12 });
    });

    test('should encode vectors and frames as number arrays', () => {
      expect(values.encode('Vector3', new Vector3(1, 2, 3), site)).toEqual({ ok: true, value: [1, 2, 3] });
      expect(values.encode('CFrame', new CFrame(10, 0, -5), site)).toEqual({
        ok: true,
        value: [10, 0, -5, 1, 0, 0, 0, 1, 0, 0, 0, 1]
      });
    });

    test('should encode Color3 channels as floats', () => {
      expect(values.encode('Color3', new Color3(0.3, 0.5, 0), site)).toEqual({ ok: true, value: [0.3, 0.5, 0] });
    });

    test('should encode Color3uint8 channels as rounded bytes', () => {
      expect(values.encode('Color3uint8', new Color3(1, 0.5, 0), site)).toEqual({ ok: true, value: [255, 128, 0] });
      expect(values.encode('Color3uint8', Color3.fromRGB(12, 34, 56), site)).toEqual({ ok: true, value: [12, 34, 56] });
    });

    test('should encode named values as strings', () => {
      expect(values.encode('BrickColor', BrickColor.named('Bright red'), site)).toEqual({ ok: true, value: 'Bright red' });
      expect(values.encode('Enum', NEON, site)).toEqual({ ok: true, value: 'Material.Neon' });
    });

    test('should encode absent physical properties as null', () => {
      expect(values.encode('PhysicalProperties', null, site)).toEqual({ ok: true, value: null });
      expect(values.encode('PhysicalProperties', undefined, site)).toEqual({ ok: true, value: null });
      expect(values.encode('PhysicalProperties', new PhysicalProperties(0.7, 0.3, 0.5), site)).toEqual({
        ok: true,
        value: [0.7, 0.3, 0.5, 1, 1]
      });
    });

    test('should encode composite values', () => {
      expect(values.encode('Font', new Font('Arial', BOLD, ITALIC), site)).toEqual({
        ok: true,
        value: ['Arial', 'Bold', 'Italic']
      });
      expect(values.encode('UDim2', UDim2.fromScalars(0.5, 10, 1, -4), site)).toEqual({
        ok: true,
        value: [0.5, 10, 1, -4]
      });
      expect(values.encode('NumberRange', new NumberRange(2), site)).toEqual({ ok: true, value: [2, 2] });
      expect(values.encode('NumberSequence', NumberSequence.constant(0.5), site)).toEqual({
        ok: true,
        value: [[0, 0.5, 0], [1, 0.5, 0]]
      });
    });

    test('should pass values of unknown types through with a diagnostic', () => {
      const value = { flag: true };
      const result = values.encode('Mystery', value, site);

      expect(result).toEqual({ ok: true, value });
      const [d] = channel.takeAll();
      expect(d.kind).toBe('unknown-type');
      expect(d.level).toBe('warn');
      expect(d.typeTag).toBe('Mystery');
      expect(d.property).toBe('Test');
    });

    test('should skip a value that does not match its type', () => {
      expect(values.encode('Vector3', 'oops', site)).toEqual({ ok: false });
      expect(channel.ofKind('codec-failure')).toHaveLength(1);
    });
  });

  describe('decode', () => {
    test('should rebuild data types', () => {
      const v = values.decode('Vector3', [1, 2, 3], site);
      expect(v.ok && valuesEqual(v.value, new Vector3(1, 2, 3))).toBe(true);

      const range = values.decode('NumberRange', [1, 4], site);
      expect(range.ok && valuesEqual(range.value, new NumberRange(1, 4))).toBe(true);

      const seq = values.decode('NumberSequence', [[0, 1, 0], [1, 0, 0.1]], site);
      const expected = new NumberSequence([new NumberSequenceKeypoint(0, 1), new NumberSequenceKeypoint(1, 0, 0.1)]);
      expect(seq.ok && valuesEqual(seq.value, expected)).toBe(true);
    });

    test('should keep Color3 channels that are not whole bytes', () => {
      const original = new Color3(0.3, 0.3, 0.3);
      const encoded = values.encode('Color3', original, site);
      if (!encoded.ok) throw new Error('expected an encoding');

      const result = values.decode('Color3', encoded.value, site);
      if (!result.ok || !(result.value instanceof Color3)) throw new Error('expected a Color3');
      expect(result.value.r).toBe(0.3);
      expect(result.value.equals(original)).toBe(true);
    });

    test('should map color bytes back into unit range', () => {
      const result = values.decode('Color3uint8', [255, 128, 0], site);
      expect(result.ok).toBe(true);
      if (!result.ok || !(result.value instanceof Color3)) throw new Error('expected a Color3');
      expect(result.value.r).toBe(1);
      expect(result.value.toRGB()).toEqual([255, 128, 0]);
    });

    test('should reject out-of-range color channels', () => {
      expect(values.decode('Color3uint8', [256, 0, 0], site)).toEqual({ ok: false });
      expect(values.decode('Color3uint8', [0.5, 0, 0], site)).toEqual({ ok: false });
      expect(channel.ofKind('codec-failure')).toHaveLength(2);
    });

    test('should fall back to the default swatch for unknown brick colors', () => {
      const result = values.decode('BrickColor', 'Not a colour', site);
      if (!result.ok || !(result.value instanceof BrickColor)) throw new Error('expected a BrickColor');
      expect(result.value.name).toBe('Medium stone grey');
    });

    test('should resolve enum items with or without an Enum prefix', () => {
      const plain = values.decode('Enum', 'Material.Plastic', site);
      const prefixed = values.decode('Enum', 'Enum.Material.Neon', site);

      expect(plain.ok && valuesEqual(plain.value, PLASTIC)).toBe(true);
      expect(prefixed.ok && valuesEqual(prefixed.value, NEON)).toBe(true);
    });

    test('should report unknown enum items', () => {
      expect(values.decode('Enum', 'Material.Wood', site)).toEqual({ ok: false });
      expect(values.decode('Enum', 'Material', site)).toEqual({ ok: false });
      expect(channel.ofKind('codec-failure')).toHaveLength(2);
    });

    test('should resolve font weight and style through the enum registry', () => {
      const result = values.decode('Font', ['Arial', 'Bold', 'Italic'], site);
      expect(result.ok && valuesEqual(result.value, new Font('Arial', BOLD, ITALIC))).toBe(true);
    });

    test('should keep absent physical properties absent', () => {
      expect(values.decode('PhysicalProperties', null, site)).toEqual({ ok: true, value: null });
    });

    test('should turn invariant violations into codec failures', () => {
      expect(values.decode('NumberRange', [10, 5], site)).toEqual({ ok: false });
      expect(values.decode('NumberSequence', [], site)).toEqual({ ok: false });
      expect(channel.ofKind('codec-failure')).toHaveLength(2);
    });

    test('should reject arrays of the wrong length', () => {
      expect(values.decode('Vector3', [1, 2], site)).toEqual({ ok: false });
      const [d] = channel.takeAll();
      expect(d.message).toBe('Part.Test: [Vector3] expected an array of 3 numbers');
    });
  });

  describe('CodecRegistry', () => {
    test('should serve every built-in tag except references', () => {
      const registry = new CodecRegistry();
      expect(registry.has('float')).toBe(true);
      expect(registry.has('Content')).toBe(true);
      expect(registry.has('Reference')).toBe(false);
      expect(registry.has('Mystery')).toBe(false);
      expect(registry.tags).toHaveLength(22);
    });

    test('should refuse two codecs for one tag', () => {
      const extra: ValueCodec<string> = {
        tags: [TypeTag.String],
        is: (value: unknown): value is string => typeof value === 'string',
        encode: v => v,
        decode: () => ''
      };
      expect(() => new CodecRegistry([extra, extra])).toThrow('tag string already has a codec');
    });

    test('should refuse a codec for references', () => {
      const reference: ValueCodec<number> = {
        tags: [TypeTag.Reference],
        is: (value: unknown): value is number => typeof value === 'number',
        encode: v => v,
        decode: () => 0
      };
      expect(() => new CodecRegistry([reference])).toThrow();
    });

    test('should rethrow errors that are not codec failures', () => {
      const broken: ValueCodec<number> = {
        tags: [TypeTag.Number],
        is: (value: unknown): value is number => typeof value === 'number',
        encode: () => {
          throw new TypeError('boom');
        },
        decode: () => 0
      };
      const transcoder = new ValueTranscoder(new CodecRegistry([broken]), { enums: { getItem: () => undefined } }, channel);

      expect(() => transcoder.encode('number', 1, site)).toThrow(TypeError);
      expect(channel.size).toBe(0);
    });
  });

  describe('typeTagOf', () => {
    test('should tag primitives and data types', () => {
      expect(typeTagOf('a')).toBe('string');
      expect(typeTagOf(true)).toBe('boolean');
      expect(typeTagOf(3)).toBe('number');
      expect(typeTagOf(Vector3.one)).toBe('Vector3');
      expect(typeTagOf(NEON)).toBe('Enum');
      expect(typeTagOf({})).toBeUndefined();
      expect(typeTagOf(null)).toBeUndefined();
    });
  });
});
