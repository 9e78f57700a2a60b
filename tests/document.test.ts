/**
 * Tests for versioned transport documents
 * 版本化传输文档测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import superjson from 'superjson';
import { InstanceSerde } from '../src/InstanceSerde';
import type { InstanceWorld } from '../src/core/InstanceWorld';
import { BrickColor } from '../src/datatypes/BrickColor';
import { valuesEqual } from '../src/datatypes/DataType';
import { Font } from '../src/datatypes/Font';
import { NumberRange } from '../src/datatypes/NumberRange';
import { NumberSequence, NumberSequenceKeypoint } from '../src/datatypes/NumberSequence';
import { UDim2 } from '../src/datatypes/UDim2';
import { Vector3 } from '../src/datatypes/Vector3';
import { DiagnosticChannel } from '../src/diagnostics/DiagnosticChannel';
import {
  CURRENT_DOCUMENT_VERSION,
  DocumentFormat,
  decodeDocument,
  encodeDocument,
  isVersionCompatible
} from '../src/serialize/DocumentCodec';
import type { SerializedRecord } from '../src/serialize/Types';
import { isSerdeError } from '../src/utils/SerdeError';
import { BOLD, ITALIC, createWorld, reflectionDump } from './fixtures/world';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return isSerdeError(e) ? e.code : 'not a SerdeError';
  }
  return undefined;
}

const record: SerializedRecord = {
  Type: 'Group',
  Id: 1,
  Properties: { Name: 'Lamp' },
  Children: [
    {
      Type: 'Part',
      Id: 2,
      Properties: { Size: [1, 2, 3], CustomPhysicalProperties: null },
      Tags: ['Glow'],
      Attributes: { Power: ['number', 3] }
    }
  ]
};

describe('DocumentCodec', () => {
  test('should wrap a record in a versioned JSON document', () => {
    const text = encodeDocument(record, { timestamp: 42 });

    expect(typeof text).toBe('string');
    expect(decodeDocument(text)).toEqual({ version: CURRENT_DOCUMENT_VERSION, timestamp: 42, root: record });
  });

  test('should indent JSON when asked', () => {
    const compact = encodeDocument(record, { timestamp: 1 });
    const pretty = encodeDocument(record, { timestamp: 1, prettyPrint: true });

    expect(compact.includes('\n')).toBe(false);
    expect(pretty.includes('\n  ')).toBe(true);
    expect(decodeDocument(pretty).root).toEqual(record);
  });

  test('should encode MessagePack bytes', () => {
    const bytes = encodeDocument(record, { format: DocumentFormat.Binary, timestamp: 7 });

    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(decodeDocument(bytes)).toEqual({ version: CURRENT_DOCUMENT_VERSION, timestamp: 7, root: record });
  });

  test('should refuse undecodable input', () => {
    expect(errorCode(() => decodeDocument('not json'))).toBe('MALFORMED_INPUT');
    expect(errorCode(() => decodeDocument(new Uint8Array(0)))).toBe('MALFORMED_INPUT');
  });

  test('should refuse documents with the wrong shape', () => {
    expect(errorCode(() => decodeDocument(superjson.stringify({ hello: 'world' })))).toBe('MALFORMED_INPUT');

    const badRoot = superjson.stringify({ version: CURRENT_DOCUMENT_VERSION, timestamp: 1, root: { Type: 'Group' } });
    expect(errorCode(() => decodeDocument(badRoot))).toBe('MALFORMED_INPUT');
  });

  describe('versioning', () => {
    const future = superjson.stringify({ version: { major: 2, minor: 0, patch: 0 }, timestamp: 1, root: record });

    test('should report an incompatible version and keep going', () => {
      const channel = new DiagnosticChannel();
      const document = decodeDocument(future, { diagnostics: channel });

      expect(document.root).toEqual(record);
      const [d] = channel.takeAll();
      expect(d.kind).toBe('incompatible-version');
      expect(d.message).toBe('Incompatible document version. Source: 2.0.0, Current: 1.0.0');
    });

    test('should refuse an incompatible version in strict mode', () => {
      expect(errorCode(() => decodeDocument(future, { strict: true }))).toBe('INCOMPATIBLE_VERSION');
    });

    test('should accept the same major version up to the current one', () => {
      expect(isVersionCompatible({ major: 1, minor: 0, patch: 0 })).toBe(true);
      expect(isVersionCompatible({ major: 1, minor: 0, patch: 1 })).toBe(false);
      expect(isVersionCompatible({ major: 1, minor: 1, patch: 0 })).toBe(false);
      expect(isVersionCompatible({ major: 0, minor: 9, patch: 9 })).toBe(false);
    });
  });

  describe('InstanceSerde documents', () => {
    let world: InstanceWorld;
    let serde: InstanceSerde<number>;

    beforeEach(() => {
      world = createWorld();
      serde = new InstanceSerde(world, { diagnostics: new DiagnosticChannel() }).buildSchema(reflectionDump);
    });

    function buildScene(): number {
      const group = world.create('Group');
      const label = world.create('TextLabel');
      world.set(label, 'Text', 'Hello');
      world.set(label, 'FontFace', new Font('Arial', BOLD, ITALIC));
      world.set(label, 'Size', UDim2.fromScalars(0.5, 0, 0, 40));
      world.setParent(label, group);

      const emitter = world.create('ParticleEmitter');
      world.set(emitter, 'Transparency', new NumberSequence([
        new NumberSequenceKeypoint(0, 0),
        new NumberSequenceKeypoint(1, 1, 0.2)
      ]));
      world.set(emitter, 'Lifetime', new NumberRange(1, 2));
      world.setParent(emitter, group);

      const part = world.create('Part');
      world.set(part, 'Size', new Vector3(2, 2, 2));
      world.set(part, 'BrickColor', BrickColor.named('Institutional white'));
      world.set(part, 'Attachment0', part);
      world.setAttribute(part, 'Weight', 12.5);
      world.setParent(part, group);
      return group;
    }

    test('should round-trip a scene through JSON', () => {
      const group = buildScene();
      const text = serde.toJSON(group);
      const expected = serde.serializeTree(group);
      world.destroy(group);

      const copy = serde.fromDocument(text);
      expect(serde.serializeTree(copy)).toEqual(expected);

      const [label, emitter, part] = world.getChildren(copy);
      expect(valuesEqual(world.get(label, 'FontFace'), new Font('Arial', BOLD, ITALIC))).toBe(true);
      expect(valuesEqual(world.get(emitter, 'Lifetime'), new NumberRange(1, 2))).toBe(true);
      expect(world.get(part, 'Attachment0')).toBe(part);
      expect(world.getAttribute(part, 'Weight')).toBe(12.5);
    });

    test('should round-trip a scene through MessagePack', () => {
      const group = buildScene();
      const bytes = serde.toBinary(group);
      const expected = serde.serializeTree(group);
      const workspace = world.create('Workspace');

      const copy = serde.fromDocument(bytes, workspace);

      expect(world.getParent(copy)).toBe(workspace);
      expect(serde.serializeTree(copy)).toEqual(expected);
    });
  });
});
