/**
 * Object tree to record serialization
 * 对象树到记录的序列化
 */

import { typeTagOf } from '../codec/CodecRegistry';
import type { ValueTranscoder } from '../codec/ValueTranscoder';
import { valuesEqual } from '../datatypes/DataType';
import type { DiagnosticSink } from '../diagnostics/Diagnostic';
import { diagnostic } from '../diagnostics/Diagnostic';
import type { HostModel } from '../model/HostModel';
import type { DefaultResolver } from '../schema/DefaultResolver';
import type { SchemaRegistry } from '../schema/SchemaRegistry';
import { SerdeError } from '../utils/SerdeError';
import type { AttributeEntry, SerializedRecord } from './Types';

// Plain assignment would hit the `__proto__` setter instead of creating a key
function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Two-pass serializer: a pre-order walk producing records, then a pass
 * turning reference properties into target ids
 * 两遍序列化器：先序遍历生成记录，再将引用属性转换为目标编号
 */
export class TreeSerializer<H> {
  constructor(
    private readonly schema: SchemaRegistry,
    private readonly defaults: DefaultResolver<H>,
    private readonly model: HostModel<H>,
    private readonly values: ValueTranscoder,
    private readonly diagnostics: DiagnosticSink
  ) {}

  /**
   * Serialize an object and its serializable descendants
   * 序列化对象及其可序列化的后代
   *
   * @throws SerdeError MALFORMED_INPUT if `root` is not a host object,
   * NOT_INSTANTIABLE if the root's class cannot be serialized
   */
  serializeTree(root: unknown): SerializedRecord {
    if (!this.model.isObject(root)) {
      throw new SerdeError('MALFORMED_INPUT', 'serializeTree expects a live host object');
    }

    const lookup = new Map<H, SerializedRecord>();
    const record = this.walk(root, { next: 1 }, lookup);
    if (!record) {
      throw new SerdeError('NOT_INSTANTIABLE', `Class ${this.model.getClassName(root)} is not serializable`);
    }
    this.linkReferences(lookup);
    return record;
  }

  /**
   * Serialize one object without children or references; undefined when
   * its class is not instantiable
   * 序列化单个对象（不含子对象与引用）；类不可实例化时返回 undefined
   */
  serializeObject(object: H, id: number): SerializedRecord | undefined {
    const className = this.model.getClassName(object);
    if (!this.schema.isInstantiable(className)) {
      this.diagnostics.report(diagnostic('not-instantiable', `Skipping ${className}: class is not instantiable`, { className }));
      return undefined;
    }

    const defaults = this.defaults.resolve(className);
    const properties: Record<string, unknown> = {};
    for (const spec of this.schema.valueProperties(className)) {
      const value = this.model.get(object, spec.name);
      if (valuesEqual(value, defaults.get(spec.name))) continue;

      const encoded = this.values.encode(spec.typeTag, value, { className, property: spec.name, id });
      if (encoded.ok) {
        setOwn(properties, spec.name, encoded.value);
      }
    }

    const record: SerializedRecord = { Type: className, Id: id, Properties: properties };

    const tags = this.model.getTags(object);
    if (tags.length > 0) {
      record.Tags = [...tags];
    }

    const attributes = this.model.getAttributes(object);
    if (attributes.size > 0) {
      const out: Record<string, AttributeEntry> = {};
      for (const [name, value] of attributes) {
        // attributes are typed by their runtime value, not by schema
        const tag = typeTagOf(value) ?? typeof value;
        const encoded = this.values.encode(tag, value, { className, property: name, id });
        if (encoded.ok) {
          setOwn(out, name, [tag, encoded.value]);
        }
      }
      if (Object.keys(out).length > 0) {
        record.Attributes = out;
      }
    }

    return record;
  }

  private walk(object: H, ids: { next: number }, lookup: Map<H, SerializedRecord>): SerializedRecord | undefined {
    const record = this.serializeObject(object, ids.next);
    if (!record) return undefined;
    ids.next++;
    lookup.set(object, record);

    const children: SerializedRecord[] = [];
    for (const child of this.model.getChildren(object)) {
      const childRecord = this.walk(child, ids, lookup);
      if (childRecord) {
        children.push(childRecord);
      }
    }
    if (children.length > 0) {
      record.Children = children;
    }
    return record;
  }

  /**
   * Second pass: reference properties become ids of records in the same tree
   * 第二遍：引用属性转换为同一棵树内记录的编号
   */
  private linkReferences(lookup: ReadonlyMap<H, SerializedRecord>): void {
    for (const [object, record] of lookup) {
      for (const spec of this.schema.referenceProperties(record.Type)) {
        const target = this.model.get(object, spec.name);
        if (target === undefined || target === null) continue;

        const targetRecord = this.model.isObject(target) ? lookup.get(target) : undefined;
        if (targetRecord) {
          setOwn(record.Properties, spec.name, targetRecord.Id);
        } else {
          this.diagnostics.report(diagnostic(
            'dangling-reference',
            `${record.Type}.${spec.name} points outside the serialized tree`,
            { className: record.Type, property: spec.name, id: record.Id }
          ));
        }
      }
    }
  }
}
