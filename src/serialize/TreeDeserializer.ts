/**
 * Record to object tree deserialization
 * 记录到对象树的反序列化
 */

import type { ValueTranscoder } from '../codec/ValueTranscoder';
import type { DiagnosticSink } from '../diagnostics/Diagnostic';
import { diagnostic } from '../diagnostics/Diagnostic';
import type { HostModel } from '../model/HostModel';
import type { SchemaRegistry } from '../schema/SchemaRegistry';
import { SerdeError } from '../utils/SerdeError';
import type { OrphanPolicy } from '../utils/SerdeOptions';
import type { AttributeEntry, SerializedRecord } from './Types';
import { parseSerializedRecord } from './Types';

interface Materialized<H> {
  object: H;
  record: SerializedRecord;
}

/**
 * Per-call construction state: every materialized node in creation order,
 * plus the id index used to resolve references
 * 单次调用的构建状态：按创建顺序的已实例化节点，以及用于解析引用的编号索引
 */
interface Arena<H> {
  nodes: Materialized<H>[];
  byId: Map<number, Materialized<H>>;
}

/**
 * Two-pass deserializer: materialize every node, then link references
 * 两遍反序列化器：先实例化所有节点，再链接引用
 */
export class TreeDeserializer<H> {
  constructor(
    private readonly schema: SchemaRegistry,
    private readonly model: HostModel<H>,
    private readonly values: ValueTranscoder,
    private readonly diagnostics: DiagnosticSink,
    private readonly orphanPolicy: OrphanPolicy = 'drop'
  ) {}

  /**
   * Rebuild a tree from a record. The root is attached to `parent` only
   * after every reference has been linked. Nothing is rolled back on failure.
   * 从记录重建对象树。所有引用链接完成后才将根挂到 `parent` 下。失败时不回滚。
   *
   * @throws SerdeError MALFORMED_INPUT for an invalid record,
   * NOT_INSTANTIABLE if the root cannot be created
   */
  deserializeTree(input: unknown, parent?: H): H {
    const record = parseSerializedRecord(input);
    const arena: Arena<H> = { nodes: [], byId: new Map() };

    const root = this.deserializeObject(record);
    if (root === undefined) {
      throw new SerdeError('NOT_INSTANTIABLE', `Class ${record.Type} is not instantiable`);
    }
    this.register(arena, root, record);
    this.materializeChildren(arena, record, root);

    this.linkReferences(arena);

    if (parent !== undefined) {
      this.model.setParent(root, parent);
    }
    return root;
  }

  /**
   * Create one object and apply its non-reference properties, tags and
   * attributes; undefined when the class is not instantiable
   * 创建单个对象并应用其非引用属性、标签和特性；类不可实例化时返回 undefined
   */
  deserializeObject(record: SerializedRecord): H | undefined {
    const className = record.Type;
    if (!this.schema.isInstantiable(className)) {
      this.diagnostics.report(diagnostic('not-instantiable', `Cannot create ${className}: class is not instantiable`, {
        className,
        id: record.Id
      }));
      return undefined;
    }

    const object = this.model.create(className);

    for (const [name, data] of Object.entries(record.Properties)) {
      const spec = this.schema.getProperty(className, name);
      if (!spec) {
        this.diagnostics.report(diagnostic('missing-schema', `${className}.${name} is not in the schema, skipped`, {
          className,
          property: name,
          id: record.Id
        }));
        continue;
      }
      // linked once every node exists
      if (spec.isReference) continue;

      const decoded = this.values.decode(spec.typeTag, data, { className, property: name, id: record.Id });
      if (decoded.ok) {
        this.model.set(object, name, decoded.value);
      }
    }

    for (const tag of record.Tags ?? []) {
      this.model.addTag(object, tag);
    }

    const attributes: Record<string, AttributeEntry> = record.Attributes ?? {};
    for (const [name, [tag, data]] of Object.entries(attributes)) {
      const decoded = this.values.decode(tag, data, { className, property: name, id: record.Id });
      if (decoded.ok) {
        this.model.setAttribute(object, name, decoded.value);
      }
    }

    return object;
  }

  private materializeChildren(arena: Arena<H>, record: SerializedRecord, parent: H): void {
    for (const child of record.Children ?? []) {
      const object = this.deserializeObject(child);
      if (object === undefined) {
        this.orphaned(arena, child, parent);
        continue;
      }
      this.register(arena, object, child);
      this.model.setParent(object, parent);
      this.materializeChildren(arena, child, object);
    }
  }

  private orphaned(arena: Arena<H>, record: SerializedRecord, ancestor: H): void {
    if (!record.Children || record.Children.length === 0) return;

    this.diagnostics.report(diagnostic(
      'orphaned-subtree',
      this.orphanPolicy === 'reparent'
        ? `Children of ${record.Type} #${record.Id} reparented to the nearest created ancestor`
        : `Children of ${record.Type} #${record.Id} dropped`,
      { className: record.Type, id: record.Id }
    ));

    if (this.orphanPolicy === 'reparent') {
      this.materializeChildren(arena, record, ancestor);
    }
  }

  private register(arena: Arena<H>, object: H, record: SerializedRecord): void {
    const node: Materialized<H> = { object, record };
    arena.nodes.push(node);
    if (arena.byId.has(record.Id)) {
      this.diagnostics.report(diagnostic(
        'duplicate-id',
        `Id ${record.Id} appears more than once; references resolve to the first node`,
        { className: record.Type, id: record.Id }
      ));
      return;
    }
    arena.byId.set(record.Id, node);
  }

  /**
   * Second pass: assign reference properties from stored ids
   * 第二遍：根据保存的编号为引用属性赋值
   */
  private linkReferences(arena: Arena<H>): void {
    for (const { object, record } of arena.nodes) {
      for (const [name, value] of Object.entries(record.Properties)) {
        const spec = this.schema.getProperty(record.Type, name);
        if (!spec?.isReference) continue;

        const target = typeof value === 'number' ? arena.byId.get(value) : undefined;
        if (target) {
          this.model.set(object, name, target.object);
        } else {
          this.diagnostics.report(diagnostic(
            'dangling-reference',
            `${record.Type}.${name} refers to unknown id ${String(value)}`,
            { className: record.Type, property: name, id: record.Id }
          ));
        }
      }
    }
  }
}
