/**
 * Facade tying a host model to a schema registry, codecs and the tree walkers
 * 将宿主模型与 schema 注册表、编解码器和树遍历器组合的门面
 *
 * @example
 * ```typescript
 * const serde = new InstanceSerde(world);
 * serde.buildSchema(JSON.parse(dumpText));
 *
 * const record = serde.serializeTree(model);
 * world.destroy(model);
 * const restored = serde.deserializeTree(record, workspace);
 * ```
 */

import { CodecRegistry } from './codec/CodecRegistry';
import type { CodecContext } from './codec/ValueCodec';
import { ValueTranscoder } from './codec/ValueTranscoder';
import type { DiagnosticSink } from './diagnostics/Diagnostic';
import type { HostModel } from './model/HostModel';
import { DefaultResolver } from './schema/DefaultResolver';
import { SchemaRegistry } from './schema/SchemaRegistry';
import { DocumentFormat, decodeDocument, encodeDocument } from './serialize/DocumentCodec';
import { TreeDeserializer } from './serialize/TreeDeserializer';
import { TreeSerializer } from './serialize/TreeSerializer';
import type { SerializedRecord } from './serialize/Types';
import type { SerdeOptions } from './utils/SerdeOptions';
import { resolveSerdeOptions } from './utils/SerdeOptions';

export class InstanceSerde<H> {
  readonly schema: SchemaRegistry;
  readonly defaults: DefaultResolver<H>;
  readonly diagnostics: DiagnosticSink;
  private readonly _serializer: TreeSerializer<H>;
  private readonly _deserializer: TreeDeserializer<H>;

  constructor(readonly model: HostModel<H>, options: SerdeOptions = {}, codecs: CodecRegistry = new CodecRegistry()) {
    const resolved = resolveSerdeOptions(options);
    this.diagnostics = resolved.diagnostics;
    this.schema = new SchemaRegistry(resolved.schema, codecs);
    this.defaults = new DefaultResolver(this.schema, model);

    const schema = this.schema;
    const context: CodecContext = {
      enums: { getItem: (enumType, name) => schema.enums.getItem(enumType, name) }
    };
    const values = new ValueTranscoder(codecs, context, this.diagnostics);

    this._serializer = new TreeSerializer(this.schema, this.defaults, model, values, this.diagnostics);
    this._deserializer = new TreeDeserializer(this.schema, model, values, this.diagnostics, resolved.orphanPolicy);
  }

  /**
   * Build the schema from a reflection dump; runs once, before any other call
   * 从反射转储构建 schema；只运行一次，且须在其他调用之前
   */
  buildSchema(dump: unknown): this {
    this.schema.build(dump);
    return this;
  }

  /**
   * Serialize an object subtree
   * 序列化对象子树
   */
  serializeTree(root: unknown): SerializedRecord {
    return this._serializer.serializeTree(root);
  }

  /**
   * Rebuild an object subtree, optionally under a parent
   * 重建对象子树，可选挂到父对象下
   */
  deserializeTree(record: unknown, parent?: H): H {
    return this._deserializer.deserializeTree(record, parent);
  }

  /**
   * Serialize to a JSON document
   * 序列化为 JSON 文档
   */
  toJSON(root: unknown, prettyPrint = false): string {
    return encodeDocument(this.serializeTree(root), { format: DocumentFormat.JSON, prettyPrint });
  }

  /**
   * Serialize to a MessagePack document
   * 序列化为 MessagePack 文档
   */
  toBinary(root: unknown): Uint8Array {
    return encodeDocument(this.serializeTree(root), { format: DocumentFormat.Binary });
  }

  /**
   * Rebuild from a JSON or MessagePack document
   * 从 JSON 或 MessagePack 文档重建
   */
  fromDocument(data: string | Uint8Array, parent?: H, options: { strict?: boolean } = {}): H {
    const document = decodeDocument(data, { strict: options.strict, diagnostics: this.diagnostics });
    return this.deserializeTree(document.root, parent);
  }
}
