/**
 * Schema registry with an init-once lifecycle
 * 具有一次性初始化生命周期的 schema 注册表
 *
 * @example
 * ```typescript
 * const registry = new SchemaRegistry();
 * registry.build(JSON.parse(dumpText));
 * registry.isInstantiable('Part'); // true
 * registry.getProperty('Part', 'Anchored'); // { name: 'Anchored', typeTag: 'bool', isReference: false }
 * ```
 */

import { CodecRegistry } from '../codec/CodecRegistry';
import { parseReflectionDump } from '../reflection/ReflectionDump';
import { SerdeError } from '../utils/SerdeError';
import type { SchemaOptions } from '../utils/SerdeOptions';
import { DEFAULT_SCHEMA_OPTIONS } from '../utils/SerdeOptions';
import type { ClassSchema, PropertySpec } from './ClassSchema';
import type { EnumRegistry } from './EnumRegistry';
import type { BuiltSchema } from './SchemaBuilder';
import { buildSchema } from './SchemaBuilder';

export class SchemaRegistry {
  private _built?: BuiltSchema;
  private readonly _options: Required<SchemaOptions>;
  private readonly _split = new Map<string, { values: PropertySpec[]; references: PropertySpec[] }>();

  constructor(options: SchemaOptions = {}, readonly codecs: CodecRegistry = new CodecRegistry()) {
    this._options = { ...DEFAULT_SCHEMA_OPTIONS, ...options };
  }

  /**
   * Build from a reflection dump; must run exactly once before use
   * 从反射转储构建；使用前必须且只能运行一次
   */
  build(dump: unknown): void {
    if (this._built) {
      throw new SerdeError('SCHEMA_ALREADY_BUILT', 'Schema registry has already been built');
    }
    this._built = buildSchema(parseReflectionDump(dump), this._options, this.codecs);
  }

  get isBuilt(): boolean {
    return this._built !== undefined;
  }

  private get built(): BuiltSchema {
    if (!this._built) {
      throw new SerdeError('SCHEMA_NOT_BUILT', 'Schema registry used before build()');
    }
    return this._built;
  }

  getClass(className: string): ClassSchema | undefined {
    return this.built.classes.get(className);
  }

  /**
   * Class schema that must exist
   * 必须存在的类 schema
   */
  requireClass(className: string): ClassSchema {
    const schema = this.getClass(className);
    if (!schema) {
      throw new SerdeError('NOT_INSTANTIABLE', `No schema for class ${className}`);
    }
    return schema;
  }

  getProperty(className: string, property: string): PropertySpec | undefined {
    return this.getClass(className)?.properties.get(property);
  }

  isInstantiable(className: string): boolean {
    return this.built.instantiable.has(className);
  }

  /**
   * Non-reference properties, in schema order
   * 非引用属性（按 schema 顺序）
   */
  valueProperties(className: string): readonly PropertySpec[] {
    return this.split(className).values;
  }

  /**
   * Reference-typed properties, in schema order
   * 引用类型属性（按 schema 顺序）
   */
  referenceProperties(className: string): readonly PropertySpec[] {
    return this.split(className).references;
  }

  private split(className: string): { values: PropertySpec[]; references: PropertySpec[] } {
    let entry = this._split.get(className);
    if (!entry) {
      const schema = this.requireClass(className);
      entry = { values: [], references: [] };
      for (const spec of schema.properties.values()) {
        (spec.isReference ? entry.references : entry.values).push(spec);
      }
      this._split.set(className, entry);
    }
    return entry;
  }

  get enums(): EnumRegistry {
    return this.built.enums;
  }

  get unknownTypeTags(): ReadonlySet<string> {
    return this.built.unknownTypeTags;
  }

  get classNames(): string[] {
    return Array.from(this.built.classes.keys());
  }

  get instantiableClassNames(): string[] {
    return Array.from(this.built.instantiable);
  }
}
