/**
 * Configuration types and defaults
 * 配置类型与默认值
 */

import { ConsoleDiagnosticSink } from '../diagnostics/ConsoleDiagnosticSink';
import type { DiagnosticSink } from '../diagnostics/Diagnostic';

/**
 * Rules that decide which reflected classes and members become schema
 * 决定哪些反射类与成员进入 schema 的规则
 */
export interface SchemaOptions {
  /** Security level treated as public 视为公开的安全级别 */
  publicSecurity?: string;
  /** Properties handled out of band, never as data 带外处理、不作为数据的属性 */
  ignoredProperties?: readonly string[];
  /** Member tags that exclude a property 排除属性的成员标签 */
  skippedMemberTags?: readonly string[];
  /** Class tag marking infrastructure singletons 标记基础设施单例的类标签 */
  serviceTag?: string;
  /** Class tag marking classes that cannot be created by name 标记不可按名称创建的类标签 */
  notCreatableTag?: string;
}

/**
 * What to do with the children of a node that failed to materialize
 * 节点实例化失败时其子节点的处理方式
 */
export type OrphanPolicy = 'drop' | 'reparent';

export interface SerdeOptions {
  schema?: SchemaOptions;
  /** Orphan handling during deserialization 反序列化时的孤儿处理 */
  orphanPolicy?: OrphanPolicy;
  /** Diagnostic receiver 诊断接收器 */
  diagnostics?: DiagnosticSink;
}

export const DEFAULT_SCHEMA_OPTIONS: Required<SchemaOptions> = {
  publicSecurity: 'None',
  ignoredProperties: ['Parent'],
  skippedMemberTags: ['ReadOnly', 'NotScriptable', 'Deprecated'],
  serviceTag: 'Service',
  notCreatableTag: 'NotCreatable'
};

/**
 * Resolve options against the defaults
 * 将选项与默认值合并
 */
export function resolveSerdeOptions(options: SerdeOptions = {}): {
  schema: Required<SchemaOptions>;
  orphanPolicy: OrphanPolicy;
  diagnostics: DiagnosticSink;
} {
  return {
    schema: { ...DEFAULT_SCHEMA_OPTIONS, ...options.schema },
    orphanPolicy: options.orphanPolicy ?? 'drop',
    diagnostics: options.diagnostics ?? new ConsoleDiagnosticSink()
  };
}
