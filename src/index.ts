/**
 * instance-serde - schema-driven serialization of attributed object trees
 * 基于 schema 的带特性对象树序列化
 *
 * @packageDocumentation
 */

// Facade
export { InstanceSerde } from './InstanceSerde';

// Host model
export type { HostModel } from './model/HostModel';
export type { Instance } from './core/Instance';
export { NULL_INSTANCE, makeInstance, indexOf, genOf } from './core/Instance';
export { InstanceManager } from './core/InstanceManager';
export { InstanceWorld } from './core/InstanceWorld';
export type { InstanceClass } from './core/InstanceWorld';
export { ChildrenIndex } from './hierarchy';
export { TagRegistry, TagStore } from './tag';

// Reflection and schema
export * from './reflection';
export * from './schema';

// Values
export * from './datatypes';
export * from './codec';

// Serialization
export * from './serialize';

// Diagnostics, errors and options
export * from './diagnostics';
export { SerdeError, isSerdeError, toSerdeError } from './utils/SerdeError';
export type { SerdeErrorCode } from './utils/SerdeError';
export { DEFAULT_SCHEMA_OPTIONS, resolveSerdeOptions } from './utils/SerdeOptions';
export type { SchemaOptions, SerdeOptions, OrphanPolicy } from './utils/SerdeOptions';
