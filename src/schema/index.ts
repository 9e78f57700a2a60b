/**
 * Schema exports
 * Schema 导出
 */

export { SchemaRegistry } from './SchemaRegistry';
export { DefaultResolver } from './DefaultResolver';
export { EnumRegistry } from './EnumRegistry';
export { buildSchema, propertyOf } from './SchemaBuilder';
export type { BuiltSchema } from './SchemaBuilder';
export type { ClassSchema, PropertySpec } from './ClassSchema';
