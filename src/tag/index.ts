/**
 * Tag system exports
 * 标签系统导出
 */

export { TagRegistry } from './TagRegistry';
export { TagStore } from './TagStore';
