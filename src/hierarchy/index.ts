/**
 * Hierarchy exports
 * 层级导出
 */

export { ChildrenIndex } from './ChildrenIndex';
