/**
 * Per-instance tag storage, keeping the order tags were added in
 * 按实例存储标签，保持添加顺序
 */

import type { Instance } from '../core/Instance';

export class TagStore {
  private tags = new Map<Instance, Set<number>>();

  add(i: Instance, tag: number): void {
    let set = this.tags.get(i);
    if (!set) {
      set = new Set();
      this.tags.set(i, set);
    }
    set.add(tag);
  }

  remove(i: Instance, tag: number): void {
    const set = this.tags.get(i);
    if (!set) return;
    set.delete(tag);
    if (set.size === 0) {
      this.tags.delete(i);
    }
  }

  has(i: Instance, tag: number): boolean {
    return this.tags.get(i)?.has(tag) ?? false;
  }

  /**
   * Tag ids of an instance in insertion order
   * 按插入顺序获取实例的标签ID
   */
  getInstanceTags(i: Instance): number[] {
    return Array.from(this.tags.get(i) ?? []);
  }

  /**
   * Instances carrying a tag
   * 具有指定标签的实例
   */
  getInstancesWithTag(tag: number): Instance[] {
    const out: Instance[] = [];
    for (const [i, set] of this.tags) {
      if (set.has(tag)) out.push(i);
    }
    return out;
  }

  clearInstance(i: Instance): void {
    this.tags.delete(i);
  }
}
