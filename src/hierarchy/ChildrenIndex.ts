/**
 * Ordered parent/child index for instance trees
 * 实例树的有序父子索引
 */

import type { Instance } from '../core/Instance';
import { NULL_INSTANCE } from '../core/Instance';

/**
 * Bidirectional index for parent-child relationships; children keep
 * the order in which they were linked
 * 父子关系的双向索引；子节点保持链接顺序
 */
export class ChildrenIndex {
  private map = new Map<Instance, Instance[]>();
  private parentOf = new Map<Instance, Instance>(); // 反查 child→parent

  /**
   * Get all children of a parent, in order
   * 按顺序获取父实例的所有子实例
   */
  childrenOf(p: Instance): readonly Instance[] {
    return this.map.get(p) ?? [];
  }

  /**
   * Parent of an instance, NULL_INSTANCE for roots
   * 获取实例的父实例，根实例返回 NULL_INSTANCE
   */
  parentOfInstance(i: Instance): Instance {
    return this.parentOf.get(i) ?? NULL_INSTANCE;
  }

  /**
   * Move `child` under `parent` (appended last), or detach it with NULL_INSTANCE
   * 将 `child` 移到 `parent` 下（追加到末尾），传 NULL_INSTANCE 则分离
   */
  link(child: Instance, parent: Instance): void {
    this.unlinkFromParent(child);

    if (parent !== NULL_INSTANCE) {
      let arr = this.map.get(parent);
      if (!arr) {
        arr = [];
        this.map.set(parent, arr);
      }
      arr.push(child);
      this.parentOf.set(child, parent);
    } else {
      this.parentOf.delete(child);
    }
  }

  private unlinkFromParent(child: Instance): void {
    const old = this.parentOf.get(child);
    if (old === undefined || old === NULL_INSTANCE) return;
    const arr = this.map.get(old);
    if (arr) {
      const i = arr.indexOf(child);
      if (i >= 0) arr.splice(i, 1);
      if (arr.length === 0) this.map.delete(old);
    }
  }

  /**
   * Remove every record involving an instance; its children become roots
   * 清理涉及该实例的所有记录；其子实例变为根
   */
  clearInstance(i: Instance): void {
    this.unlinkFromParent(i);
    this.parentOf.delete(i);

    const children = this.map.get(i);
    if (children) {
      for (const c of children) {
        this.parentOf.delete(c);
      }
      this.map.delete(i);
    }
  }

  /**
   * Ancestor detection: would parenting `child` under `newParent` form a cycle
   * 祖先检测：将 `child` 挂到 `newParent` 下是否成环
   */
  wouldCreateCycle(child: Instance, newParent: Instance): boolean {
    let cur = newParent;
    while (cur !== NULL_INSTANCE) {
      if (cur === child) return true;
      cur = this.parentOfInstance(cur);
    }
    return false;
  }

  /**
   * All descendants in pre-order
   * 先序排列的所有后代
   */
  getDescendants(i: Instance): Instance[] {
    const descendants: Instance[] = [];
    const visit = (p: Instance): void => {
      for (const c of this.childrenOf(p)) {
        descendants.push(c);
        visit(c);
      }
    };
    visit(i);
    return descendants;
  }

  clear(): void {
    this.map.clear();
    this.parentOf.clear();
  }
}
