/**
 * Instance handle allocation with generation-based reuse
 * 基于世代号复用的实例句柄分配
 */

import type { Instance } from './Instance';
import { makeInstance, indexOf, genOf } from './Instance';

export class InstanceManager {
  private generations: Uint32Array;
  private alive: Uint8Array;
  private free: number[] = [];
  // index 0 is reserved so no live handle is ever NULL_INSTANCE
  private nextIndex = 1;
  private _aliveCount = 0;

  constructor(initialCapacity = 256) {
    this.generations = new Uint32Array(initialCapacity);
    this.alive = new Uint8Array(initialCapacity);
  }

  /**
   * Ensure arrays have capacity for the given index
   * 确保数组对给定索引有容量
   */
  private ensure(index: number): void {
    if (index < this.generations.length) return;

    let newSize = this.generations.length || 1;
    while (newSize <= index) {
      newSize <<= 1;
    }

    const newGenerations = new Uint32Array(newSize);
    newGenerations.set(this.generations);
    this.generations = newGenerations;

    const newAlive = new Uint8Array(newSize);
    newAlive.set(this.alive);
    this.alive = newAlive;
  }

  create(): Instance {
    const index = this.free.pop() ?? this.nextIndex++;
    this.ensure(index);

    this.alive[index] = 1;
    this._aliveCount++;
    return makeInstance(index, this.generations[index]);
  }

  /**
   * Release a handle; stale handles are ignored
   * 释放句柄；过期句柄被忽略
   */
  destroy(instance: Instance): boolean {
    if (!this.isAlive(instance)) return false;
    const index = indexOf(instance);

    this.alive[index] = 0;
    // generation wraps within its 20 bits
    this.generations[index] = (this.generations[index] + 1) & 0xfffff;
    this.free.push(index);
    this._aliveCount--;
    return true;
  }

  isAlive(instance: Instance): boolean {
    if (!Number.isInteger(instance) || instance <= 0) return false;
    const index = indexOf(instance);
    return index < this.generations.length &&
           this.alive[index] === 1 &&
           this.generations[index] === genOf(instance);
  }

  aliveCount(): number {
    return this._aliveCount;
  }
}
