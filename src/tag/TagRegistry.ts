/**
 * Tag name registry for string-based instance tagging
 * 基于字符串的实例标签名称注册表
 */
export class TagRegistry {
  private _nextTag = 1;
  private _nameToId = new Map<string, number>();
  private _idToName = new Map<number, string>();

  /**
   * Get or register tag ID for given name
   * 获取或注册指定名称的标签ID
   */
  tagId(name: string): number {
    let id = this._nameToId.get(name);
    if (id === undefined) {
      id = this._nextTag++;
      this._nameToId.set(name, id);
      this._idToName.set(id, name);
    }
    return id;
  }

  tagName(id: number): string | undefined {
    return this._idToName.get(id);
  }

  /**
   * Get all registered tag names and their IDs
   * 获取所有已注册的标签名称及其ID
   */
  getAllTags(): Array<{ name: string; id: number }> {
    return Array.from(this._nameToId.entries()).map(([name, id]) => ({ name, id }));
  }
}
