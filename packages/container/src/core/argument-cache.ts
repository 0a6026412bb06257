type CacheNode<V> = {
  children: Map<unknown, CacheNode<V>>;
  slot?: { value: V };
};

/**
 * Memoizes one value per tuple of arguments, compared element-wise by
 * identity. Used to give closed generics a stable identity.
 */
export class ArgumentCache<V> {
  private readonly root: CacheNode<V> = { children: new Map() };
  private count = 0;

  get size(): number {
    return this.count;
  }

  get(args: readonly unknown[]): V | undefined {
    let node: CacheNode<V> | undefined = this.root;
    for (const arg of args) {
      node = node.children.get(arg);
      if (!node) return undefined;
    }
    return node.slot?.value;
  }

  getOrCreate(args: readonly unknown[], create: () => V): V {
    let node = this.root;
    for (const arg of args) {
      let next = node.children.get(arg);
      if (!next) {
        next = { children: new Map() };
        node.children.set(arg, next);
      }
      node = next;
    }
    if (!node.slot) {
      node.slot = { value: create() };
      this.count++;
    }
    return node.slot.value;
  }
}
