/**
 * Disjoint sets over 0..size-1 with path compression. The smaller index
 * always becomes the root, so the final partition does not depend on the
 * order unions are applied in.
 */
export class UnionFind {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let root = x;
    while ((this.parent[root] ?? root) !== root) {
      root = this.parent[root] ?? root;
    }
    // Compress the path walked
    let node = x;
    while (node !== root) {
      const next = this.parent[node] ?? root;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
  }

  groups(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (let i = 0; i < this.parent.length; i++) {
      const root = this.find(i);
      const members = byRoot.get(root) ?? [];
      members.push(i);
      byRoot.set(root, members);
    }
    return Array.from(byRoot.values());
  }
}
